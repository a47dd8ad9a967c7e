import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { createReadStream, type Stats } from 'fs';
import { stat, writeFile } from 'fs/promises';
import { STATUS_CODES } from 'http';
import { pipeline, type Readable, type Writable } from 'stream';
import { SandboxedPath } from '../paths.js';
import { INDEX_DOCUMENT, MAX_UPLOAD_SIZE, buildListing, contentTypeFor } from '../files.js';
import { getBoundary, parseMultipart } from '../multipart.js';
import { extractFileList } from '../selection.js';
import { ARCHIVE_FILENAME, buildArchive } from '../archive.js';
import { BadRequestError, NotFoundError, PayloadTooLargeError, isShareError } from '../errors.js';
import { formatSize, formatSpeed } from '../format.js';
import { jsonPresenter, type ListingPresenter } from '../presenter.js';
import type { ServerConfig } from '../config.js';

export const UPLOAD_SUFFIX = '/__upload';
export const DOWNLOAD_SUFFIX = '/__download';
const MAX_SELECTION_BODY = '1mb';

export interface FileRouterOptions {
  maxUploadBytes?: number;
  presentListing?: ListingPresenter;
}

/** Replace anything outside letters, digits, `.`, `-`, `_` and space */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^\p{L}\p{N}._\- ]/gu, '_');
}

function isStorableName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..';
}

/** Request path of the directory an upload/download suffix is attached to */
function directoryOf(path: string, suffix: string): string {
  const dir = path.slice(0, path.length - suffix.length);
  return dir === '' ? '/' : dir;
}

function sendText(res: Response, status: number, body: string): void {
  res.status(status).type('text/plain; charset=utf-8').send(body);
}

export function createFileRouter(config: ServerConfig, options: FileRouterOptions = {}): Router {
  const router = Router();
  const maxUploadBytes = options.maxUploadBytes ?? MAX_UPLOAD_SIZE;
  const presentListing = options.presentListing ?? jsonPresenter;
  const { root } = config;

  const uploadPattern = /\/__upload$/;
  const downloadPattern = /\/__download$/;

  // --- Upload (multipart) ---

  async function resolveUploadTarget(req: Request, res: Response, next: NextFunction) {
    try {
      let dir: SandboxedPath;
      try {
        dir = await SandboxedPath.resolve(directoryOf(req.path, UPLOAD_SUFFIX), root);
      } catch {
        throw new BadRequestError('Invalid path');
      }
      const s = await stat(dir.absolute);
      if (!s.isDirectory()) throw new BadRequestError('Not a directory');
      const boundary = getBoundary(req.headers['content-type']);
      if (!boundary) throw new BadRequestError('Missing boundary');
      res.locals.uploadDir = dir;
      res.locals.boundary = boundary;
      next();
    } catch (err) {
      next(err);
    }
  }

  const uploadBody = express.raw({ type: () => true, limit: maxUploadBytes });

  async function handleUpload(req: Request, res: Response, next: NextFunction) {
    const started = Date.now();
    try {
      const dir: unknown = res.locals.uploadDir;
      const boundary: unknown = res.locals.boundary;
      if (!(dir instanceof SandboxedPath) || typeof boundary !== 'string') {
        throw new BadRequestError('Invalid path');
      }
      const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      if (body.length > maxUploadBytes) throw new PayloadTooLargeError();

      const parts = parseMultipart(body, boundary);
      if (parts.length === 0) throw new BadRequestError('No file in upload');
      const elapsedMs = Date.now() - started;

      for (const part of parts) {
        const safeName = sanitizeFilename(part.filename);
        if (!isStorableName(safeName)) continue;
        try {
          const dest = await dir.newChild(safeName);
          await writeFile(dest.absolute, part.data);
          console.log(`[upload] ${dest.relative} (${formatSize(part.data.length)} at ${formatSpeed(part.data.length, elapsedMs)})`);
        } catch (err) {
          console.error(`[upload] failed to store ${safeName}:`, err);
        }
      }
      sendText(res, 200, 'OK');
    } catch (err) {
      next(err);
    }
  }

  router.post(uploadPattern, resolveUploadTarget, uploadBody, handleUpload);

  // --- Download selection as ZIP ---

  const selectionBody = express.text({ type: () => true, limit: MAX_SELECTION_BODY });

  router.post(downloadPattern, selectionBody, async (req, res, next) => {
    try {
      const body = typeof req.body === 'string' ? req.body : '';
      const paths = extractFileList(body);
      if (paths.length === 0) throw new BadRequestError('No files specified');

      const zip = await buildArchive(root, paths);
      console.log(`[download] ZIP ${formatSize(zip.length)} (${paths.length} selected)`);
      res.status(200);
      res.setHeader('Content-Type', 'application/zip');
      res.setHeader('Content-Disposition', `attachment; filename="${ARCHIVE_FILENAME}"`);
      res.setHeader('Content-Length', zip.length);
      res.end(zip);
    } catch (err) {
      next(err);
    }
  });

  // --- Static files and directory listings ---

  // Regex routes carry no params, so Express never URI-decodes the path;
  // percentDecode keeps malformed escapes literal instead.
  router.get(/.*/, async (req, res, next) => {
    const notFound = () => sendText(res, 404, new NotFoundError(req.path).message);
    try {
      let target: SandboxedPath;
      let s: Stats;
      try {
        target = await SandboxedPath.resolve(req.path, root);
        s = await stat(target.absolute);
      } catch {
        notFound();
        return;
      }

      if (s.isDirectory()) {
        let index: SandboxedPath | null = null;
        try {
          index = await target.child(INDEX_DOCUMENT);
          if (!(await stat(index.absolute)).isFile()) index = null;
        } catch {
          index = null;
        }
        if (index) {
          await sendFile(req, res, index, 'text/html; charset=utf-8', notFound);
          return;
        }
        const listing = await buildListing(target);
        const { contentType, body } = presentListing(listing);
        res.status(200).type(contentType).send(body);
        return;
      }

      if (!s.isFile()) {
        notFound();
        return;
      }
      await sendFile(req, res, target, contentTypeFor(target.absolute), notFound);
    } catch (err) {
      next(err);
    }
  });

  router.all(/.*/, (req, res) => {
    res.setHeader('Allow', 'GET, HEAD, POST');
    sendText(res, 405, 'Method not allowed');
  });

  return router;
}

async function sendFile(
  req: Request,
  res: Response,
  file: SandboxedPath,
  contentType: string,
  notFound: () => void,
): Promise<void> {
  let size: number;
  try {
    size = (await stat(file.absolute)).size;
  } catch {
    notFound();
    return;
  }
  res.status(200);
  res.setHeader('Content-Type', contentType);
  res.setHeader('Content-Length', size);
  if (req.method === 'HEAD') {
    res.end();
    return;
  }
  streamFile(createReadStream(file.absolute), res, file.relative);
}

/** Pipe `source` into `res`; either side failing or closing early destroys both */
export function streamFile(source: Readable, res: Writable, label: string): void {
  pipeline(source, res, (err) => {
    if (err) console.error(`[static] transfer of ${label} ended early:`, err.message);
  });
}

function clientErrorStatus(err: unknown): number | null {
  if (!err || typeof err !== 'object' || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/** Map ShareErrors, body-parser limits and other 4xx errors to short text responses */
export function fileErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isShareError(err)) {
    sendText(res, err.status, err.message);
    return;
  }
  if (err && typeof err === 'object' && 'type' in err && err.type === 'entity.too.large') {
    sendText(res, 413, new PayloadTooLargeError().message);
    return;
  }
  // body-parser and Express tag bad input with a 4xx status
  const status = clientErrorStatus(err);
  if (status !== null) {
    sendText(res, status, STATUS_CODES[status] ?? 'Bad request');
    return;
  }
  console.error('[http] unhandled error:', err);
  sendText(res, 500, 'Internal error');
}
