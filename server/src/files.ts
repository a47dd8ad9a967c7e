import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { extname } from 'path';
import type { DirectoryEntry, DirectoryListing } from 'sharedir-shared';
import type { SandboxedPath } from './paths.js';

export type { DirectoryEntry, DirectoryListing };

export const MAX_UPLOAD_SIZE = 500 * 1024 * 1024; // 500 MiB per request
export const INDEX_DOCUMENT = 'index.html';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'application/javascript; charset=utf-8',
  '.mjs': 'application/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.pdf': 'application/pdf',
  '.wasm': 'application/wasm',
  '.xml': 'application/xml; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
  '.md': 'text/plain; charset=utf-8',
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.webp': 'image/webp',
};

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/** Content type by extension (case-sensitive, as stored on disk) */
export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path)] ?? DEFAULT_CONTENT_TYPE;
}

/** Directories first, then case-insensitive name; raw name breaks ties */
export function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.kind !== b.kind) return a.kind === 'directory' ? -1 : 1;
  const la = a.name.toLowerCase();
  const lb = b.name.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * List a directory, skipping dot-entries. Best effort: an entry whose
 * metadata can't be read, or that resolves outside the root, is still
 * listed with zero size/age, and an unreadable directory lists as empty.
 */
export async function listDirectory(dir: SandboxedPath, now = Date.now()): Promise<DirectoryEntry[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir.absolute, { withFileTypes: true });
  } catch (err) {
    console.error(`[list] ${dir.relative || '/'}:`, err);
    return [];
  }

  const visible = dirents.filter((d) => !d.name.startsWith('.'));

  // Batched parallel stat to avoid excessive concurrent syscalls on large directories
  const BATCH_SIZE = 50;
  const results: DirectoryEntry[] = [];
  for (let i = 0; i < visible.length; i += BATCH_SIZE) {
    const batch = visible.slice(i, i + BATCH_SIZE);
    // stat only what resolves inside the root; escaping symlinks list with zero metadata
    const settled = await Promise.allSettled(batch.map(async (d) => stat((await dir.child(d.name)).absolute)));
    settled.forEach((result, j) => {
      const dirent = batch[j];
      if (result.status === 'fulfilled') {
        const s = result.value;
        results.push({
          name: dirent.name,
          kind: s.isDirectory() ? 'directory' : 'file',
          size: s.isDirectory() ? 0 : s.size,
          ageSeconds: Math.max(0, Math.floor((now - s.mtimeMs) / 1000)),
        });
      } else {
        results.push({
          name: dirent.name,
          kind: dirent.isDirectory() ? 'directory' : 'file',
          size: 0,
          ageSeconds: 0,
        });
      }
    });
  }

  return results.sort(compareEntries);
}

/** Listing payload for `dir`, addressed by the request path the client used */
export async function buildListing(dir: SandboxedPath): Promise<DirectoryListing> {
  const rel = dir.relative;
  const path = rel === '' ? '/' : `/${rel}/`;
  let parent: string | null = null;
  if (!dir.isRoot) {
    const cut = rel.lastIndexOf('/');
    parent = cut === -1 ? '/' : `/${rel.slice(0, cut)}/`;
  }
  return { path, parent, entries: await listDirectory(dir) };
}
