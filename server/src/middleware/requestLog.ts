import type { RequestHandler } from 'express';
import { normalizeAddress } from '../format.js';
import { UPLOAD_SUFFIX } from '../routes/files.js';

/**
 * One access line per finished request. Successful uploads are skipped: the upload
 * handler logs each stored file itself.
 */
export function requestLog(): RequestHandler {
  return (req, res, next) => {
    res.on('finish', () => {
      if (req.method === 'POST' && req.path.endsWith(UPLOAD_SUFFIX) && res.statusCode === 200) return;
      console.log(`[http] ${res.statusCode} ${req.method} ${req.path} ${normalizeAddress(req.socket.remoteAddress)}`);
    });
    next();
  };
}
