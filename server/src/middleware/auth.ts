import type { Request, RequestHandler } from 'express';
import { safeTokenCompare } from '../auth.js';
import { UnauthorizedError } from '../errors.js';

export const AUTH_REALM = 'sharedir';

/** Extract the Basic credential (still base64) from the Authorization header */
export function extractBasicCredential(req: Request): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader && authHeader.startsWith('Basic ')) {
    return authHeader.slice(6).trim();
  }
  return undefined;
}

/**
 * Gate every request on the configured credential. Runs before routing:
 * a rejected request never reaches path resolution or the filesystem.
 */
export function requireCredential(expected: string | null): RequestHandler {
  return (req, res, next) => {
    if (!expected) return next();
    const provided = extractBasicCredential(req);
    if (provided && safeTokenCompare(provided, expected)) return next();
    const err = new UnauthorizedError();
    res
      .status(err.status)
      .set('WWW-Authenticate', `Basic realm="${AUTH_REALM}"`)
      .type('text/plain')
      .send(err.message);
  };
}
