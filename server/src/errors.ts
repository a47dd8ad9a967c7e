/**
 * Error taxonomy for request handling.
 *
 * Every error a handler raises on purpose is a ShareError carrying the HTTP
 * status it maps to; the error middleware in app.ts writes `message` as a
 * short text body.
 */

export type ShareErrorCode =
  | 'PATH_ESCAPE'
  | 'NOT_FOUND'
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNAUTHORIZED'
  | 'INTERNAL_FAILURE';

export class ShareError extends Error {
  constructor(
    public readonly code: ShareErrorCode,
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ShareError';
  }
}

/** The canonical location lies outside the shared root */
export class PathEscapeError extends ShareError {
  constructor(public readonly requestPath: string) {
    super('PATH_ESCAPE', 403, `Path escapes shared root: ${requestPath}`);
    this.name = 'PathEscapeError';
  }
}

export class NotFoundError extends ShareError {
  constructor(public readonly requestPath: string) {
    super('NOT_FOUND', 404, `404 Not Found: ${requestPath}`);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends ShareError {
  constructor(message: string) {
    super('BAD_REQUEST', 400, message);
    this.name = 'BadRequestError';
  }
}

export class PayloadTooLargeError extends ShareError {
  constructor(message = '500MB max') {
    super('PAYLOAD_TOO_LARGE', 413, message);
    this.name = 'PayloadTooLargeError';
  }
}

export class UnauthorizedError extends ShareError {
  constructor() {
    super('UNAUTHORIZED', 401, 'Authentication required');
    this.name = 'UnauthorizedError';
  }
}

/** I/O or archive codec failure */
export class InternalFailureError extends ShareError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTERNAL_FAILURE', 500, message);
    this.name = 'InternalFailureError';
    if (options && 'cause' in options) this.cause = options.cause;
  }
}

/** Invalid startup configuration; never reaches a client */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isShareError(error: unknown): error is ShareError {
  return error instanceof ShareError;
}

/** Node system error code (ENOENT, EACCES, ...) if present */
export function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
