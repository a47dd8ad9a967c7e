import { realpath, stat, lstat } from 'fs/promises';
import { basename, dirname, isAbsolute, join, relative, sep } from 'path';
import { ConfigError, NotFoundError, PathEscapeError, errnoCode } from './errors.js';

/* ── Containment (component-wise, never a string prefix) ── */
export function isContainedIn(path: string, base: string): boolean {
  const rel = relative(base, path);
  if (rel === '') return true;
  if (isAbsolute(rel)) return false;
  return rel.split(sep)[0] !== '..';
}

/**
 * Decode %XX escapes byte-wise. Malformed escapes are kept literally and
 * invalid UTF-8 sequences become U+FFFD, so decoding never throws.
 */
export function percentDecode(input: string): string {
  const src = Buffer.from(input, 'utf-8');
  const out = Buffer.alloc(src.length);
  let n = 0;
  for (let i = 0; i < src.length; i++) {
    if (src[i] === 0x25 && i + 2 < src.length) {
      const hex = src.subarray(i + 1, i + 3).toString('latin1');
      if (/^[0-9a-fA-F]{2}$/.test(hex)) {
        out[n++] = parseInt(hex, 16);
        i += 2;
        continue;
      }
    }
    out[n++] = src[i];
  }
  return out.subarray(0, n).toString('utf-8');
}

/** A single path component that may name an entry inside a directory */
function isPlainName(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !name.includes('/') && !name.includes('\\') && !name.includes('\0');
}

/**
 * A filesystem location proven to lie inside the shared root.
 *
 * The constructor is private: a SandboxedPath only comes out of `open`
 * (the root itself), `resolve` (untrusted request paths), `child` and
 * `newChild`. Handlers never check containment themselves.
 */
export class SandboxedPath {
  private constructor(
    /** Canonical absolute path (for `newChild`, the not-yet-existing target) */
    readonly absolute: string,
    private readonly rootAbsolute: string,
  ) {}

  /** Canonicalize the configured share directory */
  static async open(dir: string): Promise<SandboxedPath> {
    let real: string;
    try {
      real = await realpath(dir);
    } catch {
      throw new ConfigError(`directory not found: ${dir}`);
    }
    const s = await stat(real);
    if (!s.isDirectory()) throw new ConfigError(`not a directory: ${dir}`);
    return new SandboxedPath(real, real);
  }

  /**
   * Map a request-relative path (as found in a URL, still percent-encoded)
   * to a location under `root`.
   *
   * Lexical escapes are rejected before touching the filesystem; symlink
   * escapes are rejected after canonicalization.
   */
  static async resolve(requestPath: string, root: SandboxedPath): Promise<SandboxedPath> {
    const rootAbs = root.rootAbsolute;
    const decoded = percentDecode(requestPath.replace(/^\/+/, ''));
    if (decoded === '') return root.toRoot();

    const joined = join(rootAbs, decoded);
    if (!isContainedIn(joined, rootAbs)) throw new PathEscapeError(requestPath);

    let real: string;
    try {
      real = await realpath(joined);
    } catch {
      throw new NotFoundError(requestPath);
    }
    if (!isContainedIn(real, rootAbs)) throw new PathEscapeError(requestPath);
    return new SandboxedPath(real, rootAbs);
  }

  /** Canonicalize an existing entry of this directory, re-checking containment */
  async child(name: string): Promise<SandboxedPath> {
    if (!isPlainName(name)) throw new PathEscapeError(name);
    let real: string;
    try {
      real = await realpath(join(this.absolute, name));
    } catch {
      throw new NotFoundError(name);
    }
    if (!isContainedIn(real, this.rootAbsolute)) throw new PathEscapeError(name);
    return new SandboxedPath(real, this.rootAbsolute);
  }

  /**
   * Destination for a file about to be written into this directory.
   * The parent is canonicalized again, and an existing entry (e.g. a
   * symlink) must itself resolve inside root.
   */
  async newChild(name: string): Promise<SandboxedPath> {
    if (!isPlainName(name)) throw new PathEscapeError(name);
    const dest = join(this.absolute, name);

    let parent: string;
    try {
      parent = await realpath(dirname(dest));
    } catch {
      throw new NotFoundError(this.relative);
    }
    if (!isContainedIn(parent, this.rootAbsolute)) throw new PathEscapeError(name);

    const target = join(parent, name);
    try {
      await lstat(target);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return new SandboxedPath(target, this.rootAbsolute);
      throw err;
    }
    let existing: string;
    try {
      existing = await realpath(target);
    } catch {
      // dangling symlink: writing would create its target wherever it points
      throw new PathEscapeError(name);
    }
    if (!isContainedIn(existing, this.rootAbsolute)) throw new PathEscapeError(name);
    return new SandboxedPath(existing, this.rootAbsolute);
  }

  get isRoot(): boolean {
    return this.absolute === this.rootAbsolute;
  }

  get name(): string {
    return basename(this.absolute);
  }

  /** Path relative to the root, `/`-separated, empty for the root */
  get relative(): string {
    return relative(this.rootAbsolute, this.absolute).split(sep).join('/');
  }

  private toRoot(): SandboxedPath {
    return this.isRoot ? this : new SandboxedPath(this.rootAbsolute, this.rootAbsolute);
  }

  toString(): string {
    return this.absolute;
  }
}
