import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, symlink, utimes } from 'fs/promises';
import { join } from 'path';
import { SandboxedPath } from './paths.js';
import { buildListing, compareEntries, contentTypeFor, listDirectory } from './files.js';
import { makeTempDir, removeTree, writeTree } from './test-helpers.js';

describe('contentTypeFor', () => {
  it('maps known extensions', () => {
    expect(contentTypeFor('/x/index.html')).toBe('text/html; charset=utf-8');
    expect(contentTypeFor('/x/app.mjs')).toBe('application/javascript; charset=utf-8');
    expect(contentTypeFor('/x/photo.jpeg')).toBe('image/jpeg');
    expect(contentTypeFor('/x/notes.md')).toBe('text/plain; charset=utf-8');
  });

  it('falls back to a generic binary type', () => {
    expect(contentTypeFor('/x/archive.tar.gz')).toBe('application/octet-stream');
    expect(contentTypeFor('/x/Makefile')).toBe('application/octet-stream');
  });
});

describe('compareEntries', () => {
  it('is total: case-insensitive first, raw name as tie-break', () => {
    const a = { name: 'a', kind: 'file' as const, size: 0, ageSeconds: 0 };
    const A = { name: 'A', kind: 'file' as const, size: 0, ageSeconds: 0 };
    expect(compareEntries(A, a)).toBe(-1);
    expect(compareEntries(a, A)).toBe(1);
    expect(compareEntries(a, a)).toBe(0);
  });
});

describe('listDirectory', () => {
  let rootDir: string;
  let root: SandboxedPath;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    root = await SandboxedPath.open(rootDir);
  });

  afterEach(async () => {
    await removeTree(rootDir);
  });

  it('returns an empty list for an empty directory', async () => {
    expect(await listDirectory(root)).toEqual([]);
  });

  it('puts directories first, then names case-insensitively', async () => {
    await writeTree(rootDir, {
      'beta.txt': 'bb',
      'Alpha.txt': 'a',
      'zeta/inner.txt': 'z',
      'Docs/x.txt': 'x',
    });

    const entries = await listDirectory(root);
    expect(entries.map((e) => [e.name, e.kind])).toEqual([
      ['Docs', 'directory'],
      ['zeta', 'directory'],
      ['Alpha.txt', 'file'],
      ['beta.txt', 'file'],
    ]);
    expect(entries.find((e) => e.name === 'beta.txt')?.size).toBe(2);
  });

  it('hides dot-entries', async () => {
    await writeTree(rootDir, { '.env': 'secret', '.git/HEAD': 'ref', 'shown.txt': 's' });
    const entries = await listDirectory(root);
    expect(entries.map((e) => e.name)).toEqual(['shown.txt']);
  });

  it('reports age since modification in seconds', async () => {
    await writeTree(rootDir, { 'old.txt': 'o' });
    const mtime = new Date('2024-01-01T00:00:00Z');
    await utimes(join(rootDir, 'old.txt'), mtime, mtime);

    const now = mtime.getTime() + 90_000;
    const [entry] = await listDirectory(root, now);
    expect(entry.ageSeconds).toBe(90);
  });

  it('keeps an entry whose metadata cannot be read, with zero size and age', async () => {
    await symlink(join(rootDir, 'gone'), join(rootDir, 'broken-link'));
    const entries = await listDirectory(root);
    expect(entries).toEqual([{ name: 'broken-link', kind: 'file', size: 0, ageSeconds: 0 }]);
  });
});

describe('listDirectory outside the root', () => {
  let base: string;
  let root: SandboxedPath;

  beforeEach(async () => {
    base = await makeTempDir();
    await writeTree(base, { 'outside.bin': 'x'.repeat(12345), 'share/inside.txt': 'abc' });
    root = await SandboxedPath.open(join(base, 'share'));
  });

  afterEach(async () => {
    await removeTree(base);
  });

  it('does not read metadata through a symlink that leaves the root', async () => {
    await symlink(join(base, 'outside.bin'), join(base, 'share', 'peek'));
    const entries = await listDirectory(root);
    expect(entries.find((e) => e.name === 'peek')).toEqual({ name: 'peek', kind: 'file', size: 0, ageSeconds: 0 });
  });

  it('reads metadata through a symlink that stays inside', async () => {
    await symlink(join(base, 'share', 'inside.txt'), join(base, 'share', 'alias.txt'));
    const entries = await listDirectory(root);
    expect(entries.find((e) => e.name === 'alias.txt')?.size).toBe(3);
  });
});

describe('buildListing', () => {
  let rootDir: string;
  let root: SandboxedPath;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    root = await SandboxedPath.open(rootDir);
    await mkdir(join(rootDir, 'a', 'b'), { recursive: true });
  });

  afterEach(async () => {
    await removeTree(rootDir);
  });

  it('has no parent at the root', async () => {
    const listing = await buildListing(root);
    expect(listing.path).toBe('/');
    expect(listing.parent).toBeNull();
    expect(listing.entries.map((e) => e.name)).toEqual(['a']);
  });

  it('addresses nested directories and their parents', async () => {
    const b = await SandboxedPath.resolve('/a/b', root);
    const listing = await buildListing(b);
    expect(listing.path).toBe('/a/b/');
    expect(listing.parent).toBe('/a/');

    const a = await SandboxedPath.resolve('/a', root);
    expect((await buildListing(a)).parent).toBe('/');
  });
});
