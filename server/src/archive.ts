import archiver from 'archiver';
import type { Stats } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import { SandboxedPath } from './paths.js';
import { InternalFailureError } from './errors.js';

export const ARCHIVE_FILENAME = 'sharedir-download.zip';

export interface ArchiveEntry {
  /** `/`-joined name inside the archive */
  name: string;
  source: SandboxedPath;
}

interface PendingDir {
  dir: SandboxedPath;
  prefix: string;
}

async function readEntry(path: SandboxedPath): Promise<Buffer | null> {
  try {
    return await readFile(path.absolute);
  } catch (err) {
    console.error(`[archive] skipping ${path.relative}:`, err);
    return null;
  }
}

/**
 * Walk `top` with an explicit work-list. Every entry is re-resolved through
 * `child()`, so a symlink swapped in mid-walk still can't leave the root.
 */
async function collectDirectory(top: SandboxedPath, prefix: string, out: ArchiveEntry[]): Promise<void> {
  const visited = new Set<string>([top.absolute]);
  const pending: PendingDir[] = [{ dir: top, prefix }];

  let next: PendingDir | undefined;
  while ((next = pending.pop())) {
    const { dir, prefix: dirPrefix } = next;
    let names: string[];
    try {
      names = (await readdir(dir.absolute)).sort();
    } catch (err) {
      console.error(`[archive] cannot read ${dir.relative || '/'}:`, err);
      continue;
    }

    for (const name of names) {
      if (name.startsWith('.')) continue;
      let child: SandboxedPath;
      try {
        child = await dir.child(name);
      } catch {
        continue;
      }
      const entryName = dirPrefix ? `${dirPrefix}/${name}` : name;
      let isDir: boolean;
      try {
        const s = await stat(child.absolute);
        if (!s.isFile() && !s.isDirectory()) continue;
        isDir = s.isDirectory();
      } catch {
        continue;
      }
      if (isDir) {
        // symlinked directories may point back up the tree
        if (visited.has(child.absolute)) continue;
        visited.add(child.absolute);
        pending.push({ dir: child, prefix: entryName });
      } else {
        out.push({ name: entryName, source: child });
      }
    }
  }
}

/**
 * Resolve each selection and gather the entries to store. Selections that
 * fail to resolve (missing, outside root, empty) are skipped.
 */
export async function collectSelections(root: SandboxedPath, selections: string[]): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  for (const selection of selections) {
    if (selection.replace(/^\/+/, '') === '') continue;
    let target: SandboxedPath;
    try {
      target = await SandboxedPath.resolve(selection, root);
    } catch {
      continue;
    }
    let s: Stats;
    try {
      s = await stat(target.absolute);
    } catch {
      continue;
    }
    if (s.isFile()) {
      entries.push({ name: target.name, source: target });
    } else if (s.isDirectory()) {
      await collectDirectory(target, target.name, entries);
    }
  }
  return entries;
}

/** Resolves once archiver has compressed the appended entry */
function appendEntry(zip: archiver.Archiver, data: Buffer, name: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onEntry = () => {
      zip.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      zip.off('entry', onEntry);
      reject(err);
    };
    zip.once('entry', onEntry);
    zip.once('error', onError);
    zip.append(data, { name });
  });
}

/** Read and compress one file at a time; unreadable files are skipped */
async function feedEntries(zip: archiver.Archiver, entries: ArchiveEntry[]): Promise<void> {
  for (const entry of entries) {
    const data = await readEntry(entry.source);
    if (data) await appendEntry(zip, data, entry.name);
  }
}

/** DEFLATE the entries into an in-memory ZIP */
export function zipEntries(entries: ArchiveEntry[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const zip = archiver('zip', { zlib: { level: 6 } });
    const chunks: Buffer[] = [];
    zip.on('data', (chunk: Buffer) => chunks.push(chunk));
    zip.on('end', () => resolve(Buffer.concat(chunks)));
    zip.on('warning', (err) => console.error('[archive] warning:', err));
    zip.on('error', reject);
    feedEntries(zip, entries)
      .then(() => zip.finalize())
      .catch(reject);
  });
}

/** Build a ZIP of the selected paths; only codec failures are fatal */
export async function buildArchive(root: SandboxedPath, selections: string[]): Promise<Buffer> {
  const entries = await collectSelections(root, selections);
  try {
    return await zipEntries(entries);
  } catch (err) {
    throw new InternalFailureError('ZIP creation failed', { cause: err });
  }
}
