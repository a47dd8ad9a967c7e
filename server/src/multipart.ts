/**
 * multipart/form-data decoding for uploads.
 *
 * The whole body is already buffered (the upload route caps it), so parsing
 * is a plain scan for delimiters. Structure it doesn't recognise is skipped:
 * the worst outcome of a malformed body is "no files found".
 */

export interface UploadedPart {
  /** Final path component of the client-supplied filename (not yet sanitized) */
  filename: string;
  data: Buffer;
}

const CRLF = Buffer.from('\r\n');
const HEADER_END = Buffer.from('\r\n\r\n');
const CLOSE_MARKER = Buffer.from('--');

/** Boundary parameter of a multipart/form-data content type, or null */
export function getBoundary(contentType: string | undefined): string | null {
  if (!contentType || !contentType.toLowerCase().includes('multipart/form-data')) return null;
  const at = contentType.indexOf('boundary=');
  if (at === -1) return null;
  const raw = contentType.slice(at + 'boundary='.length).split(';')[0].trim();
  const boundary = raw.replace(/^"+|"+$/g, '');
  return boundary || null;
}

/** Filename from a part's header block, keeping only the last path component */
export function extractFilename(headers: string): string | null {
  for (const line of headers.split(/\r?\n/)) {
    if (!line.toLowerCase().includes('content-disposition')) continue;
    const pos = line.indexOf('filename="');
    if (pos === -1) continue;
    const start = pos + 'filename="'.length;
    const end = line.indexOf('"', start);
    if (end === -1) continue;
    const name = line.slice(start, end);
    const parts = name.split(/[/\\]/);
    return parts[parts.length - 1];
  }
  return null;
}

export function parseMultipart(body: Buffer, boundary: string): UploadedPart[] {
  if (!boundary) return [];
  const delim = Buffer.from(`--${boundary}`);

  const starts: number[] = [];
  let at = body.indexOf(delim);
  while (at !== -1) {
    starts.push(at + delim.length);
    at = body.indexOf(delim, at + delim.length);
  }

  const files: UploadedPart[] = [];
  for (let idx = 0; idx < starts.length; idx++) {
    const start = starts[idx];
    const end = idx + 1 < starts.length ? starts[idx + 1] - delim.length : body.length;
    if (start >= end) continue;

    let part = body.subarray(start, end);
    if (startsWith(part, CRLF)) part = part.subarray(CRLF.length);
    if (startsWith(part, CLOSE_MARKER)) continue;

    const sep = part.indexOf(HEADER_END);
    if (sep === -1) continue;
    const headers = part.subarray(0, sep).toString('utf-8');
    let data = part.subarray(sep + HEADER_END.length);
    if (endsWith(data, CRLF)) data = data.subarray(0, data.length - CRLF.length);

    const filename = extractFilename(headers);
    if (filename) files.push({ filename, data: Buffer.from(data) });
  }
  return files;
}

function startsWith(buf: Buffer, prefix: Buffer): boolean {
  return buf.length >= prefix.length && buf.subarray(0, prefix.length).equals(prefix);
}

function endsWith(buf: Buffer, suffix: Buffer): boolean {
  return buf.length >= suffix.length && buf.subarray(buf.length - suffix.length).equals(suffix);
}
