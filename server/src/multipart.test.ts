import { describe, it, expect } from 'vitest';
import { extractFilename, getBoundary, parseMultipart } from './multipart.js';

function body(...lines: string[]): Buffer {
  return Buffer.from(lines.join('\r\n'), 'utf-8');
}

describe('parseMultipart', () => {
  it('decodes two file parts with exact names and payloads', () => {
    const payload = body(
      '--X',
      'Content-Disposition: form-data; name="files"; filename="a.txt"',
      'Content-Type: text/plain',
      '',
      'hello',
      '--X',
      'Content-Disposition: form-data; name="files"; filename="b.txt"',
      'Content-Type: text/plain',
      '',
      'world',
      '--X--',
      '',
    );

    const parts = parseMultipart(payload, 'X');
    expect(parts).toHaveLength(2);
    expect(parts[0].filename).toBe('a.txt');
    expect(parts[0].data.toString()).toBe('hello');
    expect(parts[1].filename).toBe('b.txt');
    expect(parts[1].data.toString()).toBe('world');
  });

  it('keeps binary payloads byte for byte, including inner CRLFs', () => {
    const bytes = Buffer.from([0x00, 0xff, 0x0d, 0x0a, 0x10, 0x0d, 0x0a]);
    const payload = Buffer.concat([
      Buffer.from('--b0undary\r\nContent-Disposition: form-data; name="f"; filename="bin.dat"\r\n\r\n'),
      bytes,
      Buffer.from('\r\n--b0undary--\r\n'),
    ]);

    const parts = parseMultipart(payload, 'b0undary');
    expect(parts).toHaveLength(1);
    expect(parts[0].data.equals(bytes)).toBe(true);
  });

  it('drops parts without a filename (plain form fields)', () => {
    const payload = body(
      '--X',
      'Content-Disposition: form-data; name="note"',
      '',
      'just a field',
      '--X',
      'Content-Disposition: form-data; name="f"; filename="keep.txt"',
      '',
      'kept',
      '--X--',
    );

    const parts = parseMultipart(payload, 'X');
    expect(parts.map((p) => p.filename)).toEqual(['keep.txt']);
  });

  it('drops parts with an empty filename', () => {
    const payload = body(
      '--X',
      'Content-Disposition: form-data; name="f"; filename=""',
      '',
      '',
      '--X--',
    );
    expect(parseMultipart(payload, 'X')).toEqual([]);
  });

  it('returns nothing when the boundary never occurs', () => {
    const payload = body('--other', 'Content-Disposition: form-data; filename="a.txt"', '', 'x', '--other--');
    expect(parseMultipart(payload, 'X')).toEqual([]);
  });

  it('returns nothing for an empty boundary or empty body', () => {
    expect(parseMultipart(Buffer.from('anything'), '')).toEqual([]);
    expect(parseMultipart(Buffer.alloc(0), 'X')).toEqual([]);
  });

  it('skips a part with no blank line between headers and payload', () => {
    const payload = body('--X', 'Content-Disposition: form-data; filename="a.txt"', 'no separator here', '--X--');
    expect(parseMultipart(payload, 'X')).toEqual([]);
  });

  it('accepts a body without a closing marker', () => {
    const payload = body('--X', 'Content-Disposition: form-data; name="f"; filename="tail.txt"', '', 'tail');
    const parts = parseMultipart(payload, 'X');
    expect(parts).toHaveLength(1);
    expect(parts[0].data.toString()).toBe('tail');
  });
});

describe('extractFilename', () => {
  it('matches the disposition header case-insensitively', () => {
    expect(extractFilename('content-disposition: form-data; name="f"; filename="x.png"')).toBe('x.png');
    expect(extractFilename('CONTENT-DISPOSITION: form-data; filename="y.png"')).toBe('y.png');
  });

  it('keeps only the last component of Windows and POSIX paths', () => {
    expect(extractFilename('Content-Disposition: form-data; filename="C:\\Users\\me\\photo.jpg"')).toBe('photo.jpg');
    expect(extractFilename('Content-Disposition: form-data; filename="../../etc/passwd"')).toBe('passwd');
  });

  it('ignores filename parameters on other headers', () => {
    expect(extractFilename('X-Note: filename="nope.txt"\r\nContent-Type: text/plain')).toBeNull();
  });

  it('returns null for an unterminated quote', () => {
    expect(extractFilename('Content-Disposition: form-data; filename="open')).toBeNull();
  });
});

describe('getBoundary', () => {
  it('reads the boundary parameter', () => {
    expect(getBoundary('multipart/form-data; boundary=----abc123')).toBe('----abc123');
  });

  it('strips quotes and trailing parameters', () => {
    expect(getBoundary('multipart/form-data; boundary="q-b"')).toBe('q-b');
    expect(getBoundary('multipart/form-data; boundary=abc; charset=utf-8')).toBe('abc');
  });

  it('rejects other content types and a missing boundary', () => {
    expect(getBoundary('application/json')).toBeNull();
    expect(getBoundary('multipart/form-data')).toBeNull();
    expect(getBoundary('multipart/form-data; boundary=')).toBeNull();
    expect(getBoundary(undefined)).toBeNull();
  });
});
