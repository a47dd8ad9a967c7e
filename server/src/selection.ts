/**
 * Pull the `"<key>": ["a", "b", ...]` string array out of a request body
 * without a full JSON parse. A missing key or bracket gives an empty list,
 * never an error. Escapes inside the strings are not interpreted, and a
 * path containing a comma is split at it.
 */
export function extractStringArray(body: string, key: string): string[] {
  const pattern = `"${key}"`;
  const keyPos = body.indexOf(pattern);
  if (keyPos === -1) return [];
  const afterKey = body.slice(keyPos + pattern.length);

  const open = afterKey.indexOf('[');
  if (open === -1) return [];
  const afterBracket = afterKey.slice(open + 1);
  const close = afterBracket.indexOf(']');
  if (close === -1) return [];

  return afterBracket
    .slice(0, close)
    .split(',')
    .map((s) => s.trim().replace(/^"+|"+$/g, ''))
    .filter((s) => s.length > 0);
}

/** Paths selected for a ZIP download (`{"files": [...]}`) */
export function extractFileList(body: string): string[] {
  return extractStringArray(body, 'files');
}
