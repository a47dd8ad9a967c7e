// Human-readable sizes for log lines

const KB = 1024;
const MB = 1024 * KB;
const GB = 1024 * MB;

export function formatSize(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)} GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)} MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)} KB`;
  return `${bytes} B`;
}

export function formatSpeed(bytes: number, elapsedMs: number): string {
  if (elapsedMs <= 0) return `${formatSize(bytes)}/s`;
  return `${formatSize(Math.floor((bytes / elapsedMs) * 1000))}/s`;
}

/** Strip the IPv4-mapped IPv6 prefix Node reports for v4 clients on dual-stack sockets */
export function normalizeAddress(address: string | undefined): string {
  if (!address) return 'unknown';
  return address.startsWith('::ffff:') ? address.slice(7) : address;
}
