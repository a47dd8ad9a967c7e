import { createHmac, timingSafeEqual } from 'crypto';

/** Constant-time string comparison using HMAC to prevent timing side-channel attacks.
 *  HMAC digests are always 32 bytes, so comparison is constant-time regardless of input lengths. */
export function safeTokenCompare(a: string, b: string): boolean {
  const key = 'sharedir-credential-compare';
  const hmacA = createHmac('sha256', key).update(a).digest();
  const hmacB = createHmac('sha256', key).update(b).digest();
  return timingSafeEqual(hmacA, hmacB);
}

/** Encode `user:pass` the way a Basic Authorization header carries it */
export function encodeBasicCredential(user: string, password: string): string {
  return Buffer.from(`${user}:${password}`, 'utf-8').toString('base64');
}

/**
 * Parse a `user:pass` string (split at the first colon).
 * Returns null when there is no colon or the user part is empty.
 */
export function parseCredentialPair(value: string): { user: string; password: string } | null {
  const colon = value.indexOf(':');
  if (colon <= 0) return null;
  return { user: value.slice(0, colon), password: value.slice(colon + 1) };
}
