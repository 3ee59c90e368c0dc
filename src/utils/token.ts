import crypto from 'crypto';

/** Constant-time comparison of a presented token with the stored one. */
export function tokensMatch(received: string, expected: string): boolean {
  const a = Buffer.from(received.trim(), 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length > 0 && a.length === b.length && crypto.timingSafeEqual(a, b);
}

/** Token from an `Authorization: <scheme> <token>` header, or undefined. */
export function tokenFromAuthorization(header: string | undefined, scheme: string): string | undefined {
  if (!header) return undefined;
  const prefix = `${scheme} `;
  if (!header.startsWith(prefix)) return undefined;
  const token = header.slice(prefix.length).trim();
  return token || undefined;
}
