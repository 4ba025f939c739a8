/**
 * Shared-secret check for plugin endpoints.
 *
 * The secret (web.password) may be sent as `Authorization: Bearer <secret>`
 * or as a `?password=` query parameter.
 */

import crypto from 'crypto';

/**
 * Timing-safe string comparison
 * Returns false early if lengths differ (this leaks length, not content).
 */
export function timingSafeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

/**
 * Extract the presented secret from a request's header or query
 */
export function presentedSecret(authorization: string | undefined, query: unknown): string | undefined {
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length).trim();
  }
  if (typeof query === 'object' && query !== null && 'password' in query) {
    const value: unknown = query.password;
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Whether a request may reach a plugin endpoint
 */
export function isAuthorized(password: string | undefined, authorization: string | undefined, query: unknown): boolean {
  if (!password) return true;
  const secret = presentedSecret(authorization, query);
  return secret !== undefined && timingSafeCompare(secret, password);
}
