import { ADMIT, deny, type Filter } from './gate.js';
import { logger } from '../utils/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  /** Maximum invocations per user within the window (default 10) */
  max?: number;
  /** Window duration in seconds (default 60) */
  windowSeconds?: number;
}

/**
 * Per-user fixed-window rate limit on one handler.
 *
 * Each call to `rateLimit()` owns its own in-memory store, so limits are per
 * handler. Over the limit, the user is told how long to wait and the handler
 * does not run.
 */
export function rateLimit(options: RateLimitOptions = {}): Filter {
  const max = options.max ?? 10;
  const windowMs = (options.windowSeconds ?? 60) * 1000;
  const store = new Map<string, RateLimitEntry>();

  function cleanupExpiredEntries(now: number): void {
    for (const [userId, entry] of store.entries()) {
      if (now > entry.resetAt) {
        store.delete(userId);
      }
    }
  }

  return {
    name: 'rate-limit',
    stage: 'courtesy',
    admit(ctx) {
      const now = Date.now();
      cleanupExpiredEntries(now);

      const userId = ctx.event.userId;
      const entry = store.get(userId) ?? { count: 0, resetAt: now + windowMs };
      entry.count++;
      store.set(userId, entry);

      if (entry.count <= max) {
        return ADMIT;
      }

      const waitSeconds = Math.ceil((entry.resetAt - now) / 1000);
      logger.warn('Rate limit exceeded', {
        plugin: ctx.plugin.name,
        userId,
        count: entry.count,
        limit: max,
        waitSeconds,
      });
      return deny(`Rate limit exceeded. Please wait ${String(waitSeconds)} seconds before trying again.`);
    },
  };
}
