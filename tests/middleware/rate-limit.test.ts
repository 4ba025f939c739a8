import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import { rateLimit } from '../../src/middleware/rate-limit.js';
import { logger } from '../../src/utils/logger.js';
import { filterContext } from '../helpers/filter-context.js';

describe('rateLimit', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should admit up to the limit', async () => {
    const limit = rateLimit({ max: 2, windowSeconds: 60 });
    const ctx = filterContext();

    expect(await limit.admit(ctx)).toEqual({ admitted: true });
    expect(await limit.admit(ctx)).toEqual({ admitted: true });
  });

  it('should deny over the limit with the remaining wait', async () => {
    const limit = rateLimit({ max: 1, windowSeconds: 60 });
    const ctx = filterContext();

    await limit.admit(ctx);
    vi.advanceTimersByTime(15_000);

    expect(await limit.admit(ctx)).toEqual({
      admitted: false,
      notice: 'Rate limit exceeded. Please wait 45 seconds before trying again.',
    });
    expect(logger.warn).toHaveBeenCalledWith('Rate limit exceeded', {
      plugin: 'weather',
      userId: 'U0USER',
      count: 2,
      limit: 1,
      waitSeconds: 45,
    });
  });

  it('should reset after the window', async () => {
    const limit = rateLimit({ max: 1, windowSeconds: 10 });
    const ctx = filterContext();

    await limit.admit(ctx);
    vi.advanceTimersByTime(10_001);

    expect(await limit.admit(ctx)).toEqual({ admitted: true });
  });

  it('should count users separately', async () => {
    const limit = rateLimit({ max: 1 });

    await limit.admit(filterContext({ event: { userId: 'U0ONE' } }));

    expect(await limit.admit(filterContext({ event: { userId: 'U0TWO' } }))).toEqual({ admitted: true });
  });

  it('should keep a separate store per filter', async () => {
    const first = rateLimit({ max: 1 });
    const second = rateLimit({ max: 1 });
    const ctx = filterContext();

    await first.admit(ctx);

    expect(await second.admit(ctx)).toEqual({ admitted: true });
  });

  it('should default to ten calls a minute', async () => {
    const limit = rateLimit();
    const ctx = filterContext();

    for (let i = 0; i < 10; i++) {
      expect(await limit.admit(ctx)).toEqual({ admitted: true });
    }
    expect(await limit.admit(ctx)).toEqual({
      admitted: false,
      notice: 'Rate limit exceeded. Please wait 60 seconds before trying again.',
    });
  });
});
