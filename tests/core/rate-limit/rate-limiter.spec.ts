import { describe, expect, it } from 'vitest';
import { createMemorySecurityStorage } from '../../../src/adapters/memory/memory-security-storage.js';
import { RateLimiter } from '../../../src/core/rate-limit/rate-limiter.js';
import { manualClock, recordingLogger } from '../../support/fixtures.js';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

function setup(options: { rules?: ConstructorParameters<typeof RateLimiter>[0]['rules'] } = {}) {
  const storage = createMemorySecurityStorage();
  const clock = manualClock();
  const logger = recordingLogger();
  const limiter = new RateLimiter({ storage, clock, logger, rules: options.rules });
  return { storage, clock, logger, limiter };
}

describe('core/rate-limit/rate-limiter', () => {
  it('blocks for the block duration after maxAttempts, and resetAttempts lifts it', async () => {
    const { limiter } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');

    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: false,
      retryAfterMs: 30 * MINUTE
    });

    await limiter.resetAttempts('1.2.3.4', 'login');
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: true,
      retryAfterMs: 0
    });
  });

  it('keeps denying with the remaining time until the block passes, then starts a new window', async () => {
    const { limiter, clock } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');
    await limiter.isAllowed('1.2.3.4', 'login');

    clock.advance(10 * MINUTE);
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: false,
      retryAfterMs: 20 * MINUTE
    });

    clock.advance(20 * MINUTE);
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: true,
      retryAfterMs: 0
    });
    await limiter.recordAttempt('1.2.3.4', 'login');
    const info = await limiter.getRateLimitInfo('1.2.3.4', 'login');
    expect(info).toEqual({
      action: 'login',
      maxAttempts: 5,
      currentAttempts: 1,
      remainingAttempts: 4,
      windowMs: 15 * MINUTE,
      blocked: false,
      retryAfterMs: 0
    });
  });

  it('keeps a live block when attempts are recorded after the window has ended', async () => {
    const { limiter, clock } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: false,
      retryAfterMs: 30 * MINUTE
    });

    clock.advance(16 * MINUTE);
    await limiter.recordAttempt('1.2.3.4', 'login');
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: false,
      retryAfterMs: 14 * MINUTE
    });
    await expect(limiter.getBlockStatus('1.2.3.4', 'login')).resolves.toEqual({
      blocked: true,
      blockedUntil: new Date('2026-01-01T00:30:00.000Z'),
      retryAfterMs: 14 * MINUTE
    });

    clock.advance(14 * MINUTE);
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: true,
      retryAfterMs: 0
    });
  });

  it('allows attempts again once the window has passed without a block', async () => {
    const { limiter, clock } = setup();
    for (let i = 0; i < 4; i++) await limiter.recordAttempt('1.2.3.4', 'login');
    clock.advance(15 * MINUTE);
    await expect(limiter.getRemainingAttempts('1.2.3.4', 'login')).resolves.toBe(5);
    await limiter.recordAttempt('1.2.3.4', 'login');
    await expect(limiter.getRemainingAttempts('1.2.3.4', 'login')).resolves.toBe(4);
  });

  it('lets a burst straddling a window boundary exceed the per-window limit', async () => {
    const { limiter, clock } = setup();
    const attempt = async () => {
      const decision = await limiter.isAllowed('1.2.3.4', 'login');
      if (decision.allowed) await limiter.recordAttempt('1.2.3.4', 'login');
      return decision.allowed;
    };

    expect(await attempt()).toBe(true);
    clock.advance(15 * MINUTE - 1000);

    let passed = 0;
    for (let i = 0; i < 4; i++) if (await attempt()) passed++;
    clock.advance(1000);
    for (let i = 0; i < 5; i++) if (await attempt()) passed++;

    // Nine attempts inside one second against a limit of five.
    expect(passed).toBe(9);
    expect(await attempt()).toBe(false);
  });

  it('installs a single block when checks race', async () => {
    const { limiter, logger } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');

    const decisions = await Promise.all([
      limiter.isAllowed('1.2.3.4', 'login'),
      limiter.isAllowed('1.2.3.4', 'login'),
      limiter.isAllowed('1.2.3.4', 'login')
    ]);
    expect(decisions).toEqual([
      { allowed: false, retryAfterMs: 30 * MINUTE },
      { allowed: false, retryAfterMs: 30 * MINUTE },
      { allowed: false, retryAfterMs: 30 * MINUTE }
    ]);
    expect(logger.entries.filter(e => e.message === 'rate limit block installed')).toHaveLength(1);
  });

  it('keeps separate counters per identifier and per action', async () => {
    const { limiter } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toMatchObject({ allowed: false });
    await expect(limiter.isAllowed('5.6.7.8', 'login')).resolves.toMatchObject({ allowed: true });
    await expect(limiter.isAllowed('1.2.3.4', 'register')).resolves.toMatchObject({ allowed: true });
  });

  it('allows and never records actions without a rule', async () => {
    const { limiter, storage } = setup();
    await limiter.recordAttempt('1.2.3.4', 'export_pdf');
    await expect(limiter.isAllowed('1.2.3.4', 'export_pdf')).resolves.toEqual({
      allowed: true,
      retryAfterMs: 0
    });
    expect(storage.tables.rateLimits.size).toBe(0);
    await expect(limiter.getRateLimitInfo('1.2.3.4', 'export_pdf')).rejects.toMatchObject({
      code: 'invalid_input'
    });
  });

  it('rejects an empty identifier', async () => {
    const { limiter } = setup();
    await expect(limiter.isAllowed('', 'login')).rejects.toMatchObject({ code: 'invalid_input' });
  });

  it('fails closed when the store is unavailable', async () => {
    const storage = createMemorySecurityStorage();
    const limiter = new RateLimiter({
      storage: {
        rateLimits: {
          ...storage.rateLimits,
          get: async () => {
            throw new Error('connection refused');
          }
        }
      }
    });
    await expect(limiter.isAllowed('1.2.3.4', 'login')).rejects.toMatchObject({
      code: 'transient_dependency',
      message: 'storage.rateLimits.get failed'
    });
  });

  it('reports and lifts blocks', async () => {
    const { limiter, clock } = setup();
    for (let i = 0; i < 5; i++) await limiter.recordAttempt('1.2.3.4', 'login');
    await limiter.isAllowed('1.2.3.4', 'login');

    const status = await limiter.getBlockStatus('1.2.3.4', 'login');
    expect(status).toEqual({
      blocked: true,
      blockedUntil: new Date(clock.now().getTime() + 30 * MINUTE),
      retryAfterMs: 30 * MINUTE
    });

    await limiter.unblock('1.2.3.4', 'login');
    await expect(limiter.getBlockStatus('1.2.3.4', 'login')).resolves.toEqual({ blocked: false });
    await expect(limiter.isAllowed('1.2.3.4', 'login')).resolves.toEqual({
      allowed: true,
      retryAfterMs: 0
    });
  });

  it('sweeps stale rows but keeps rows that are still blocking', async () => {
    const { limiter, clock, storage } = setup({
      rules: {
        login: { maxAttempts: 5, windowMs: 15 * MINUTE, blockMs: 30 * MINUTE },
        register: { maxAttempts: 1, windowMs: MINUTE, blockMs: 48 * HOUR }
      }
    });
    await limiter.recordAttempt('1.2.3.4', 'login');
    await limiter.recordAttempt('1.2.3.4', 'register');
    await limiter.isAllowed('1.2.3.4', 'register');

    clock.advance(25 * HOUR);
    await limiter.recordAttempt('5.6.7.8', 'login');

    await expect(limiter.cleanupExpiredRecords()).resolves.toBe(1);
    expect([...storage.tables.rateLimits.values()].map(r => `${r.identifier}/${r.action}`).sort()).toEqual([
      '1.2.3.4/register',
      '5.6.7.8/login'
    ]);
  });

  it('validates rules at construction', () => {
    expect(
      () =>
        new RateLimiter({
          storage: createMemorySecurityStorage(),
          rules: { login: { maxAttempts: 0, windowMs: MINUTE, blockMs: MINUTE } }
        })
    ).toThrow(/login.maxAttempts/);
  });
});
