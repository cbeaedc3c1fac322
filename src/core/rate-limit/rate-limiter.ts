import { AuthError } from '../auth-error.js';
import { defaultRateLimitRules, validateRateLimitRule } from '../auth-policy.js';
import type { RateLimitRule, RateLimitRules } from '../auth-policy.js';
import { noopLogger } from '../auth-types.js';
import type { Clock, Logger } from '../auth-types.js';
import type { RateLimitRecord, SecurityStorage } from '../storage/security-storage.js';
import { storeCall } from '../storage/store-call.js';

export type RateLimitDecision = {
  allowed: boolean;
  /**
   * Milliseconds until the block is lifted. 0 when allowed.
   */
  retryAfterMs: number;
};

export type BlockStatus = { blocked: false } | { blocked: true; blockedUntil: Date; retryAfterMs: number };

export type RateLimitInfo = {
  action: string;
  maxAttempts: number;
  currentAttempts: number;
  remainingAttempts: number;
  windowMs: number;
  blocked: boolean;
  blockedUntil?: Date;
  retryAfterMs: number;
};

export type RateLimiterOptions = {
  storage: Pick<SecurityStorage, 'rateLimits'>;
  rules?: RateLimitRules;
  clock?: Clock;
  logger?: Logger;
  /**
   * Rows whose window started longer ago than this are removed by `cleanupExpiredRecords`.
   */
  retentionMs?: number;
};

const DEFAULT_RETENTION_MS = 1000 * 60 * 60 * 24;

/**
 * Fixed-window rate limiter with temporary blocks, backed by the shared store.
 *
 * - Every counter change is a single conditional statement in the store; nothing here
 *   reads a counter and writes it back.
 * - Fixed windows: a burst straddling a window boundary can pass up to ~2x `maxAttempts`.
 * - Actions without a rule are always allowed and never recorded.
 */
export class RateLimiter {
  private readonly storage: Pick<SecurityStorage, 'rateLimits'>;
  private readonly rules: RateLimitRules;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly retentionMs: number;

  constructor(options: RateLimiterOptions) {
    this.storage = options.storage;
    this.rules = options.rules ?? defaultRateLimitRules;
    this.clock = options.clock ?? { now: () => new Date() };
    this.logger = options.logger ?? noopLogger;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    for (const [action, rule] of Object.entries(this.rules)) {
      if (rule) validateRateLimitRule(action, rule);
    }
  }

  ruleFor(action: string): RateLimitRule | undefined {
    return this.rules[action];
  }

  async isAllowed(identifier: string, action: string): Promise<RateLimitDecision> {
    const rule = this.ruleFor(action);
    if (!rule) return { allowed: true, retryAfterMs: 0 };
    assertIdentifier(identifier);

    const now = this.clock.now();
    const record = await storeCall('rateLimits.get', () =>
      this.storage.rateLimits.get(identifier, action)
    );
    if (!record) return { allowed: true, retryAfterMs: 0 };

    const liveBlockMs = remainingBlockMs(record, now);
    if (liveBlockMs > 0) return { allowed: false, retryAfterMs: liveBlockMs };

    if (currentAttempts(record, rule, now) < rule.maxAttempts) {
      return { allowed: true, retryAfterMs: 0 };
    }

    const blockedUntil = new Date(now.getTime() + rule.blockMs);
    const installed = await storeCall('rateLimits.installBlock', () =>
      this.storage.rateLimits.installBlock({
        identifier,
        action,
        now,
        windowStartCutoff: windowStartCutoff(rule, now),
        maxAttempts: rule.maxAttempts,
        blockedUntil
      })
    );
    if (installed) {
      this.logger.info('rate limit block installed', { action, blockMs: rule.blockMs });
      return { allowed: false, retryAfterMs: rule.blockMs };
    }

    // Lost the race: either another request installed the block or the counter was reset.
    const after = await storeCall('rateLimits.get', () =>
      this.storage.rateLimits.get(identifier, action)
    );
    const raced = after ? remainingBlockMs(after, now) : 0;
    return raced > 0 ? { allowed: false, retryAfterMs: raced } : { allowed: true, retryAfterMs: 0 };
  }

  async recordAttempt(identifier: string, action: string): Promise<void> {
    const rule = this.ruleFor(action);
    if (!rule) return;
    assertIdentifier(identifier);
    const now = this.clock.now();
    await storeCall('rateLimits.recordAttempt', () =>
      this.storage.rateLimits.recordAttempt({
        identifier,
        action,
        now,
        windowStartCutoff: windowStartCutoff(rule, now)
      })
    );
  }

  async resetAttempts(identifier: string, action: string): Promise<void> {
    if (!this.ruleFor(action)) return;
    assertIdentifier(identifier);
    const now = this.clock.now();
    await storeCall('rateLimits.reset', () => this.storage.rateLimits.reset(identifier, action, now));
  }

  async getRemainingAttempts(identifier: string, action: string): Promise<number> {
    const info = await this.getRateLimitInfo(identifier, action);
    return info.remainingAttempts;
  }

  async getBlockStatus(identifier: string, action: string): Promise<BlockStatus> {
    assertIdentifier(identifier);
    const now = this.clock.now();
    const record = await storeCall('rateLimits.get', () =>
      this.storage.rateLimits.get(identifier, action)
    );
    const retryAfterMs = record ? remainingBlockMs(record, now) : 0;
    if (!record?.blockedUntil || retryAfterMs <= 0) return { blocked: false };
    return { blocked: true, blockedUntil: record.blockedUntil, retryAfterMs };
  }

  /**
   * Lift a block early (support tooling). The window is cleared too; a full window left in
   * place would re-install the block on the next check.
   */
  async unblock(identifier: string, action: string): Promise<void> {
    assertIdentifier(identifier);
    const now = this.clock.now();
    await storeCall('rateLimits.reset', () => this.storage.rateLimits.reset(identifier, action, now));
    this.logger.info('rate limit block lifted', { action });
  }

  async getRateLimitInfo(identifier: string, action: string): Promise<RateLimitInfo> {
    const rule = this.ruleFor(action);
    if (!rule) throw new AuthError('invalid_input', `no rate limit defined for action: ${action}`);
    assertIdentifier(identifier);

    const now = this.clock.now();
    const record = await storeCall('rateLimits.get', () =>
      this.storage.rateLimits.get(identifier, action)
    );
    const currentAttemptsInWindow = record ? currentAttempts(record, rule, now) : 0;
    const retryAfterMs = record ? remainingBlockMs(record, now) : 0;
    const blocked = retryAfterMs > 0;

    return {
      action,
      maxAttempts: rule.maxAttempts,
      currentAttempts: currentAttemptsInWindow,
      remainingAttempts: Math.max(0, rule.maxAttempts - currentAttemptsInWindow),
      windowMs: rule.windowMs,
      blocked,
      ...(blocked && record?.blockedUntil ? { blockedUntil: record.blockedUntil } : {}),
      retryAfterMs
    };
  }

  /**
   * Remove rows whose window started more than `retentionMs` ago and that are not blocking.
   * Returns the number of removed rows.
   */
  async cleanupExpiredRecords(): Promise<number> {
    const now = this.clock.now();
    const removed = await storeCall('rateLimits.deleteStale', () =>
      this.storage.rateLimits.deleteStale({
        windowStartBefore: new Date(now.getTime() - this.retentionMs),
        now
      })
    );
    this.logger.debug('rate limit records swept', { removed });
    return removed;
  }
}

function assertIdentifier(identifier: string): void {
  if (typeof identifier !== 'string' || identifier.length === 0) {
    throw new AuthError('invalid_input', 'rate limit identifier is required');
  }
}

function windowStartCutoff(rule: RateLimitRule, now: Date): Date {
  return new Date(now.getTime() - rule.windowMs);
}

function remainingBlockMs(record: RateLimitRecord, now: Date): number {
  if (!record.blockedUntil) return 0;
  return Math.max(0, record.blockedUntil.getTime() - now.getTime());
}

/**
 * Attempts that still count at `now`: zero once the window has expired or a block has elapsed.
 */
function currentAttempts(record: RateLimitRecord, rule: RateLimitRule, now: Date): number {
  const windowExpired = record.windowStart.getTime() <= now.getTime() - rule.windowMs;
  const blockElapsed =
    record.blockedUntil !== undefined && record.blockedUntil.getTime() <= now.getTime();
  return windowExpired || blockElapsed ? 0 : record.attempts;
}
