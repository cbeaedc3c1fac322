import { AuthError, accountLockedError, invalidCredentialsError, rateLimitedError } from '../auth-error.js';
import type { SecurityPolicy } from '../auth-policy.js';
import type { Clock, Logger, TokenSubject, UserId } from '../auth-types.js';
import type { SecurityAuditEvent } from '../audit/security-audit.js';
import type { CredentialHasher } from '../credentials/credential-hasher.js';
import type { RateLimiter } from '../rate-limit/rate-limiter.js';
import type { SessionTokenService } from '../sessions/session-tokens.js';
import type { TokenPair } from '../sessions/session-types.js';
import type { AccountRecord, SecurityStorage } from '../storage/security-storage.js';
import { storeCall } from '../storage/store-call.js';
import { maskPhoneNumber } from '../two-factor/phone-number.js';
import type { TwoFactorChallengeService } from '../two-factor/sms-challenges.js';

/**
 * Everything the login flows need. Built once by `createSecurityCore`.
 */
export type LoginFlowContext = {
  storage: SecurityStorage;
  policy: SecurityPolicy;
  hasher: CredentialHasher;
  rateLimiter: RateLimiter;
  sessions: SessionTokenService;
  challenges: TwoFactorChallengeService;
  clock: Clock;
  logger: Logger;
  audit: (event: Omit<SecurityAuditEvent, 'occurredAt'>) => Promise<void>;
};

export type PasswordLoginInput = {
  email: string;
  password: string;
  sourceAddress: string;
  userAgent?: string;
};

export type PasswordLoginResult =
  | { twoFactorRequired: false; userId: UserId; tokens: TokenPair }
  | {
      twoFactorRequired: true;
      userId: UserId;
      /**
       * Expiry of the SMS code that was just sent.
       */
      expiresAt: Date;
      phoneNumberHint: string;
    };

export async function loginWithPassword(
  ctx: LoginFlowContext,
  input: PasswordLoginInput
): Promise<PasswordLoginResult> {
  const email = normalizeEmail(input.email);
  validateLoginPassword(input.password, ctx.policy);
  const sourceAddress = requireSourceAddress(input.sourceAddress);
  const meta = { sourceAddress, userAgent: input.userAgent };

  const decision = await ctx.rateLimiter.isAllowed(sourceAddress, 'login');
  if (!decision.allowed) {
    await ctx.audit({
      type: 'rate_limited',
      ...meta,
      description: 'login rate limit exceeded',
      data: { action: 'login', retryAfterMs: decision.retryAfterMs }
    });
    throw rateLimitedError(decision.retryAfterMs);
  }
  await ctx.rateLimiter.recordAttempt(sourceAddress, 'login');

  const account = await storeCall('accounts.findByEmail', () =>
    ctx.storage.accounts.findByEmail(email)
  );
  if (!account || !account.isActive) {
    // Spend comparable work to reduce account enumeration.
    await ctx.hasher.dummyVerify(input.password);
    await ctx.audit({
      type: 'login_failed',
      userId: account?.id,
      ...meta,
      description: account ? 'account_inactive' : 'user_not_found'
    });
    throw invalidCredentialsError();
  }

  const now = ctx.clock.now();
  if (account.lockedUntil && account.lockedUntil.getTime() > now.getTime()) {
    await ctx.audit({
      type: 'account_locked',
      userId: account.id,
      ...meta,
      description: 'login attempted while locked',
      data: { lockedUntil: account.lockedUntil.toISOString() }
    });
    throw accountLockedError(account.lockedUntil.getTime() - now.getTime());
  }

  const ok = await ctx.hasher.verify(input.password, account.passwordHash);
  if (!ok) {
    const after = await storeCall('accounts.recordFailedLogin', () =>
      ctx.storage.accounts.recordFailedLogin({
        userId: account.id,
        now,
        maxFailedLogins: ctx.policy.lockout.maxFailedLogins,
        lockUntil: new Date(now.getTime() + ctx.policy.lockout.lockMs)
      })
    );
    await ctx.audit({
      type: 'login_failed',
      userId: account.id,
      ...meta,
      description: 'invalid_password',
      data: { failedLoginAttempts: after.failedLoginAttempts }
    });
    if (after.lockedUntil && after.lockedUntil.getTime() > now.getTime()) {
      await ctx.audit({
        type: 'account_locked',
        userId: account.id,
        ...meta,
        description: 'too many failed logins',
        data: { lockedUntil: after.lockedUntil.toISOString() }
      });
    }
    throw invalidCredentialsError();
  }

  if (ctx.hasher.needsRehash(account.passwordHash)) {
    const upgraded = await ctx.hasher.hashSecret(input.password);
    await storeCall('accounts.updatePasswordHash', () =>
      ctx.storage.accounts.updatePasswordHash(account.id, upgraded, now)
    );
  }
  await ctx.rateLimiter.resetAttempts(sourceAddress, 'login');

  if (account.twoFactorEnabled && account.phoneVerified && account.phoneNumber) {
    const phoneNumber = account.phoneNumber;
    const sendDecision = await ctx.rateLimiter.isAllowed(phoneNumber, 'sms_send');
    if (!sendDecision.allowed) {
      await ctx.audit({
        type: 'rate_limited',
        userId: account.id,
        ...meta,
        description: 'sms send rate limit exceeded',
        data: { action: 'sms_send', retryAfterMs: sendDecision.retryAfterMs }
      });
      throw rateLimitedError(sendDecision.retryAfterMs);
    }
    await ctx.rateLimiter.recordAttempt(phoneNumber, 'sms_send');

    let sent: { expiresAt: Date };
    try {
      sent = await ctx.challenges.requestCode({ phoneNumber, purpose: 'login', userId: account.id });
    } catch (err) {
      await ctx.audit({
        type: 'two_factor_send_failed',
        userId: account.id,
        ...meta,
        description: err instanceof AuthError ? err.code : 'unknown'
      });
      throw err;
    }
    await ctx.audit({
      type: 'login_two_factor_required',
      userId: account.id,
      ...meta,
      description: 'sms code sent'
    });
    return {
      twoFactorRequired: true,
      userId: account.id,
      expiresAt: sent.expiresAt,
      phoneNumberHint: maskPhoneNumber(phoneNumber)
    };
  }

  const tokens = await completeLogin(ctx, account, meta);
  await ctx.audit({ type: 'login_success', userId: account.id, ...meta, description: 'password' });
  return { twoFactorRequired: false, userId: account.id, tokens };
}

/**
 * Clears the failure counter, stamps lastLoginAt and mints the token pair.
 */
export async function completeLogin(
  ctx: LoginFlowContext,
  account: AccountRecord,
  meta: { sourceAddress: string; userAgent?: string }
): Promise<TokenPair> {
  const now = ctx.clock.now();
  await storeCall('accounts.recordSuccessfulLogin', () =>
    ctx.storage.accounts.recordSuccessfulLogin(account.id, now)
  );
  return ctx.sessions.generateTokenPair(toTokenSubject(account), meta.userAgent ?? '', meta.sourceAddress);
}

export function toTokenSubject(account: AccountRecord): TokenSubject {
  return { id: account.id, tenantId: account.tenantId, email: account.email, role: account.role };
}

export function requireSourceAddress(sourceAddress: string): string {
  if (typeof sourceAddress !== 'string' || sourceAddress.trim().length === 0) {
    throw new AuthError('invalid_input', 'sourceAddress is required');
  }
  return sourceAddress.trim();
}

function normalizeEmail(email: string): string {
  if (typeof email !== 'string') throw new AuthError('invalid_input', 'email must be a string');
  const trimmed = email.trim().toLowerCase();
  if (!trimmed) {
    throw new AuthError('invalid_input', 'email is required', { publicMessage: 'Email is required.' });
  }
  if (trimmed.length > 320) throw new AuthError('invalid_input', 'email is too long');
  return trimmed;
}

function validateLoginPassword(password: string, policy: SecurityPolicy): void {
  if (typeof password !== 'string') throw new AuthError('invalid_input', 'password must be a string');
  if (password.length === 0) {
    throw new AuthError('invalid_input', 'password is required', {
      publicMessage: 'Password is required.'
    });
  }
  if (password.length > policy.password.maxLength) {
    throw new AuthError('invalid_input', 'password is too long');
  }
}
