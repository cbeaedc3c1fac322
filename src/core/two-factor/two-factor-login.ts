import { AuthError, accountLockedError, rateLimitedError } from '../auth-error.js';
import type { UserId } from '../auth-types.js';
import { completeLogin, requireSourceAddress } from '../password/password-login.js';
import type { LoginFlowContext } from '../password/password-login.js';
import type { TokenPair } from '../sessions/session-types.js';
import { storeCall } from '../storage/store-call.js';
import type { RequestCodeResult } from './challenge-types.js';
import { assertValidPhoneNumber } from './phone-number.js';
import { toChallengeError } from './sms-challenges.js';

export type CompleteTwoFactorLoginInput = {
  userId: UserId;
  code: string;
  sourceAddress: string;
  userAgent?: string;
};

export type PhoneVerificationRequestInput = {
  userId: UserId;
  phoneNumber: string;
  sourceAddress: string;
  userAgent?: string;
};

export type PhoneVerificationConfirmInput = PhoneVerificationRequestInput & { code: string };

export async function completeTwoFactorLogin(
  ctx: LoginFlowContext,
  input: CompleteTwoFactorLoginInput
): Promise<{ userId: UserId; tokens: TokenPair }> {
  const userId = requireUserId(input.userId);
  const sourceAddress = requireSourceAddress(input.sourceAddress);
  const meta = { sourceAddress, userAgent: input.userAgent };

  await enforceRateLimit(ctx, userId, 'sms_verify', { ...meta, userId });

  const account = await storeCall('accounts.findById', () => ctx.storage.accounts.findById(userId));
  if (!account || !account.isActive || !account.phoneNumber) {
    await ctx.audit({ type: 'two_factor_failed', userId, ...meta, description: 'not_found' });
    throw toChallengeError({ ok: false, reason: 'not_found' });
  }
  const now = ctx.clock.now();
  if (account.lockedUntil && account.lockedUntil.getTime() > now.getTime()) {
    throw accountLockedError(account.lockedUntil.getTime() - now.getTime());
  }

  const result = await ctx.challenges.verifyCode({
    phoneNumber: account.phoneNumber,
    code: input.code,
    purpose: 'login',
    userId
  });
  if (!result.ok) {
    await ctx.audit({
      type: 'two_factor_failed',
      userId,
      ...meta,
      description: result.reason,
      ...(result.reason === 'invalid' ? { data: { remainingAttempts: result.remainingAttempts } } : {})
    });
    throw toChallengeError(result);
  }

  await ctx.rateLimiter.resetAttempts(userId, 'sms_verify');
  const tokens = await completeLogin(ctx, account, meta);
  await ctx.audit({ type: 'two_factor_success', userId, ...meta, description: 'login' });
  return { userId, tokens };
}

export async function requestPhoneVerification(
  ctx: LoginFlowContext,
  input: PhoneVerificationRequestInput
): Promise<RequestCodeResult> {
  const userId = requireUserId(input.userId);
  const sourceAddress = requireSourceAddress(input.sourceAddress);
  const phoneNumber = assertValidPhoneNumber(input.phoneNumber);
  const meta = { userId, sourceAddress, userAgent: input.userAgent };

  await enforceRateLimit(ctx, phoneNumber, 'sms_send', meta);

  const account = await storeCall('accounts.findById', () => ctx.storage.accounts.findById(userId));
  if (!account || !account.isActive) {
    throw new AuthError('not_found', 'account not found');
  }

  try {
    return await ctx.challenges.requestCode({ phoneNumber, purpose: 'phone_verification', userId });
  } catch (err) {
    await ctx.audit({
      type: 'two_factor_send_failed',
      ...meta,
      description: err instanceof AuthError ? err.code : 'unknown'
    });
    throw err;
  }
}

export async function confirmPhoneVerification(
  ctx: LoginFlowContext,
  input: PhoneVerificationConfirmInput
): Promise<void> {
  const userId = requireUserId(input.userId);
  const sourceAddress = requireSourceAddress(input.sourceAddress);
  const meta = { userId, sourceAddress, userAgent: input.userAgent };

  await enforceRateLimit(ctx, userId, 'sms_verify', meta);

  const result = await ctx.challenges.verifyCode({
    phoneNumber: input.phoneNumber,
    code: input.code,
    purpose: 'phone_verification',
    userId
  });
  if (!result.ok) {
    await ctx.audit({ type: 'two_factor_failed', ...meta, description: result.reason });
    throw toChallengeError(result);
  }
  await ctx.rateLimiter.resetAttempts(userId, 'sms_verify');
  await ctx.audit({ type: 'phone_verified', ...meta, description: 'sms code confirmed' });
}

async function enforceRateLimit(
  ctx: LoginFlowContext,
  identifier: string,
  action: 'sms_send' | 'sms_verify',
  meta: { userId: UserId; sourceAddress: string; userAgent?: string }
): Promise<void> {
  const decision = await ctx.rateLimiter.isAllowed(identifier, action);
  if (!decision.allowed) {
    await ctx.audit({
      type: 'rate_limited',
      ...meta,
      description: `${action} rate limit exceeded`,
      data: { action, retryAfterMs: decision.retryAfterMs }
    });
    throw rateLimitedError(decision.retryAfterMs);
  }
  await ctx.rateLimiter.recordAttempt(identifier, action);
}

function requireUserId(userId: UserId): UserId {
  if (typeof userId !== 'string' || userId.length === 0) {
    throw new AuthError('invalid_input', 'userId is required');
  }
  return userId;
}
