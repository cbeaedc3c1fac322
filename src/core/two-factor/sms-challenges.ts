import { randomInt as nodeRandomInt, randomUUID } from 'node:crypto';
import { AuthError, transientError } from '../auth-error.js';
import type { ChallengePolicy } from '../auth-policy.js';
import { asChallengeId, noopLogger } from '../auth-types.js';
import type { Clock, Logger } from '../auth-types.js';
import type { CredentialHasher } from '../credentials/credential-hasher.js';
import type { SmsGateway } from '../sms/sms-gateway.js';
import type {
  ChallengePurpose,
  SecurityStorage,
  VerificationChallengeRecord
} from '../storage/security-storage.js';
import { challengePurposes } from '../storage/security-storage.js';
import { storeCall } from '../storage/store-call.js';
import { formatChallengeMessage } from './challenge-messages.js';
import type {
  RequestCodeInput,
  RequestCodeResult,
  VerificationStatus,
  VerifyCodeInput,
  VerifyCodeResult
} from './challenge-types.js';
import { assertValidPhoneNumber, maskPhoneNumber } from './phone-number.js';

export type RandomIntFn = (min: number, max: number) => number;

export type TwoFactorChallengeService = {
  requestCode(input: RequestCodeInput): Promise<RequestCodeResult>;
  verifyCode(input: VerifyCodeInput): Promise<VerifyCodeResult>;
  getVerificationStatus(phoneNumber: string, purpose: ChallengePurpose): Promise<VerificationStatus>;
  /**
   * Deletes unverified challenges for (phone, purpose). Returns the number removed.
   */
  revokeVerificationCode(phoneNumber: string, purpose: ChallengePurpose): Promise<number>;
  /**
   * Deletes challenges that expired more than `retentionMs` ago.
   */
  cleanupExpiredCodes(): Promise<number>;
};

export type CreateTwoFactorChallengeServiceOptions = {
  storage: Pick<SecurityStorage, 'challenges' | 'accounts'>;
  hasher: CredentialHasher;
  smsGateway: SmsGateway;
  policy: ChallengePolicy;
  /**
   * Shown in the SMS text.
   */
  appName: string;
  clock?: Clock;
  randomInt?: RandomIntFn;
  generateId?: () => string;
  logger?: Logger;
  retentionMs?: number;
};

const DEFAULT_RETENTION_MS = 1000 * 60 * 60 * 24;

export function createTwoFactorChallengeService(
  options: CreateTwoFactorChallengeServiceOptions
): TwoFactorChallengeService {
  const storage = options.storage;
  const hasher = options.hasher;
  const policy = options.policy;
  const clock = options.clock ?? { now: () => new Date() };
  const randomInt = options.randomInt ?? nodeRandomInt;
  const generateId = options.generateId ?? randomUUID;
  const logger = options.logger ?? noopLogger;
  const retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;

  const generateCode = (): string => {
    const min = 10 ** (policy.codeLength - 1);
    const max = 10 ** policy.codeLength;
    const n = randomInt(min, max);
    if (!Number.isInteger(n) || n < min || n >= max) {
      throw new AuthError('internal_error', 'randomInt returned a value outside the code range');
    }
    return String(n);
  };

  const requestCode = async (input: RequestCodeInput): Promise<RequestCodeResult> => {
    assertPurpose(input.purpose);
    const phoneNumber = assertValidPhoneNumber(input.phoneNumber);

    const now = clock.now();
    const code = generateCode();
    const codeHash = await hasher.hashSecret(code);
    const challenge: VerificationChallengeRecord = {
      id: asChallengeId(generateId()),
      userId: input.userId,
      phoneNumber,
      codeHash,
      purpose: input.purpose,
      attempts: 0,
      maxAttempts: policy.maxAttempts,
      createdAt: now,
      expiresAt: new Date(now.getTime() + policy.ttlMs),
      verified: false
    };
    const message = formatChallengeMessage({
      appName: options.appName,
      purpose: input.purpose,
      code,
      ttlMs: policy.ttlMs
    });

    let deliveryError: unknown;
    try {
      await storage.challenges.replaceChallenge(challenge, async () => {
        try {
          await options.smsGateway.send(phoneNumber, message);
        } catch (err) {
          deliveryError = err;
          throw err;
        }
      });
    } catch (err) {
      if (deliveryError !== undefined) {
        logger.warn('sms delivery failed', {
          purpose: input.purpose,
          phone: maskPhoneNumber(phoneNumber)
        });
        throw transientError('sms delivery failed', deliveryError);
      }
      throw transientError('storage.challenges.replaceChallenge failed', err);
    }

    logger.debug('verification code sent', {
      purpose: input.purpose,
      phone: maskPhoneNumber(phoneNumber)
    });
    return { challengeId: challenge.id, expiresAt: challenge.expiresAt, phoneNumber };
  };

  const verifyCode = async (input: VerifyCodeInput): Promise<VerifyCodeResult> => {
    assertPurpose(input.purpose);
    const phoneNumber = assertValidPhoneNumber(input.phoneNumber);
    if (typeof input.code !== 'string') {
      throw new AuthError('invalid_input', 'code must be a string');
    }
    const code = input.code.trim();

    const challenge = await storeCall('challenges.getLatestChallenge', () =>
      storage.challenges.getLatestChallenge(phoneNumber, input.purpose)
    );
    if (!challenge) return { ok: false, reason: 'not_found' };
    // A challenge bound to another account is invisible to this caller.
    if (input.userId && challenge.userId && challenge.userId !== input.userId) {
      return { ok: false, reason: 'not_found' };
    }

    const now = clock.now();
    if (challenge.verified) return { ok: false, reason: 'already_used' };
    if (challenge.expiresAt.getTime() <= now.getTime()) return { ok: false, reason: 'expired' };
    if (challenge.attempts >= challenge.maxAttempts) return { ok: false, reason: 'too_many_attempts' };

    // Count the attempt before comparing; the guard in the store caps it at maxAttempts.
    const attempts = await storeCall('challenges.incrementAttempts', () =>
      storage.challenges.incrementAttempts(challenge.id, now)
    );
    if (attempts === null) {
      return reclassify(challenge.id, phoneNumber, input.purpose, now);
    }

    const valid =
      /^[0-9]+$/.test(code) &&
      code.length === policy.codeLength &&
      (await hasher.verify(code, challenge.codeHash));
    if (!valid) {
      return {
        ok: false,
        reason: 'invalid',
        remainingAttempts: Math.max(0, challenge.maxAttempts - attempts)
      };
    }

    const marked = await storeCall('challenges.markVerified', () =>
      storage.challenges.markVerified(challenge.id, now)
    );
    if (!marked) return reclassify(challenge.id, phoneNumber, input.purpose, now);

    if (input.purpose === 'phone_verification' && input.userId) {
      const userId = input.userId;
      await storeCall('accounts.markPhoneVerified', () =>
        storage.accounts.markPhoneVerified(userId, phoneNumber, now)
      );
    }
    return { ok: true, challengeId: challenge.id };
  };

  // A guarded write lost to a concurrent request; report what the row looks like now.
  const reclassify = async (
    challengeId: VerificationChallengeRecord['id'],
    phoneNumber: string,
    purpose: ChallengePurpose,
    now: Date
  ): Promise<VerifyCodeResult> => {
    const latest = await storeCall('challenges.getLatestChallenge', () =>
      storage.challenges.getLatestChallenge(phoneNumber, purpose)
    );
    if (!latest || latest.id !== challengeId) return { ok: false, reason: 'not_found' };
    if (latest.verified) return { ok: false, reason: 'already_used' };
    if (latest.expiresAt.getTime() <= now.getTime()) return { ok: false, reason: 'expired' };
    return { ok: false, reason: 'too_many_attempts' };
  };

  const getVerificationStatus = async (
    phoneNumber: string,
    purpose: ChallengePurpose
  ): Promise<VerificationStatus> => {
    assertPurpose(purpose);
    const normalized = assertValidPhoneNumber(phoneNumber);
    const latest = await storeCall('challenges.getLatestChallenge', () =>
      storage.challenges.getLatestChallenge(normalized, purpose)
    );
    if (!latest) return { exists: false };
    return {
      exists: true,
      verified: latest.verified,
      expiresAt: latest.expiresAt,
      attempts: latest.attempts,
      maxAttempts: latest.maxAttempts
    };
  };

  const revokeVerificationCode = async (
    phoneNumber: string,
    purpose: ChallengePurpose
  ): Promise<number> => {
    assertPurpose(purpose);
    const normalized = assertValidPhoneNumber(phoneNumber);
    return storeCall('challenges.deleteUnverifiedChallenges', () =>
      storage.challenges.deleteUnverifiedChallenges(normalized, purpose)
    );
  };

  const cleanupExpiredCodes = async (): Promise<number> => {
    const before = new Date(clock.now().getTime() - retentionMs);
    const removed = await storeCall('challenges.deleteExpiredChallenges', () =>
      storage.challenges.deleteExpiredChallenges(before)
    );
    logger.debug('expired verification codes swept', { removed });
    return removed;
  };

  return {
    requestCode,
    verifyCode,
    getVerificationStatus,
    revokeVerificationCode,
    cleanupExpiredCodes
  };
}

/**
 * Maps a failed verification to the error a caller should surface.
 */
export function toChallengeError(result: Exclude<VerifyCodeResult, { ok: true }>): AuthError {
  switch (result.reason) {
    case 'not_found':
      return new AuthError('challenge_not_found', 'no verification code found', {
        publicMessage: 'No verification code found. Please request a new code.'
      });
    case 'already_used':
      return new AuthError('challenge_consumed', 'verification code already used', {
        publicMessage: 'Code has already been used.'
      });
    case 'expired':
      return new AuthError('challenge_expired', 'verification code expired', {
        publicMessage: 'Verification code has expired.'
      });
    case 'too_many_attempts':
      return new AuthError('challenge_attempts_exhausted', 'too many verification attempts', {
        publicMessage: 'Too many verification attempts. Please request a new code.'
      });
    case 'invalid':
      return new AuthError('challenge_invalid', 'invalid verification code', {
        remainingAttempts: result.remainingAttempts,
        publicMessage:
          result.remainingAttempts > 0
            ? `Invalid verification code. ${result.remainingAttempts} attempts remaining.`
            : 'Invalid verification code. No more attempts allowed. Please request a new code.'
      });
  }
}

function assertPurpose(purpose: ChallengePurpose): void {
  if (!challengePurposes.includes(purpose)) {
    throw new AuthError('invalid_input', `unknown verification purpose: ${String(purpose)}`);
  }
}
