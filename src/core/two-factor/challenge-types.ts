import type { ChallengeId, UserId } from '../auth-types.js';
import type { ChallengePurpose } from '../storage/security-storage.js';

export type RequestCodeInput = {
  phoneNumber: string;
  purpose: ChallengePurpose;
  userId?: UserId;
};

export type RequestCodeResult = {
  challengeId: ChallengeId;
  expiresAt: Date;
  /**
   * Normalized form of the number the code was sent to.
   */
  phoneNumber: string;
};

export type VerifyCodeInput = {
  phoneNumber: string;
  code: string;
  purpose: ChallengePurpose;
  userId?: UserId;
};

export type VerifyCodeFailureReason = 'not_found' | 'already_used' | 'expired' | 'too_many_attempts';

export type VerifyCodeResult =
  | { ok: true; challengeId: ChallengeId }
  | { ok: false; reason: VerifyCodeFailureReason }
  | { ok: false; reason: 'invalid'; remainingAttempts: number };

export type VerificationStatus =
  | { exists: false }
  | {
      exists: true;
      verified: boolean;
      expiresAt: Date;
      attempts: number;
      maxAttempts: number;
    };
