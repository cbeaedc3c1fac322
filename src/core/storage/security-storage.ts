import type { AccessTokenId, ChallengeId, SessionId, UserId } from '../auth-types.js';

export type AccountRecord = {
  id: UserId;
  tenantId: string;
  email: string;
  role: string;
  /**
   * Self-describing encoded hash (never plaintext).
   * Example (PHC): "$argon2id$v=19$m=131072,t=4,p=4$<salt>$<key>"
   */
  passwordHash: string;
  phoneNumber?: string;
  phoneVerified: boolean;
  twoFactorEnabled: boolean;
  isActive: boolean;
  failedLoginAttempts: number;
  lockedUntil?: Date;
  lastLoginAt?: Date;
};

export type SessionRecord = {
  id: SessionId;
  userId: UserId;
  /**
   * Hash of the refresh token's secret part (never the token itself).
   */
  refreshTokenHash: string;
  /**
   * `jti` of the access token bound to this session.
   */
  accessTokenId: AccessTokenId;
  deviceFingerprint: string;
  userAgent?: string;
  sourceAddress?: string;
  createdAt: Date;
  expiresAt: Date;
  revoked: boolean;
  revokedAt?: Date;
  /**
   * Set when this session was minted by exchanging another session's refresh token.
   */
  rotatedFromSessionId?: SessionId;
};

export type ChallengePurpose = 'login' | 'register' | 'password_reset' | 'phone_verification';

export const challengePurposes: readonly ChallengePurpose[] = [
  'login',
  'register',
  'password_reset',
  'phone_verification'
];

export type VerificationChallengeRecord = {
  id: ChallengeId;
  userId?: UserId;
  phoneNumber: string;
  /**
   * Hash of the one-time code (never plaintext).
   */
  codeHash: string;
  purpose: ChallengePurpose;
  attempts: number;
  maxAttempts: number;
  createdAt: Date;
  expiresAt: Date;
  verified: boolean;
};

export type RateLimitRecord = {
  identifier: string;
  action: string;
  attempts: number;
  windowStart: Date;
  blockedUntil?: Date;
  updatedAt: Date;
};

export type RecordFailedLoginInput = {
  userId: UserId;
  now: Date;
  /**
   * Lock once the counter reaches this value.
   */
  maxFailedLogins: number;
  /**
   * Lock expiry applied when the threshold is reached.
   */
  lockUntil: Date;
};

export type RecordAttemptInput = {
  identifier: string;
  action: string;
  now: Date;
  /**
   * Windows that started at or before this instant have expired.
   */
  windowStartCutoff: Date;
};

export type InstallBlockInput = RecordAttemptInput & {
  maxAttempts: number;
  blockedUntil: Date;
};

/**
 * Storage interface. Apps implement this against their DB of choice.
 *
 * Important: every counter and state transition below MUST be a single atomic statement
 * (conditional upsert / compare-and-swap). The services never read-then-write these fields.
 */
export type SecurityStorage = {
  accounts: {
    findByEmail(email: string): Promise<AccountRecord | null>;
    findById(userId: UserId): Promise<AccountRecord | null>;
    /**
     * Atomically increment the failure counter (restarting at 1 once a previous lock has
     * expired) and set `lockedUntil` when the new value reaches `maxFailedLogins`. Returns the
     * state after the update.
     */
    recordFailedLogin(
      input: RecordFailedLoginInput
    ): Promise<{ failedLoginAttempts: number; lockedUntil?: Date }>;
    /**
     * Reset the failure counter, clear any lock, set lastLoginAt.
     */
    recordSuccessfulLogin(userId: UserId, at: Date): Promise<void>;
    markPhoneVerified(userId: UserId, phoneNumber: string, at: Date): Promise<void>;
    /**
     * Replace the stored hash (parameter upgrade after a successful login, password reset).
     */
    updatePasswordHash(userId: UserId, passwordHash: string, at: Date): Promise<void>;
  };

  sessions: {
    createSession(session: SessionRecord): Promise<void>;
    getSessionById(id: SessionId): Promise<SessionRecord | null>;
    /**
     * The non-revoked session bound to `accessTokenId` whose expiresAt is after `now`.
     */
    findActiveByAccessTokenId(accessTokenId: AccessTokenId, now: Date): Promise<SessionRecord | null>;
    listActiveSessionsForUser(userId: UserId, now: Date): Promise<SessionRecord[]>;
    /**
     * Compare-and-set: revoke iff not already revoked. True when this call revoked it.
     */
    revokeSession(id: SessionId, revokedAt: Date): Promise<boolean>;
    /**
     * Returns the number of sessions this call revoked.
     */
    revokeAllUserSessions(userId: UserId, revokedAt: Date): Promise<number>;
    /**
     * Atomically revoke `oldId` (iff still active at `revokedAt`) and insert `newSession`.
     * Returns false, inserting nothing, when the old session was already revoked or expired.
     */
    rotateSession(oldId: SessionId, newSession: SessionRecord, revokedAt: Date): Promise<boolean>;
    deleteExpiredSessions(now: Date): Promise<number>;
  };

  challenges: {
    /**
     * In one transaction: delete unexpired, unverified challenges for the same
     * (phoneNumber, purpose), insert `challenge`, then await `deliver()`.
     * If `deliver` throws, everything is rolled back and the error propagates.
     */
    replaceChallenge(
      challenge: VerificationChallengeRecord,
      deliver: () => Promise<void>
    ): Promise<void>;
    /**
     * Most recently created challenge for (phoneNumber, purpose), in any state.
     */
    getLatestChallenge(
      phoneNumber: string,
      purpose: ChallengePurpose
    ): Promise<VerificationChallengeRecord | null>;
    /**
     * Conditional increment: attempts + 1 iff attempts < maxAttempts, not verified and not
     * expired at `now`. Returns the new attempt count, or null when the guard failed.
     */
    incrementAttempts(id: ChallengeId, now: Date): Promise<number | null>;
    /**
     * Compare-and-set: mark verified iff not verified and not expired at `now`.
     */
    markVerified(id: ChallengeId, now: Date): Promise<boolean>;
    deleteUnverifiedChallenges(phoneNumber: string, purpose: ChallengePurpose): Promise<number>;
    /**
     * Delete challenges whose expiresAt is before `before`.
     */
    deleteExpiredChallenges(before: Date): Promise<number>;
  };

  rateLimits: {
    get(identifier: string, action: string): Promise<RateLimitRecord | null>;
    /**
     * Single upsert. Starts a new window (attempts = 1, windowStart = now) when there is
     * no row, the window started at or before `windowStartCutoff`, or the block has elapsed;
     * otherwise attempts + 1. A block that has not elapsed is kept either way. Returns the row
     * after the update.
     */
    recordAttempt(input: RecordAttemptInput): Promise<RateLimitRecord>;
    /**
     * Conditional update: set blockedUntil iff the row has no block, its window started after
     * `windowStartCutoff` and it holds at least maxAttempts. True when this call installed it.
     */
    installBlock(input: InstallBlockInput): Promise<boolean>;
    /**
     * attempts = 0, blockedUntil cleared.
     */
    reset(identifier: string, action: string, now: Date): Promise<void>;
    /**
     * Delete rows whose window started before `windowStartBefore` and that are not blocking at `now`.
     */
    deleteStale(input: { windowStartBefore: Date; now: Date }): Promise<number>;
  };
};
