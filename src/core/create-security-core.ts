import { AuthError } from './auth-error.js';
import { defaultSecurityPolicy, mergePolicy, validatePolicy } from './auth-policy.js';
import type { SecurityPolicy, SecurityPolicyOverrides } from './auth-policy.js';
import { noopLogger } from './auth-types.js';
import type { Clock, Logger, RandomBytesFn, TokenSubject, UserId } from './auth-types.js';
import { emitAuditEvent } from './audit/security-audit.js';
import type { AuditSink, SecurityAuditEvent } from './audit/security-audit.js';
import type { SecurityConfig } from './config/load-config.js';
import { createCredentialHasher } from './credentials/credential-hasher.js';
import type { CredentialHasher } from './credentials/credential-hasher.js';
import { assertPasswordStrength } from './password/password-strength.js';
import { loginWithPassword } from './password/password-login.js';
import type {
  LoginFlowContext,
  PasswordLoginInput,
  PasswordLoginResult
} from './password/password-login.js';
import { RateLimiter } from './rate-limit/rate-limiter.js';
import type { RateLimitDecision } from './rate-limit/rate-limiter.js';
import { createSessionTokenService } from './sessions/session-tokens.js';
import type { SessionTokenService } from './sessions/session-tokens.js';
import type {
  AccessTokenClaims,
  ActiveSessionSummary,
  RevokeSessionResult,
  TokenPair
} from './sessions/session-types.js';
import type { SmsGateway } from './sms/sms-gateway.js';
import type { SecurityStorage } from './storage/security-storage.js';
import type {
  RequestCodeInput,
  RequestCodeResult,
  VerifyCodeInput,
  VerifyCodeResult
} from './two-factor/challenge-types.js';
import { createTwoFactorChallengeService } from './two-factor/sms-challenges.js';
import type { RandomIntFn, TwoFactorChallengeService } from './two-factor/sms-challenges.js';
import {
  completeTwoFactorLogin,
  confirmPhoneVerification,
  requestPhoneVerification
} from './two-factor/two-factor-login.js';
import type {
  CompleteTwoFactorLoginInput,
  PhoneVerificationConfirmInput,
  PhoneVerificationRequestInput
} from './two-factor/two-factor-login.js';

export type CreateSecurityCoreOptions = {
  storage: SecurityStorage;
  /**
   * Usually `loadSecurityConfig()`. Supplies the signing secret, issuer and SMS app name.
   */
  config: Pick<SecurityConfig, 'jwtSecret' | 'jwtIssuer' | 'appName'>;
  smsGateway: SmsGateway;
  auditSink?: AuditSink;
  logger?: Logger;
  /**
   * Inject for testability; defaults to new Date().
   */
  clock?: Clock;
  /**
   * Inject for testability; defaults to Node's crypto.randomBytes.
   */
  randomBytes?: RandomBytesFn;
  /**
   * Inject for testability; defaults to Node's crypto.randomInt.
   */
  randomInt?: RandomIntFn;
  generateId?: () => string;
  policy?: SecurityPolicyOverrides;
};

export type CleanupSummary = {
  sessions: number;
  challenges: number;
  rateLimits: number;
};

export type SecurityCore = {
  readonly policy: SecurityPolicy;
  readonly hasher: CredentialHasher;
  readonly rateLimiter: RateLimiter;
  readonly sessions: SessionTokenService;
  readonly challenges: TwoFactorChallengeService;

  // Credentials
  hash(secret: string, salt: Uint8Array): Promise<string>;
  verify(secret: string, encodedHash: string): Promise<boolean>;
  generateSalt(length?: number): Uint8Array;
  /**
   * Strength check, then a salted hash. For registration and password reset.
   */
  hashPassword(password: string): Promise<string>;

  // Rate limiting
  isAllowed(identifier: string, action: string): Promise<RateLimitDecision>;
  recordAttempt(identifier: string, action: string): Promise<void>;
  resetAttempts(identifier: string, action: string): Promise<void>;

  // Sessions
  generateTokenPair(user: TokenSubject, deviceInfo: string, sourceAddress: string): Promise<TokenPair>;
  validateToken(accessToken: string): Promise<AccessTokenClaims>;
  revokeSession(refreshToken: string): Promise<RevokeSessionResult>;
  revokeAllSessions(userId: UserId): Promise<number>;
  /**
   * Exchange a refresh token for a new pair. Throws `unauthorized` for invalid, expired and
   * replayed tokens.
   */
  refreshSession(input: {
    refreshToken: string;
    sourceAddress: string;
    userAgent?: string;
  }): Promise<TokenPair>;
  listActiveSessions(userId: UserId): Promise<ActiveSessionSummary[]>;

  // Second factor
  requestCode(input: RequestCodeInput): Promise<RequestCodeResult>;
  verifyCode(input: VerifyCodeInput): Promise<VerifyCodeResult>;

  // Flows
  loginWithPassword(input: PasswordLoginInput): Promise<PasswordLoginResult>;
  completeTwoFactorLogin(input: CompleteTwoFactorLoginInput): Promise<{ userId: UserId; tokens: TokenPair }>;
  requestPhoneVerification(input: PhoneVerificationRequestInput): Promise<RequestCodeResult>;
  confirmPhoneVerification(input: PhoneVerificationConfirmInput): Promise<void>;

  /**
   * Expired sessions, codes expired for more than a day, and stale rate-limit rows.
   */
  cleanupExpired(): Promise<CleanupSummary>;
};

export function createSecurityCore(options: CreateSecurityCoreOptions): SecurityCore {
  if (!options || typeof options !== 'object') {
    throw new AuthError('invalid_input', 'createSecurityCore: options must be an object');
  }
  if (!options.storage) {
    throw new AuthError('invalid_input', 'createSecurityCore: storage is required');
  }
  if (!options.smsGateway) {
    throw new AuthError('invalid_input', 'createSecurityCore: smsGateway is required');
  }
  if (!options.config?.jwtSecret) {
    throw new AuthError('configuration', 'createSecurityCore: config.jwtSecret is required');
  }

  const policy = mergePolicy(defaultSecurityPolicy, {
    ...options.policy,
    session: { issuer: options.config.jwtIssuer, ...options.policy?.session }
  });
  validatePolicy(policy);

  const clock: Clock = options.clock ?? { now: () => new Date() };
  const logger = options.logger ?? noopLogger;
  const storage = options.storage;

  const hasher = createCredentialHasher({
    params: policy.hashing.params,
    saltLength: policy.hashing.saltLength,
    randomBytes: options.randomBytes
  });
  const rateLimiter = new RateLimiter({ storage, rules: policy.rateLimits, clock, logger });
  const sessions = createSessionTokenService({
    storage,
    hasher,
    policy: policy.session,
    signingSecret: options.config.jwtSecret,
    clock,
    randomBytes: options.randomBytes,
    generateId: options.generateId,
    logger
  });
  const challenges = createTwoFactorChallengeService({
    storage,
    hasher,
    smsGateway: options.smsGateway,
    policy: policy.challenge,
    appName: options.config.appName,
    clock,
    randomInt: options.randomInt,
    generateId: options.generateId,
    logger
  });

  const audit = (event: Omit<SecurityAuditEvent, 'occurredAt'>): Promise<void> =>
    emitAuditEvent(options.auditSink, logger, { ...event, occurredAt: clock.now() });

  const flow: LoginFlowContext = {
    storage,
    policy,
    hasher,
    rateLimiter,
    sessions,
    challenges,
    clock,
    logger,
    audit
  };

  return {
    policy,
    hasher,
    rateLimiter,
    sessions,
    challenges,

    hash: (secret, salt) => hasher.hash(secret, salt),
    verify: (secret, encodedHash) => hasher.verify(secret, encodedHash),
    generateSalt: length => hasher.generateSalt(length),
    hashPassword: async password => {
      assertPasswordStrength(password, policy.password);
      return hasher.hashSecret(password);
    },

    isAllowed: (identifier, action) => rateLimiter.isAllowed(identifier, action),
    recordAttempt: (identifier, action) => rateLimiter.recordAttempt(identifier, action),
    resetAttempts: (identifier, action) => rateLimiter.resetAttempts(identifier, action),

    generateTokenPair: (user, deviceInfo, sourceAddress) =>
      sessions.generateTokenPair(user, deviceInfo, sourceAddress),
    validateToken: accessToken => sessions.validateToken(accessToken),
    revokeSession: async refreshToken => {
      const out = await sessions.revokeSession(refreshToken);
      if (out.revoked) {
        await audit({
          type: 'session_revoked',
          userId: out.userId,
          description: 'logout',
          data: { sessionId: out.sessionId }
        });
      }
      return out;
    },
    revokeAllSessions: async userId => {
      const revoked = await sessions.revokeAllSessions(userId);
      await audit({ type: 'sessions_revoked_all', userId, description: 'revoke all', data: { revoked } });
      return revoked;
    },
    refreshSession: async input => {
      const out = await sessions.refreshSession(
        input.refreshToken,
        input.userAgent ?? '',
        input.sourceAddress
      );
      const meta = { sourceAddress: input.sourceAddress, userAgent: input.userAgent };
      if (out.ok) {
        await audit({
          type: 'session_refreshed',
          userId: out.userId,
          ...meta,
          description: 'refresh token rotated',
          data: { sessionId: out.tokens.sessionId, rotatedFromSessionId: out.rotatedFromSessionId }
        });
        return out.tokens;
      }
      if (out.reason === 'reused') {
        await audit({
          type: 'refresh_token_reuse',
          userId: out.userId,
          ...meta,
          description: 'revoked refresh token presented; all sessions revoked'
        });
      }
      throw new AuthError('unauthorized', `refresh failed: ${out.reason}`, {
        publicMessage: 'Session expired. Please sign in again.'
      });
    },
    listActiveSessions: userId => sessions.listActiveSessions(userId),

    requestCode: input => challenges.requestCode(input),
    verifyCode: input => challenges.verifyCode(input),

    loginWithPassword: input => loginWithPassword(flow, input),
    completeTwoFactorLogin: input => completeTwoFactorLogin(flow, input),
    requestPhoneVerification: input => requestPhoneVerification(flow, input),
    confirmPhoneVerification: input => confirmPhoneVerification(flow, input),

    cleanupExpired: async () => {
      const removedSessions = await sessions.cleanupExpiredSessions();
      const removedChallenges = await challenges.cleanupExpiredCodes();
      const removedRateLimits = await rateLimiter.cleanupExpiredRecords();
      logger.info('security cleanup finished', {
        sessions: removedSessions,
        challenges: removedChallenges,
        rateLimits: removedRateLimits
      });
      return {
        sessions: removedSessions,
        challenges: removedChallenges,
        rateLimits: removedRateLimits
      };
    }
  };
}
