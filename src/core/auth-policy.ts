import { AuthError } from './auth-error.js';

export type Argon2Params = {
  /**
   * Kibibytes (KiB). Each lane allocates its share of memoryCost.
   */
  memoryCost: number;
  /**
   * Iterations.
   */
  timeCost: number;
  /**
   * Lanes/threads.
   */
  parallelism: number;
  /**
   * Derived key length in bytes.
   */
  outputLen: number;
};

export type PasswordPolicy = {
  minLength: number;
  maxLength: number;
  /**
   * Require at least one upper-case letter, lower-case letter, digit and symbol.
   */
  requireCharacterClasses: boolean;
};

export type HashingPolicy = {
  params: Argon2Params;
  /**
   * Salt length in bytes used by `hashSecret`.
   */
  saltLength: number;
};

export type RateLimitRule = {
  maxAttempts: number;
  /**
   * Fixed window size.
   */
  windowMs: number;
  /**
   * Block installed once maxAttempts is reached within a window.
   */
  blockMs: number;
};

export type RateLimitAction =
  | 'login'
  | 'register'
  | 'password_reset'
  | 'sms_send'
  | 'sms_verify'
  | 'email_verification';

export type RateLimitRules = Partial<Record<RateLimitAction | (string & {}), RateLimitRule>>;

export type SessionPolicy = {
  /**
   * Access token (JWT) lifetime.
   */
  accessTokenTtlMs: number;
  /**
   * Session row / refresh token lifetime.
   */
  refreshTokenTtlMs: number;
  /**
   * `iss` claim; validated on every token.
   */
  issuer: string;
  /**
   * Accepted clock skew for exp/nbf, in seconds.
   */
  clockToleranceSeconds: number;
};

export type ChallengePolicy = {
  codeLength: number;
  ttlMs: number;
  maxAttempts: number;
};

export type LockoutPolicy = {
  /**
   * Consecutive wrong passwords before the account is locked.
   */
  maxFailedLogins: number;
  lockMs: number;
};

export type SecurityPolicy = {
  password: PasswordPolicy;
  hashing: HashingPolicy;
  rateLimits: RateLimitRules;
  session: SessionPolicy;
  challenge: ChallengePolicy;
  lockout: LockoutPolicy;
};

const MINUTE = 1000 * 60;
const HOUR = MINUTE * 60;

export const defaultArgon2Params: Argon2Params = {
  memoryCost: 128 * 1024, // 128 MiB
  timeCost: 4,
  parallelism: 4,
  outputLen: 64
};

export const defaultRateLimitRules: RateLimitRules = {
  login: { maxAttempts: 5, windowMs: 15 * MINUTE, blockMs: 30 * MINUTE },
  register: { maxAttempts: 3, windowMs: HOUR, blockMs: 2 * HOUR },
  password_reset: { maxAttempts: 3, windowMs: HOUR, blockMs: HOUR },
  sms_send: { maxAttempts: 5, windowMs: HOUR, blockMs: 2 * HOUR },
  sms_verify: { maxAttempts: 10, windowMs: 15 * MINUTE, blockMs: 30 * MINUTE },
  email_verification: { maxAttempts: 3, windowMs: HOUR, blockMs: HOUR }
};

export const defaultSecurityPolicy: SecurityPolicy = {
  password: {
    minLength: 8,
    maxLength: 1024,
    requireCharacterClasses: true
  },
  hashing: {
    params: defaultArgon2Params,
    saltLength: 32
  },
  rateLimits: defaultRateLimitRules,
  session: {
    accessTokenTtlMs: 15 * MINUTE,
    refreshTokenTtlMs: 7 * 24 * HOUR,
    issuer: 'property-auth',
    clockToleranceSeconds: 0
  },
  challenge: {
    codeLength: 6,
    ttlMs: 5 * MINUTE,
    maxAttempts: 3
  },
  lockout: {
    maxFailedLogins: 5,
    lockMs: 30 * MINUTE
  }
};

export type SecurityPolicyOverrides = {
  password?: Partial<PasswordPolicy>;
  hashing?: { params?: Partial<Argon2Params>; saltLength?: number };
  rateLimits?: RateLimitRules;
  session?: Partial<SessionPolicy>;
  challenge?: Partial<ChallengePolicy>;
  lockout?: Partial<LockoutPolicy>;
};

export function mergePolicy(
  base: SecurityPolicy,
  override?: SecurityPolicyOverrides
): SecurityPolicy {
  if (!override) return base;
  return {
    password: { ...base.password, ...override.password },
    hashing: {
      params: { ...base.hashing.params, ...override.hashing?.params },
      saltLength: override.hashing?.saltLength ?? base.hashing.saltLength
    },
    rateLimits: { ...base.rateLimits, ...override.rateLimits },
    session: { ...base.session, ...override.session },
    challenge: { ...base.challenge, ...override.challenge },
    lockout: { ...base.lockout, ...override.lockout }
  };
}

export function validatePolicy(policy: SecurityPolicy): void {
  if (policy.password.minLength < 8) {
    throw new AuthError('invalid_input', 'policy.password.minLength must be >= 8');
  }
  if (policy.password.maxLength < policy.password.minLength) {
    throw new AuthError('invalid_input', 'policy.password.maxLength must be >= minLength');
  }
  validateArgon2Params(policy.hashing.params);
  if (policy.hashing.saltLength < 16 || policy.hashing.saltLength > 1024) {
    throw new AuthError('invalid_input', 'policy.hashing.saltLength must be between 16 and 1024');
  }
  for (const [action, rule] of Object.entries(policy.rateLimits)) {
    if (rule) validateRateLimitRule(action, rule);
  }
  if (policy.session.accessTokenTtlMs < 1000 * 30) {
    throw new AuthError('invalid_input', 'policy.session.accessTokenTtlMs must be at least 30 seconds');
  }
  if (policy.session.refreshTokenTtlMs < policy.session.accessTokenTtlMs) {
    throw new AuthError('invalid_input', 'policy.session.refreshTokenTtlMs must be >= accessTokenTtlMs');
  }
  if (!policy.session.issuer) {
    throw new AuthError('invalid_input', 'policy.session.issuer is required');
  }
  if (policy.session.clockToleranceSeconds < 0 || policy.session.clockToleranceSeconds > 300) {
    throw new AuthError('invalid_input', 'policy.session.clockToleranceSeconds must be between 0 and 300');
  }
  if (policy.challenge.codeLength < 4 || policy.challenge.codeLength > 10) {
    throw new AuthError('invalid_input', 'policy.challenge.codeLength must be between 4 and 10');
  }
  if (policy.challenge.ttlMs < 1000 * 30) {
    throw new AuthError('invalid_input', 'policy.challenge.ttlMs must be at least 30 seconds');
  }
  if (!Number.isInteger(policy.challenge.maxAttempts) || policy.challenge.maxAttempts < 1) {
    throw new AuthError('invalid_input', 'policy.challenge.maxAttempts must be >= 1');
  }
  if (!Number.isInteger(policy.lockout.maxFailedLogins) || policy.lockout.maxFailedLogins < 1) {
    throw new AuthError('invalid_input', 'policy.lockout.maxFailedLogins must be >= 1');
  }
  if (policy.lockout.lockMs < 0) {
    throw new AuthError('invalid_input', 'policy.lockout.lockMs must be >= 0');
  }
}

export function validateArgon2Params(params: Argon2Params): void {
  if (!Number.isInteger(params.memoryCost) || params.memoryCost < 1024) {
    throw new AuthError('invalid_input', 'invalid argon2 memoryCost parameter');
  }
  if (!Number.isInteger(params.timeCost) || params.timeCost < 1) {
    throw new AuthError('invalid_input', 'invalid argon2 timeCost parameter');
  }
  if (!Number.isInteger(params.parallelism) || params.parallelism < 1 || params.parallelism > 255) {
    throw new AuthError('invalid_input', 'invalid argon2 parallelism parameter');
  }
  if (params.memoryCost < 8 * params.parallelism) {
    throw new AuthError('invalid_input', 'argon2 memoryCost must be >= 8 * parallelism');
  }
  if (!Number.isInteger(params.outputLen) || params.outputLen < 16 || params.outputLen > 128) {
    throw new AuthError('invalid_input', 'invalid argon2 outputLen parameter');
  }
}

export function validateRateLimitRule(action: string, rule: RateLimitRule): void {
  if (!Number.isInteger(rule.maxAttempts) || rule.maxAttempts < 1)
    throw new AuthError('invalid_input', `rate limit ${action}.maxAttempts must be >= 1`);
  if (!Number.isFinite(rule.windowMs) || rule.windowMs <= 0)
    throw new AuthError('invalid_input', `rate limit ${action}.windowMs must be > 0`);
  if (!Number.isFinite(rule.blockMs) || rule.blockMs <= 0)
    throw new AuthError('invalid_input', `rate limit ${action}.blockMs must be > 0`);
}
