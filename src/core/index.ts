export * from "./auth-error.js";
export * from "./auth-policy.js";
export * from "./auth-types.js";
export * from "./audit/security-audit.js";
export * from "./config/load-config.js";
export * from "./create-security-core.js";
export * from "./credentials/credential-hasher.js";
export * from "./password/password-strength.js";
export type { PasswordLoginInput, PasswordLoginResult } from "./password/password-login.js";
export * from "./rate-limit/rate-limiter.js";
export {
  createSessionTokenService,
  deviceFingerprint,
  parseRefreshToken,
  MIN_SIGNING_SECRET_LENGTH,
} from "./sessions/session-tokens.js";
export type {
  CreateSessionTokenServiceOptions,
  SessionTokenService,
} from "./sessions/session-tokens.js";
export * from "./sessions/session-types.js";
export * from "./sms/sms-gateway.js";
export * from "./sms/twilio-gateway.js";
export * from "./storage/security-storage.js";
export * from "./two-factor/challenge-types.js";
export * from "./two-factor/phone-number.js";
export { createTwoFactorChallengeService, toChallengeError } from "./two-factor/sms-challenges.js";
export type {
  CreateTwoFactorChallengeServiceOptions,
  RandomIntFn,
  TwoFactorChallengeService,
} from "./two-factor/sms-challenges.js";
export type {
  CompleteTwoFactorLoginInput,
  PhoneVerificationConfirmInput,
  PhoneVerificationRequestInput,
} from "./two-factor/two-factor-login.js";
export { formatChallengeMessage } from "./two-factor/challenge-messages.js";
