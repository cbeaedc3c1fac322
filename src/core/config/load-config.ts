import { z } from 'zod';
import { AuthError } from '../auth-error.js';
import { createTestModeSmsGateway } from '../sms/sms-gateway.js';
import type { SmsGateway } from '../sms/sms-gateway.js';
import { createTwilioSmsGateway } from '../sms/twilio-gateway.js';
import type { FetchFn } from '../sms/twilio-gateway.js';

const optionalString = z
  .string()
  .trim()
  .transform(v => (v.length === 0 ? undefined : v))
  .optional();

export const securityEnvSchema = z
  .object({
    JWT_SECRET: z
      .string({ required_error: 'JWT_SECRET is required' })
      .min(32, 'JWT_SECRET must be at least 32 characters'),
    JWT_ISSUER: z.string().trim().min(1).default('property-auth'),
    APP_NAME: z.string().trim().min(1).default('PropertyAuth'),
    TWILIO_ACCOUNT_SID: optionalString,
    TWILIO_AUTH_TOKEN: optionalString,
    TWILIO_PHONE_NUMBER: optionalString,
    SMS_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(10_000)
  })
  .superRefine((env, ctx) => {
    const twilio = [env.TWILIO_ACCOUNT_SID, env.TWILIO_AUTH_TOKEN, env.TWILIO_PHONE_NUMBER];
    const set = twilio.filter(v => v !== undefined).length;
    if (set !== 0 && set !== twilio.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          'TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_PHONE_NUMBER must be set together'
      });
    }
  });

export type TwilioConfig = {
  accountSid: string;
  authToken: string;
  fromNumber: string;
};

export type SecurityConfig = {
  jwtSecret: string;
  jwtIssuer: string;
  appName: string;
  /**
   * Absent means test mode: codes are kept in memory and never sent.
   */
  twilio?: TwilioConfig;
  smsTimeoutMs: number;
};

/**
 * Reads and validates configuration. Throws `configuration` when anything is missing or
 * malformed; the signing secret has no fallback.
 */
export function loadSecurityConfig(
  env: Record<string, string | undefined> = process.env
): SecurityConfig {
  const parsed = securityEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new AuthError('configuration', `invalid security configuration: ${issues}`, {
      cause: parsed.error
    });
  }
  const e = parsed.data;
  const twilio =
    e.TWILIO_ACCOUNT_SID && e.TWILIO_AUTH_TOKEN && e.TWILIO_PHONE_NUMBER
      ? {
          accountSid: e.TWILIO_ACCOUNT_SID,
          authToken: e.TWILIO_AUTH_TOKEN,
          fromNumber: e.TWILIO_PHONE_NUMBER
        }
      : undefined;
  return {
    jwtSecret: e.JWT_SECRET,
    jwtIssuer: e.JWT_ISSUER,
    appName: e.APP_NAME,
    twilio,
    smsTimeoutMs: e.SMS_TIMEOUT_MS
  };
}

export function createSmsGatewayFromConfig(
  config: SecurityConfig,
  options: { fetch?: FetchFn } = {}
): SmsGateway {
  if (!config.twilio) return createTestModeSmsGateway();
  return createTwilioSmsGateway({
    ...config.twilio,
    timeoutMs: config.smsTimeoutMs,
    fetch: options.fetch
  });
}
