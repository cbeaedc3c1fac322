import { describe, expect, it } from 'vitest';
import { createMemorySecurityStorage } from '../../../src/adapters/memory/memory-security-storage.js';
import { defaultSecurityPolicy } from '../../../src/core/auth-policy.js';
import { asUserId } from '../../../src/core/auth-types.js';
import { createCredentialHasher } from '../../../src/core/credentials/credential-hasher.js';
import { createTestModeSmsGateway } from '../../../src/core/sms/sms-gateway.js';
import {
  createTwoFactorChallengeService,
  toChallengeError
} from '../../../src/core/two-factor/sms-challenges.js';
import {
  fastArgon2Params,
  manualClock,
  recordingLogger,
  sequentialIds,
  testAccount
} from '../../support/fixtures.js';

const MINUTE = 60_000;
const PHONE = '+15555550123';

function setup(codes: number[] = [123456, 654321, 111111]) {
  const storage = createMemorySecurityStorage({ accounts: [testAccount()] });
  const clock = manualClock();
  const logger = recordingLogger();
  let failDelivery = false;
  const gateway = createTestModeSmsGateway({
    now: clock.now,
    fail: () => (failDelivery ? new Error('provider down') : undefined)
  });
  const queue = [...codes];
  const service = createTwoFactorChallengeService({
    storage,
    hasher: createCredentialHasher({ params: fastArgon2Params }),
    smsGateway: gateway,
    policy: defaultSecurityPolicy.challenge,
    appName: 'PropertyAuth',
    clock,
    randomInt: () => {
      const next = queue.shift();
      if (next === undefined) throw new Error('no more codes');
      return next;
    },
    generateId: sequentialIds('ch'),
    logger
  });
  return {
    storage,
    clock,
    gateway,
    logger,
    service,
    setFailDelivery: (v: boolean) => {
      failDelivery = v;
    }
  };
}

describe('core/two-factor/sms-challenges', () => {
  it('sends a code to the normalized number and stores only its hash', async () => {
    const { service, gateway, storage, clock } = setup();
    const start = clock.now();

    const sent = await service.requestCode({ phoneNumber: '+1 (555) 555-0123', purpose: 'login' });
    expect(sent).toEqual({
      challengeId: 'ch-1',
      expiresAt: new Date(start.getTime() + 5 * MINUTE),
      phoneNumber: PHONE
    });
    expect(gateway.outbox).toEqual([
      {
        to: PHONE,
        body: 'Your PropertyAuth login verification code is: 123456. This code expires in 5 minutes.',
        sentAt: start
      }
    ]);
    expect(storage.tables.challenges).toHaveLength(1);
    expect(storage.tables.challenges[0]?.codeHash.startsWith('$argon2id$')).toBe(true);
    expect(storage.tables.challenges[0]?.codeHash).not.toContain('123456');
  });

  it('accepts the right code once', async () => {
    const { service } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });

    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-1' });
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: false, reason: 'already_used' });
  });

  it('locks the challenge after maxAttempts wrong codes, even for the right code', async () => {
    const { service } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });
    const verify = (code: string) => service.verifyCode({ phoneNumber: PHONE, code, purpose: 'login' });

    await expect(verify('000000')).resolves.toEqual({ ok: false, reason: 'invalid', remainingAttempts: 2 });
    await expect(verify('000001')).resolves.toEqual({ ok: false, reason: 'invalid', remainingAttempts: 1 });
    await expect(verify('000002')).resolves.toEqual({ ok: false, reason: 'invalid', remainingAttempts: 0 });
    await expect(verify('123456')).resolves.toEqual({ ok: false, reason: 'too_many_attempts' });
  });

  it('counts malformed codes as attempts', async () => {
    const { service, storage } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });

    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '12345a', purpose: 'login' })
    ).resolves.toEqual({ ok: false, reason: 'invalid', remainingAttempts: 2 });
    expect(storage.tables.challenges[0]?.attempts).toBe(1);
    // Surrounding whitespace is ignored.
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: ' 123456 ', purpose: 'login' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-1' });
  });

  it('invalidates the previous code when a new one is requested', async () => {
    const { service, storage } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });

    expect(storage.tables.challenges.map(c => c.id)).toEqual(['ch-2']);
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: false, reason: 'invalid', remainingAttempts: 2 });
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '654321', purpose: 'login' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-2' });
  });

  it('keeps challenges for different purposes apart', async () => {
    const { service } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });
    await service.requestCode({ phoneNumber: PHONE, purpose: 'password_reset' });

    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-1' });
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '654321', purpose: 'password_reset' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-2' });
  });

  it('expires codes after the configured lifetime', async () => {
    const { service, clock } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });
    clock.advance(5 * MINUTE);

    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: false, reason: 'expired' });
  });

  it('rolls the new challenge back when delivery fails', async () => {
    const { service, storage, setFailDelivery, logger } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });

    setFailDelivery(true);
    await expect(service.requestCode({ phoneNumber: PHONE, purpose: 'login' })).rejects.toMatchObject({
      code: 'transient_dependency',
      message: 'sms delivery failed'
    });
    expect(storage.tables.challenges.map(c => c.id)).toEqual(['ch-1']);
    expect(logger.entries).toContainEqual({
      level: 'warn',
      message: 'sms delivery failed',
      meta: { purpose: 'login', phone: '+1555****123' }
    });

    // The earlier code is still usable.
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-1' });
  });

  it('marks the phone verified on a successful phone_verification', async () => {
    const { service, storage } = setup();
    const userId = asUserId('user-1');
    await service.requestCode({ phoneNumber: PHONE, purpose: 'phone_verification', userId });

    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'phone_verification', userId })
    ).resolves.toEqual({ ok: true, challengeId: 'ch-1' });
    const account = storage.tables.accounts.get(userId);
    expect(account?.phoneVerified).toBe(true);
    expect(account?.phoneNumber).toBe(PHONE);
  });

  it('hides challenges that belong to another account', async () => {
    const { service } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login', userId: asUserId('user-1') });

    await expect(
      service.verifyCode({
        phoneNumber: PHONE,
        code: '123456',
        purpose: 'login',
        userId: asUserId('user-2')
      })
    ).resolves.toEqual({ ok: false, reason: 'not_found' });
  });

  it('reports not_found when no code was requested', async () => {
    const { service } = setup();
    await expect(
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ).resolves.toEqual({ ok: false, reason: 'not_found' });
  });

  it('validates phone numbers and purposes', async () => {
    const { service, gateway } = setup();
    await expect(service.requestCode({ phoneNumber: '555-0123', purpose: 'login' })).rejects.toMatchObject({
      code: 'invalid_input'
    });
    await expect(
      service.requestCode({ phoneNumber: PHONE, purpose: 'unknown' as never })
    ).rejects.toMatchObject({ code: 'invalid_input' });
    expect(gateway.outbox).toHaveLength(0);
  });

  it('accepts exactly one of two concurrent correct submissions', async () => {
    const { service } = setup();
    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });

    const results = await Promise.all([
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' }),
      service.verifyCode({ phoneNumber: PHONE, code: '123456', purpose: 'login' })
    ]);
    expect(results).toContainEqual({ ok: true, challengeId: 'ch-1' });
    expect(results).toContainEqual({ ok: false, reason: 'already_used' });
  });

  it('reports status, revokes and sweeps codes', async () => {
    const { service, clock, storage } = setup();
    const start = clock.now();
    await expect(service.getVerificationStatus(PHONE, 'login')).resolves.toEqual({ exists: false });

    await service.requestCode({ phoneNumber: PHONE, purpose: 'login' });
    await service.verifyCode({ phoneNumber: PHONE, code: '000000', purpose: 'login' });
    await expect(service.getVerificationStatus(PHONE, 'login')).resolves.toEqual({
      exists: true,
      verified: false,
      expiresAt: new Date(start.getTime() + 5 * MINUTE),
      attempts: 1,
      maxAttempts: 3
    });

    await expect(service.revokeVerificationCode(PHONE, 'login')).resolves.toBe(1);
    await expect(service.getVerificationStatus(PHONE, 'login')).resolves.toEqual({ exists: false });

    await service.requestCode({ phoneNumber: PHONE, purpose: 'register' });
    clock.advance(24 * 60 * MINUTE);
    await expect(service.cleanupExpiredCodes()).resolves.toBe(0);
    clock.advance(5 * MINUTE + 1);
    await expect(service.cleanupExpiredCodes()).resolves.toBe(1);
    expect(storage.tables.challenges).toHaveLength(0);
  });
});

describe('core/two-factor/toChallengeError', () => {
  it('maps each failure to its error code and public message', () => {
    expect(toChallengeError({ ok: false, reason: 'not_found' })).toMatchObject({
      code: 'challenge_not_found',
      status: 404
    });
    expect(toChallengeError({ ok: false, reason: 'already_used' })).toMatchObject({
      code: 'challenge_consumed',
      publicMessage: 'Code has already been used.'
    });
    expect(toChallengeError({ ok: false, reason: 'expired' })).toMatchObject({
      code: 'challenge_expired',
      publicMessage: 'Verification code has expired.'
    });
    expect(toChallengeError({ ok: false, reason: 'too_many_attempts' })).toMatchObject({
      code: 'challenge_attempts_exhausted',
      status: 429
    });
    expect(toChallengeError({ ok: false, reason: 'invalid', remainingAttempts: 2 })).toMatchObject({
      code: 'challenge_invalid',
      remainingAttempts: 2,
      publicMessage: 'Invalid verification code. 2 attempts remaining.'
    });
    expect(toChallengeError({ ok: false, reason: 'invalid', remainingAttempts: 0 })).toMatchObject({
      publicMessage: 'Invalid verification code. No more attempts allowed. Please request a new code.'
    });
  });
});
