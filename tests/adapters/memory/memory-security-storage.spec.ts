import { describe, expect, it } from 'vitest';
import { createMemorySecurityStorage } from '../../../src/adapters/memory/memory-security-storage.js';
import { asAccessTokenId, asChallengeId, asSessionId, asUserId } from '../../../src/core/auth-types.js';
import type {
  SessionRecord,
  VerificationChallengeRecord
} from '../../../src/core/storage/security-storage.js';
import { testAccount } from '../../support/fixtures.js';

const MINUTE = 60_000;
const t0 = new Date('2026-01-01T00:00:00.000Z');
const at = (ms: number) => new Date(t0.getTime() + ms);
const userId = asUserId('user-1');

function session(id: string, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: asSessionId(id),
    userId,
    refreshTokenHash: 'hash',
    accessTokenId: asAccessTokenId(`jti-${id}`),
    deviceFingerprint: 'fp',
    createdAt: t0,
    expiresAt: at(60 * MINUTE),
    revoked: false,
    ...overrides
  };
}

function challenge(id: string, overrides: Partial<VerificationChallengeRecord> = {}): VerificationChallengeRecord {
  return {
    id: asChallengeId(id),
    phoneNumber: '+15555550123',
    codeHash: 'hash',
    purpose: 'login',
    attempts: 0,
    maxAttempts: 3,
    createdAt: t0,
    expiresAt: at(5 * MINUTE),
    verified: false,
    ...overrides
  };
}

describe('adapters/memory/memory-security-storage', () => {
  it('finds accounts by email case-insensitively and returns copies', async () => {
    const storage = createMemorySecurityStorage({ accounts: [testAccount()] });
    const found = await storage.accounts.findByEmail('INVESTOR@example.com');
    expect(found?.id).toBe('user-1');

    if (found) found.failedLoginAttempts = 99;
    expect(storage.tables.accounts.get(userId)?.failedLoginAttempts).toBe(0);
  });

  it('locks at the threshold and restarts the count once a lock has expired', async () => {
    const storage = createMemorySecurityStorage({ accounts: [testAccount({ failedLoginAttempts: 1 })] });
    const fail = (now: Date) =>
      storage.accounts.recordFailedLogin({ userId, now, maxFailedLogins: 2, lockUntil: at(30 * MINUTE) });

    await expect(fail(t0)).resolves.toEqual({ failedLoginAttempts: 2, lockedUntil: at(30 * MINUTE) });
    await expect(fail(at(30 * MINUTE))).resolves.toEqual({ failedLoginAttempts: 1 });
    expect(storage.tables.accounts.get(userId)?.lockedUntil).toBeUndefined();
    await expect(
      storage.accounts.recordFailedLogin({
        userId: asUserId('missing'),
        now: t0,
        maxFailedLogins: 2,
        lockUntil: t0
      })
    ).resolves.toEqual({ failedLoginAttempts: 0 });
  });

  it('rotates a session once', async () => {
    const storage = createMemorySecurityStorage();
    await storage.sessions.createSession(session('s-1'));

    await expect(storage.sessions.rotateSession(asSessionId('s-1'), session('s-2'), at(1000))).resolves.toBe(true);
    await expect(storage.sessions.rotateSession(asSessionId('s-1'), session('s-3'), at(2000))).resolves.toBe(false);
    expect([...storage.tables.sessions.keys()]).toEqual(['s-1', 's-2']);
    expect(storage.tables.sessions.get(asSessionId('s-1'))).toMatchObject({ revoked: true, revokedAt: at(1000) });
  });

  it('refuses a second session bound to the same access token id', async () => {
    const storage = createMemorySecurityStorage();
    await storage.sessions.createSession(session('s-1', { accessTokenId: asAccessTokenId('jti-shared') }));

    await expect(
      storage.sessions.createSession(session('s-2', { accessTokenId: asAccessTokenId('jti-shared') }))
    ).rejects.toThrow('session id or access token id already exists');
    await expect(
      storage.sessions.rotateSession(
        asSessionId('s-1'),
        session('s-3', { accessTokenId: asAccessTokenId('jti-shared') }),
        at(1000)
      )
    ).rejects.toThrow('session id or access token id already exists');

    expect([...storage.tables.sessions.keys()]).toEqual(['s-1']);
    expect(storage.tables.sessions.get(asSessionId('s-1'))).toMatchObject({ revoked: false });
  });

  it('lists active sessions newest first', async () => {
    const storage = createMemorySecurityStorage();
    await storage.sessions.createSession(session('s-1'));
    await storage.sessions.createSession(session('s-2', { createdAt: at(1000) }));
    await storage.sessions.createSession(session('s-3', { revoked: true }));
    await storage.sessions.createSession(session('s-4', { expiresAt: at(1000) }));

    const active = await storage.sessions.listActiveSessionsForUser(userId, at(1000));
    expect(active.map(s => s.id)).toEqual(['s-2', 's-1']);
  });

  it('replaces only live, unverified challenges and restores them on failure', async () => {
    const storage = createMemorySecurityStorage();
    storage.tables.challenges.push(
      challenge('old-verified', { verified: true }),
      challenge('old-expired', { expiresAt: t0 }),
      challenge('old-live')
    );

    await expect(
      storage.challenges.replaceChallenge(challenge('new', { createdAt: t0 }), async () => {
        throw new Error('provider down');
      })
    ).rejects.toThrowError('provider down');
    expect(storage.tables.challenges.map(c => c.id).sort()).toEqual(['old-expired', 'old-live', 'old-verified']);

    await storage.challenges.replaceChallenge(challenge('new', { createdAt: at(1) }), async () => undefined);
    expect(storage.tables.challenges.map(c => c.id)).toEqual(['old-verified', 'old-expired', 'new']);
  });

  it('caps attempts at maxAttempts', async () => {
    const storage = createMemorySecurityStorage();
    storage.tables.challenges.push(challenge('c-1', { maxAttempts: 2 }));
    const id = asChallengeId('c-1');

    await expect(storage.challenges.incrementAttempts(id, t0)).resolves.toBe(1);
    await expect(storage.challenges.incrementAttempts(id, t0)).resolves.toBe(2);
    await expect(storage.challenges.incrementAttempts(id, t0)).resolves.toBeNull();
  });

  it('starts a new rate-limit window once the old one has passed', async () => {
    const storage = createMemorySecurityStorage();
    const attempt = (now: Date) =>
      storage.rateLimits.recordAttempt({
        identifier: '203.0.113.7',
        action: 'login',
        now,
        windowStartCutoff: new Date(now.getTime() - 15 * MINUTE)
      });

    await attempt(t0);
    await expect(attempt(at(MINUTE))).resolves.toMatchObject({ attempts: 2, windowStart: t0 });
    await expect(attempt(at(15 * MINUTE))).resolves.toMatchObject({ attempts: 1, windowStart: at(15 * MINUTE) });
  });

  it('carries a live block into the next rate-limit window', async () => {
    const storage = createMemorySecurityStorage();
    const attempt = (now: Date) =>
      storage.rateLimits.recordAttempt({
        identifier: '203.0.113.7',
        action: 'login',
        now,
        windowStartCutoff: new Date(now.getTime() - 15 * MINUTE)
      });

    await attempt(t0);
    await expect(
      storage.rateLimits.installBlock({
        identifier: '203.0.113.7',
        action: 'login',
        now: t0,
        windowStartCutoff: new Date(t0.getTime() - 15 * MINUTE),
        maxAttempts: 1,
        blockedUntil: at(30 * MINUTE)
      })
    ).resolves.toBe(true);

    await expect(attempt(at(16 * MINUTE))).resolves.toMatchObject({
      attempts: 1,
      windowStart: at(16 * MINUTE),
      blockedUntil: at(30 * MINUTE)
    });
    await expect(attempt(at(30 * MINUTE))).resolves.toMatchObject({
      attempts: 1,
      windowStart: at(30 * MINUTE),
      blockedUntil: undefined
    });
  });
});
