import type { ChallengeId, SessionId, UserId } from '../../core/auth-types.js';
import type {
  AccountRecord,
  ChallengePurpose,
  RateLimitRecord,
  SecurityStorage,
  SessionRecord,
  VerificationChallengeRecord
} from '../../core/storage/security-storage.js';

export type MemorySecurityTables = {
  accounts: Map<UserId, AccountRecord>;
  sessions: Map<SessionId, SessionRecord>;
  challenges: VerificationChallengeRecord[];
  rateLimits: Map<string, RateLimitRecord>;
};

export type MemorySecurityStorage = SecurityStorage & {
  /**
   * Live state, for assertions in tests. Mutating it bypasses every guard.
   */
  readonly tables: MemorySecurityTables;
  addAccount(account: AccountRecord): void;
};

/**
 * In-process storage for tests and local development.
 *
 * Every operation runs synchronously between awaits, so each one is atomic with respect to the
 * others in the same process, which is the guarantee the SQL adapters give with conditional
 * statements. Single-instance only.
 */
export function createMemorySecurityStorage(
  options: { accounts?: AccountRecord[] } = {}
): MemorySecurityStorage {
  const tables: MemorySecurityTables = {
    accounts: new Map(),
    sessions: new Map(),
    challenges: [],
    rateLimits: new Map()
  };
  for (const a of options.accounts ?? []) tables.accounts.set(a.id, { ...a });

  const rateKey = (identifier: string, action: string) => `${identifier}\u0000${action}`;
  const isActiveChallenge = (c: VerificationChallengeRecord, at: Date) =>
    !c.verified && c.expiresAt.getTime() > at.getTime();
  // Same keys the SQL schema declares unique: the primary key and access_token_jti.
  const assertNewSession = (session: SessionRecord) => {
    for (const s of tables.sessions.values()) {
      if (s.id === session.id || s.accessTokenId === session.accessTokenId) {
        throw new Error('session id or access token id already exists');
      }
    }
  };

  return {
    tables,

    addAccount(account) {
      tables.accounts.set(account.id, { ...account });
    },

    accounts: {
      async findByEmail(email) {
        const needle = email.toLowerCase();
        for (const a of tables.accounts.values()) {
          if (a.email.toLowerCase() === needle) return { ...a };
        }
        return null;
      },

      async findById(userId) {
        const a = tables.accounts.get(userId);
        return a ? { ...a } : null;
      },

      async recordFailedLogin(input) {
        const a = tables.accounts.get(input.userId);
        if (!a) return { failedLoginAttempts: 0 };
        const lockExpired =
          a.lockedUntil !== undefined && a.lockedUntil.getTime() <= input.now.getTime();
        const failed = lockExpired ? 1 : a.failedLoginAttempts + 1;
        const lockedUntil =
          failed >= input.maxFailedLogins ? input.lockUntil : lockExpired ? undefined : a.lockedUntil;
        tables.accounts.set(a.id, { ...a, failedLoginAttempts: failed, lockedUntil });
        return lockedUntil ? { failedLoginAttempts: failed, lockedUntil } : { failedLoginAttempts: failed };
      },

      async recordSuccessfulLogin(userId, at) {
        const a = tables.accounts.get(userId);
        if (!a) return;
        tables.accounts.set(userId, {
          ...a,
          failedLoginAttempts: 0,
          lockedUntil: undefined,
          lastLoginAt: at
        });
      },

      async markPhoneVerified(userId, phoneNumber) {
        const a = tables.accounts.get(userId);
        if (!a) return;
        tables.accounts.set(userId, { ...a, phoneNumber, phoneVerified: true });
      },

      async updatePasswordHash(userId, passwordHash) {
        const a = tables.accounts.get(userId);
        if (!a) return;
        tables.accounts.set(userId, { ...a, passwordHash });
      }
    },

    sessions: {
      async createSession(session) {
        assertNewSession(session);
        tables.sessions.set(session.id, { ...session });
      },

      async getSessionById(id) {
        const s = tables.sessions.get(id);
        return s ? { ...s } : null;
      },

      async findActiveByAccessTokenId(accessTokenId, now) {
        for (const s of tables.sessions.values()) {
          if (
            s.accessTokenId === accessTokenId &&
            !s.revoked &&
            s.expiresAt.getTime() > now.getTime()
          ) {
            return { ...s };
          }
        }
        return null;
      },

      async listActiveSessionsForUser(userId, now) {
        return [...tables.sessions.values()]
          .filter(s => s.userId === userId && !s.revoked && s.expiresAt.getTime() > now.getTime())
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
          .map(s => ({ ...s }));
      },

      async revokeSession(id, revokedAt) {
        const s = tables.sessions.get(id);
        if (!s || s.revoked) return false;
        tables.sessions.set(id, { ...s, revoked: true, revokedAt });
        return true;
      },

      async revokeAllUserSessions(userId, revokedAt) {
        let n = 0;
        for (const s of tables.sessions.values()) {
          if (s.userId !== userId || s.revoked) continue;
          tables.sessions.set(s.id, { ...s, revoked: true, revokedAt });
          n++;
        }
        return n;
      },

      async rotateSession(oldId, newSession, revokedAt) {
        const old = tables.sessions.get(oldId);
        if (!old || old.revoked || old.expiresAt.getTime() <= revokedAt.getTime()) return false;
        assertNewSession(newSession);
        tables.sessions.set(oldId, { ...old, revoked: true, revokedAt });
        tables.sessions.set(newSession.id, { ...newSession });
        return true;
      },

      async deleteExpiredSessions(now) {
        let n = 0;
        for (const [id, s] of tables.sessions) {
          if (s.expiresAt.getTime() <= now.getTime()) {
            tables.sessions.delete(id);
            n++;
          }
        }
        return n;
      }
    },

    challenges: {
      async replaceChallenge(challenge, deliver) {
        const sameKey = (c: VerificationChallengeRecord) =>
          c.phoneNumber === challenge.phoneNumber && c.purpose === challenge.purpose;
        const removed = tables.challenges.filter(
          c => sameKey(c) && isActiveChallenge(c, challenge.createdAt)
        );
        tables.challenges = tables.challenges.filter(c => !removed.includes(c));
        const inserted: VerificationChallengeRecord = { ...challenge };
        tables.challenges.push(inserted);
        try {
          await deliver();
        } catch (err) {
          tables.challenges = tables.challenges.filter(c => c !== inserted).concat(removed);
          throw err;
        }
      },

      async getLatestChallenge(phoneNumber, purpose) {
        const latest = latestFor(tables.challenges, phoneNumber, purpose);
        return latest ? { ...latest } : null;
      },

      async incrementAttempts(id, now) {
        const c = findChallenge(tables.challenges, id);
        if (!c || c.attempts >= c.maxAttempts || !isActiveChallenge(c, now)) return null;
        c.attempts += 1;
        return c.attempts;
      },

      async markVerified(id, now) {
        const c = findChallenge(tables.challenges, id);
        if (!c || !isActiveChallenge(c, now)) return false;
        c.verified = true;
        return true;
      },

      async deleteUnverifiedChallenges(phoneNumber, purpose) {
        const before = tables.challenges.length;
        tables.challenges = tables.challenges.filter(
          c => !(c.phoneNumber === phoneNumber && c.purpose === purpose && !c.verified)
        );
        return before - tables.challenges.length;
      },

      async deleteExpiredChallenges(before) {
        const count = tables.challenges.length;
        tables.challenges = tables.challenges.filter(c => c.expiresAt.getTime() >= before.getTime());
        return count - tables.challenges.length;
      }
    },

    rateLimits: {
      async get(identifier, action) {
        const r = tables.rateLimits.get(rateKey(identifier, action));
        return r ? { ...r } : null;
      },

      async recordAttempt({ identifier, action, now, windowStartCutoff }) {
        const key = rateKey(identifier, action);
        const prev = tables.rateLimits.get(key);
        const restart =
          !prev ||
          prev.windowStart.getTime() <= windowStartCutoff.getTime() ||
          (prev.blockedUntil !== undefined && prev.blockedUntil.getTime() <= now.getTime());
        // A live block outlasts the window it was installed in.
        const liveBlock =
          prev?.blockedUntil !== undefined && prev.blockedUntil.getTime() > now.getTime()
            ? prev.blockedUntil
            : undefined;
        const next: RateLimitRecord =
          restart || !prev
            ? { identifier, action, attempts: 1, windowStart: now, blockedUntil: liveBlock, updatedAt: now }
            : { ...prev, attempts: prev.attempts + 1, blockedUntil: liveBlock, updatedAt: now };
        tables.rateLimits.set(key, next);
        return { ...next };
      },

      async installBlock({ identifier, action, now, windowStartCutoff, maxAttempts, blockedUntil }) {
        const key = rateKey(identifier, action);
        const r = tables.rateLimits.get(key);
        if (
          !r ||
          r.blockedUntil !== undefined ||
          r.windowStart.getTime() <= windowStartCutoff.getTime() ||
          r.attempts < maxAttempts
        ) {
          return false;
        }
        tables.rateLimits.set(key, { ...r, blockedUntil, updatedAt: now });
        return true;
      },

      async reset(identifier, action, now) {
        const key = rateKey(identifier, action);
        const r = tables.rateLimits.get(key);
        if (!r) return;
        tables.rateLimits.set(key, { ...r, attempts: 0, blockedUntil: undefined, updatedAt: now });
      },

      async deleteStale({ windowStartBefore, now }) {
        let n = 0;
        for (const [key, r] of tables.rateLimits) {
          const blocking = r.blockedUntil !== undefined && r.blockedUntil.getTime() > now.getTime();
          if (r.windowStart.getTime() < windowStartBefore.getTime() && !blocking) {
            tables.rateLimits.delete(key);
            n++;
          }
        }
        return n;
      }
    }
  };
}

function findChallenge(
  challenges: VerificationChallengeRecord[],
  id: ChallengeId
): VerificationChallengeRecord | undefined {
  return challenges.find(c => c.id === id);
}

function latestFor(
  challenges: VerificationChallengeRecord[],
  phoneNumber: string,
  purpose: ChallengePurpose
): VerificationChallengeRecord | undefined {
  let latest: VerificationChallengeRecord | undefined;
  for (const c of challenges) {
    if (c.phoneNumber !== phoneNumber || c.purpose !== purpose) continue;
    // Later insertions win ties.
    if (!latest || c.createdAt.getTime() >= latest.createdAt.getTime()) latest = c;
  }
  return latest;
}
