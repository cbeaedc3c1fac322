import { sql } from 'kysely';
import { asAccessTokenId, asChallengeId, asSessionId, asUserId } from '../../core/auth-types.js';
import type { Logger } from '../../core/auth-types.js';
import { challengePurposes } from '../../core/storage/security-storage.js';
import type {
  AccountRecord,
  ChallengePurpose,
  RateLimitRecord,
  SecurityStorage,
  SessionRecord,
  VerificationChallengeRecord
} from '../../core/storage/security-storage.js';
import { resolveTables } from './kysely-types.js';
import type { KyselyDb, KyselyTableOptions } from './kysely-types.js';

export type CreateKyselySecurityStorageOptions = KyselyTableOptions & {
  db: KyselyDb;
  logger?: Pick<Logger, 'debug'>;
};

const ACCOUNT_COLUMNS = [
  'id',
  'tenantId',
  'email',
  'role',
  'passwordHash',
  'phoneNumber',
  'phoneVerified',
  'twoFactorEnabled',
  'isActive',
  'failedLoginAttempts',
  'lockedUntil',
  'lastLoginAt'
] as const;

const SESSION_COLUMNS = [
  'id',
  'userId',
  'refreshTokenHash',
  'accessTokenJti',
  'deviceFingerprint',
  'userAgent',
  'sourceAddress',
  'createdAt',
  'expiresAt',
  'revoked',
  'revokedAt',
  'rotatedFromSessionId'
] as const;

const CHALLENGE_COLUMNS = [
  'id',
  'userId',
  'phoneNumber',
  'codeHash',
  'purpose',
  'attempts',
  'maxAttempts',
  'createdAt',
  'expiresAt',
  'verified'
] as const;

const RATE_LIMIT_COLUMNS = [
  'identifier',
  'action',
  'attempts',
  'windowStart',
  'blockedUntil',
  'updatedAt'
] as const;

/**
 * Kysely adapter for SecurityStorage.
 *
 * Notes:
 * - Column names are camelCase; pair with `CamelCasePlugin` to use the snake_case schema created
 *   by `migrations/001_init`.
 * - Assumes Postgres: `returning(...)`, `ON CONFLICT` and advisory locks.
 * - For schema support, pass `db.withSchema('your_schema')` as `db`.
 */
export function createKyselySecurityStorage(
  options: CreateKyselySecurityStorageOptions
): SecurityStorage {
  const tables = resolveTables(options);
  const db = options.db;

  const debug = (message: string, meta?: Record<string, unknown>) => {
    options.logger?.debug(message, meta);
  };

  return {
    accounts: {
      async findByEmail(email) {
        const r = await db
          .selectFrom(tables.users)
          .select([...ACCOUNT_COLUMNS])
          .where(sql`lower(${sql.ref('email')})`, '=', email.toLowerCase())
          .limit(1)
          .executeTakeFirst();
        return r ? toAccount(r) : null;
      },

      async findById(userId) {
        const r = await db
          .selectFrom(tables.users)
          .select([...ACCOUNT_COLUMNS])
          .where('id', '=', userId)
          .executeTakeFirst();
        return r ? toAccount(r) : null;
      },

      async recordFailedLogin({ userId, now, maxFailedLogins, lockUntil }) {
        // Every expression reads the pre-update row.
        const lockExpired = sql<boolean>`(${sql.ref('lockedUntil')} IS NOT NULL AND ${sql.ref(
          'lockedUntil'
        )} <= ${now})`;
        const nextCount = sql<number>`CASE WHEN ${lockExpired} THEN 1 ELSE ${sql.ref(
          'failedLoginAttempts'
        )} + 1 END`;
        const r = await db
          .updateTable(tables.users)
          .set({
            failedLoginAttempts: nextCount,
            lockedUntil: sql`CASE
              WHEN (${nextCount}) >= ${maxFailedLogins} THEN ${lockUntil}::timestamptz
              WHEN ${lockExpired} THEN NULL
              ELSE ${sql.ref('lockedUntil')}
            END`
          })
          .where('id', '=', userId)
          .returning(['failedLoginAttempts', 'lockedUntil'])
          .executeTakeFirst();
        if (!r) return { failedLoginAttempts: 0 };
        const failedLoginAttempts = toNumber(getField(r, 'failedLoginAttempts'));
        const lockedUntil = toOptionalDate(getField(r, 'lockedUntil'));
        return lockedUntil ? { failedLoginAttempts, lockedUntil } : { failedLoginAttempts };
      },

      async recordSuccessfulLogin(userId, at) {
        await db
          .updateTable(tables.users)
          .set({ failedLoginAttempts: 0, lockedUntil: null, lastLoginAt: at })
          .where('id', '=', userId)
          .execute();
      },

      async markPhoneVerified(userId, phoneNumber) {
        await db
          .updateTable(tables.users)
          .set({ phoneNumber, phoneVerified: true })
          .where('id', '=', userId)
          .execute();
      },

      async updatePasswordHash(userId, passwordHash) {
        await db
          .updateTable(tables.users)
          .set({ passwordHash })
          .where('id', '=', userId)
          .execute();
      }
    },

    sessions: {
      async createSession(s) {
        await db.insertInto(tables.sessions).values(sessionValues(s)).execute();
      },

      async getSessionById(id) {
        const r = await db
          .selectFrom(tables.sessions)
          .select([...SESSION_COLUMNS])
          .where('id', '=', id)
          .executeTakeFirst();
        return r ? toSession(r) : null;
      },

      async findActiveByAccessTokenId(accessTokenId, now) {
        const r = await db
          .selectFrom(tables.sessions)
          .select([...SESSION_COLUMNS])
          .where('accessTokenJti', '=', accessTokenId)
          .where('revoked', '=', false)
          .where('expiresAt', '>', now)
          .limit(1)
          .executeTakeFirst();
        return r ? toSession(r) : null;
      },

      async listActiveSessionsForUser(userId, now) {
        const rows = await db
          .selectFrom(tables.sessions)
          .select([...SESSION_COLUMNS])
          .where('userId', '=', userId)
          .where('revoked', '=', false)
          .where('expiresAt', '>', now)
          .orderBy('createdAt', 'desc')
          .execute();
        return rows.map(toSession);
      },

      async revokeSession(id, revokedAt) {
        const r = await db
          .updateTable(tables.sessions)
          .set({ revoked: true, revokedAt })
          .where('id', '=', id)
          .where('revoked', '=', false)
          .returning(['id'])
          .executeTakeFirst();
        return Boolean(r);
      },

      async revokeAllUserSessions(userId, revokedAt) {
        const r = await db
          .updateTable(tables.sessions)
          .set({ revoked: true, revokedAt })
          .where('userId', '=', userId)
          .where('revoked', '=', false)
          .executeTakeFirst();
        const n = Number(r.numUpdatedRows);
        debug('sessions.revokeAllUserSessions', { userId, revoked: n });
        return n;
      },

      async rotateSession(oldId, newSession, revokedAt) {
        return db.transaction().execute(async tx => {
          const revoked = await tx
            .updateTable(tables.sessions)
            .set({ revoked: true, revokedAt })
            .where('id', '=', oldId)
            .where('revoked', '=', false)
            .where('expiresAt', '>', revokedAt)
            .returning(['id'])
            .executeTakeFirst();
          if (!revoked) return false;
          await tx.insertInto(tables.sessions).values(sessionValues(newSession)).execute();
          return true;
        });
      },

      async deleteExpiredSessions(now) {
        const r = await db
          .deleteFrom(tables.sessions)
          .where('expiresAt', '<=', now)
          .executeTakeFirst();
        const n = Number(r.numDeletedRows);
        debug('sessions.deleteExpiredSessions', { removed: n });
        return n;
      }
    },

    challenges: {
      async replaceChallenge(ch, deliver) {
        await db.transaction().execute(async tx => {
          // Serialize replacements for the same (phone, purpose).
          await sql`SELECT pg_advisory_xact_lock(hashtext(${`${ch.phoneNumber}:${ch.purpose}`}))`.execute(
            tx
          );
          await tx
            .deleteFrom(tables.challenges)
            .where('phoneNumber', '=', ch.phoneNumber)
            .where('purpose', '=', ch.purpose)
            .where('verified', '=', false)
            .where('expiresAt', '>', ch.createdAt)
            .execute();
          await tx
            .insertInto(tables.challenges)
            .values({
              id: ch.id,
              userId: ch.userId ?? null,
              phoneNumber: ch.phoneNumber,
              codeHash: ch.codeHash,
              purpose: ch.purpose,
              attempts: ch.attempts,
              maxAttempts: ch.maxAttempts,
              createdAt: ch.createdAt,
              expiresAt: ch.expiresAt,
              verified: ch.verified
            })
            .execute();
          await deliver();
        });
      },

      async getLatestChallenge(phoneNumber, purpose) {
        const r = await db
          .selectFrom(tables.challenges)
          .select([...CHALLENGE_COLUMNS])
          .where('phoneNumber', '=', phoneNumber)
          .where('purpose', '=', purpose)
          .orderBy('createdAt', 'desc')
          .limit(1)
          .executeTakeFirst();
        return r ? toChallenge(r) : null;
      },

      async incrementAttempts(id, now) {
        const r = await db
          .updateTable(tables.challenges)
          .set({ attempts: sql`${sql.ref('attempts')} + 1` })
          .where('id', '=', id)
          .whereRef('attempts', '<', 'maxAttempts')
          .where('verified', '=', false)
          .where('expiresAt', '>', now)
          .returning(['attempts'])
          .executeTakeFirst();
        return r ? toNumber(getField(r, 'attempts')) : null;
      },

      async markVerified(id, now) {
        const r = await db
          .updateTable(tables.challenges)
          .set({ verified: true })
          .where('id', '=', id)
          .where('verified', '=', false)
          .where('expiresAt', '>', now)
          .returning(['id'])
          .executeTakeFirst();
        return Boolean(r);
      },

      async deleteUnverifiedChallenges(phoneNumber, purpose) {
        const r = await db
          .deleteFrom(tables.challenges)
          .where('phoneNumber', '=', phoneNumber)
          .where('purpose', '=', purpose)
          .where('verified', '=', false)
          .executeTakeFirst();
        return Number(r.numDeletedRows);
      },

      async deleteExpiredChallenges(before) {
        const r = await db
          .deleteFrom(tables.challenges)
          .where('expiresAt', '<', before)
          .executeTakeFirst();
        const n = Number(r.numDeletedRows);
        debug('challenges.deleteExpiredChallenges', { removed: n });
        return n;
      }
    },

    rateLimits: {
      async get(identifier, action) {
        const r = await db
          .selectFrom(tables.rateLimits)
          .select([...RATE_LIMIT_COLUMNS])
          .where('identifier', '=', identifier)
          .where('action', '=', action)
          .executeTakeFirst();
        return r ? toRateLimit(r) : null;
      },

      async recordAttempt({ identifier, action, now, windowStartCutoff }) {
        // Qualified: inside DO UPDATE a bare column name is ambiguous with EXCLUDED.
        const col = (name: string) => sql.ref(`${tables.rateLimits}.${name}`);
        const restart = sql<boolean>`(${col('windowStart')} <= ${windowStartCutoff} OR (${col(
          'blockedUntil'
        )} IS NOT NULL AND ${col('blockedUntil')} <= ${now}))`;
        const r = await db
          .insertInto(tables.rateLimits)
          .values({
            identifier,
            action,
            attempts: 1,
            windowStart: now,
            blockedUntil: null,
            updatedAt: now
          })
          .onConflict(oc =>
            oc.columns(['identifier', 'action']).doUpdateSet({
              attempts: sql`CASE WHEN ${restart} THEN 1 ELSE ${col('attempts')} + 1 END`,
              windowStart: sql`CASE WHEN ${restart} THEN ${now}::timestamptz ELSE ${col(
                'windowStart'
              )} END`,
              blockedUntil: sql`CASE WHEN ${col('blockedUntil')} > ${now} THEN ${col(
                'blockedUntil'
              )} ELSE NULL END`,
              updatedAt: now
            })
          )
          .returning([...RATE_LIMIT_COLUMNS])
          .executeTakeFirst();
        if (!r) {
          return { identifier, action, attempts: 1, windowStart: now, updatedAt: now };
        }
        return toRateLimit(r);
      },

      async installBlock({ identifier, action, now, windowStartCutoff, maxAttempts, blockedUntil }) {
        const r = await db
          .updateTable(tables.rateLimits)
          .set({ blockedUntil, updatedAt: now })
          .where('identifier', '=', identifier)
          .where('action', '=', action)
          .where('blockedUntil', 'is', null)
          .where('windowStart', '>', windowStartCutoff)
          .where('attempts', '>=', maxAttempts)
          .returning(['identifier'])
          .executeTakeFirst();
        return Boolean(r);
      },

      async reset(identifier, action, now) {
        await db
          .updateTable(tables.rateLimits)
          .set({ attempts: 0, blockedUntil: null, updatedAt: now })
          .where('identifier', '=', identifier)
          .where('action', '=', action)
          .execute();
      },

      async deleteStale({ windowStartBefore, now }) {
        const r = await db
          .deleteFrom(tables.rateLimits)
          .where('windowStart', '<', windowStartBefore)
          .where(eb => eb.or([eb('blockedUntil', 'is', null), eb('blockedUntil', '<=', now)]))
          .executeTakeFirst();
        const n = Number(r.numDeletedRows);
        debug('rateLimits.deleteStale', { removed: n });
        return n;
      }
    }
  };
}

function sessionValues(s: SessionRecord) {
  return {
    id: s.id,
    userId: s.userId,
    refreshTokenHash: s.refreshTokenHash,
    accessTokenJti: s.accessTokenId,
    deviceFingerprint: s.deviceFingerprint,
    userAgent: s.userAgent ?? null,
    sourceAddress: s.sourceAddress ?? null,
    createdAt: s.createdAt,
    expiresAt: s.expiresAt,
    revoked: s.revoked,
    revokedAt: s.revokedAt ?? null,
    rotatedFromSessionId: s.rotatedFromSessionId ?? null
  };
}

function toAccount(r: unknown): AccountRecord {
  return {
    id: asUserId(toString(getField(r, 'id'))),
    tenantId: toString(getField(r, 'tenantId')),
    email: toString(getField(r, 'email')),
    role: toString(getField(r, 'role')),
    passwordHash: toString(getField(r, 'passwordHash')),
    phoneNumber: toOptionalString(getField(r, 'phoneNumber')),
    phoneVerified: getField(r, 'phoneVerified') === true,
    twoFactorEnabled: getField(r, 'twoFactorEnabled') === true,
    isActive: getField(r, 'isActive') === true,
    failedLoginAttempts: toNumber(getField(r, 'failedLoginAttempts')),
    lockedUntil: toOptionalDate(getField(r, 'lockedUntil')),
    lastLoginAt: toOptionalDate(getField(r, 'lastLoginAt'))
  };
}

function toSession(r: unknown): SessionRecord {
  const rotatedFrom = toOptionalString(getField(r, 'rotatedFromSessionId'));
  return {
    id: asSessionId(toString(getField(r, 'id'))),
    userId: asUserId(toString(getField(r, 'userId'))),
    refreshTokenHash: toString(getField(r, 'refreshTokenHash')),
    accessTokenId: asAccessTokenId(toString(getField(r, 'accessTokenJti'))),
    deviceFingerprint: toString(getField(r, 'deviceFingerprint')),
    userAgent: toOptionalString(getField(r, 'userAgent')),
    sourceAddress: toOptionalString(getField(r, 'sourceAddress')),
    createdAt: toDate(getField(r, 'createdAt')),
    expiresAt: toDate(getField(r, 'expiresAt')),
    revoked: getField(r, 'revoked') === true,
    revokedAt: toOptionalDate(getField(r, 'revokedAt')),
    rotatedFromSessionId: rotatedFrom ? asSessionId(rotatedFrom) : undefined
  };
}

function toChallenge(r: unknown): VerificationChallengeRecord {
  const userId = toOptionalString(getField(r, 'userId'));
  return {
    id: asChallengeId(toString(getField(r, 'id'))),
    userId: userId ? asUserId(userId) : undefined,
    phoneNumber: toString(getField(r, 'phoneNumber')),
    codeHash: toString(getField(r, 'codeHash')),
    purpose: toPurpose(getField(r, 'purpose')),
    attempts: toNumber(getField(r, 'attempts')),
    maxAttempts: toNumber(getField(r, 'maxAttempts')),
    createdAt: toDate(getField(r, 'createdAt')),
    expiresAt: toDate(getField(r, 'expiresAt')),
    verified: getField(r, 'verified') === true
  };
}

function toRateLimit(r: unknown): RateLimitRecord {
  return {
    identifier: toString(getField(r, 'identifier')),
    action: toString(getField(r, 'action')),
    attempts: toNumber(getField(r, 'attempts')),
    windowStart: toDate(getField(r, 'windowStart')),
    blockedUntil: toOptionalDate(getField(r, 'blockedUntil')),
    updatedAt: toDate(getField(r, 'updatedAt'))
  };
}

function toPurpose(v: unknown): ChallengePurpose {
  const purpose = challengePurposes.find(p => p === v);
  if (!purpose) throw new TypeError(`Unknown challenge purpose: ${String(v)}`);
  return purpose;
}

function toDate(v: unknown): Date {
  if (v instanceof Date) return v;
  if (typeof v === 'string' || typeof v === 'number') return new Date(v);
  throw new TypeError('Expected Date|string|number');
}

function toOptionalDate(v: unknown): Date | undefined {
  if (v == null) return undefined;
  return toDate(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function getField(row: unknown, key: string): unknown {
  if (!isRecord(row)) return undefined;
  return row[key];
}

function toString(v: unknown): string {
  return typeof v === 'string' ? v : String(v ?? '');
}

function toOptionalString(v: unknown): string | undefined {
  if (v == null) return undefined;
  return typeof v === 'string' ? v : String(v);
}

function toNumber(v: unknown): number {
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isFinite(n)) throw new TypeError('Expected a numeric column');
  return n;
}
