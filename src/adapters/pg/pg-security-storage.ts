import { asAccessTokenId, asChallengeId, asSessionId, asUserId } from '../../core/auth-types.js';
import type { Logger } from '../../core/auth-types.js';
import type {
  AccountRecord,
  ChallengePurpose,
  RateLimitRecord,
  SecurityStorage,
  SessionRecord,
  VerificationChallengeRecord
} from '../../core/storage/security-storage.js';
import { resolveTables, toDate, toOptionalDate, withTx } from './pg-types.js';
import type { PgPool, PgTableOptions } from './pg-types.js';

export type CreatePgSecurityStorageOptions = PgTableOptions & {
  pool: PgPool;
  /**
   * Optional debug logger. Never logs secrets.
   */
  logger?: Pick<Logger, 'debug'>;
};

type AccountRow = {
  id: string;
  tenant_id: string;
  email: string;
  role: string;
  password_hash: string;
  phone_number: string | null;
  phone_verified: boolean;
  two_factor_enabled: boolean;
  is_active: boolean;
  failed_login_attempts: number;
  locked_until: Date | string | null;
  last_login_at: Date | string | null;
};

type SessionRow = {
  id: string;
  user_id: string;
  refresh_token_hash: string;
  access_token_jti: string;
  device_fingerprint: string;
  user_agent: string | null;
  source_address: string | null;
  created_at: Date | string;
  expires_at: Date | string;
  revoked: boolean;
  revoked_at: Date | string | null;
  rotated_from_session_id: string | null;
};

type ChallengeRow = {
  id: string;
  user_id: string | null;
  phone_number: string;
  code_hash: string;
  purpose: ChallengePurpose;
  attempts: number;
  max_attempts: number;
  created_at: Date | string;
  expires_at: Date | string;
  verified: boolean;
};

type RateLimitRow = {
  identifier: string;
  action: string;
  attempts: number;
  window_start: Date | string;
  blocked_until: Date | string | null;
  updated_at: Date | string;
};

const ACCOUNT_COLUMNS = `id, tenant_id, email, role, password_hash, phone_number, phone_verified,
  two_factor_enabled, is_active, failed_login_attempts, locked_until, last_login_at`;

const SESSION_COLUMNS = `id, user_id, refresh_token_hash, access_token_jti, device_fingerprint,
  user_agent, source_address, created_at, expires_at, revoked, revoked_at, rotated_from_session_id`;

const CHALLENGE_COLUMNS = `id, user_id, phone_number, code_hash, purpose, attempts, max_attempts,
  created_at, expires_at, verified`;

const RATE_LIMIT_COLUMNS = 'identifier, action, attempts, window_start, blocked_until, updated_at';

export function createPgSecurityStorage(options: CreatePgSecurityStorageOptions): SecurityStorage {
  const tables = resolveTables(options);
  const pool = options.pool;

  const debug = (message: string, meta?: Record<string, unknown>) => {
    options.logger?.debug(message, meta);
  };

  return {
    accounts: {
      async findByEmail(email) {
        const res = await pool.query<AccountRow>(
          `SELECT ${ACCOUNT_COLUMNS} FROM ${tables.users} WHERE lower(email) = lower($1) LIMIT 1`,
          [email]
        );
        const r = res.rows[0];
        return r ? toAccount(r) : null;
      },

      async findById(userId) {
        const res = await pool.query<AccountRow>(
          `SELECT ${ACCOUNT_COLUMNS} FROM ${tables.users} WHERE id = $1`,
          [userId]
        );
        const r = res.rows[0];
        return r ? toAccount(r) : null;
      },

      async recordFailedLogin({ userId, now, maxFailedLogins, lockUntil }) {
        // All right-hand sides read the pre-update row.
        const res = await pool.query<{
          failed_login_attempts: number;
          locked_until: Date | string | null;
        }>(
          `UPDATE ${tables.users}
           SET failed_login_attempts = CASE
                 WHEN locked_until IS NOT NULL AND locked_until <= $2 THEN 1
                 ELSE failed_login_attempts + 1
               END,
               locked_until = CASE
                 WHEN (CASE
                         WHEN locked_until IS NOT NULL AND locked_until <= $2 THEN 1
                         ELSE failed_login_attempts + 1
                       END) >= $3::int THEN $4::timestamptz
                 WHEN locked_until IS NOT NULL AND locked_until <= $2 THEN NULL
                 ELSE locked_until
               END
           WHERE id = $1
           RETURNING failed_login_attempts, locked_until`,
          [userId, now, maxFailedLogins, lockUntil]
        );
        const r = res.rows[0];
        if (!r) return { failedLoginAttempts: 0 };
        const lockedUntil = toOptionalDate(r.locked_until);
        return lockedUntil
          ? { failedLoginAttempts: r.failed_login_attempts, lockedUntil }
          : { failedLoginAttempts: r.failed_login_attempts };
      },

      async recordSuccessfulLogin(userId, at) {
        await pool.query(
          `UPDATE ${tables.users}
           SET failed_login_attempts = 0, locked_until = NULL, last_login_at = $2
           WHERE id = $1`,
          [userId, at]
        );
      },

      async markPhoneVerified(userId, phoneNumber) {
        await pool.query(
          `UPDATE ${tables.users} SET phone_number = $2, phone_verified = TRUE WHERE id = $1`,
          [userId, phoneNumber]
        );
      },

      async updatePasswordHash(userId, passwordHash) {
        await pool.query(`UPDATE ${tables.users} SET password_hash = $2 WHERE id = $1`, [
          userId,
          passwordHash
        ]);
      }
    },

    sessions: {
      async createSession(s) {
        await pool.query(
          `INSERT INTO ${tables.sessions} (${SESSION_COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
          sessionValues(s)
        );
      },

      async getSessionById(id) {
        const res = await pool.query<SessionRow>(
          `SELECT ${SESSION_COLUMNS} FROM ${tables.sessions} WHERE id = $1`,
          [id]
        );
        const r = res.rows[0];
        return r ? toSession(r) : null;
      },

      async findActiveByAccessTokenId(accessTokenId, now) {
        const res = await pool.query<SessionRow>(
          `SELECT ${SESSION_COLUMNS} FROM ${tables.sessions}
           WHERE access_token_jti = $1 AND revoked = FALSE AND expires_at > $2
           LIMIT 1`,
          [accessTokenId, now]
        );
        const r = res.rows[0];
        return r ? toSession(r) : null;
      },

      async listActiveSessionsForUser(userId, now) {
        const res = await pool.query<SessionRow>(
          `SELECT ${SESSION_COLUMNS} FROM ${tables.sessions}
           WHERE user_id = $1 AND revoked = FALSE AND expires_at > $2
           ORDER BY created_at DESC`,
          [userId, now]
        );
        return res.rows.map(toSession);
      },

      async revokeSession(id, revokedAt) {
        const res = await pool.query(
          `UPDATE ${tables.sessions} SET revoked = TRUE, revoked_at = $2
           WHERE id = $1 AND revoked = FALSE
           RETURNING id`,
          [id, revokedAt]
        );
        return res.rowCount === 1;
      },

      async revokeAllUserSessions(userId, revokedAt) {
        const res = await pool.query(
          `UPDATE ${tables.sessions} SET revoked = TRUE, revoked_at = $2
           WHERE user_id = $1 AND revoked = FALSE`,
          [userId, revokedAt]
        );
        const n = res.rowCount ?? 0;
        debug('sessions.revokeAllUserSessions', { userId, revoked: n });
        return n;
      },

      async rotateSession(oldId, newSession, revokedAt) {
        return withTx(pool, async tx => {
          const revoked = await tx.query(
            `UPDATE ${tables.sessions} SET revoked = TRUE, revoked_at = $2
             WHERE id = $1 AND revoked = FALSE AND expires_at > $2
             RETURNING id`,
            [oldId, revokedAt]
          );
          if (revoked.rowCount !== 1) return false;
          await tx.query(
            `INSERT INTO ${tables.sessions} (${SESSION_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
            sessionValues(newSession)
          );
          return true;
        });
      },

      async deleteExpiredSessions(now) {
        const res = await pool.query(`DELETE FROM ${tables.sessions} WHERE expires_at <= $1`, [now]);
        const n = res.rowCount ?? 0;
        debug('sessions.deleteExpiredSessions', { removed: n });
        return n;
      }
    },

    challenges: {
      async replaceChallenge(ch, deliver) {
        await withTx(pool, async tx => {
          // Serialize replacements for the same (phone, purpose).
          await tx.query(`SELECT pg_advisory_xact_lock(hashtext($1))`, [
            `${ch.phoneNumber}:${ch.purpose}`
          ]);
          await tx.query(
            `DELETE FROM ${tables.challenges}
             WHERE phone_number = $1 AND purpose = $2 AND verified = FALSE AND expires_at > $3`,
            [ch.phoneNumber, ch.purpose, ch.createdAt]
          );
          await tx.query(
            `INSERT INTO ${tables.challenges} (${CHALLENGE_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
            [
              ch.id,
              ch.userId ?? null,
              ch.phoneNumber,
              ch.codeHash,
              ch.purpose,
              ch.attempts,
              ch.maxAttempts,
              ch.createdAt,
              ch.expiresAt,
              ch.verified
            ]
          );
          await deliver();
        });
      },

      async getLatestChallenge(phoneNumber, purpose) {
        const res = await pool.query<ChallengeRow>(
          `SELECT ${CHALLENGE_COLUMNS} FROM ${tables.challenges}
           WHERE phone_number = $1 AND purpose = $2
           ORDER BY created_at DESC
           LIMIT 1`,
          [phoneNumber, purpose]
        );
        const r = res.rows[0];
        return r ? toChallenge(r) : null;
      },

      async incrementAttempts(id, now) {
        const res = await pool.query<{ attempts: number }>(
          `UPDATE ${tables.challenges} SET attempts = attempts + 1
           WHERE id = $1 AND attempts < max_attempts AND verified = FALSE AND expires_at > $2
           RETURNING attempts`,
          [id, now]
        );
        return res.rows[0]?.attempts ?? null;
      },

      async markVerified(id, now) {
        const res = await pool.query(
          `UPDATE ${tables.challenges} SET verified = TRUE
           WHERE id = $1 AND verified = FALSE AND expires_at > $2
           RETURNING id`,
          [id, now]
        );
        return res.rowCount === 1;
      },

      async deleteUnverifiedChallenges(phoneNumber, purpose) {
        const res = await pool.query(
          `DELETE FROM ${tables.challenges}
           WHERE phone_number = $1 AND purpose = $2 AND verified = FALSE`,
          [phoneNumber, purpose]
        );
        return res.rowCount ?? 0;
      },

      async deleteExpiredChallenges(before) {
        const res = await pool.query(`DELETE FROM ${tables.challenges} WHERE expires_at < $1`, [
          before
        ]);
        const n = res.rowCount ?? 0;
        debug('challenges.deleteExpiredChallenges', { removed: n });
        return n;
      }
    },

    rateLimits: {
      async get(identifier, action) {
        const res = await pool.query<RateLimitRow>(
          `SELECT ${RATE_LIMIT_COLUMNS} FROM ${tables.rateLimits}
           WHERE identifier = $1 AND action = $2`,
          [identifier, action]
        );
        const r = res.rows[0];
        return r ? toRateLimit(r) : null;
      },

      async recordAttempt({ identifier, action, now, windowStartCutoff }) {
        const res = await pool.query<RateLimitRow>(
          `INSERT INTO ${tables.rateLimits} AS rl (${RATE_LIMIT_COLUMNS})
           VALUES ($1, $2, 1, $3, NULL, $3)
           ON CONFLICT (identifier, action) DO UPDATE SET
             attempts = CASE
               WHEN rl.window_start <= $4 OR (rl.blocked_until IS NOT NULL AND rl.blocked_until <= $3)
                 THEN 1
               ELSE rl.attempts + 1
             END,
             window_start = CASE
               WHEN rl.window_start <= $4 OR (rl.blocked_until IS NOT NULL AND rl.blocked_until <= $3)
                 THEN $3
               ELSE rl.window_start
             END,
             blocked_until = CASE WHEN rl.blocked_until > $3 THEN rl.blocked_until ELSE NULL END,
             updated_at = $3
           RETURNING ${RATE_LIMIT_COLUMNS}`,
          [identifier, action, now, windowStartCutoff]
        );
        const r = res.rows[0];
        if (!r) {
          return { identifier, action, attempts: 1, windowStart: now, updatedAt: now };
        }
        return toRateLimit(r);
      },

      async installBlock({ identifier, action, now, windowStartCutoff, maxAttempts, blockedUntil }) {
        const res = await pool.query(
          `UPDATE ${tables.rateLimits} SET blocked_until = $5, updated_at = $3
           WHERE identifier = $1 AND action = $2
             AND blocked_until IS NULL AND window_start > $4 AND attempts >= $6
           RETURNING identifier`,
          [identifier, action, now, windowStartCutoff, blockedUntil, maxAttempts]
        );
        return res.rowCount === 1;
      },

      async reset(identifier, action, now) {
        await pool.query(
          `UPDATE ${tables.rateLimits} SET attempts = 0, blocked_until = NULL, updated_at = $3
           WHERE identifier = $1 AND action = $2`,
          [identifier, action, now]
        );
      },

      async deleteStale({ windowStartBefore, now }) {
        const res = await pool.query(
          `DELETE FROM ${tables.rateLimits}
           WHERE window_start < $1 AND (blocked_until IS NULL OR blocked_until <= $2)`,
          [windowStartBefore, now]
        );
        const n = res.rowCount ?? 0;
        debug('rateLimits.deleteStale', { removed: n });
        return n;
      }
    }
  };
}

function sessionValues(s: SessionRecord): unknown[] {
  return [
    s.id,
    s.userId,
    s.refreshTokenHash,
    s.accessTokenId,
    s.deviceFingerprint,
    s.userAgent ?? null,
    s.sourceAddress ?? null,
    s.createdAt,
    s.expiresAt,
    s.revoked,
    s.revokedAt ?? null,
    s.rotatedFromSessionId ?? null
  ];
}

function toAccount(r: AccountRow): AccountRecord {
  return {
    id: asUserId(r.id),
    tenantId: r.tenant_id,
    email: r.email,
    role: r.role,
    passwordHash: r.password_hash,
    phoneNumber: r.phone_number ?? undefined,
    phoneVerified: r.phone_verified,
    twoFactorEnabled: r.two_factor_enabled,
    isActive: r.is_active,
    failedLoginAttempts: r.failed_login_attempts,
    lockedUntil: toOptionalDate(r.locked_until),
    lastLoginAt: toOptionalDate(r.last_login_at)
  };
}

function toSession(r: SessionRow): SessionRecord {
  return {
    id: asSessionId(r.id),
    userId: asUserId(r.user_id),
    refreshTokenHash: r.refresh_token_hash,
    accessTokenId: asAccessTokenId(r.access_token_jti),
    deviceFingerprint: r.device_fingerprint,
    userAgent: r.user_agent ?? undefined,
    sourceAddress: r.source_address ?? undefined,
    createdAt: toDate(r.created_at),
    expiresAt: toDate(r.expires_at),
    revoked: r.revoked,
    revokedAt: toOptionalDate(r.revoked_at),
    rotatedFromSessionId: r.rotated_from_session_id ? asSessionId(r.rotated_from_session_id) : undefined
  };
}

function toChallenge(r: ChallengeRow): VerificationChallengeRecord {
  return {
    id: asChallengeId(r.id),
    userId: r.user_id ? asUserId(r.user_id) : undefined,
    phoneNumber: r.phone_number,
    codeHash: r.code_hash,
    purpose: r.purpose,
    attempts: r.attempts,
    maxAttempts: r.max_attempts,
    createdAt: toDate(r.created_at),
    expiresAt: toDate(r.expires_at),
    verified: r.verified
  };
}

function toRateLimit(r: RateLimitRow): RateLimitRecord {
  return {
    identifier: r.identifier,
    action: r.action,
    attempts: r.attempts,
    windowStart: toDate(r.window_start),
    blockedUntil: toOptionalDate(r.blocked_until),
    updatedAt: toDate(r.updated_at)
  };
}
