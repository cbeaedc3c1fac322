/**
 * Kysely migration: 001_init
 *
 * Creates the tables used by the pg and Kysely adapters.
 *
 * Notes:
 * - `users` is normally the application's own table; it is only created when missing, with the
 *   columns the security core reads and writes.
 * - Passwords, refresh tokens and one-time codes are never stored plaintext; only hashes.
 * - At most one unexpired, unverified challenge per (phone_number, purpose) is enforced by the
 *   adapters, not by a constraint (expiry is time-dependent).
 */

import type { Kysely } from 'kysely';
import { sql } from 'kysely';

export async function up(db: Kysely<Record<string, Record<string, unknown>>>): Promise<void> {
  await db.schema
    .createTable('users')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('tenant_id', 'text', col => col.notNull())
    .addColumn('email', 'text', col => col.notNull().unique())
    .addColumn('role', 'text', col => col.notNull().defaultTo('user'))
    .addColumn('password_hash', 'text', col => col.notNull())
    .addColumn('phone_number', 'text')
    .addColumn('phone_verified', 'boolean', col => col.notNull().defaultTo(false))
    .addColumn('two_factor_enabled', 'boolean', col => col.notNull().defaultTo(false))
    .addColumn('is_active', 'boolean', col => col.notNull().defaultTo(true))
    .addColumn('failed_login_attempts', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('locked_until', 'timestamptz')
    .addColumn('last_login_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('auth_sessions')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('user_id', 'text', col => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('refresh_token_hash', 'text', col => col.notNull())
    .addColumn('access_token_jti', 'text', col => col.notNull())
    .addColumn('device_fingerprint', 'text', col => col.notNull())
    .addColumn('user_agent', 'text')
    .addColumn('source_address', 'text')
    .addColumn('created_at', 'timestamptz', col => col.notNull())
    .addColumn('expires_at', 'timestamptz', col => col.notNull())
    .addColumn('revoked', 'boolean', col => col.notNull().defaultTo(false))
    .addColumn('revoked_at', 'timestamptz')
    .addColumn('rotated_from_session_id', 'text')
    .execute();

  await db.schema
    .createIndex('auth_sessions_access_token_jti_idx')
    .ifNotExists()
    .unique()
    .on('auth_sessions')
    .column('access_token_jti')
    .execute();
  await db.schema
    .createIndex('auth_sessions_user_id_idx')
    .ifNotExists()
    .on('auth_sessions')
    .column('user_id')
    .execute();
  await db.schema
    .createIndex('auth_sessions_expires_at_idx')
    .ifNotExists()
    .on('auth_sessions')
    .column('expires_at')
    .execute();

  await db.schema
    .createTable('auth_verification_challenges')
    .ifNotExists()
    .addColumn('id', 'text', col => col.primaryKey())
    .addColumn('user_id', 'text', col => col.references('users.id').onDelete('cascade'))
    .addColumn('phone_number', 'text', col => col.notNull())
    .addColumn('code_hash', 'text', col => col.notNull())
    .addColumn('purpose', 'text', col =>
      col
        .notNull()
        .check(sql`purpose IN ('login', 'register', 'password_reset', 'phone_verification')`)
    )
    .addColumn('attempts', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('max_attempts', 'integer', col => col.notNull())
    .addColumn('created_at', 'timestamptz', col => col.notNull())
    .addColumn('expires_at', 'timestamptz', col => col.notNull())
    .addColumn('verified', 'boolean', col => col.notNull().defaultTo(false))
    .addCheckConstraint(
      'auth_verification_challenges_attempts_check',
      sql`attempts >= 0 AND attempts <= max_attempts`
    )
    .execute();

  await db.schema
    .createIndex('auth_verification_challenges_phone_purpose_idx')
    .ifNotExists()
    .on('auth_verification_challenges')
    .columns(['phone_number', 'purpose'])
    .execute();
  await db.schema
    .createIndex('auth_verification_challenges_expires_at_idx')
    .ifNotExists()
    .on('auth_verification_challenges')
    .column('expires_at')
    .execute();

  await db.schema
    .createTable('auth_rate_limits')
    .ifNotExists()
    .addColumn('identifier', 'text', col => col.notNull())
    .addColumn('action', 'text', col => col.notNull())
    .addColumn('attempts', 'integer', col => col.notNull().defaultTo(0))
    .addColumn('window_start', 'timestamptz', col => col.notNull())
    .addColumn('blocked_until', 'timestamptz')
    .addColumn('updated_at', 'timestamptz', col => col.notNull())
    .addUniqueConstraint('auth_rate_limits_identifier_action_key', ['identifier', 'action'])
    .execute();

  await db.schema
    .createIndex('auth_rate_limits_blocked_until_idx')
    .ifNotExists()
    .on('auth_rate_limits')
    .column('blocked_until')
    .execute();
  await db.schema
    .createIndex('auth_rate_limits_window_start_idx')
    .ifNotExists()
    .on('auth_rate_limits')
    .column('window_start')
    .execute();

  await db.schema
    .createTable('auth_security_audit_log')
    .ifNotExists()
    .addColumn('id', 'bigserial', col => col.primaryKey())
    .addColumn('user_id', 'text')
    .addColumn('event_type', 'text', col => col.notNull())
    .addColumn('event_description', 'text', col => col.notNull())
    .addColumn('source_address', 'text')
    .addColumn('user_agent', 'text')
    .addColumn('additional_data', 'jsonb')
    .addColumn('created_at', 'timestamptz', col => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('auth_security_audit_log_user_id_created_at_idx')
    .ifNotExists()
    .on('auth_security_audit_log')
    .columns(['user_id', 'created_at'])
    .execute();
}

export async function down(db: Kysely<Record<string, Record<string, unknown>>>): Promise<void> {
  await db.schema.dropIndex('auth_security_audit_log_user_id_created_at_idx').ifExists().execute();
  await db.schema.dropIndex('auth_rate_limits_window_start_idx').ifExists().execute();
  await db.schema.dropIndex('auth_rate_limits_blocked_until_idx').ifExists().execute();
  await db.schema.dropIndex('auth_verification_challenges_expires_at_idx').ifExists().execute();
  await db.schema.dropIndex('auth_verification_challenges_phone_purpose_idx').ifExists().execute();
  await db.schema.dropIndex('auth_sessions_expires_at_idx').ifExists().execute();
  await db.schema.dropIndex('auth_sessions_user_id_idx').ifExists().execute();
  await db.schema.dropIndex('auth_sessions_access_token_jti_idx').ifExists().execute();

  // `users` belongs to the application and is left in place.
  await db.schema.dropTable('auth_security_audit_log').ifExists().execute();
  await db.schema.dropTable('auth_rate_limits').ifExists().execute();
  await db.schema.dropTable('auth_verification_challenges').ifExists().execute();
  await db.schema.dropTable('auth_sessions').ifExists().execute();
}
