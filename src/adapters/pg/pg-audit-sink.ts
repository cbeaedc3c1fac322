import type { AuditSink } from '../../core/audit/security-audit.js';
import { resolveTables } from './pg-types.js';
import type { PgPool, PgTableOptions } from './pg-types.js';

/**
 * Appends security events to the audit table. One INSERT per event; nothing is ever updated.
 */
export function createPgAuditSink(options: PgTableOptions & { pool: PgPool }): AuditSink {
  const tables = resolveTables(options);
  return {
    async log(event) {
      await options.pool.query(
        `INSERT INTO ${tables.auditLog}
         (user_id, event_type, event_description, source_address, user_agent, additional_data, created_at)
         VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)`,
        [
          event.userId ?? null,
          event.type,
          event.description,
          event.sourceAddress ?? null,
          event.userAgent ?? null,
          event.data ? JSON.stringify(event.data) : null,
          event.occurredAt
        ]
      );
    }
  };
}
