import type { AuditSink } from '../../core/audit/security-audit.js';
import { resolveTables } from './kysely-types.js';
import type { KyselyDb, KyselyTableOptions } from './kysely-types.js';

/**
 * Appends security events to the audit table. Append-only.
 */
export function createKyselyAuditSink(options: KyselyTableOptions & { db: KyselyDb }): AuditSink {
  const tables = resolveTables(options);
  return {
    async log(event) {
      await options.db
        .insertInto(tables.auditLog)
        .values({
          userId: event.userId ?? null,
          eventType: event.type,
          eventDescription: event.description,
          sourceAddress: event.sourceAddress ?? null,
          userAgent: event.userAgent ?? null,
          additionalData: event.data ? JSON.stringify(event.data) : null,
          createdAt: event.occurredAt
        })
        .execute();
    }
  };
}
