import type { Kysely, Transaction } from 'kysely';

/**
 * Loosely typed on purpose: table names are configurable (prefix/overrides), which full
 * compile-time table/column typing can't follow without user-supplied type machinery.
 *
 * Row decoding stays local to the adapter.
 */
export type KyselyDb = Kysely<Record<string, Record<string, unknown>>>;
export type KyselyTx = Transaction<Record<string, Record<string, unknown>>>;

export type KyselySecurityTables = {
  users: string;
  sessions: string;
  challenges: string;
  rateLimits: string;
  auditLog: string;
};

export type KyselyTableOptions = {
  /**
   * Optional prefix applied to the default auth table names (not to `users`).
   */
  tablePrefix?: string;
  /**
   * Override individual table names.
   *
   * Unqualified; for a schema pass `db.withSchema(...)` as `db`.
   */
  tables?: Partial<KyselySecurityTables>;
};

export function resolveTables(options: KyselyTableOptions): KyselySecurityTables {
  const prefix = options.tablePrefix ?? '';
  const defaults: KyselySecurityTables = {
    users: 'users',
    sessions: `${prefix}authSessions`,
    challenges: `${prefix}authVerificationChallenges`,
    rateLimits: `${prefix}authRateLimits`,
    auditLog: `${prefix}authSecurityAuditLog`
  };
  return { ...defaults, ...(options.tables ?? {}) };
}
