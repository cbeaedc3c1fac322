export type PgQueryResult<Row> = {
  rows: Row[];
  rowCount: number | null;
};

export type PgClient = {
  query<Row = unknown>(text: string, values?: readonly unknown[]): Promise<PgQueryResult<Row>>;
  release(): void;
};

/**
 * Minimal structural type for `pg.Pool` (so consumers don't *need* pg's TS types).
 */
export type PgPool = {
  query<Row = unknown>(text: string, values?: readonly unknown[]): Promise<PgQueryResult<Row>>;
  connect(): Promise<PgClient>;
};

export type PgSecurityTables = {
  /**
   * The application's account table (read-mostly; see AccountRecord).
   */
  users: string;
  sessions: string;
  challenges: string;
  rateLimits: string;
  auditLog: string;
};

export type PgTableOptions = {
  /**
   * Optional DB schema/namespace (Postgres). If set, table names are qualified.
   */
  schema?: string;
  /**
   * Optional prefix applied to the default auth_* table names (e.g. "app_" -> "app_auth_sessions").
   */
  tablePrefix?: string;
  /**
   * Override individual table names (unqualified). Applied after `tablePrefix`.
   */
  tables?: Partial<PgSecurityTables>;
};

export function resolveTables(options: PgTableOptions): PgSecurityTables {
  const prefix = options.tablePrefix ?? '';
  const defaults: PgSecurityTables = {
    users: 'users',
    sessions: `${prefix}auth_sessions`,
    challenges: `${prefix}auth_verification_challenges`,
    rateLimits: `${prefix}auth_rate_limits`,
    auditLog: `${prefix}auth_security_audit_log`
  };
  const merged = { ...defaults, ...(options.tables ?? {}) };
  return {
    users: qualify(options.schema, merged.users),
    sessions: qualify(options.schema, merged.sessions),
    challenges: qualify(options.schema, merged.challenges),
    rateLimits: qualify(options.schema, merged.rateLimits),
    auditLog: qualify(options.schema, merged.auditLog)
  };
}

function qualify(schema: string | undefined, table: string): string {
  // Minimal identifier handling: schema/table are assumed trusted (code config, not user input).
  // Users should not pass untrusted values into `schema`/`tables`/`tablePrefix`.
  return schema ? `${schema}.${table}` : table;
}

export function toDate(v: Date | string | number): Date {
  return v instanceof Date ? v : new Date(v);
}

export function toOptionalDate(v: Date | string | number | null | undefined): Date | undefined {
  if (v == null) return undefined;
  return toDate(v);
}

export async function withTx<T>(pool: PgPool, fn: (tx: PgClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const out = await fn(client);
    await client.query('COMMIT');
    return out;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    client.release();
  }
}
