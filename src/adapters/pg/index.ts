export { createPgSecurityStorage } from './pg-security-storage.js';
export type { CreatePgSecurityStorageOptions } from './pg-security-storage.js';
export { createPgAuditSink } from './pg-audit-sink.js';
export { resolveTables } from './pg-types.js';
export type { PgClient, PgPool, PgQueryResult, PgSecurityTables, PgTableOptions } from './pg-types.js';
