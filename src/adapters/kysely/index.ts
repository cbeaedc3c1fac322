/**
 * Kysely adapter.
 *
 * Use a `Kysely` instance configured with `CamelCasePlugin`; run `migrations/001_init` (or
 * `sql/001_init.sql`) first.
 */
export * from './kysely-security-storage.js';
export * from './kysely-audit-sink.js';
export * from './kysely-types.js';
