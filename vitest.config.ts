/// <reference types="vitest/config" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          globals: true,
          environment: 'node',
          include: ['tests/**/*.spec.ts'],
          exclude: ['tests/**/*.int.spec.ts']
        }
      },
      {
        test: {
          name: 'integration',
          globals: true,
          environment: 'node',
          // Suites skip themselves unless AUTH_PG_INTEGRATION / AUTH_KYSELY_INTEGRATION is set.
          include: ['tests/**/*.int.spec.ts'],
          testTimeout: 60_000
        }
      }
    ]
  }
});
