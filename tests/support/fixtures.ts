import type { Argon2Params } from '../../src/core/auth-policy.js';
import { asUserId } from '../../src/core/auth-types.js';
import type { Clock, Logger, LogMeta } from '../../src/core/auth-types.js';
import type { AccountRecord } from '../../src/core/storage/security-storage.js';

// Cheap argon2 parameters; production defaults take ~100ms per hash.
export const fastArgon2Params: Argon2Params = {
  memoryCost: 1024,
  timeCost: 1,
  parallelism: 1,
  outputLen: 32
};

export const testSigningSecret = 'test-secret-test-secret-test-secret-00';

export type ManualClock = Clock & {
  advance(ms: number): void;
  set(at: Date): void;
};

export function manualClock(start = new Date('2026-01-01T00:00:00.000Z')): ManualClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(ms) {
      current += ms;
    },
    set(at) {
      current = at.getTime();
    }
  };
}

export function sequentialIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export type RecordedLog = { level: keyof Logger; message: string; meta?: LogMeta };

export function recordingLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const at =
    (level: keyof Logger) =>
    (message: string, meta?: LogMeta): void => {
      entries.push({ level, message, meta });
    };
  return {
    entries,
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error')
  };
}

export function testAccount(overrides: Partial<AccountRecord> = {}): AccountRecord {
  return {
    id: asUserId('user-1'),
    tenantId: 'tenant-1',
    email: 'investor@example.com',
    role: 'owner',
    passwordHash: '',
    phoneVerified: false,
    twoFactorEnabled: false,
    isActive: true,
    failedLoginAttempts: 0,
    ...overrides
  };
}
