import { describe, expect, it } from 'vitest';
import { AuthError } from '../../../src/core/auth-error.js';
import { storeCall } from '../../../src/core/storage/store-call.js';

describe('core/storage/store-call', () => {
  it('returns the result', async () => {
    await expect(storeCall('sessions.getSessionById', async () => 42)).resolves.toBe(42);
  });

  it('wraps driver failures as transient', async () => {
    const cause = new Error('connection reset');
    let caught: unknown;
    try {
      await storeCall('sessions.getSessionById', async () => {
        throw cause;
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({
      code: 'transient_dependency',
      message: 'storage.sessions.getSessionById failed',
      status: 503
    });
    expect(caught instanceof Error ? caught.cause : undefined).toBe(cause);
  });

  it('passes AuthErrors through', async () => {
    const original = new AuthError('conflict', 'duplicate');
    await expect(
      storeCall('accounts.findById', async () => {
        throw original;
      })
    ).rejects.toBe(original);
  });
});
