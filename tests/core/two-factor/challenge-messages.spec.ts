import { describe, expect, it } from 'vitest';
import { formatChallengeMessage } from '../../../src/core/two-factor/challenge-messages.js';

describe('core/two-factor/challenge-messages', () => {
  it('names the purpose and the lifetime in minutes', () => {
    expect(
      formatChallengeMessage({ appName: 'Acme', purpose: 'register', code: '0042', ttlMs: 10 * 60_000 })
    ).toBe('Your Acme registration verification code is: 0042. This code expires in 10 minutes.');
    expect(
      formatChallengeMessage({ appName: 'Acme', purpose: 'password_reset', code: '987654', ttlMs: 60_000 })
    ).toBe('Your Acme password reset code is: 987654. This code expires in 1 minute.');
  });

  it('never reports less than one minute', () => {
    expect(
      formatChallengeMessage({ appName: 'Acme', purpose: 'phone_verification', code: '111111', ttlMs: 30_000 })
    ).toBe('Your Acme phone verification code is: 111111. This code expires in 1 minute.');
  });
});
