import type { ChallengePurpose } from '../storage/security-storage.js';

const purposeLabel: Record<ChallengePurpose, string> = {
  login: 'login verification code',
  register: 'registration verification code',
  password_reset: 'password reset code',
  phone_verification: 'phone verification code'
};

export function formatChallengeMessage(input: {
  appName: string;
  purpose: ChallengePurpose;
  code: string;
  ttlMs: number;
}): string {
  const minutes = Math.max(1, Math.round(input.ttlMs / 60_000));
  const unit = minutes === 1 ? 'minute' : 'minutes';
  return `Your ${input.appName} ${purposeLabel[input.purpose]} is: ${input.code}. This code expires in ${minutes} ${unit}.`;
}
