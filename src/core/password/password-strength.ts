import { AuthError } from '../auth-error.js';
import type { PasswordPolicy } from '../auth-policy.js';

export const PASSWORD_SYMBOLS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

export type PasswordRequirement = 'min_length' | 'max_length' | 'uppercase' | 'lowercase' | 'digit' | 'symbol';

/**
 * Requirements `password` does not meet. Empty when acceptable.
 */
export function checkPasswordStrength(password: string, policy: PasswordPolicy): PasswordRequirement[] {
  const missing: PasswordRequirement[] = [];
  if (password.length < policy.minLength) missing.push('min_length');
  if (password.length > policy.maxLength) missing.push('max_length');
  if (!policy.requireCharacterClasses) return missing;

  let upper = false;
  let lower = false;
  let digit = false;
  let symbol = false;
  for (const ch of password) {
    if (ch >= 'A' && ch <= 'Z') upper = true;
    else if (ch >= 'a' && ch <= 'z') lower = true;
    else if (ch >= '0' && ch <= '9') digit = true;
    else if (PASSWORD_SYMBOLS.includes(ch)) symbol = true;
  }
  if (!upper) missing.push('uppercase');
  if (!lower) missing.push('lowercase');
  if (!digit) missing.push('digit');
  if (!symbol) missing.push('symbol');
  return missing;
}

export function assertPasswordStrength(password: string, policy: PasswordPolicy): void {
  if (typeof password !== 'string') {
    throw new AuthError('invalid_input', 'password must be a string');
  }
  const missing = checkPasswordStrength(password, policy);
  if (missing.length === 0) return;
  if (missing.includes('max_length')) {
    throw new AuthError('invalid_input', 'password is too long', {
      publicMessage: `Password must be at most ${policy.maxLength} characters.`
    });
  }
  throw new AuthError('invalid_input', `password does not meet requirements: ${missing.join(', ')}`, {
    publicMessage: policy.requireCharacterClasses
      ? `Password must be at least ${policy.minLength} characters and contain upper-case and lower-case letters, a digit and a symbol.`
      : `Password must be at least ${policy.minLength} characters.`
  });
}
