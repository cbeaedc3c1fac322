import { AuthError } from '../auth-error.js';

/**
 * Strips common formatting (spaces, dashes, dots, parentheses). The result is the canonical
 * form used as the challenge key and sent to the gateway.
 */
export function normalizePhoneNumber(phoneNumber: string): string {
  return phoneNumber.replace(/[\s\-().]/g, '');
}

/**
 * E.164-ish: "+" followed by 10 to 15 digits after formatting is removed.
 */
export function isValidPhoneNumber(phoneNumber: string): boolean {
  if (typeof phoneNumber !== 'string') return false;
  return /^\+[0-9]{10,15}$/.test(normalizePhoneNumber(phoneNumber));
}

export function assertValidPhoneNumber(phoneNumber: string): string {
  if (!isValidPhoneNumber(phoneNumber)) {
    throw new AuthError('invalid_input', 'invalid phone number', {
      publicMessage: 'Enter the phone number in international format, e.g. +15555550123.'
    });
  }
  return normalizePhoneNumber(phoneNumber);
}

/**
 * "+1555****123" style masking for logs and UI hints.
 */
export function maskPhoneNumber(phoneNumber: string): string {
  const n = normalizePhoneNumber(phoneNumber);
  if (n.length <= 7) return '*'.repeat(n.length);
  return `${n.slice(0, 5)}${'*'.repeat(n.length - 8)}${n.slice(-3)}`;
}
