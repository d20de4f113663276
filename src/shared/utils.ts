// ---------------------------------------------------------------------------
// Mail2SMS — Shared Utilities
// ---------------------------------------------------------------------------

import { randomUUID } from 'node:crypto';

/** Generate a cryptographically random UUID v4. */
export function generateId(): string {
  return randomUUID();
}

/**
 * Mask a phone number for logs, keeping only the last four digits.
 * `+15551234567` → `+*******4567`
 */
export function maskPhone(phone: string): string {
  if (phone.length <= 4) return phone;
  const visible = phone.slice(-4);
  const hidden = phone.slice(0, -4).replace(/\d/g, '*');
  return hidden + visible;
}
