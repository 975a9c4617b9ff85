import type { TenantId } from '../types/config';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Canonical tenant id for a chat id coming from the platform (number) or from
 * user input (string). Returns null when the value is not an integer.
 *
 * Every store key goes through here: "-100123", " -100123" and -100123 must all
 * address the same group.
 */
export function toTenantId(value: number | string): TenantId | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? String(value) : null;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? String(parsed) : null;
}
