/**
 * Identifier helpers.
 *
 * IDs are a base36 timestamp prefix plus a random suffix, so they sort by
 * creation time.
 */

import { randomBytes } from 'node:crypto';

export function generateId(prefix?: string): string {
  const timestamp = Date.now().toString(36).padStart(9, '0');
  const random = randomBytes(6).toString('hex');
  return prefix ? `${prefix}_${timestamp}_${random}` : `${timestamp}_${random}`;
}
