/**
 * Surrogate key derivation
 *
 * Cross-boundary contract: md5 hex of the key fields joined by '-', with
 * null rendered as NULL_KEY_FIELD. Identical grouping keys always produce
 * identical keys, so downstream stores can upsert by key across reruns.
 */

import { createHash } from 'node:crypto';

export type KeyField = string | number | boolean | null;

export const NULL_KEY_FIELD = '_dbt_utils_surrogate_key_null_';

export function surrogateKey(fields: readonly KeyField[]): string {
  const canonical = fields
    .map((field) => (field === null ? NULL_KEY_FIELD : String(field)))
    .join('-');
  return createHash('md5').update(canonical, 'utf8').digest('hex');
}

export function entityId(city: string, country: string | null): string {
  return surrogateKey([city, country]);
}

/**
 * Key of a daily fact; `date` is YYYY-MM-DD
 */
export function dailyFactId(city: string, country: string | null, date: string): string {
  return surrogateKey([city, country, date]);
}
