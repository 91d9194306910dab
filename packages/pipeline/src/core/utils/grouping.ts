/**
 * Grouping helpers for partitioned stages
 */

import type { EntityKey } from '@airshed/types';

/**
 * Stable string form of an entity key; keeps null country distinct from ''
 */
export function entityKeyString(key: EntityKey): string {
  return JSON.stringify([key.city, key.country]);
}

/**
 * Group preserving first-seen order of keys and input order within groups
 */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
