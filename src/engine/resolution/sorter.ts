/**
 * Chronological Sorter.
 */

import type { Entity } from '../models';
import { compareDates } from '../date';

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Start date, then name, then id. Total over entities with distinct ids.
 */
export function compareEntities(a: Entity, b: Entity): number {
  return compareDates(a.start, b.start)
    || compareStrings(a.name, b.name)
    || compareStrings(a.id, b.id);
}

/**
 * Ordered copy; the input is left as it is.
 */
export function sortChronologically(entities: readonly Entity[]): Entity[] {
  return [...entities].sort(compareEntities);
}
