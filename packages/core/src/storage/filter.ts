/**
 * Scan filter evaluation
 *
 * Mirrors the semantics of a server-side filter expression: an attribute
 * that is missing, or of the wrong type for the operator, fails the
 * condition instead of raising.
 *
 * @internal
 */

import type { FilterCondition, Item, ItemValue, ScanFilter } from '../types/public-api.js';
import { isStoreDecimal } from './decimal.js';

function numericValue(value: ItemValue | undefined): number | null {
  if (typeof value === 'number') return value;
  if (isStoreDecimal(value)) return value.toNumber();
  return null;
}

export function matchesCondition(item: Item, condition: FilterCondition): boolean {
  const actual = item[condition.attribute];
  if (actual === undefined) return false;

  switch (condition.op) {
    case 'eq': {
      if (typeof condition.value === 'number') {
        return numericValue(actual) === condition.value;
      }
      return actual === condition.value;
    }
    case 'contains': {
      if (typeof actual === 'string') return actual.includes(condition.value);
      if (Array.isArray(actual)) return actual.includes(condition.value);
      return false;
    }
    case 'gt': {
      const n = numericValue(actual);
      return n !== null && n > condition.value;
    }
  }
}

export function matchesFilter(item: Item, filter: ScanFilter = []): boolean {
  return filter.every((condition) => matchesCondition(item, condition));
}
