// File: src/services/filter.ts
// Row filtering shared by all resource kinds

import { ResourceRow, SearchCriterion } from '../types'

/**
 * Case-sensitive substring test; an absent field never matches
 */
export function matchesSubstring(value: string | undefined, substring: string): boolean {
  return value !== undefined && value.includes(substring)
}

/**
 * Keep the rows that satisfy every criterion, preserving their order
 *
 * With no criteria every row is kept.
 */
export function filterRows<R extends ResourceRow>(rows: R[], criteria: SearchCriterion<R>[]): R[] {
  if (criteria.length === 0) {
    return [...rows]
  }
  return rows.filter((row) => criteria.every((criterion) => criterion(row)))
}
