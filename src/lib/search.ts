import Fuse from 'fuse.js';
import type { SortDirection, SortKey, StudentRecord } from '../types';
import { fullName } from './record';

// ============================================================================
// SEARCH CONFIGURATION
// ============================================================================

export interface SearchOptions {
  keys: (string | { name: string; weight: number })[];
  threshold?: number;
  minMatchCharLength?: number;
  shouldSort?: boolean;
  includeScore?: boolean;
  ignoreLocation?: boolean;
  distance?: number;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  keys: [],
  threshold: 0.3, // Good balance between fuzziness and precision
  minMatchCharLength: 1,
  shouldSort: true,
  includeScore: true,
  ignoreLocation: true,
  distance: 100,
};

const NAME_SEARCH_OPTIONS: SearchOptions = {
  keys: [
    { name: 'lastName', weight: 2 },
    { name: 'firstName', weight: 2 },
    { name: 'fullName', weight: 1 },
  ],
};

/**
 * Trims and lower-cases a query. Empty string means "match everything".
 */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

// ============================================================================
// SUBSTRING SEARCH
// ============================================================================

/**
 * Case-insensitive substring match against first OR last name.
 * Expects an already normalised query.
 */
export function recordMatchesQuery(record: StudentRecord, normalizedQuery: string): boolean {
  return (
    record.firstName.toLowerCase().includes(normalizedQuery) ||
    record.lastName.toLowerCase().includes(normalizedQuery)
  );
}

// ============================================================================
// FUZZY NAME SEARCH
// ============================================================================

interface NameEntry {
  index: number;
  firstName: string;
  lastName: string;
  fullName: string;
}

export interface NameIndex {
  /** Positions of matching records, best match first */
  search(query: string): number[];
}

/**
 * Builds a Fuse index over record names. Callers own the returned index;
 * Dataset keeps one per instance.
 */
export function createNameIndex(
  records: readonly StudentRecord[],
  options: SearchOptions = NAME_SEARCH_OPTIONS
): NameIndex {
  const entries: NameEntry[] = records.map((r, index) => ({
    index,
    firstName: r.firstName,
    lastName: r.lastName,
    fullName: fullName(r),
  }));

  const fuse = new Fuse(entries, {
    ...DEFAULT_SEARCH_OPTIONS,
    ...options,
  });

  return {
    search(query: string): number[] {
      const trimmed = query.trim();
      if (trimmed.length < (options.minMatchCharLength ?? 1)) {
        return [];
      }
      return fuse.search(trimmed).map(r => r.item.index);
    },
  };
}

// ============================================================================
// SORTING
// ============================================================================

function sortValue(record: StudentRecord, key: SortKey): string | number {
  return key === 'fullName' ? fullName(record) : record[key];
}

/**
 * Returns a sorted copy. Ties are broken by ascending student id
 * regardless of direction.
 */
export function sortRecords(
  records: readonly StudentRecord[],
  key: SortKey = 'studentId',
  direction: SortDirection = 'asc'
): StudentRecord[] {
  const sign = direction === 'asc' ? 1 : -1;

  return records.slice().sort((a, b) => {
    const av = sortValue(a, key);
    const bv = sortValue(b, key);
    let cmp: number;
    if (typeof av === 'number' && typeof bv === 'number') {
      cmp = av - bv;
    } else {
      cmp = String(av).localeCompare(String(bv));
    }
    if (cmp !== 0) {
      return cmp * sign;
    }
    return a.studentId - b.studentId;
  });
}
