import type { Dataset } from './dataset';
import { normalizeQuery } from './search';

export interface ViewFilters {
  term?: string | null;
  grade?: number | null;
  scoreRange?: { min: number; max: number } | null;
  query?: string | null;
  /** Use typo-tolerant name matching for `query` */
  fuzzy?: boolean;
}

export function hasActiveFilters(filters: ViewFilters): boolean {
  return (
    (filters.term ?? null) !== null ||
    (filters.grade ?? null) !== null ||
    (filters.scoreRange ?? null) !== null ||
    normalizeQuery(filters.query ?? '').length > 0
  );
}

/**
 * Applies term, grade, score range and name query in that order. Unset
 * criteria and a blank query are skipped; with nothing set the dataset comes
 * back as is.
 */
export function applyFilters(dataset: Dataset, filters: ViewFilters): Dataset {
  if (!hasActiveFilters(filters)) {
    return dataset;
  }

  let view = dataset;
  if (filters.term != null) {
    view = view.filterByTerm(filters.term);
  }
  if (filters.grade != null) {
    view = view.filterByGrade(filters.grade);
  }
  if (filters.scoreRange != null) {
    view = view.filterByScoreRange(filters.scoreRange.min, filters.scoreRange.max);
  }
  const query = filters.query ?? '';
  if (normalizeQuery(query).length > 0) {
    view = filters.fuzzy ? view.fuzzySearch(query) : view.search(query);
  }
  return view;
}
