import { LANGUAGE_CATEGORY } from '@/config';
import type { FilterStore, ResultRecord } from '@/types/search';

/**
 * Facet selection helpers. Every function returns a new store; inputs are
 * never mutated so the results can be stored directly in Redux state.
 */

/**
 * Marks every distinct language of `records` as selected. Existing entries
 * for those languages are overwritten; other categories are left as they are.
 */
export function seedLanguageFacets(store: FilterStore, records: readonly ResultRecord[]): FilterStore {
  const languages = { ...(store[LANGUAGE_CATEGORY] ?? {}) };
  for (const record of records) {
    languages[record.language] = true;
  }
  return { ...store, [LANGUAGE_CATEGORY]: languages };
}

export function setFacet(
  store: FilterStore,
  category: string,
  facetValue: string,
  selected: boolean
): FilterStore {
  return {
    ...store,
    [category]: { ...(store[category] ?? {}), [facetValue]: selected },
  };
}

/** Absent facets count as unselected. */
export function isSelected(store: FilterStore, category: string, facetValue: string): boolean {
  return store[category]?.[facetValue] ?? false;
}

export function applyFilter(records: readonly ResultRecord[], store: FilterStore): ResultRecord[] {
  return records.filter((record) => isSelected(store, LANGUAGE_CATEGORY, record.language));
}

export interface FacetCount {
  value: string;
  count: number;
}

// Count desc, then value asc.
export function countFacets(records: readonly ResultRecord[]): FacetCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.language, (counts.get(record.language) ?? 0) + 1);
  }
  return Array.from(counts, ([value, count]) => ({ value, count })).sort(
    (a, b) => b.count - a.count || a.value.localeCompare(b.value)
  );
}
