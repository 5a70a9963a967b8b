import type { ResultRecord, SortCriterion } from '@/types/search';

export type SortOption = 'relevance' | 'last-updated';

export const SORT_OPTIONS: ReadonlyArray<{ value: SortOption; label: string }> = [
  { value: 'relevance', label: 'Relevance' },
  { value: 'last-updated', label: 'Last updated' },
];

function sortKey(criterion: SortCriterion, record: ResultRecord): number {
  return criterion === 'LastUpdated' ? record.lastUpdated : record.score ?? 0;
}

/**
 * Orders records by the criterion, highest first. Array.prototype.sort is
 * stable, so records with equal keys keep their input order.
 */
export function sortResults(criterion: SortCriterion, records: readonly ResultRecord[]): ResultRecord[] {
  return [...records].sort((a, b) => sortKey(criterion, b) - sortKey(criterion, a));
}

export function parseSortCriterion(option: string): SortCriterion {
  return option === 'last-updated' ? 'LastUpdated' : 'Score';
}

export function sortOptionFor(criterion: SortCriterion): SortOption {
  return criterion === 'LastUpdated' ? 'last-updated' : 'relevance';
}
