/**
 * Repository search types.
 *
 * Raw shapes mirror the GitHub search API (`/search/repositories`);
 * normalized shapes are what the store and the views work with.
 */

// -------------------------------------------------------------------------
// Normalized records
// -------------------------------------------------------------------------

export interface Owner {
  name: string;
  avatarUrl: string;
}

export interface ResultRecord {
  id: number;
  name: string;
  fullName: string;
  owner: Owner;
  url: string;
  /** Seconds since epoch. */
  lastUpdated: number;
  description: string | null;
  language: string;
  score: number | null;
  stars: number;
}

export interface SearchPage {
  totalCount: number;
  records: ResultRecord[];
  lastPage: number | null;
}

// -------------------------------------------------------------------------
// View state
// -------------------------------------------------------------------------

export type SortCriterion = 'LastUpdated' | 'Score';

export type QueryTransaction = 'NotAsked' | 'Loading' | 'Failure' | 'Success';

/** category -> facet value -> selected */
export type FilterStore = Record<string, Record<string, boolean>>;

export interface FacetOption {
  value: string;
  count: number;
  selected: boolean;
}

export type SearchFailureKind = 'TransportError' | 'DecodeError';

export interface SearchFailure {
  kind: SearchFailureKind;
  message: string;
}
