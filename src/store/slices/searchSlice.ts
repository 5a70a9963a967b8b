/**
 * Search State Slice
 *
 * Holds the query, the last successful result set, the language facet
 * selections and the sort criterion. `searchRepositories` is the only
 * effect: it performs the request and re-enters the reducer through its
 * `fulfilled` / `rejected` actions.
 */

import { createAsyncThunk, createSelector, createSlice, PayloadAction } from '@reduxjs/toolkit';
import { LANGUAGE_CATEGORY, MAX_RENDERED_RESULTS } from '@/config';
import { toSearchFailure } from '@/services/errors';
import { searchRepositories as fetchRepositories } from '@/services/githubSearchService';
import { applyFilter, countFacets, isSelected, seedLanguageFacets, setFacet } from '@/utils/facets';
import { sortResults } from '@/utils/sortResults';
import type {
  FacetOption,
  FilterStore,
  QueryTransaction,
  ResultRecord,
  SearchFailure,
  SearchPage,
  SortCriterion,
} from '@/types/search';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export interface SearchState {
  query: string;
  transaction: QueryTransaction;
  /** Last successful result set; kept as-is when a later request fails. */
  records: ResultRecord[];
  totalCount: number;
  lastPage: number | null;
  facets: FilterStore;
  sortBy: SortCriterion;
  error: SearchFailure | null;
  currentRequestId: string | null;
}

/** The part of the root state this slice's thunk and selectors read. */
export interface SearchRootState {
  search: SearchState;
}

export interface ToggleFacetPayload {
  category: string;
  value: string;
  selected: boolean;
}

// =============================================================================
// TRANSACTION STATE MACHINE
// =============================================================================

const TRANSITIONS: Record<QueryTransaction, readonly QueryTransaction[]> = {
  NotAsked: ['Loading'],
  // a resubmit while in flight supersedes the pending request
  Loading: ['Loading', 'Success', 'Failure'],
  Success: ['Loading'],
  Failure: ['Loading'],
};

export function canTransition(from: QueryTransaction, to: QueryTransaction): boolean {
  return TRANSITIONS[from].includes(to);
}

// =============================================================================
// INITIAL STATE
// =============================================================================

export const initialState: SearchState = {
  query: '',
  transaction: 'NotAsked',
  records: [],
  totalCount: 0,
  lastPage: null,
  facets: { [LANGUAGE_CATEGORY]: {} },
  sortBy: 'Score',
  error: null,
  currentRequestId: null,
};

// =============================================================================
// EFFECTS
// =============================================================================

export const searchRepositories = createAsyncThunk<
  SearchPage,
  void,
  { state: SearchRootState; rejectValue: SearchFailure }
>(
  'search/searchRepositories',
  async (_, { getState, rejectWithValue }) => {
    const query = getState().search.query.trim();
    try {
      return await fetchRepositories(query);
    } catch (err) {
      console.error(`Repository search for "${query}" failed:`, err);
      return rejectWithValue(toSearchFailure(err));
    }
  },
  {
    // blank queries never leave the client
    condition: (_, { getState }) => getState().search.query.trim().length > 0,
  }
);

// =============================================================================
// SLICE DEFINITION
// =============================================================================

export const searchSlice = createSlice({
  name: 'search',
  initialState,
  reducers: {
    setQuery: (state, action: PayloadAction<string>) => {
      state.query = action.payload;
    },
    toggleFacet: (state, action: PayloadAction<ToggleFacetPayload>) => {
      const { category, value, selected } = action.payload;
      state.facets = setFacet(state.facets, category, value, selected);
    },
    setSortCriterion: (state, action: PayloadAction<SortCriterion>) => {
      state.sortBy = action.payload;
    },
  },
  extraReducers: (builder) => {
    builder
      .addCase(searchRepositories.pending, (state, action) => {
        if (!canTransition(state.transaction, 'Loading')) return;
        state.transaction = 'Loading';
        state.currentRequestId = action.meta.requestId;
        state.error = null;
      })
      .addCase(searchRepositories.fulfilled, (state, action) => {
        if (action.meta.requestId !== state.currentRequestId) return;
        if (!canTransition(state.transaction, 'Success')) return;

        const { records, totalCount, lastPage } = action.payload;
        state.transaction = 'Success';
        state.currentRequestId = null;
        state.records = records;
        state.totalCount = totalCount;
        state.lastPage = lastPage;
        // seeded in the same step so the first render already sees every language
        state.facets = seedLanguageFacets(state.facets, records);
      })
      .addCase(searchRepositories.rejected, (state, action) => {
        if (action.meta.requestId !== state.currentRequestId) return;
        if (!canTransition(state.transaction, 'Failure')) return;

        state.transaction = 'Failure';
        state.currentRequestId = null;
        state.error = action.payload ?? {
          kind: 'TransportError',
          message: action.error.message ?? 'Unknown error',
        };
      });
  },
});

// =============================================================================
// ACTIONS EXPORT
// =============================================================================

export const { setQuery, toggleFacet, setSortCriterion } = searchSlice.actions;

// =============================================================================
// SELECTORS
// =============================================================================

export const selectSearch = (state: SearchRootState): SearchState => state.search;

export const selectTransaction = (state: SearchRootState): QueryTransaction =>
  state.search.transaction;

const selectRecords = (state: SearchRootState) => state.search.records;
const selectFacets = (state: SearchRootState) => state.search.facets;
const selectSortBy = (state: SearchRootState) => state.search.sortBy;

/** Filtered, then sorted, records for the result list. */
export const selectVisibleResults = createSelector(
  [selectRecords, selectFacets, selectSortBy],
  (records, facets, sortBy): ResultRecord[] =>
    sortResults(sortBy, applyFilter(records, facets)).slice(0, MAX_RENDERED_RESULTS)
);

/** Checkbox entries for the languages present in the current records. */
export const selectLanguageFacets = createSelector(
  [selectRecords, selectFacets],
  (records, facets): FacetOption[] =>
    countFacets(records).map(({ value, count }) => ({
      value,
      count,
      selected: isSelected(facets, LANGUAGE_CATEGORY, value),
    }))
);

// =============================================================================
// REDUCER EXPORT
// =============================================================================

export default searchSlice.reducer;
