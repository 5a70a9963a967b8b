import { configureStore } from '@reduxjs/toolkit';
import searchReducer, { initialState, type SearchState } from './slices/searchSlice';

/**
 * Builds a store for one mounted page. Tests pass a partial search state to
 * start from.
 */
export function makeStore(preloadedSearch?: Partial<SearchState>) {
  return configureStore({
    reducer: {
      search: searchReducer,
    },
    preloadedState: preloadedSearch ? { search: { ...initialState, ...preloadedSearch } } : undefined,
  });
}

export type AppStore = ReturnType<typeof makeStore>;
export type RootState = ReturnType<AppStore['getState']>;
export type AppDispatch = AppStore['dispatch'];
