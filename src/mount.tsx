import React from 'react';
import { createRoot, type Root } from 'react-dom/client';
import { Provider } from 'react-redux';
import { RepositorySearchPage } from '@/components/search/RepositorySearchPage';
import { makeStore, type AppStore } from '@/store';

/**
 * Render the search page into `element` with its own store.
 */
export function mountRepositorySearch(element: HTMLElement, store: AppStore = makeStore()): Root {
  const root = createRoot(element);
  root.render(
    <React.StrictMode>
      <Provider store={store}>
        <RepositorySearchPage />
      </Provider>
    </React.StrictMode>
  );
  return root;
}
