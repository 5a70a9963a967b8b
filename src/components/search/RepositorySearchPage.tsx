import React from 'react';
import { LanguageFacetList } from './LanguageFacetList';
import { RepositoryList } from './RepositoryList';
import { SearchForm } from './SearchForm';
import { SearchStatus } from './SearchStatus';
import { SortSelector } from './SortSelector';

export const RepositorySearchPage: React.FC = () => (
  <main className="repository-search">
    <header className="repository-search__header">
      <h1>GitHub Repository Search</h1>
      <SearchForm />
    </header>
    <div className="repository-search__body">
      <aside className="repository-search__sidebar">
        <SortSelector />
        <LanguageFacetList />
      </aside>
      <section className="repository-search__results">
        <SearchStatus />
        <RepositoryList />
      </section>
    </div>
  </main>
);
