import React from 'react';
import { Loader2, Search, X } from 'lucide-react';
import { useAppDispatch, useAppSelector } from '@/hooks/redux';
import { searchRepositories, setQuery } from '@/store/slices/searchSlice';

/**
 * Query box. Typing only updates the pending query; the request goes out on
 * submit.
 */
interface SearchFormProps {
  placeholder?: string;
}

export const SearchForm: React.FC<SearchFormProps> = ({ placeholder = 'Search GitHub repositories...' }) => {
  const dispatch = useAppDispatch();
  const query = useAppSelector((state) => state.search.query);
  const isSearching = useAppSelector((state) => state.search.transaction === 'Loading');

  const handleSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    void dispatch(searchRepositories());
  };

  return (
    <form role="search" onSubmit={handleSubmit} className="search-form">
      <input
        type="text"
        aria-label="Search query"
        value={query}
        placeholder={placeholder}
        onChange={(e) => dispatch(setQuery(e.target.value))}
        className="search-form__input"
      />
      {query && (
        <button type="button" aria-label="Clear query" onClick={() => dispatch(setQuery(''))} className="search-form__clear">
          <X size={16} />
        </button>
      )}
      <button type="submit" disabled={isSearching} className="search-form__submit">
        {isSearching ? <Loader2 size={16} className="animate-spin" /> : <Search size={16} />}
        <span>Search</span>
      </button>
    </form>
  );
};
