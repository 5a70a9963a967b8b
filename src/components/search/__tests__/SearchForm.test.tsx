import React from 'react';
import { fireEvent, screen } from '@testing-library/react';
import { SearchForm } from '../SearchForm';
import { renderWithStore } from '@/test/renderWithStore';
import { searchRepositories as fetchRepositories } from '@/services/githubSearchService';

vi.mock('@/services/githubSearchService');

/**
 * SearchForm GWT Tests
 */

describe('SearchForm Component', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('GIVEN a SearchForm WHEN the user types THEN the pending query is updated without a request', () => {
    const { store } = renderWithStore(<SearchForm />);

    fireEvent.change(screen.getByRole('textbox', { name: 'Search query' }), { target: { value: 'bbc' } });

    expect(store.getState().search.query).toBe('bbc');
    expect(store.getState().search.transaction).toBe('NotAsked');
    expect(fetchRepositories).not.toHaveBeenCalled();
  });

  it('GIVEN a query WHEN the form is submitted THEN a search is requested', () => {
    vi.mocked(fetchRepositories).mockResolvedValueOnce({ totalCount: 0, records: [], lastPage: null });
    const { store } = renderWithStore(<SearchForm />, { query: 'bbc' });

    fireEvent.click(screen.getByRole('button', { name: 'Search' }));

    expect(fetchRepositories).toHaveBeenCalledWith('bbc');
    expect(store.getState().search.transaction).toBe('Loading');
  });

  it('GIVEN a search in flight WHEN rendered THEN the submit button is disabled', () => {
    renderWithStore(<SearchForm />, { query: 'bbc', transaction: 'Loading' });

    expect(screen.getByRole('button', { name: 'Search' })).toBeDisabled();
  });

  it('GIVEN a query WHEN "Clear query" is clicked THEN the query is emptied', () => {
    const { store } = renderWithStore(<SearchForm />, { query: 'bbc' });

    fireEvent.click(screen.getByRole('button', { name: 'Clear query' }));

    expect(store.getState().search.query).toBe('');
    expect(screen.queryByRole('button', { name: 'Clear query' })).not.toBeInTheDocument();
  });
});
