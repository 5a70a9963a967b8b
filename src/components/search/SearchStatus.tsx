import React from 'react';
import { AlertTriangle, Loader2 } from 'lucide-react';
import { useAppSelector } from '@/hooks/redux';
import { selectVisibleResults } from '@/store/slices/searchSlice';

/**
 * One-line summary of the current transaction.
 * A failed search keeps the previous results on screen, flagged as stale.
 */
export const SearchStatus: React.FC = () => {
  const { transaction, error, records, totalCount, lastPage } = useAppSelector((state) => state.search);
  const visibleCount = useAppSelector(selectVisibleResults).length;

  switch (transaction) {
    case 'NotAsked':
      return <p className="search-status">Enter a query to search GitHub repositories.</p>;
    case 'Loading':
      return (
        <p className="search-status search-status--loading" role="status">
          <Loader2 size={14} className="animate-spin" /> Searching...
        </p>
      );
    case 'Failure':
      return (
        <div className="search-status search-status--failure" role="alert">
          <AlertTriangle size={14} />
          <span>Search failed: {error?.message ?? 'Unknown error'}</span>
          {records.length > 0 && <span className="search-status__stale">Showing results from the previous search.</span>}
        </div>
      );
    case 'Success':
      return (
        <p className="search-status">
          Showing {visibleCount} of {totalCount} repositories
          {lastPage !== null && <span className="search-status__pages"> (page 1 of {lastPage})</span>}
        </p>
      );
  }
};
