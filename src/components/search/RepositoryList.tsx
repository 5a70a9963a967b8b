import React from 'react';
import { useAppSelector } from '@/hooks/redux';
import { selectVisibleResults } from '@/store/slices/searchSlice';
import { RepositoryCard } from './RepositoryCard';

export const RepositoryList: React.FC = () => {
  const results = useAppSelector(selectVisibleResults);
  const hasRecords = useAppSelector((state) => state.search.records.length > 0);
  const transaction = useAppSelector((state) => state.search.transaction);

  if (results.length === 0) {
    if (transaction !== 'Success') return null;
    return (
      <p className="repository-list__empty">
        {hasRecords ? 'No repositories match the selected languages.' : 'No repositories found.'}
      </p>
    );
  }

  return (
    <ul className="repository-list" aria-label="Repositories">
      {results.map((record) => (
        <RepositoryCard key={record.id} record={record} />
      ))}
    </ul>
  );
};
