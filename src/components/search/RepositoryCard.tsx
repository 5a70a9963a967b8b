import React from 'react';
import { format } from 'date-fns';
import { ExternalLink, Star } from 'lucide-react';
import type { ResultRecord } from '@/types/search';

export interface RepositoryCardProps {
  record: ResultRecord;
}

export const RepositoryCard: React.FC<RepositoryCardProps> = ({ record }) => {
  const updated = new Date(record.lastUpdated * 1000);

  return (
    <li className="repository-card">
      <div className="repository-card__header">
        <a href={record.url} title={record.fullName} target="_blank" rel="noopener noreferrer">
          {record.name}
        </a>
        <ExternalLink size={12} />
      </div>

      <div className="repository-card__owner">
        <img src={record.owner.avatarUrl} alt={`${record.owner.name} avatar`} width={20} height={20} />
        <span>{record.owner.name}</span>
      </div>

      <p className="repository-card__description">{record.description ?? 'No description'}</p>

      <RepositoryMeta record={record} updated={updated} />
    </li>
  );
};

const RepositoryMeta: React.FC<{ record: ResultRecord; updated: Date }> = ({ record, updated }) => (
  <div className="repository-card__meta">
    <span className="repository-card__language">{record.language}</span>
    <span className="repository-card__stars">
      <Star size={12} /> {record.stars}
    </span>
    {record.score !== null && <span className="repository-card__score">Score {record.score.toFixed(2)}</span>}
    <time dateTime={updated.toISOString()}>Updated {format(updated, 'MMM d, yyyy')}</time>
  </div>
);
