import React from 'react';
import { clsx } from 'clsx';
import { Filter } from 'lucide-react';
import { LANGUAGE_CATEGORY } from '@/config';
import { useAppDispatch, useAppSelector } from '@/hooks/redux';
import { selectLanguageFacets, toggleFacet } from '@/store/slices/searchSlice';

export const LanguageFacetList: React.FC = () => {
  const dispatch = useAppDispatch();
  const facets = useAppSelector(selectLanguageFacets);

  if (facets.length === 0) return null;

  return (
    <fieldset className="facet-list">
      <legend className="facet-list__legend">
        <Filter size={14} />
        <span>Language</span>
      </legend>
      {facets.map((facet) => (
        <label key={facet.value} className={clsx('facet-option', { 'facet-option--active': facet.selected })}>
          <input
            type="checkbox"
            checked={facet.selected}
            onChange={(e) =>
              dispatch(toggleFacet({ category: LANGUAGE_CATEGORY, value: facet.value, selected: e.target.checked }))
            }
          />
          <span>{facet.value}</span>{' '}
          <span className="facet-option__count">({facet.count})</span>
        </label>
      ))}
    </fieldset>
  );
};
