import React from 'react';
import { ArrowUpDown } from 'lucide-react';
import { useAppDispatch, useAppSelector } from '@/hooks/redux';
import { setSortCriterion } from '@/store/slices/searchSlice';
import { parseSortCriterion, SORT_OPTIONS, sortOptionFor } from '@/utils/sortResults';

export const SortSelector: React.FC = () => {
  const dispatch = useAppDispatch();
  const sortBy = useAppSelector((state) => state.search.sortBy);

  return (
    <div className="sort-selector">
      <ArrowUpDown size={14} />
      <label htmlFor="sort-by">Sort by</label>
      <select
        id="sort-by"
        value={sortOptionFor(sortBy)}
        onChange={(e) => dispatch(setSortCriterion(parseSortCriterion(e.target.value)))}
      >
        {SORT_OPTIONS.map((option) => (
          <option key={option.value} value={option.value}>
            {option.label}
          </option>
        ))}
      </select>
    </div>
  );
};
