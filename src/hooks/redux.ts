import { TypedUseSelectorHook, useDispatch, useSelector } from 'react-redux';
import type { RootState, AppDispatch } from '@/store';

/**
 * Typed dispatch hook for the search store.
 * Use this instead of plain `useDispatch` so thunks type-check.
 */
export const useAppDispatch = () => useDispatch<AppDispatch>();

/**
 * Typed selector hook for the search store.
 */
export const useAppSelector: TypedUseSelectorHook<RootState> = useSelector;
