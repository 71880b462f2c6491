import type { SortDirection } from '../api/types.js';

/** null (unsorted) → asc → desc → asc … */
export function nextSortDirection(current: SortDirection | null): SortDirection {
  return current === 'asc' ? 'desc' : 'asc';
}

/** Returns a copy of `rows` ordered by created_at. */
export function sortByCreatedAt<T extends { created_at: string }>(
  rows: readonly T[],
  direction: SortDirection,
): T[] {
  return [...rows].sort((a, b) => {
    const diff = Date.parse(a.created_at) - Date.parse(b.created_at);
    return direction === 'asc' ? diff : -diff;
  });
}
