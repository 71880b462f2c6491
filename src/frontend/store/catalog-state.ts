/* ------------------------------------------------------------------ */
/*  CatalogBrowser state: pagination, selection, sort, case gate       */
/* ------------------------------------------------------------------ */

import type { CaseStatus, ConfigRow, SortDirection } from '../api/types.js';
import { nextSortDirection, sortByCreatedAt } from './sorting.js';

export const PAGE_SIZE = 10;

export interface CatalogState {
  configs: ConfigRow[];
  totalRecords: number;
  currentPage: number;
  totalPages: number;
  selectedIds: string[];
  caseStatus: CaseStatus | null;
  sortDirection: SortDirection | null;
  busy: boolean;
}

export type CatalogAction =
  | { type: 'SET_TOTAL'; payload: number }
  | { type: 'SET_PAGE_DATA'; payload: ConfigRow[] }
  | { type: 'SET_CASE_STATUS'; payload: CaseStatus }
  | { type: 'TOGGLE_ROW'; payload: string }
  | { type: 'CLEAR_SELECTION' }
  | { type: 'NEXT_PAGE' }
  | { type: 'PREV_PAGE' }
  | { type: 'TOGGLE_SORT' }
  | { type: 'SET_BUSY'; payload: boolean };

export const initialCatalogState: CatalogState = {
  configs: [],
  totalRecords: 0,
  currentPage: 1,
  totalPages: 1,
  selectedIds: [],
  caseStatus: null,
  sortDirection: null,
  busy: false,
};

export function totalPagesFor(totalRecords: number, pageSize: number = PAGE_SIZE): number {
  return Math.ceil(totalRecords / pageSize) || 1;
}

export function catalogReducer(state: CatalogState, action: CatalogAction): CatalogState {
  switch (action.type) {
    case 'SET_TOTAL': {
      const totalPages = totalPagesFor(action.payload);
      return {
        ...state,
        totalRecords: action.payload,
        totalPages,
        currentPage: Math.min(state.currentPage, totalPages),
      };
    }
    case 'SET_PAGE_DATA':
      return {
        ...state,
        configs: state.sortDirection ? sortByCreatedAt(action.payload, state.sortDirection) : action.payload,
      };
    case 'SET_CASE_STATUS':
      return { ...state, caseStatus: action.payload };
    case 'TOGGLE_ROW': {
      const selected = state.selectedIds.includes(action.payload)
        ? state.selectedIds.filter((id) => id !== action.payload)
        : [...state.selectedIds, action.payload];
      return { ...state, selectedIds: selected };
    }
    case 'CLEAR_SELECTION':
      return { ...state, selectedIds: [] };
    case 'NEXT_PAGE':
      if (state.currentPage >= state.totalPages) return state;
      return { ...state, currentPage: state.currentPage + 1, selectedIds: [] };
    case 'PREV_PAGE':
      if (state.currentPage <= 1) return state;
      return { ...state, currentPage: state.currentPage - 1, selectedIds: [] };
    case 'TOGGLE_SORT': {
      const sortDirection = nextSortDirection(state.sortDirection);
      return { ...state, sortDirection, configs: sortByCreatedAt(state.configs, sortDirection) };
    }
    case 'SET_BUSY':
      return { ...state, busy: action.payload };
    default:
      return state;
  }
}

/* ── Selectors ─────────────────────────────────────────────────── */

export function pageOffset(state: CatalogState, pageSize: number = PAGE_SIZE): number {
  return (state.currentPage - 1) * pageSize;
}

export function isPrevDisabled(state: CatalogState): boolean {
  return state.currentPage <= 1;
}

export function isNextDisabled(state: CatalogState): boolean {
  return state.currentPage >= state.totalPages;
}

/** Add needs a selection and an open case. */
export function isAddDisabled(state: CatalogState): boolean {
  return state.busy || state.selectedIds.length === 0 || state.caseStatus === 'Closed';
}
