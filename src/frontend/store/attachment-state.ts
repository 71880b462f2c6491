/* ------------------------------------------------------------------ */
/*  AttachmentList state: attached rows, selection, sort, case gate    */
/* ------------------------------------------------------------------ */

import type { CaseConfigRow, CaseStatus, SortDirection } from '../api/types.js';
import { nextSortDirection, sortByCreatedAt } from './sorting.js';

export interface AttachmentState {
  caseConfigs: CaseConfigRow[];
  selectedIds: string[];
  caseStatus: CaseStatus | null;
  sortDirection: SortDirection | null;
  busy: boolean;
}

export type AttachmentAction =
  | { type: 'SET_ROWS'; payload: CaseConfigRow[] }
  | { type: 'SET_CASE_STATUS'; payload: CaseStatus }
  | { type: 'TOGGLE_ROW'; payload: string }
  | { type: 'CLEAR_SELECTION' }
  | { type: 'TOGGLE_SORT' }
  | { type: 'SET_BUSY'; payload: boolean };

export const initialAttachmentState: AttachmentState = {
  caseConfigs: [],
  selectedIds: [],
  caseStatus: null,
  sortDirection: null,
  busy: false,
};

export function attachmentReducer(state: AttachmentState, action: AttachmentAction): AttachmentState {
  switch (action.type) {
    case 'SET_ROWS': {
      const ids = new Set(action.payload.map((row) => row.case_config_id));
      return {
        ...state,
        caseConfigs: state.sortDirection ? sortByCreatedAt(action.payload, state.sortDirection) : action.payload,
        selectedIds: state.selectedIds.filter((id) => ids.has(id)),
      };
    }
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
    case 'TOGGLE_SORT': {
      const sortDirection = nextSortDirection(state.sortDirection);
      return { ...state, sortDirection, caseConfigs: sortByCreatedAt(state.caseConfigs, sortDirection) };
    }
    case 'SET_BUSY':
      return { ...state, busy: action.payload };
    default:
      return state;
  }
}

/** Closed cases are read-only. An empty selection is left to the server to reject. */
export function isSendDisabled(state: AttachmentState): boolean {
  return state.busy || state.caseStatus === 'Closed';
}
