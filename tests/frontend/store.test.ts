/* ------------------------------------------------------------------ */
/*  Tests for the CatalogBrowser and AttachmentList reducers           */
/* ------------------------------------------------------------------ */

import { describe, it, expect, vi } from 'vitest';
import {
  attachmentReducer,
  catalogReducer,
  errorMessage,
  initialAttachmentState,
  initialCatalogState,
  isAddDisabled,
  isNextDisabled,
  isPrevDisabled,
  isSendDisabled,
  nextSortDirection,
  pageOffset,
  publishChange,
  shouldRefresh,
  sortByCreatedAt,
  totalPagesFor,
} from '../../src/frontend/store/index.js';
import type { CatalogState } from '../../src/frontend/store/index.js';
import type { CaseConfigRow, ConfigRow } from '../../src/frontend/api/types.js';
import { ApiError } from '../../src/frontend/api/client.js';
import { UpdateBroker } from '../../src/frontend/realtime/update-broker.js';

function config(n: number, created_at: string): ConfigRow {
  return { config_id: `c${n}`, label: `Config ${n}`, type: 'Hardware', amount: n, created_at };
}

function attached(n: number, created_at: string): CaseConfigRow {
  return { case_config_id: `cc${n}`, case_id: 'case-1', label: `Config ${n}`, type: 'Hardware', amount: n, created_at };
}

describe('sorting', () => {
  it('cycles unsorted → asc → desc → asc', () => {
    expect(nextSortDirection(null)).toBe('asc');
    expect(nextSortDirection('asc')).toBe('desc');
    expect(nextSortDirection('desc')).toBe('asc');
  });

  it('orders by created_at without mutating the input', () => {
    const rows = [config(1, '2026-01-02T00:00:00Z'), config(2, '2026-01-01T00:00:00Z')];
    expect(sortByCreatedAt(rows, 'asc').map((r) => r.config_id)).toEqual(['c2', 'c1']);
    expect(sortByCreatedAt(rows, 'desc').map((r) => r.config_id)).toEqual(['c1', 'c2']);
    expect(rows.map((r) => r.config_id)).toEqual(['c1', 'c2']);
  });
});

describe('catalogReducer', () => {
  it('computes total pages with a minimum of one', () => {
    expect(totalPagesFor(0)).toBe(1);
    expect(totalPagesFor(10)).toBe(1);
    expect(totalPagesFor(25)).toBe(3);
  });

  it('pages forward and back within bounds', () => {
    let state = catalogReducer(initialCatalogState, { type: 'SET_TOTAL', payload: 25 });
    expect(isPrevDisabled(state)).toBe(true);

    state = catalogReducer(state, { type: 'NEXT_PAGE' });
    state = catalogReducer(state, { type: 'NEXT_PAGE' });
    expect(state.currentPage).toBe(3);
    expect(pageOffset(state)).toBe(20);
    expect(isNextDisabled(state)).toBe(true);

    state = catalogReducer(state, { type: 'NEXT_PAGE' });
    expect(state.currentPage).toBe(3);

    state = catalogReducer(state, { type: 'PREV_PAGE' });
    expect(state.currentPage).toBe(2);
  });

  it('clears the selection on page change', () => {
    let state = catalogReducer(initialCatalogState, { type: 'SET_TOTAL', payload: 25 });
    state = catalogReducer(state, { type: 'TOGGLE_ROW', payload: 'c1' });
    state = catalogReducer(state, { type: 'NEXT_PAGE' });
    expect(state.selectedIds).toEqual([]);
  });

  it('toggles row selection', () => {
    let state = catalogReducer(initialCatalogState, { type: 'TOGGLE_ROW', payload: 'c1' });
    state = catalogReducer(state, { type: 'TOGGLE_ROW', payload: 'c2' });
    state = catalogReducer(state, { type: 'TOGGLE_ROW', payload: 'c1' });
    expect(state.selectedIds).toEqual(['c2']);
  });

  it('re-applies the current sort to a fetched page', () => {
    let state = catalogReducer(initialCatalogState, { type: 'TOGGLE_SORT' });
    state = catalogReducer(state, { type: 'TOGGLE_SORT' });
    state = catalogReducer(state, {
      type: 'SET_PAGE_DATA',
      payload: [config(1, '2026-01-01T00:00:00Z'), config(2, '2026-01-02T00:00:00Z')],
    });
    expect(state.sortDirection).toBe('desc');
    expect(state.configs.map((c) => c.config_id)).toEqual(['c2', 'c1']);
  });

  it('disables Add without a selection or for a closed case', () => {
    const open: CatalogState = { ...initialCatalogState, caseStatus: 'Open' };
    expect(isAddDisabled(open)).toBe(true);

    const selected = catalogReducer(open, { type: 'TOGGLE_ROW', payload: 'c1' });
    expect(isAddDisabled(selected)).toBe(false);

    const closed = catalogReducer(selected, { type: 'SET_CASE_STATUS', payload: 'Closed' });
    expect(isAddDisabled(closed)).toBe(true);
  });
});

describe('attachmentReducer', () => {
  it('drops selected ids that are no longer present', () => {
    let state = attachmentReducer(initialAttachmentState, {
      type: 'SET_ROWS',
      payload: [attached(1, '2026-01-01T00:00:00Z'), attached(2, '2026-01-02T00:00:00Z')],
    });
    state = attachmentReducer(state, { type: 'TOGGLE_ROW', payload: 'cc1' });
    state = attachmentReducer(state, { type: 'TOGGLE_ROW', payload: 'cc2' });
    state = attachmentReducer(state, { type: 'SET_ROWS', payload: [attached(2, '2026-01-02T00:00:00Z')] });

    expect(state.selectedIds).toEqual(['cc2']);
  });

  it('sorts the attached rows when toggled', () => {
    let state = attachmentReducer(initialAttachmentState, {
      type: 'SET_ROWS',
      payload: [attached(2, '2026-01-02T00:00:00Z'), attached(1, '2026-01-01T00:00:00Z')],
    });
    state = attachmentReducer(state, { type: 'TOGGLE_SORT' });
    expect(state.caseConfigs.map((r) => r.case_config_id)).toEqual(['cc1', 'cc2']);
  });

  it('disables Send only for a closed case', () => {
    expect(isSendDisabled({ ...initialAttachmentState, caseStatus: 'Open' })).toBe(false);
    expect(isSendDisabled({ ...initialAttachmentState, caseStatus: 'Closed' })).toBe(true);
  });
});

describe('errorMessage', () => {
  it('prefers the error message', () => {
    expect(errorMessage(new ApiError(409, 'Case c1 is closed'))).toBe('Case c1 is closed');
    expect(errorMessage(new Error('boom'))).toBe('boom');
  });

  it('falls back to a generic message', () => {
    expect(errorMessage(undefined)).toBe('An error occurred');
    expect(errorMessage(new Error(''))).toBe('An error occurred');
  });
});

describe('shouldRefresh', () => {
  it('refreshes for the same case published by the other widget', () => {
    expect(shouldRefresh({ case_id: 'case-1', source: 'catalog-browser' }, 'case-1', 'attachment-list')).toBe(true);
    expect(shouldRefresh({ case_id: 'case-1', source: 'attachment-list' }, 'case-1', 'catalog-browser')).toBe(true);
  });

  it('ignores events for another case', () => {
    expect(shouldRefresh({ case_id: 'case-2', source: 'catalog-browser' }, 'case-1', 'attachment-list')).toBe(false);
    expect(shouldRefresh({ case_id: 'case-2', source: 'remote' }, 'case-1', 'catalog-browser')).toBe(false);
  });

  it("ignores the widget's own publications", () => {
    expect(shouldRefresh({ case_id: 'case-1', source: 'catalog-browser' }, 'case-1', 'catalog-browser')).toBe(false);
    expect(shouldRefresh({ case_id: 'case-1', source: 'attachment-list' }, 'case-1', 'attachment-list')).toBe(false);
  });

  it('refreshes for remote events on the same case', () => {
    expect(shouldRefresh({ case_id: 'case-1', source: 'remote' }, 'case-1', 'catalog-browser')).toBe(true);
    expect(shouldRefresh({ case_id: 'case-1', source: 'remote' }, 'case-1', 'attachment-list')).toBe(true);
  });
});

describe('publishChange', () => {
  it('delivers the event and reports no failure', () => {
    const broker = new UpdateBroker();
    const handler = vi.fn();
    broker.subscribe(handler);

    expect(publishChange(broker, { case_id: 'case-1', source: 'catalog-browser' })).toBeNull();
    expect(handler).toHaveBeenCalledWith({ case_id: 'case-1', source: 'catalog-browser' });
  });

  it('returns a subscriber failure instead of throwing', () => {
    const broker = new UpdateBroker();
    const boom = new Error('refresh failed');
    const after = vi.fn();
    broker.subscribe(() => {
      throw boom;
    });
    broker.subscribe(after);

    expect(publishChange(broker, { case_id: 'case-1', source: 'attachment-list' })).toBe(boom);
    expect(after).toHaveBeenCalledTimes(1);
  });
});
