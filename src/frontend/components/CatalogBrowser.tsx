/* ------------------------------------------------------------------ */
/*  CatalogBrowser: paginated catalog with multi-select "Add"          */
/* ------------------------------------------------------------------ */

import { useCallback, useEffect, useReducer } from 'react';
import { attachConfigs, fetchCase, fetchConfigCount, fetchConfigs } from '../api/client.js';
import {
  catalogReducer,
  errorMessage,
  initialCatalogState,
  isAddDisabled,
  isNextDisabled,
  isPrevDisabled,
  pageOffset,
  PAGE_SIZE,
  publishChange,
  shouldRefresh,
  useUpdateBroker,
} from '../store/index.js';
import { useToast } from './Toast.js';

export function CatalogBrowser({ caseId }: { caseId: string }) {
  const [state, dispatch] = useReducer(catalogReducer, initialCatalogState);
  const broker = useUpdateBroker();
  const toast = useToast();

  const loadCaseStatus = useCallback(async () => {
    try {
      const row = await fetchCase(caseId);
      dispatch({ type: 'SET_CASE_STATUS', payload: row.status });
    } catch (err: unknown) {
      toast('error', 'Error loading case', errorMessage(err));
    }
  }, [caseId, toast]);

  const loadCount = useCallback(async () => {
    try {
      dispatch({ type: 'SET_TOTAL', payload: await fetchConfigCount() });
    } catch (err: unknown) {
      toast('error', 'Error loading configs', errorMessage(err));
    }
  }, [toast]);

  const offset = pageOffset(state);
  const loadPage = useCallback(async () => {
    try {
      const page = await fetchConfigs({ limit: PAGE_SIZE, offset });
      dispatch({ type: 'SET_PAGE_DATA', payload: page.data });
    } catch (err: unknown) {
      toast('error', 'Error loading configs', errorMessage(err));
    }
  }, [offset, toast]);

  useEffect(() => {
    void loadCaseStatus();
    void loadCount();
  }, [loadCaseStatus, loadCount]);

  useEffect(() => {
    void loadPage();
  }, [loadPage]);

  // Submission elsewhere may have closed the case.
  useEffect(() => {
    const sub = broker.subscribe((event) => {
      if (!shouldRefresh(event, caseId, 'catalog-browser')) return;
      void loadCaseStatus();
    });
    return () => sub.release();
  }, [broker, caseId, loadCaseStatus]);

  async function handleAdd() {
    dispatch({ type: 'SET_BUSY', payload: true });
    try {
      const result = await attachConfigs(caseId, state.selectedIds);
      toast('info', 'Info', result.message);
      dispatch({ type: 'CLEAR_SELECTION' });
    } catch (err: unknown) {
      toast('error', 'Error adding configs', errorMessage(err));
      dispatch({ type: 'SET_BUSY', payload: false });
      return;
    }

    await Promise.all([loadCount(), loadPage()]);
    const failed = publishChange(broker, { case_id: caseId, source: 'catalog-browser' });
    if (failed) toast('error', 'Error refreshing case configs', errorMessage(failed));
    dispatch({ type: 'SET_BUSY', payload: false });
  }

  const arrow = state.sortDirection === 'asc' ? ' ▲' : state.sortDirection === 'desc' ? ' ▼' : '';

  return (
    <div className="panel">
      <h3>Available Configs</h3>
      {state.configs.length === 0 ? (
        <p className="muted">No configs</p>
      ) : (
        <table className="data-table">
          <thead>
            <tr>
              <th />
              <th>Label</th>
              <th>Type</th>
              <th>Amount</th>
              <th onClick={() => dispatch({ type: 'TOGGLE_SORT' })} style={{ cursor: 'pointer' }}>
                Created{arrow}
              </th>
            </tr>
          </thead>
          <tbody>
            {state.configs.map((row) => (
              <tr key={row.config_id}>
                <td>
                  <input
                    type="checkbox"
                    checked={state.selectedIds.includes(row.config_id)}
                    onChange={() => dispatch({ type: 'TOGGLE_ROW', payload: row.config_id })}
                  />
                </td>
                <td>{row.label}</td>
                <td>{row.type}</td>
                <td>{row.amount.toLocaleString()}</td>
                <td>{new Date(row.created_at).toLocaleString()}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
      <div className="pager">
        <button disabled={isPrevDisabled(state)} onClick={() => dispatch({ type: 'PREV_PAGE' })}>
          Previous
        </button>
        <span>Page {state.currentPage} of {state.totalPages}</span>
        <button disabled={isNextDisabled(state)} onClick={() => dispatch({ type: 'NEXT_PAGE' })}>
          Next
        </button>
        <button className="btn-apply" disabled={isAddDisabled(state)} onClick={() => void handleAdd()}>
          Add
        </button>
      </div>
    </div>
  );
}
