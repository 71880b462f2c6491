/* ------------------------------------------------------------------ */
/*  AttachmentList: configs attached to the case, with "Send"          */
/* ------------------------------------------------------------------ */

import { useCallback, useEffect, useReducer } from 'react';
import { fetchCase, fetchCaseConfigs, sendCaseConfigs } from '../api/client.js';
import {
  attachmentReducer,
  errorMessage,
  initialAttachmentState,
  isSendDisabled,
  publishChange,
  shouldRefresh,
  useUpdateBroker,
} from '../store/index.js';
import { useToast } from './Toast.js';

export function AttachmentList({ caseId }: { caseId: string }) {
  const [state, dispatch] = useReducer(attachmentReducer, initialAttachmentState);
  const broker = useUpdateBroker();
  const toast = useToast();

  const loadRows = useCallback(async () => {
    try {
      dispatch({ type: 'SET_ROWS', payload: await fetchCaseConfigs(caseId) });
    } catch (err: unknown) {
      toast('error', 'Error loading case configs', errorMessage(err));
    }
  }, [caseId, toast]);

  const loadCaseStatus = useCallback(async () => {
    try {
      const row = await fetchCase(caseId);
      dispatch({ type: 'SET_CASE_STATUS', payload: row.status });
    } catch (err: unknown) {
      toast('error', 'Error loading case', errorMessage(err));
    }
  }, [caseId, toast]);

  useEffect(() => {
    void loadRows();
    void loadCaseStatus();
  }, [loadRows, loadCaseStatus]);

  useEffect(() => {
    const sub = broker.subscribe((event) => {
      if (!shouldRefresh(event, caseId, 'attachment-list')) return;
      void loadRows();
      void loadCaseStatus();
    });
    return () => sub.release();
  }, [broker, caseId, loadRows, loadCaseStatus]);

  async function handleSend() {
    dispatch({ type: 'SET_BUSY', payload: true });
    try {
      await sendCaseConfigs(state.selectedIds);
      toast('success', 'Success', 'Case Configs sent.');
      dispatch({ type: 'CLEAR_SELECTION' });
    } catch (err: unknown) {
      toast('error', 'Error sending case configs', errorMessage(err));
      dispatch({ type: 'SET_BUSY', payload: false });
      return;
    }

    const failed = publishChange(broker, { case_id: caseId, source: 'attachment-list' });
    if (failed) toast('error', 'Error refreshing configs', errorMessage(failed));
    await Promise.all([loadRows(), loadCaseStatus()]);
    dispatch({ type: 'SET_BUSY', payload: false });
  }

  const arrow = state.sortDirection === 'asc' ? ' ▲' : state.sortDirection === 'desc' ? ' ▼' : '';

  return (
    <div className="panel">
      <h3>
        Case Configs
        {state.caseStatus && <span className={`badge badge-${state.caseStatus.toLowerCase()}`}>{state.caseStatus}</span>}
      </h3>
      {state.caseConfigs.length === 0 ? (
        <p className="muted">No configs attached</p>
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
            {state.caseConfigs.map((row) => (
              <tr key={row.case_config_id}>
                <td>
                  <input
                    type="checkbox"
                    checked={state.selectedIds.includes(row.case_config_id)}
                    onChange={() => dispatch({ type: 'TOGGLE_ROW', payload: row.case_config_id })}
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
        <button className="btn-apply" disabled={isSendDisabled(state)} onClick={() => void handleSend()}>
          Send
        </button>
      </div>
    </div>
  );
}
