/* ------------------------------------------------------------------ */
/*  API client: thin fetch wrapper for the CaseDesk REST endpoints     */
/*                                                                     */
/*  All fetch calls are centralized here. Components never call fetch  */
/*  directly.                                                          */
/* ------------------------------------------------------------------ */

import type {
  AttachResponse,
  CaseConfigRow,
  CaseRow,
  ConfigPage,
  SendResponse,
  SortDirection,
} from './types.js';

const BASE = '/api/v1';

/** Non-2xx response. `message` is the server's `error` text when it sent one. */
export class ApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
  }
}

async function readErrorMessage(res: Response): Promise<string> {
  try {
    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
  } catch {
    // body was not JSON; fall back to the status line
  }
  return `API ${res.status}: ${res.statusText}`;
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = init ? await fetch(`${BASE}${path}`, init) : await fetch(`${BASE}${path}`);
  if (!res.ok) {
    throw new ApiError(res.status, await readErrorMessage(res));
  }
  return res.json() as Promise<T>;
}

function post<T>(path: string, body: unknown): Promise<T> {
  return request<T>(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

/* ── Catalog ───────────────────────────────────────────────────── */

export interface FetchConfigsParams {
  limit?: number;
  offset?: number;
  sort?: SortDirection;
}

export function fetchConfigs(p: FetchConfigsParams = {}): Promise<ConfigPage> {
  const qs = new URLSearchParams();
  if (p.limit !== undefined) qs.set('limit', String(p.limit));
  if (p.offset !== undefined) qs.set('offset', String(p.offset));
  if (p.sort) qs.set('sort', p.sort);
  const q = qs.toString();
  return request<ConfigPage>(`/configs${q ? `?${q}` : ''}`);
}

export async function fetchConfigCount(): Promise<number> {
  const body = await request<{ total: number }>('/configs/count');
  return body.total;
}

/* ── Cases ─────────────────────────────────────────────────────── */

export function fetchCase(caseId: string): Promise<CaseRow> {
  return request<CaseRow>(`/cases/${encodeURIComponent(caseId)}`);
}

export async function fetchCaseConfigs(caseId: string): Promise<CaseConfigRow[]> {
  const body = await request<{ data: CaseConfigRow[] }>(`/cases/${encodeURIComponent(caseId)}/configs`);
  return body.data;
}

export function attachConfigs(caseId: string, configIds: readonly string[]): Promise<AttachResponse> {
  return post<AttachResponse>(`/cases/${encodeURIComponent(caseId)}/configs`, { config_ids: configIds });
}

export function sendCaseConfigs(caseConfigIds: readonly string[]): Promise<SendResponse> {
  return post<SendResponse>('/case-configs/send', { case_config_ids: caseConfigIds });
}
