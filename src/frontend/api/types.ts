/* ------------------------------------------------------------------ */
/*  Shared API response types mirroring backend contracts              */
/* ------------------------------------------------------------------ */

export type CaseStatus = 'Open' | 'Closed';
export type SortDirection = 'asc' | 'desc';

/** Catalog row from GET /api/v1/configs */
export interface ConfigRow {
  config_id: string;
  label: string;
  type: string;
  amount: number;
  created_at: string;
}

/** Attached row from GET /api/v1/cases/:case_id/configs */
export interface CaseConfigRow {
  case_config_id: string;
  case_id: string;
  label: string;
  type: string;
  amount: number;
  created_at: string;
}

/** GET /api/v1/cases/:case_id */
export interface CaseRow {
  case_id: string;
  subject: string;
  status: CaseStatus;
  created_at: string;
}

export interface ConfigPage {
  data: ConfigRow[];
  pagination: { limit: number; offset: number; count: number; total: number };
}

/** POST /api/v1/cases/:case_id/configs */
export interface AttachResponse {
  totalAdded: number;
  totalDuplicates: number;
  message: string;
}

/** POST /api/v1/case-configs/send */
export interface SendResponse {
  status: 'sent';
  case_id: string;
  entries_sent: number;
}
