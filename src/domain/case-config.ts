/**
 * Core domain types for cases and the configs attached to them.
 *
 * These types define the canonical shape of each record as it flows
 * through the system. They carry no framework dependencies.
 */

export type CaseStatus = 'Open' | 'Closed';

export const CASE_STATUSES: readonly CaseStatus[] = ['Open', 'Closed'];

/** A selectable catalog entry, managed outside this system. */
export interface CatalogEntry {
  readonly config_id: string;
  /** Unique within the catalog; the de-duplication key on attach. */
  readonly label: string;
  readonly type: string;
  readonly amount: number;
  readonly created_at: Date;
}

/**
 * Case-specific copy of a catalog entry.
 *
 * At most one row per (case_id, label).
 */
export interface AttachedEntry {
  readonly case_config_id: string;
  readonly case_id: string;
  readonly label: string;
  readonly type: string;
  readonly amount: number;
  readonly created_at: Date;
}

export interface CaseRecord {
  readonly case_id: string;
  readonly subject: string;
  readonly status: CaseStatus;
  readonly created_at: Date;
}

export type SortDirection = 'asc' | 'desc';

export function isClosed(record: Pick<CaseRecord, 'status'>): boolean {
  return record.status === 'Closed';
}
