import type {
  AttachedEntry,
  CaseRecord,
  CaseStatus,
  CatalogEntry,
  SortDirection,
} from '../domain/index.js';

export interface PaginationParams {
  limit: number;
  offset: number;
}

/** Fields copied from a catalog entry when it is attached to a case. */
export interface NewAttachedEntry {
  case_id: string;
  label: string;
  type: string;
  amount: number;
}

/**
 * Record store collaborator.
 *
 * Implementations must wrap driver failures in `DataAccessError` and
 * make `insertCaseConfigs` all-or-nothing for the batch.
 */
export interface CaseConfigRepository {
  listConfigs(pagination: PaginationParams, direction: SortDirection): Promise<CatalogEntry[]>;
  countConfigs(): Promise<number>;
  findConfigsByIds(configIds: readonly string[]): Promise<CatalogEntry[]>;

  findCaseById(caseId: string): Promise<CaseRecord | undefined>;
  /** Returns false when no case matched. */
  updateCaseStatus(caseId: string, status: CaseStatus): Promise<boolean>;

  findCaseConfigs(caseId: string, direction: SortDirection): Promise<AttachedEntry[]>;
  findCaseConfigsByIds(caseConfigIds: readonly string[]): Promise<AttachedEntry[]>;
  findAttachedLabels(caseId: string): Promise<string[]>;
  insertCaseConfigs(rows: readonly NewAttachedEntry[]): Promise<AttachedEntry[]>;
}

/** Wire body POSTed to the external system on submit. */
export interface CaseConfigPayload {
  caseId: string;
  status: 'Closed';
  entries: Array<{
    label: string;
    type: string;
    amount: number;
  }>;
}

/**
 * Outbound HTTP collaborator. Resolves on a 200 response and throws
 * `ExternalServiceError` otherwise.
 */
export type CaseConfigSender = (payload: CaseConfigPayload) => Promise<void>;
