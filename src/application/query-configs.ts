import { NotFoundError } from '../domain/index.js';
import type { AttachedEntry, CaseRecord, CatalogEntry, SortDirection } from '../domain/index.js';
import type { CaseConfigRepository } from './ports.js';

export const DEFAULT_PAGE_SIZE = 10;
const MAX_LIMIT = 100;

export interface ListConfigsParams {
  limit?: number;
  offset?: number;
  sort?: SortDirection;
}

export interface ConfigPage {
  data: CatalogEntry[];
  pagination: { limit: number; offset: number; count: number; total: number };
}

/**
 * Use case: one page of the catalog, ordered by created_at.
 * Clamps limit to [1, 100], defaults to 10.
 */
export async function listConfigs(
  repo: CaseConfigRepository,
  params: ListConfigsParams,
): Promise<ConfigPage> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const [data, total] = await Promise.all([
    repo.listConfigs({ limit, offset }, params.sort ?? 'asc'),
    repo.countConfigs(),
  ]);

  return {
    data,
    pagination: { limit, offset, count: data.length, total },
  };
}

export async function countConfigs(repo: CaseConfigRepository): Promise<number> {
  return repo.countConfigs();
}

/** Throws NotFoundError when the case does not exist. */
export async function getCase(repo: CaseConfigRepository, caseId: string): Promise<CaseRecord> {
  const record = await repo.findCaseById(caseId);
  if (!record) throw new NotFoundError(`Case ${caseId} not found`);
  return record;
}

/** Attached entries of a case; empty for an unknown case. */
export async function listCaseConfigs(
  repo: CaseConfigRepository,
  caseId: string,
  sort: SortDirection = 'asc',
): Promise<AttachedEntry[]> {
  return repo.findCaseConfigs(caseId, sort);
}
