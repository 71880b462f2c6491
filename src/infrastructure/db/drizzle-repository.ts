import { DataAccessError } from '../../domain/index.js';
import type { CaseConfigRepository } from '../../application/ports.js';
import type { Database } from './client.js';
import { queryConfigs, countAllConfigs, findConfigsByIds } from './config-repository.js';
import { findCaseById, updateCaseStatus } from './case-repository.js';
import {
  findCaseConfigs,
  findCaseConfigsByIds,
  findAttachedLabels,
  insertCaseConfigs,
} from './case-config-repository.js';

const UNIQUE_VIOLATION = '23505';

/**
 * Postgres SQLSTATE of a driver error. Drizzle may wrap the postgres.js
 * error, so the cause chain is walked a few levels.
 */
export function pgErrorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    const conflict = pgErrorCode(err) === UNIQUE_VIOLATION;
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataAccessError(`${operation} failed: ${reason}`, { cause: err, conflict });
  }
}

/** CaseConfigRepository over the Drizzle/postgres.js client. */
export function createDrizzleRepository(db: Database): CaseConfigRepository {
  return {
    listConfigs: (pagination, direction) =>
      guard('listConfigs', () => queryConfigs(db, pagination, direction)),
    countConfigs: () => guard('countConfigs', () => countAllConfigs(db)),
    findConfigsByIds: (ids) => guard('findConfigsByIds', () => findConfigsByIds(db, ids)),
    findCaseById: (caseId) => guard('findCaseById', () => findCaseById(db, caseId)),
    updateCaseStatus: (caseId, status) =>
      guard('updateCaseStatus', () => updateCaseStatus(db, caseId, status)),
    findCaseConfigs: (caseId, direction) =>
      guard('findCaseConfigs', () => findCaseConfigs(db, caseId, direction)),
    findCaseConfigsByIds: (ids) =>
      guard('findCaseConfigsByIds', () => findCaseConfigsByIds(db, ids)),
    findAttachedLabels: (caseId) => guard('findAttachedLabels', () => findAttachedLabels(db, caseId)),
    insertCaseConfigs: (rows) => guard('insertCaseConfigs', () => insertCaseConfigs(db, rows)),
  };
}
