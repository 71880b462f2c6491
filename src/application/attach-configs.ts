import { CaseClosedError, NotFoundError, isClosed } from '../domain/index.js';
import type { CatalogEntry } from '../domain/index.js';
import type { CaseConfigRepository, NewAttachedEntry } from './ports.js';

export const ALL_ADDED_MESSAGE = 'All records added successfully.';
export const NONE_ADDED_MESSAGE =
  'No records were added. All selected configs are already added to the Case.';
const PARTIAL_PREFIX = 'Records added, duplicate records were not added: ';

export interface AttachResult {
  totalAdded: number;
  totalDuplicates: number;
  message: string;
}

export interface AttachPlan {
  toInsert: CatalogEntry[];
  duplicates: CatalogEntry[];
}

/**
 * Splits the requested entries into new and duplicate by label.
 *
 * A label seen earlier in the same request counts as already attached,
 * so only its first occurrence is planned for insert.
 */
export function planAttachment(
  requested: readonly CatalogEntry[],
  attachedLabels: Iterable<string>,
): AttachPlan {
  const taken = new Set(attachedLabels);
  const toInsert: CatalogEntry[] = [];
  const duplicates: CatalogEntry[] = [];

  for (const entry of requested) {
    if (taken.has(entry.label)) {
      duplicates.push(entry);
    } else {
      taken.add(entry.label);
      toInsert.push(entry);
    }
  }

  return { toInsert, duplicates };
}

export function summarizeAttachment(added: number, duplicateLabels: readonly string[]): string {
  if (added > 0 && duplicateLabels.length > 0) {
    return PARTIAL_PREFIX + [...new Set(duplicateLabels)].join(', ');
  }
  if (added > 0) return ALL_ADDED_MESSAGE;
  return NONE_ADDED_MESSAGE;
}

/**
 * Use case: attach catalog entries to a case without duplicating labels.
 *
 * Ids that match no catalog entry are ignored. The insert is a single
 * batch; if it fails nothing from this call persists and the
 * `DataAccessError` propagates.
 *
 * Two sessions can both pass the label check before either insert
 * commits. The store's unique (case_id, label) index rejects the loser
 * as a conflicting `DataAccessError`.
 */
export async function attachConfigsToCase(
  repo: CaseConfigRepository,
  caseId: string,
  configIds: readonly string[],
): Promise<AttachResult> {
  const record = await repo.findCaseById(caseId);
  if (!record) throw new NotFoundError(`Case ${caseId} not found`);
  if (isClosed(record)) throw new CaseClosedError(caseId);

  if (configIds.length === 0) {
    return { totalAdded: 0, totalDuplicates: 0, message: NONE_ADDED_MESSAGE };
  }

  const [attachedLabels, found] = await Promise.all([
    repo.findAttachedLabels(caseId),
    repo.findConfigsByIds([...new Set(configIds)]),
  ]);

  const byId = new Map(found.map((entry) => [entry.config_id, entry]));
  const requested: CatalogEntry[] = [];
  for (const id of configIds) {
    const entry = byId.get(id);
    if (entry) requested.push(entry);
  }

  const { toInsert, duplicates } = planAttachment(requested, attachedLabels);

  if (toInsert.length > 0) {
    const rows: NewAttachedEntry[] = toInsert.map((entry) => ({
      case_id: caseId,
      label: entry.label,
      type: entry.type,
      amount: entry.amount,
    }));
    await repo.insertCaseConfigs(rows);
  }

  return {
    totalAdded: toInsert.length,
    totalDuplicates: duplicates.length,
    message: summarizeAttachment(toInsert.length, duplicates.map((d) => d.label)),
  };
}
