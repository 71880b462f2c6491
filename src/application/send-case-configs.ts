import {
  CaseClosedError,
  NotFoundError,
  SelectionError,
  isClosed,
} from '../domain/index.js';
import type { AttachedEntry } from '../domain/index.js';
import type { CaseConfigPayload, CaseConfigRepository, CaseConfigSender } from './ports.js';

export interface SendResult {
  case_id: string;
  entries_sent: number;
}

export function buildCaseConfigPayload(
  caseId: string,
  entries: readonly AttachedEntry[],
): CaseConfigPayload {
  return {
    caseId,
    status: 'Closed',
    entries: entries.map((e) => ({ label: e.label, type: e.type, amount: e.amount })),
  };
}

/**
 * Use case: send attached configs to the external system and close the case.
 *
 * The case id is taken from the first resolved entry. The case status is
 * only changed after the sender resolves; any sender failure propagates
 * and leaves the case Open. No retry.
 */
export async function sendCaseConfigs(
  repo: CaseConfigRepository,
  send: CaseConfigSender,
  caseConfigIds: readonly string[],
): Promise<SendResult> {
  if (caseConfigIds.length === 0) throw new SelectionError();

  const found = await repo.findCaseConfigsByIds([...new Set(caseConfigIds)]);
  const byId = new Map(found.map((row) => [row.case_config_id, row]));
  const entries: AttachedEntry[] = [];
  for (const id of caseConfigIds) {
    const row = byId.get(id);
    if (row) entries.push(row);
  }

  const first = entries[0];
  if (!first) throw new NotFoundError('None of the selected case configs exist');

  const caseId = first.case_id;
  const record = await repo.findCaseById(caseId);
  if (!record) throw new NotFoundError(`Case ${caseId} not found`);
  if (isClosed(record)) throw new CaseClosedError(caseId);

  await send(buildCaseConfigPayload(caseId, entries));

  const updated = await repo.updateCaseStatus(caseId, 'Closed');
  if (!updated) throw new NotFoundError(`Case ${caseId} not found`);

  return { case_id: caseId, entries_sent: entries.length };
}
