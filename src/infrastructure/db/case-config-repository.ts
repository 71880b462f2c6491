import { randomUUID } from 'node:crypto';
import { asc, desc, eq, inArray } from 'drizzle-orm';
import type { Database } from './client.js';
import { caseConfigs } from './schema.js';
import type { SortDirection } from '../../domain/index.js';

/** Row shape returned by case config queries. */
export type CaseConfigRow = typeof caseConfigs.$inferSelect;

export interface InsertCaseConfigInput {
  case_id: string;
  label: string;
  type: string;
  amount: number;
}

export async function findCaseConfigs(
  db: Database,
  caseId: string,
  direction: SortDirection,
): Promise<CaseConfigRow[]> {
  const order = direction === 'asc' ? asc : desc;
  return db
    .select()
    .from(caseConfigs)
    .where(eq(caseConfigs.case_id, caseId))
    .orderBy(order(caseConfigs.created_at), asc(caseConfigs.label));
}

export async function findCaseConfigsByIds(
  db: Database,
  caseConfigIds: readonly string[],
): Promise<CaseConfigRow[]> {
  if (caseConfigIds.length === 0) return [];
  return db
    .select()
    .from(caseConfigs)
    .where(inArray(caseConfigs.case_config_id, [...caseConfigIds]));
}

export async function findAttachedLabels(db: Database, caseId: string): Promise<string[]> {
  const rows = await db
    .select({ label: caseConfigs.label })
    .from(caseConfigs)
    .where(eq(caseConfigs.case_id, caseId));
  return rows.map((r) => r.label);
}

/**
 * Inserts all rows in one multi-row INSERT, which Postgres applies
 * atomically. A unique violation on (case_id, label) rejects the batch.
 */
export async function insertCaseConfigs(
  db: Database,
  rows: readonly InsertCaseConfigInput[],
): Promise<CaseConfigRow[]> {
  if (rows.length === 0) return [];
  const now = new Date();
  return db
    .insert(caseConfigs)
    .values(rows.map((row) => ({
      case_config_id: randomUUID(),
      case_id: row.case_id,
      label: row.label,
      type: row.type,
      amount: row.amount,
      created_at: now,
    })))
    .returning();
}
