import { eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { cases } from './schema.js';
import type { CaseStatus } from '../../domain/index.js';

export type CaseRow = typeof cases.$inferSelect;

export async function findCaseById(db: Database, caseId: string): Promise<CaseRow | undefined> {
  const rows = await db.select().from(cases).where(eq(cases.case_id, caseId)).limit(1);
  return rows[0];
}

/** Returns true if a case row was updated. */
export async function updateCaseStatus(
  db: Database,
  caseId: string,
  status: CaseStatus,
): Promise<boolean> {
  const rows = await db
    .update(cases)
    .set({ status })
    .where(eq(cases.case_id, caseId))
    .returning({ case_id: cases.case_id });
  return rows.length > 0;
}
