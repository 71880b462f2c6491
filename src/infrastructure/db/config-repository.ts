import { asc, count, desc, inArray } from 'drizzle-orm';
import type { Database } from './client.js';
import { configs } from './schema.js';
import type { SortDirection } from '../../domain/index.js';

/** Row shape returned by catalog queries. */
export type ConfigRow = typeof configs.$inferSelect;

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Fetches one page of the catalog ordered by created_at, then label so
 * rows created in the same instant keep a stable order.
 */
export async function queryConfigs(
  db: Database,
  pagination: PaginationParams,
  direction: SortDirection,
): Promise<ConfigRow[]> {
  const order = direction === 'asc' ? asc : desc;
  return db
    .select()
    .from(configs)
    .orderBy(order(configs.created_at), asc(configs.label))
    .limit(pagination.limit)
    .offset(pagination.offset);
}

export async function countAllConfigs(db: Database): Promise<number> {
  const rows = await db.select({ count: count() }).from(configs);
  return Number(rows[0]?.count ?? 0);
}

export async function findConfigsByIds(db: Database, configIds: readonly string[]): Promise<ConfigRow[]> {
  if (configIds.length === 0) return [];
  return db.select().from(configs).where(inArray(configs.config_id, [...configIds]));
}
