import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';
import type { Log } from '../logging.js';

export interface DbClientOptions {
  /** Pool size; the migrate script needs only one connection. */
  maxConnections?: number;
  /** Receives server NOTICEs (e.g. "relation already exists, skipping"). */
  log?: Pick<Log, 'debug'>;
}

/** postgres.js pool plus the Drizzle instance bound to the CaseDesk schema. */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { log } = options;
  const sql = postgres(databaseUrl, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => log?.debug({ code: notice['code'] }, String(notice['message'] ?? 'Postgres notice')),
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];
