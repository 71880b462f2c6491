import type { Sql } from './client.js';

/**
 * Lightweight migration via raw SQL, mirroring `schema.ts`.
 * drizzle-kit generates the same DDL for production migrations.
 */
const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS configs (
    config_id    UUID PRIMARY KEY,
    label        VARCHAR(255)     NOT NULL,
    type         VARCHAR(255)     NOT NULL,
    amount       DOUBLE PRECISION NOT NULL,
    created_at   TIMESTAMPTZ      NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS cases (
    case_id      UUID PRIMARY KEY,
    subject      VARCHAR(255) NOT NULL DEFAULT '',
    status       VARCHAR(20)  NOT NULL DEFAULT 'Open',
    created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS case_configs (
    case_config_id UUID PRIMARY KEY,
    case_id        UUID             NOT NULL,
    label          VARCHAR(255)     NOT NULL,
    type           VARCHAR(255)     NOT NULL,
    amount         DOUBLE PRECISION NOT NULL,
    created_at     TIMESTAMPTZ      NOT NULL DEFAULT NOW()
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_configs_label ON configs (label)`,
  `CREATE INDEX IF NOT EXISTS idx_configs_created_at ON configs (created_at)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_case_configs_case_label ON case_configs (case_id, label)`,
  `CREATE INDEX IF NOT EXISTS idx_case_configs_case_id ON case_configs (case_id)`,
];

export async function ensureSchema(sql: Sql): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
