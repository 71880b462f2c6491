import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { createDbClient, ensureSchema, parseSeedFile, configs, cases } from './infrastructure/db/index.js';
import { loadAppConfig } from './infrastructure/config.js';

/**
 * Standalone script: creates the tables and, when given `--seed`, loads
 * catalog entries and cases from data/seed.json (or the path after it).
 *
 *   npm run migrate
 *   npm run migrate -- --seed data/seed.json
 */

const config = loadAppConfig();
const log = pino({ level: config.logLevel });

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const seedIdx = args.indexOf('--seed');

  const { sql, db } = createDbClient(config.databaseUrl, { maxConnections: 1, log });
  try {
    await ensureSchema(sql);
    log.info('Database ready (configs + cases + case_configs tables)');

    if (seedIdx === -1) return;

    const seedPath = resolve(process.cwd(), args[seedIdx + 1] ?? 'data/seed.json');
    if (!existsSync(seedPath)) {
      throw new Error(`Seed file not found: ${seedPath}`);
    }
    const seed = parseSeedFile(readFileSync(seedPath, 'utf-8'));

    if (seed.configs.length > 0) {
      const inserted = await db
        .insert(configs)
        .values(seed.configs.map((c) => ({ config_id: randomUUID(), ...c })))
        .onConflictDoNothing({ target: configs.label })
        .returning({ config_id: configs.config_id });
      log.info({ requested: seed.configs.length, inserted: inserted.length }, 'Catalog seeded');
    }

    if (seed.cases.length > 0) {
      const inserted = await db
        .insert(cases)
        .values(seed.cases.map((c) => ({ ...c, case_id: c.case_id ?? randomUUID() })))
        .onConflictDoNothing({ target: cases.case_id })
        .returning({ case_id: cases.case_id });
      log.info({ caseIds: inserted.map((c) => c.case_id) }, 'Cases seeded');
    }
  } finally {
    await sql.end();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Migration failed');
  process.exit(1);
});
