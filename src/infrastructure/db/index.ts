export { configs, cases, caseConfigs } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql } from './client.js';
export { queryConfigs, countAllConfigs, findConfigsByIds } from './config-repository.js';
export type { ConfigRow } from './config-repository.js';
export { findCaseById, updateCaseStatus } from './case-repository.js';
export type { CaseRow } from './case-repository.js';
export {
  findCaseConfigs,
  findCaseConfigsByIds,
  findAttachedLabels,
  insertCaseConfigs,
} from './case-config-repository.js';
export type { CaseConfigRow, InsertCaseConfigInput } from './case-config-repository.js';
export { createDrizzleRepository, pgErrorCode } from './drizzle-repository.js';
export { ensureSchema } from './migrations.js';
export { parseSeedFile } from './seed.js';
export type { SeedFile } from './seed.js';
