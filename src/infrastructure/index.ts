export { createDbClient, createDrizzleRepository, ensureSchema } from './db/index.js';
export type { Database, Sql } from './db/index.js';
export { InMemoryCaseConfigRepository } from './memory/index.js';
export { createCaseConfigSender } from './http/index.js';
export {
  createRedisClient,
  publishConfigUpdate,
  startConfigUpdateSubscriber,
} from './redis/index.js';
export { loadAppConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export type { Log } from './logging.js';
