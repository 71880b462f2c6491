export { InMemoryCaseConfigRepository } from './in-memory-case-config-repo.js';
export type { InMemorySeed } from './in-memory-case-config-repo.js';
