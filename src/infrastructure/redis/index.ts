export { createRedisClient } from './client.js';
export { publishConfigUpdate, CONFIG_UPDATES_CHANNEL } from './case-config-notifier.js';
export type { ConfigUpdatePayload } from './case-config-notifier.js';
export { startConfigUpdateSubscriber, parseConfigUpdate } from './case-config-subscriber.js';
export type { ConfigUpdateHandler } from './case-config-subscriber.js';
