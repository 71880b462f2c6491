import { Redis } from 'ioredis';
import { z } from 'zod';
import type { Log } from '../logging.js';
import { CONFIG_UPDATES_CHANNEL } from './case-config-notifier.js';
import type { ConfigUpdatePayload } from './case-config-notifier.js';

export type ConfigUpdateHandler = (payload: ConfigUpdatePayload) => void;

const payloadSchema = z.object({
  ts: z.string(),
  case_id: z.string().min(1),
  source: z.enum(['catalog-browser', 'attachment-list', 'remote']),
});

/**
 * Parses a raw channel message. Returns null for malformed input.
 */
export function parseConfigUpdate(message: string): ConfigUpdatePayload | null {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch {
    return null;
  }
  const parsed = payloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Subscribes to "config_updates" in the app process.
 *
 * ioredis requires a dedicated connection for subscriber mode.
 * Malformed payloads are logged and skipped.
 *
 * Returns a cleanup function for graceful shutdown.
 */
export async function startConfigUpdateSubscriber(
  redisUrl: string,
  log: Log,
  handler: ConfigUpdateHandler,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();

  sub.on('message', (channel: string, message: string) => {
    if (channel !== CONFIG_UPDATES_CHANNEL) return;

    const payload = parseConfigUpdate(message);
    if (!payload) {
      log.warn({ message }, 'Malformed config update payload, skipping');
      return;
    }

    log.debug({ case_id: payload.case_id, source: payload.source }, 'Config update received');
    handler(payload);
  });

  await sub.subscribe(CONFIG_UPDATES_CHANNEL);
  log.info({ channel: CONFIG_UPDATES_CHANNEL }, 'Subscribed to config updates');

  return async () => {
    try {
      await sub.unsubscribe(CONFIG_UPDATES_CHANNEL);
    } finally {
      await sub.quit();
      log.info({ channel: CONFIG_UPDATES_CHANNEL }, 'Config update subscriber disconnected');
    }
  };
}
