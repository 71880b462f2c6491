import type { Redis } from 'ioredis';
import type { AttachmentChangedEvent } from '../../domain/index.js';
import type { Log } from '../logging.js';

export const CONFIG_UPDATES_CHANNEL = 'config_updates';

export interface ConfigUpdatePayload {
  ts: string;
  case_id: string;
  source: AttachmentChangedEvent['source'];
}

/**
 * Publishes an attachment change to the "config_updates" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated, so an
 * attach or send response is never affected by Pub/Sub issues.
 */
export async function publishConfigUpdate(
  redis: Pick<Redis, 'publish'>,
  log: Log,
  event: AttachmentChangedEvent,
): Promise<void> {
  const payload: ConfigUpdatePayload = {
    ts: new Date().toISOString(),
    case_id: event.case_id,
    source: event.source,
  };
  try {
    await redis.publish(CONFIG_UPDATES_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: CONFIG_UPDATES_CHANNEL, case_id: event.case_id }, 'Published config update');
  } catch (err: unknown) {
    log.error({ err, case_id: event.case_id }, 'Failed to publish config update');
  }
}
