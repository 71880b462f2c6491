import { describe, it, expect, vi } from 'vitest';
import {
  CONFIG_UPDATES_CHANNEL,
  parseConfigUpdate,
  publishConfigUpdate,
} from '../../src/infrastructure/redis/index.js';
import { OPEN_CASE_ID, makeLog } from '../helpers.js';

describe('publishConfigUpdate', () => {
  it('publishes the event on config_updates', async () => {
    const publish = vi.fn().mockResolvedValue(1);
    const log = makeLog();

    await publishConfigUpdate({ publish }, log, { case_id: OPEN_CASE_ID, source: 'catalog-browser' });

    expect(publish).toHaveBeenCalledTimes(1);
    const [channel, message] = publish.mock.calls[0] ?? [];
    expect(channel).toBe(CONFIG_UPDATES_CHANNEL);
    expect(parseConfigUpdate(String(message))).toMatchObject({
      case_id: OPEN_CASE_ID,
      source: 'catalog-browser',
    });
  });

  it('logs and swallows publish failures', async () => {
    const err = new Error('connection lost');
    const publish = vi.fn().mockRejectedValue(err);
    const log = makeLog();

    await expect(
      publishConfigUpdate({ publish }, log, { case_id: OPEN_CASE_ID, source: 'attachment-list' }),
    ).resolves.toBeUndefined();
    expect(log.error).toHaveBeenCalledWith({ err, case_id: OPEN_CASE_ID }, 'Failed to publish config update');
  });
});

describe('parseConfigUpdate', () => {
  it('parses a well-formed message', () => {
    const msg = JSON.stringify({ ts: '2026-03-01T00:00:00.000Z', case_id: OPEN_CASE_ID, source: 'remote' });
    expect(parseConfigUpdate(msg)).toEqual({
      ts: '2026-03-01T00:00:00.000Z',
      case_id: OPEN_CASE_ID,
      source: 'remote',
    });
  });

  it('returns null for malformed input', () => {
    expect(parseConfigUpdate('not json')).toBeNull();
    expect(parseConfigUpdate('{"case_id":"x"}')).toBeNull();
    expect(parseConfigUpdate(JSON.stringify({ ts: 't', case_id: 'x', source: 'elsewhere' }))).toBeNull();
  });
});
