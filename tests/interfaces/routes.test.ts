import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/app.js';
import { InMemoryCaseConfigRepository } from '../../src/infrastructure/memory/index.js';
import type { CaseConfigSender } from '../../src/application/ports.js';
import type { AttachmentChangedEvent } from '../../src/domain/index.js';
import { DataAccessError, ExternalServiceError } from '../../src/domain/index.js';
import {
  CLOSED_CASE_ID,
  MISSING_CASE_ID,
  OPEN_CASE_ID,
  caseConfigId,
  configId,
  makeAttached,
  makeCase,
  makeConfig,
} from '../helpers.js';

let app: FastifyInstance;
let repo: InMemoryCaseConfigRepository;
let sender: Mock<CaseConfigSender>;
let notify: Mock<(event: AttachmentChangedEvent) => Promise<void>>;

beforeEach(async () => {
  repo = new InMemoryCaseConfigRepository({
    configs: Array.from({ length: 12 }, (_, i) => makeConfig(i + 1)),
    cases: [makeCase(OPEN_CASE_ID), makeCase(CLOSED_CASE_ID, 'Closed')],
    caseConfigs: [makeAttached(1, OPEN_CASE_ID)],
  });
  sender = vi.fn<CaseConfigSender>().mockResolvedValue(undefined);
  notify = vi.fn<(event: AttachmentChangedEvent) => Promise<void>>().mockResolvedValue(undefined);
  app = await buildServer({ repository: repo, sender, notify });
});

afterEach(async () => {
  await app.close();
});

describe('GET /api/v1/health', () => {
  it('returns ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });
});

describe('GET /api/v1/configs', () => {
  it('returns the first page with pagination', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/configs?limit=10&offset=10' });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.pagination).toEqual({ limit: 10, offset: 10, count: 2, total: 12 });
    expect(body.data.map((c: { label: string }) => c.label)).toEqual(['Config 11', 'Config 12']);
  });

  it('rejects a bad sort value', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/configs?sort=sideways' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });

  it('counts the catalog', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/configs/count' });
    expect(res.json()).toEqual({ total: 12 });
  });
});

describe('GET /api/v1/cases/:case_id', () => {
  it('returns the case', async () => {
    const res = await app.inject({ method: 'GET', url: `/api/v1/cases/${OPEN_CASE_ID}` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ case_id: OPEN_CASE_ID, status: 'Open' });
  });

  it('returns 404 for an unknown case', async () => {
    const res = await app.inject({ method: 'GET', url: `/api/v1/cases/${MISSING_CASE_ID}` });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: `Case ${MISSING_CASE_ID} not found`, kind: 'not_found' });
  });

  it('returns 400 for a malformed id', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/cases/nope' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'case_id must be a valid UUID' });
  });

  it('lists attached configs', async () => {
    const res = await app.inject({ method: 'GET', url: `/api/v1/cases/${OPEN_CASE_ID}/configs` });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toHaveLength(1);
  });
});

describe('POST /api/v1/cases/:case_id/configs', () => {
  it('attaches configs, reports duplicates and notifies', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(1), configId(2)] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      totalAdded: 1,
      totalDuplicates: 1,
      message: 'Records added, duplicate records were not added: Config 1',
    });
    expect(notify).toHaveBeenCalledWith({ case_id: OPEN_CASE_ID, source: 'catalog-browser' });
  });

  it('does not notify when nothing was added', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(1)] },
    });

    expect(res.json().totalAdded).toBe(0);
    expect(notify).not.toHaveBeenCalled();
  });

  it('returns 409 for a closed case', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${CLOSED_CASE_ID}/configs`,
      payload: { config_ids: [configId(2)] },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: `Case ${CLOSED_CASE_ID} is closed`, kind: 'case_closed' });
  });

  it('returns 409 when the store reports a conflict', async () => {
    vi.spyOn(repo, 'insertCaseConfigs').mockRejectedValueOnce(
      new DataAccessError('insertCaseConfigs failed: duplicate key', { conflict: true }),
    );
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(3)] },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json().kind).toBe('data_access');
  });

  it('returns 500 for other store failures', async () => {
    vi.spyOn(repo, 'findAttachedLabels').mockRejectedValueOnce(new DataAccessError('findAttachedLabels failed: timeout'));
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(3)] },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'findAttachedLabels failed: timeout', kind: 'data_access' });
  });

  it('rejects non-UUID config ids', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: ['abc'] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });
});

describe('POST /api/v1/case-configs/send', () => {
  it('sends, closes the case and notifies', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/case-configs/send',
      payload: { case_config_ids: [caseConfigId(1)] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'sent', case_id: OPEN_CASE_ID, entries_sent: 1 });
    expect((await repo.findCaseById(OPEN_CASE_ID))?.status).toBe('Closed');
    expect(notify).toHaveBeenCalledWith({ case_id: OPEN_CASE_ID, source: 'attachment-list' });
  });

  it('returns 400 for an empty selection', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/case-configs/send',
      payload: { case_config_ids: [] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Select at least one record to send.', kind: 'selection' });
  });

  it('returns 502 and keeps the case open when the endpoint fails', async () => {
    sender.mockRejectedValueOnce(new ExternalServiceError('Case config endpoint responded 500 Internal Server Error', 500));
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/case-configs/send',
      payload: { case_config_ids: [caseConfigId(1)] },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      error: 'Case config endpoint responded 500 Internal Server Error',
      kind: 'external_service',
    });
    expect((await repo.findCaseById(OPEN_CASE_ID))?.status).toBe('Open');
    expect(notify).not.toHaveBeenCalled();
  });

  it('returns 500 without details for unexpected errors', async () => {
    sender.mockRejectedValueOnce(new Error('unexpected'));
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/case-configs/send',
      payload: { case_config_ids: [caseConfigId(1)] },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'Internal server error' });
  });
});

describe('config update notifications', () => {
  it('answers the attach even when the notification never settles', async () => {
    notify.mockReturnValue(new Promise<void>(() => {}));
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(2)] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().totalAdded).toBe(1);
    expect(notify).toHaveBeenCalledTimes(1);
  });

  it('answers the send even when the notification never settles', async () => {
    notify.mockReturnValue(new Promise<void>(() => {}));
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/case-configs/send',
      payload: { case_config_ids: [caseConfigId(1)] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'sent', case_id: OPEN_CASE_ID, entries_sent: 1 });
  });

  it('does not fail the request when the notification rejects', async () => {
    notify.mockRejectedValue(new Error('redis down'));
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/cases/${OPEN_CASE_ID}/configs`,
      payload: { config_ids: [configId(2)] },
    });

    expect(res.statusCode).toBe(200);
  });
});
