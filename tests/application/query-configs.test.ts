import { describe, it, expect } from 'vitest';
import {
  countConfigs,
  getCase,
  listCaseConfigs,
  listConfigs,
} from '../../src/application/query-configs.js';
import { InMemoryCaseConfigRepository } from '../../src/infrastructure/memory/index.js';
import { NotFoundError } from '../../src/domain/index.js';
import { MISSING_CASE_ID, OPEN_CASE_ID, makeAttached, makeCase, makeConfig } from '../helpers.js';

const configs = Array.from({ length: 25 }, (_, i) => makeConfig(i + 1));

function setup() {
  return new InMemoryCaseConfigRepository({
    configs,
    cases: [makeCase(OPEN_CASE_ID)],
    caseConfigs: [makeAttached(2, OPEN_CASE_ID), makeAttached(1, OPEN_CASE_ID)],
  });
}

describe('listConfigs', () => {
  it('defaults to the first page of 10, oldest first', async () => {
    const page = await listConfigs(setup(), {});

    expect(page.pagination).toEqual({ limit: 10, offset: 0, count: 10, total: 25 });
    expect(page.data[0]?.label).toBe('Config 1');
    expect(page.data[9]?.label).toBe('Config 10');
  });

  it('returns the partial last page', async () => {
    const page = await listConfigs(setup(), { limit: 10, offset: 20 });

    expect(page.data.map((c) => c.label)).toEqual(['Config 21', 'Config 22', 'Config 23', 'Config 24', 'Config 25']);
    expect(page.pagination.count).toBe(5);
  });

  it('sorts newest first when asked', async () => {
    const page = await listConfigs(setup(), { limit: 2, sort: 'desc' });
    expect(page.data.map((c) => c.label)).toEqual(['Config 25', 'Config 24']);
  });

  it('clamps limit and offset', async () => {
    const big = await listConfigs(setup(), { limit: 1000, offset: -5 });
    expect(big.pagination).toMatchObject({ limit: 100, offset: 0, count: 25 });

    const small = await listConfigs(setup(), { limit: 0 });
    expect(small.pagination.limit).toBe(1);
  });
});

describe('countConfigs', () => {
  it('counts the whole catalog', async () => {
    expect(await countConfigs(setup())).toBe(25);
  });
});

describe('getCase', () => {
  it('returns the case', async () => {
    expect((await getCase(setup(), OPEN_CASE_ID)).status).toBe('Open');
  });

  it('throws NotFoundError for an unknown case', async () => {
    await expect(getCase(setup(), MISSING_CASE_ID)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('listCaseConfigs', () => {
  it('orders attached rows by created_at', async () => {
    const repo = setup();
    expect((await listCaseConfigs(repo, OPEN_CASE_ID)).map((r) => r.label)).toEqual(['Config 1', 'Config 2']);
    expect((await listCaseConfigs(repo, OPEN_CASE_ID, 'desc')).map((r) => r.label)).toEqual(['Config 2', 'Config 1']);
  });

  it('is empty for an unknown case', async () => {
    expect(await listCaseConfigs(setup(), MISSING_CASE_ID)).toEqual([]);
  });
});
