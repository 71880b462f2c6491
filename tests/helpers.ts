import { vi } from 'vitest';
import type { AttachedEntry, CaseRecord, CatalogEntry } from '../src/domain/index.js';
import type { Log } from '../src/infrastructure/logging.js';

export const OPEN_CASE_ID = '11111111-1111-4111-8111-111111111111';
export const CLOSED_CASE_ID = '22222222-2222-4222-8222-222222222222';
export const MISSING_CASE_ID = '99999999-9999-4999-8999-999999999999';

/** Config ids c1..cN with zero-padded suffixes so they are valid UUIDs. */
export function configId(n: number): string {
  return `aaaaaaaa-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

export function caseConfigId(n: number): string {
  return `bbbbbbbb-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

export function makeConfig(n: number, overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    config_id: configId(n),
    label: `Config ${n}`,
    type: 'Hardware',
    amount: n * 10,
    created_at: new Date(Date.UTC(2026, 0, n)),
    ...overrides,
  };
}

export function makeCase(caseId: string, status: CaseRecord['status'] = 'Open'): CaseRecord {
  return { case_id: caseId, subject: 'Test case', status, created_at: new Date('2026-01-01T00:00:00Z') };
}

export function makeAttached(
  n: number,
  caseId: string,
  overrides: Partial<AttachedEntry> = {},
): AttachedEntry {
  return {
    case_config_id: caseConfigId(n),
    case_id: caseId,
    label: `Config ${n}`,
    type: 'Hardware',
    amount: n * 10,
    created_at: new Date(Date.UTC(2026, 1, n)),
    ...overrides,
  };
}

export function makeLog() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Log;
}

/** A masked (client to server) WebSocket frame with a short payload. */
export function maskedFrame(opcode: number, payload: Buffer, mask = [0x11, 0x22, 0x33, 0x44]): Buffer {
  const masked = Buffer.from(payload.map((b, i) => b ^ (mask[i % 4] ?? 0)));
  return Buffer.concat([Buffer.from([0x80 | opcode, 0x80 | payload.length]), Buffer.from(mask), masked]);
}
