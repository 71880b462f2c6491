import { randomUUID } from 'node:crypto';
import { DataAccessError } from '../../domain/index.js';
import type {
  AttachedEntry,
  CaseRecord,
  CaseStatus,
  CatalogEntry,
  SortDirection,
} from '../../domain/index.js';
import type {
  CaseConfigRepository,
  NewAttachedEntry,
  PaginationParams,
} from '../../application/ports.js';

export interface InMemorySeed {
  configs?: CatalogEntry[];
  cases?: CaseRecord[];
  caseConfigs?: AttachedEntry[];
}

function byCreatedAt<T extends { created_at: Date; label: string }>(direction: SortDirection) {
  return (a: T, b: T): number => {
    const diff = a.created_at.getTime() - b.created_at.getTime();
    if (diff !== 0) return direction === 'asc' ? diff : -diff;
    return a.label.localeCompare(b.label);
  };
}

/**
 * In-process record store.
 *
 * Used by tests and local runs without Postgres. Mirrors the Postgres
 * store's guarantees: the (case_id, label) uniqueness constraint and an
 * all-or-nothing batch insert.
 */
export class InMemoryCaseConfigRepository implements CaseConfigRepository {
  private readonly configs: Map<string, CatalogEntry> = new Map();
  private readonly cases: Map<string, CaseRecord> = new Map();
  private readonly caseConfigs: Map<string, AttachedEntry> = new Map();
  private readonly now: () => Date;

  constructor(seed: InMemorySeed = {}, now: () => Date = () => new Date()) {
    this.now = now;
    for (const c of seed.configs ?? []) this.configs.set(c.config_id, c);
    for (const c of seed.cases ?? []) this.cases.set(c.case_id, c);
    for (const c of seed.caseConfigs ?? []) this.caseConfigs.set(c.case_config_id, c);
  }

  async listConfigs(pagination: PaginationParams, direction: SortDirection): Promise<CatalogEntry[]> {
    return [...this.configs.values()]
      .sort(byCreatedAt(direction))
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async countConfigs(): Promise<number> {
    return this.configs.size;
  }

  async findConfigsByIds(configIds: readonly string[]): Promise<CatalogEntry[]> {
    return configIds.flatMap((id) => {
      const entry = this.configs.get(id);
      return entry ? [entry] : [];
    });
  }

  async findCaseById(caseId: string): Promise<CaseRecord | undefined> {
    return this.cases.get(caseId);
  }

  async updateCaseStatus(caseId: string, status: CaseStatus): Promise<boolean> {
    const existing = this.cases.get(caseId);
    if (!existing) return false;
    this.cases.set(caseId, { ...existing, status });
    return true;
  }

  async findCaseConfigs(caseId: string, direction: SortDirection): Promise<AttachedEntry[]> {
    return [...this.caseConfigs.values()]
      .filter((row) => row.case_id === caseId)
      .sort(byCreatedAt(direction));
  }

  async findCaseConfigsByIds(caseConfigIds: readonly string[]): Promise<AttachedEntry[]> {
    return caseConfigIds.flatMap((id) => {
      const row = this.caseConfigs.get(id);
      return row ? [row] : [];
    });
  }

  async findAttachedLabels(caseId: string): Promise<string[]> {
    return [...this.caseConfigs.values()]
      .filter((row) => row.case_id === caseId)
      .map((row) => row.label);
  }

  /** Validates the whole batch before writing any row. */
  async insertCaseConfigs(rows: readonly NewAttachedEntry[]): Promise<AttachedEntry[]> {
    const taken = new Set(
      [...this.caseConfigs.values()].map((row) => `${row.case_id}\u0000${row.label}`),
    );
    for (const row of rows) {
      const key = `${row.case_id}\u0000${row.label}`;
      if (taken.has(key)) {
        throw new DataAccessError(
          `insertCaseConfigs failed: label "${row.label}" already attached to case ${row.case_id}`,
          { conflict: true },
        );
      }
      taken.add(key);
    }

    const createdAt = this.now();
    const inserted = rows.map((row): AttachedEntry => ({
      case_config_id: randomUUID(),
      case_id: row.case_id,
      label: row.label,
      type: row.type,
      amount: row.amount,
      created_at: createdAt,
    }));
    for (const row of inserted) this.caseConfigs.set(row.case_config_id, row);
    return inserted;
  }
}
