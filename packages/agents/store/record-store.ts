// Structured-record store boundary: append-only inserts and simple filtered queries

import { RecordStoreError } from '../utils/errors.js';

export type RecordValue = string | number | boolean | null | RecordValue[] | { [key: string]: RecordValue };
export type StoreRecord = Record<string, RecordValue>;

/**
 * Query filters. A plain value is an equality match; `{ contains }` is a
 * case-insensitive substring match.
 */
export type RecordFilter = Record<string, RecordValue | { contains: string }>;

export interface RecordStore {
  insertRecords(table: string, records: StoreRecord[]): Promise<number>;
  queryRecords(table: string, filters?: RecordFilter): Promise<StoreRecord[]>;
}

const IDENTIFIER_RE = /^[a-z_][a-z0-9_]*$/;

/** Table and column names are interpolated into SQL, so only plain identifiers pass. */
export function assertIdentifier(name: string, table: string): void {
  if (!IDENTIFIER_RE.test(name)) {
    throw new RecordStoreError(`Invalid identifier "${name}"`, table);
  }
}

export function isContainsFilter(value: RecordFilter[string]): value is { contains: string } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.keys(value).length === 1 && typeof value.contains === 'string';
}

function matches(record: StoreRecord, filters: RecordFilter): boolean {
  return Object.entries(filters).every(([key, expected]) => {
    const actual = record[key];
    if (isContainsFilter(expected)) {
      return typeof actual === 'string' && actual.toLowerCase().includes(expected.contains.toLowerCase());
    }
    return JSON.stringify(actual) === JSON.stringify(expected);
  });
}

/** In-memory store for tests and local runs. Records are deep-copied in and out. */
export class LocalRecordStore implements RecordStore {
  private tables = new Map<string, StoreRecord[]>();

  async insertRecords(table: string, records: StoreRecord[]): Promise<number> {
    assertIdentifier(table, table);
    let rows = this.tables.get(table);
    if (!rows) {
      rows = [];
      this.tables.set(table, rows);
    }
    for (const record of records) {
      rows.push(structuredClone(record));
    }
    return records.length;
  }

  async queryRecords(table: string, filters: RecordFilter = {}): Promise<StoreRecord[]> {
    const rows = this.tables.get(table) ?? [];
    return rows.filter(r => matches(r, filters)).map(r => structuredClone(r));
  }

  /** Row count for one table */
  count(table: string): number {
    return this.tables.get(table)?.length ?? 0;
  }
}
