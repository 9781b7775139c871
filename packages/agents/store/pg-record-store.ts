// Postgres record store: parameterized inserts and filtered selects over the CIM tables
// Objects and arrays are serialized for JSONB columns; identifiers are whitelisted

import { queryWithRetry } from '../db/pg-client.js';
import { RecordStoreError } from '../utils/errors.js';
import {
  assertIdentifier, isContainsFilter,
  type RecordFilter, type RecordStore, type RecordValue, type StoreRecord,
} from './record-store.js';

function toParam(value: RecordValue): unknown {
  return value !== null && typeof value === 'object' ? JSON.stringify(value) : value;
}

export class PgRecordStore implements RecordStore {
  async insertRecords(table: string, records: StoreRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    assertIdentifier(table, table);

    let inserted = 0;
    for (const record of records) {
      const columns = Object.keys(record);
      for (const column of columns) assertIdentifier(column, table);

      const placeholders = columns.map((_, i) => `$${i + 1}`).join(', ');
      const sql = `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders})`;
      try {
        const result = await queryWithRetry(sql, columns.map(c => toParam(record[c])));
        inserted += result.rowCount ?? 0;
      } catch (err) {
        throw new RecordStoreError(
          `Insert into ${table} failed: ${err instanceof Error ? err.message : String(err)}`,
          table,
          err,
        );
      }
    }
    return inserted;
  }

  async queryRecords(table: string, filters: RecordFilter = {}): Promise<StoreRecord[]> {
    assertIdentifier(table, table);

    const clauses: string[] = [];
    const params: unknown[] = [];
    for (const [column, value] of Object.entries(filters)) {
      assertIdentifier(column, table);
      if (isContainsFilter(value)) {
        params.push(`%${value.contains}%`);
        clauses.push(`${column} ILIKE $${params.length}`);
      } else if (value === null) {
        clauses.push(`${column} IS NULL`);
      } else {
        params.push(toParam(value));
        clauses.push(`${column} = $${params.length}`);
      }
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    try {
      const result = await queryWithRetry<StoreRecord>(`SELECT * FROM ${table}${where}`, params);
      return result.rows;
    } catch (err) {
      throw new RecordStoreError(
        `Query on ${table} failed: ${err instanceof Error ? err.message : String(err)}`,
        table,
        err,
      );
    }
  }
}
