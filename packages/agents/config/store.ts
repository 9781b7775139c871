// Record store factory: selects the backend from CIM_STORE_BACKEND
// Supported values: 'local' (default, in-memory) and 'postgres'

import type { CimConfig } from './index.js';
import type { RecordStore } from '../store/record-store.js';

/**
 * Create a RecordStore for the configured backend.
 * - `local`: LocalRecordStore (in-memory)
 * - `postgres`: PgRecordStore, with pending migrations applied first
 */
export async function createRecordStore(config: CimConfig): Promise<RecordStore> {
  switch (config.store.backend) {
    case 'postgres': {
      const { getPool, runMigrations } = await import('../db/pg-client.js');
      await getPool(config.store.pg);
      await runMigrations();
      const { PgRecordStore } = await import('../store/pg-record-store.js');
      return new PgRecordStore();
    }
    case 'local': {
      const { LocalRecordStore } = await import('../store/record-store.js');
      return new LocalRecordStore();
    }
  }
}
