import { describe, it, expect } from 'vitest';
import { LocalRecordStore, assertIdentifier, isContainsFilter } from '../store/record-store.js';
import { RecordStoreError } from '../utils/errors.js';

describe('LocalRecordStore', () => {
  it('appends records and returns the inserted count', async () => {
    const store = new LocalRecordStore();
    expect(await store.insertRecords('deal_metrics', [{ id: '1' }, { id: '2' }])).toBe(2);
    expect(await store.insertRecords('deal_metrics', [{ id: '3' }])).toBe(1);
    expect(store.count('deal_metrics')).toBe(3);
  });

  it('filters by equality, null and case-insensitive substring', async () => {
    const store = new LocalRecordStore();
    await store.insertRecords('deal_metrics', [
      { id: '1', document_id: 'doc-1', metric_name: 'EBITDA Margin', deal_id: null },
      { id: '2', document_id: 'doc-1', metric_name: 'Revenue', deal_id: 'deal-7' },
      { id: '3', document_id: 'doc-2', metric_name: 'Gross margin', deal_id: null },
    ]);

    const byDoc = await store.queryRecords('deal_metrics', { document_id: 'doc-1' });
    expect(byDoc.map(r => r.id)).toEqual(['1', '2']);

    const margins = await store.queryRecords('deal_metrics', { metric_name: { contains: 'MARGIN' } });
    expect(margins.map(r => r.id)).toEqual(['1', '3']);

    const unassigned = await store.queryRecords('deal_metrics', { deal_id: null, document_id: 'doc-2' });
    expect(unassigned.map(r => r.id)).toEqual(['3']);
  });

  it('returns copies that cannot change stored rows', async () => {
    const store = new LocalRecordStore();
    const record = { id: '1', metadata: { topics: ['growth'] } };
    await store.insertRecords('document_quotes', [record]);
    record.metadata.topics.push('mutated');

    const [row] = await store.queryRecords('document_quotes');
    expect(row.metadata).toEqual({ topics: ['growth'] });
  });

  it('returns an empty list for an unknown table', async () => {
    expect(await new LocalRecordStore().queryRecords('chart_elements')).toEqual([]);
  });

  it('rejects table names that are not plain identifiers', async () => {
    await expect(new LocalRecordStore().insertRecords('deal_metrics; DROP TABLE x', [{ id: '1' }]))
      .rejects.toThrow(RecordStoreError);
  });
});

describe('assertIdentifier', () => {
  it('accepts lower-case snake case only', () => {
    expect(() => assertIdentifier('agent_logs', 'agent_logs')).not.toThrow();
    expect(() => assertIdentifier('AgentLogs', 'agent_logs')).toThrow('Invalid identifier "AgentLogs"');
  });
});

describe('isContainsFilter', () => {
  it('recognizes only { contains: string }', () => {
    expect(isContainsFilter({ contains: 'rev' })).toBe(true);
    expect(isContainsFilter({ contains: 'rev', extra: 1 })).toBe(false);
    expect(isContainsFilter('rev')).toBe(false);
    expect(isContainsFilter(null)).toBe(false);
  });
});
