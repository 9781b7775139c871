import { describe, it, expect } from 'vitest';
import { ResultRecorder, TABLES } from '../store/result-recorder.js';
import { LocalRecordStore, type RecordStore, type StoreRecord } from '../store/record-store.js';
import { normalize } from '../schemas/normalize.js';
import { quoteSchema } from '../schemas/quote.js';
import { chartSchema } from '../schemas/chart.js';
import { riskSchema } from '../schemas/risk.js';
import type { RunReport } from '../types/run.js';
import type { AgentResults } from '../types/agents.js';
import type { Chunk } from '../types/document.js';
import { silentLogger } from '../utils/logger.js';

function sequentialIds() {
  let n = 0;
  return () => `id-${++n}`;
}

function runReport(results: AgentResults): RunReport {
  return {
    documentId: 'doc-1',
    status: 'complete',
    results,
    errors: [],
    states: ['started', 'text_extracted', 'complete'],
    cancelled: false,
    startedAt: '2026-01-05T10:00:00.000Z',
    completedAt: '2026-01-05T10:00:02.000Z',
  };
}

const quotes = normalize({
  quotes: [
    { quote_text: 'Best supplier we have used.', speaker: 'A customer', quote_type: 'customer', significance_score: 0.6 },
    { quote_text: 'We expect 20% growth next year.', speaker: 'CEO', speaker_title: 'Chief Executive', quote_type: 'executive' },
  ],
  quote_relationships: [
    { quote_id: '1', related_metric: 'Revenue growth', relationship_type: 'supports', confidence_score: 0.7 },
    { quote_id: 'q-9', related_metric: 'Churn' },
  ],
}, quoteSchema).value;

const charts = normalize({
  chart_elements: [{ chart_type: 'line', title: 'Revenue 2019-2023', data_points: { 2023: 10 }, source_page: 0 }],
  chart_relationships: [{ chart_id: '0', related_text: 'Revenue grew steadily', relationship_type: 'explanation' }],
}, chartSchema).value;

describe('ResultRecorder.recordRun', () => {
  it('writes one row per metric with derived numeric values', async () => {
    const store = new LocalRecordStore();
    const recorder = new ResultRecorder(store, { logger: silentLogger, newId: sequentialIds() });

    const summary = await recorder.recordRun(runReport({
      financial: {
        agent: 'financial',
        status: 'success',
        output: [{
          metric_name: 'EBITDA Margin', metric_value: '15%', metric_type: 'profitability', time_period: '2023',
          source_section: 'Financials', confidence_score: 0.8, numeric_value: 15, unit: '%',
        }],
        error: null,
        log: ['[t] prompt built'],
        durationMs: 5,
      },
    }), { dealId: 'deal-7' });

    expect(summary).toEqual({ inserted: { deal_metrics: 1, agent_logs: 1 }, errors: [] });
    expect(await store.queryRecords(TABLES.metrics)).toEqual([{
      id: 'id-1',
      document_id: 'doc-1',
      deal_id: 'deal-7',
      metric_name: 'EBITDA Margin',
      metric_value: '15%',
      numeric_value: 15,
      unit: '%',
      metric_type: 'profitability',
      time_period: '2023',
      source_section: 'Financials',
      confidence_score: 0.8,
    }]);
    expect(await store.queryRecords(TABLES.logs)).toEqual([{
      id: 'id-2',
      document_id: 'doc-1',
      deal_id: 'deal-7',
      agent_name: 'financial',
      log_type: 'info',
      message: 'financial completed',
      log_lines: ['[t] prompt built'],
    }]);
  });

  it('stores risk output as JSON and logs failed agents as errors', async () => {
    const store = new LocalRecordStore();
    const recorder = new ResultRecorder(store, { logger: silentLogger, newId: sequentialIds() });
    const risk = normalize({ risk_summary: 'Moderate', confidence_score: 0.6 }, riskSchema).value;

    const summary = await recorder.recordRun(runReport({
      risk: { agent: 'risk', status: 'success', output: risk, error: null, log: [], durationMs: 1 },
      memo: { agent: 'memo', status: 'error', output: null, error: 'Model test-model call was cancelled', log: [], durationMs: 1 },
    }));

    expect(summary.inserted).toEqual({ ai_outputs: 1, agent_logs: 2 });
    const [output] = await store.queryRecords(TABLES.outputs);
    expect(output).toMatchObject({ agent_type: 'risk', deal_id: null, confidence_score: 0.6 });
    expect(output.output_json).toEqual(risk);

    const errors = await store.queryRecords(TABLES.logs, { log_type: 'error' });
    expect(errors.map(r => r.message)).toEqual(['Model test-model call was cancelled']);
    expect(store.count(TABLES.memo)).toBe(0);
  });

  it('links relationships to the generated quote and chart ids', async () => {
    const store = new LocalRecordStore();
    const recorder = new ResultRecorder(store, { logger: silentLogger, newId: sequentialIds() });

    const summary = await recorder.recordRun(runReport({
      quote: { agent: 'quote', status: 'success', output: quotes, error: null, log: [], durationMs: 1 },
      chart: { agent: 'chart', status: 'success', output: charts, error: null, log: [], durationMs: 1 },
    }));

    expect(summary.inserted).toEqual({
      document_quotes: 2,
      quote_relationships: 1,
      chart_elements: 1,
      chart_relationships: 1,
      agent_logs: 2,
    });

    const [relationship] = await store.queryRecords(TABLES.quoteRelationships);
    expect(relationship).toMatchObject({ quote_id: 'id-2', related_metric: 'Revenue growth', relationship_type: 'supports' });

    const [quote] = await store.queryRecords(TABLES.quotes, { id: 'id-1' });
    expect(quote).toMatchObject({ speaker: 'A customer', speaker_title: null, context: null, quote_type: 'customer' });

    const [chart] = await store.queryRecords(TABLES.charts);
    expect(chart).toMatchObject({ id: 'id-4', source_page: null, description: null, data_points: { 2023: 10 } });
    const [chartLink] = await store.queryRecords(TABLES.chartRelationships);
    expect(chartLink).toMatchObject({ chart_id: 'id-4', related_text: 'Revenue grew steadily' });
  });

  it('collects store failures instead of throwing', async () => {
    const failing: RecordStore = {
      insertRecords: async (table: string, records: StoreRecord[]) => {
        if (table === TABLES.quotes) throw new Error('disk full');
        return records.length;
      },
      queryRecords: async () => [],
    };
    const recorder = new ResultRecorder(failing, { logger: silentLogger });

    const summary = await recorder.recordRun(runReport({
      quote: { agent: 'quote', status: 'success', output: quotes, error: null, log: [], durationMs: 1 },
    }));

    expect(summary.errors).toEqual(['document_quotes: disk full']);
    expect(summary.inserted).toEqual({ agent_logs: 1 });
  });
});

describe('ResultRecorder.persistChunks', () => {
  it('writes one row per chunk', async () => {
    const store = new LocalRecordStore();
    const recorder = new ResultRecorder(store, { logger: silentLogger, newId: sequentialIds() });
    const chunk: Chunk = {
      sequence: 0,
      text: 'Acme makes widgets.',
      length: 19,
      sectionType: 'executive_summary',
      title: 'EXECUTIVE SUMMARY',
      pageRange: { start: 2, end: 3 },
      metadata: { section_index: 1, block_count: 1 },
      processed: true,
    };

    const summary = await recorder.persistChunks('doc-1', [chunk]);

    expect(summary).toEqual({ inserted: { document_chunks: 1 }, errors: [] });
    expect(await store.queryRecords(TABLES.chunks)).toEqual([{
      id: 'id-1',
      document_id: 'doc-1',
      sequence: 0,
      chunk_text: 'Acme makes widgets.',
      chunk_size: 19,
      section_type: 'executive_summary',
      title: 'EXECUTIVE SUMMARY',
      page_start: 2,
      page_end: 3,
      metadata: { section_index: 1, block_count: 1 },
      processed: true,
    }]);
  });
});
