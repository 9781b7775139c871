// Maps run reports onto the CIM tables. Append-only: rows are never updated or deleted.
// Store failures are logged and collected; they never throw out of a run.

import { randomUUID } from 'node:crypto';
import { ALL_AGENTS, type AgentResults, type FinancialMetric } from '../types/agents.js';
import type { Chunk } from '../types/document.js';
import type { PersistenceSummary, RunReport } from '../types/run.js';
import type { ChartAnalysis } from '../schemas/chart.js';
import type { QuoteAnalysis } from '../schemas/quote.js';
import type { InvestmentMemo } from '../schemas/memo.js';
import { toJsonValue } from '../schemas/normalize.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { toErrorMessage } from '../utils/errors.js';
import type { RecordStore, RecordValue, StoreRecord } from './record-store.js';

export const TABLES = {
  metrics: 'deal_metrics',
  outputs: 'ai_outputs',
  memo: 'cim_analysis',
  quotes: 'document_quotes',
  quoteRelationships: 'quote_relationships',
  charts: 'chart_elements',
  chartRelationships: 'chart_relationships',
  logs: 'agent_logs',
  chunks: 'document_chunks',
} as const;

export interface ResultRecorderOptions {
  logger?: Logger;
  /** Row id generator, defaults to random UUIDs */
  newId?: () => string;
}

export interface RecordOptions {
  dealId?: string;
}

function json(value: unknown): RecordValue {
  return toJsonValue(value) ?? null;
}

/** Relationship rows point at elements by their zero-based index in the agent output. */
function resolveIndex(ref: string, ids: readonly string[]): string | undefined {
  const trimmed = ref.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return ids[Number(trimmed)];
}

export class ResultRecorder {
  private readonly logger: Logger;
  private readonly newId: () => string;

  constructor(private readonly store: RecordStore, options: ResultRecorderOptions = {}) {
    this.logger = options.logger ?? createLogger('ResultRecorder');
    this.newId = options.newId ?? randomUUID;
  }

  private async write(table: string, rows: StoreRecord[], summary: PersistenceSummary): Promise<boolean> {
    if (rows.length === 0) return true;
    try {
      const count = await this.store.insertRecords(table, rows);
      summary.inserted[table] = (summary.inserted[table] ?? 0) + count;
      return true;
    } catch (err) {
      const message = `${table}: ${toErrorMessage(err)}`;
      this.logger.error('insert failed', { table, rows: rows.length, error: toErrorMessage(err) });
      summary.errors.push(message);
      return false;
    }
  }

  async recordRun(report: RunReport, options: RecordOptions = {}): Promise<PersistenceSummary> {
    const summary: PersistenceSummary = { inserted: {}, errors: [] };
    const base = { document_id: report.documentId, deal_id: options.dealId ?? null };
    const { results } = report;

    if (results.financial?.status === 'success') {
      await this.write(TABLES.metrics, this.metricRows(results.financial.output, base), summary);
    }

    const outputs: StoreRecord[] = [];
    if (results.risk?.status === 'success') {
      const { output } = results.risk;
      outputs.push({ id: this.newId(), ...base, agent_type: 'risk', output_json: json(output), confidence_score: output.confidence_score });
    }
    if (results.consistency?.status === 'success') {
      const { output } = results.consistency;
      outputs.push({ id: this.newId(), ...base, agent_type: 'consistency', output_json: json(output), confidence_score: output.confidence_score });
    }
    await this.write(TABLES.outputs, outputs, summary);

    if (results.memo?.status === 'success') {
      await this.write(TABLES.memo, [this.memoRow(results.memo.output, base)], summary);
    }
    if (results.quote?.status === 'success') {
      await this.recordQuotes(results.quote.output, base, summary);
    }
    if (results.chart?.status === 'success') {
      await this.recordCharts(results.chart.output, base, summary);
    }

    await this.write(TABLES.logs, this.logRows(results, base), summary);

    this.logger.info('run persisted', {
      documentId: report.documentId,
      inserted: summary.inserted,
      errors: summary.errors.length,
    });
    return summary;
  }

  async persistChunks(documentId: string, chunks: readonly Chunk[]): Promise<PersistenceSummary> {
    const summary: PersistenceSummary = { inserted: {}, errors: [] };
    const rows: StoreRecord[] = chunks.map(chunk => ({
      id: this.newId(),
      document_id: documentId,
      sequence: chunk.sequence,
      chunk_text: chunk.text,
      chunk_size: chunk.length,
      section_type: chunk.sectionType,
      title: chunk.title ?? null,
      page_start: chunk.pageRange?.start ?? null,
      page_end: chunk.pageRange?.end ?? null,
      metadata: { ...chunk.metadata },
      processed: chunk.processed,
    }));
    await this.write(TABLES.chunks, rows, summary);
    return summary;
  }

  private metricRows(metrics: FinancialMetric[], base: StoreRecord): StoreRecord[] {
    return metrics.map(m => ({
      id: this.newId(),
      ...base,
      metric_name: m.metric_name,
      metric_value: m.metric_value,
      numeric_value: m.numeric_value,
      unit: m.unit,
      metric_type: m.metric_type,
      time_period: m.time_period,
      source_section: m.source_section,
      confidence_score: m.confidence_score,
    }));
  }

  private memoRow(memo: InvestmentMemo, base: StoreRecord): StoreRecord {
    return {
      id: this.newId(),
      ...base,
      investment_grade: memo.investment_grade,
      executive_summary: memo.executive_summary,
      business_model: json(memo.business_model),
      financial_analysis: json(memo.financial_analysis),
      key_risks: json(memo.key_risks),
      competitive_position: json(memo.competitive_position),
      recommendation: json(memo.recommendation),
      investment_highlights: memo.investment_highlights,
      management_questions: memo.management_questions,
      confidence_score: memo.confidence_score,
    };
  }

  private async recordQuotes(analysis: QuoteAnalysis, base: StoreRecord, summary: PersistenceSummary): Promise<void> {
    const ids = analysis.quotes.map(() => this.newId());
    const quoteRows: StoreRecord[] = analysis.quotes.map((q, i) => ({
      id: ids[i],
      ...base,
      quote_text: q.quote_text,
      speaker: q.speaker || null,
      speaker_title: q.speaker_title || null,
      context: q.context || null,
      significance_score: q.significance_score,
      quote_type: q.quote_type,
      metadata: json(q.metadata),
    }));
    if (!(await this.write(TABLES.quotes, quoteRows, summary))) return;

    const relationshipRows: StoreRecord[] = [];
    for (const rel of analysis.quote_relationships) {
      const quoteId = resolveIndex(rel.quote_id, ids);
      if (!quoteId) {
        this.logger.warn('quote relationship skipped: unknown quote reference', { quoteId: rel.quote_id });
        continue;
      }
      relationshipRows.push({
        id: this.newId(),
        quote_id: quoteId,
        related_metric: rel.related_metric,
        relationship_type: rel.relationship_type,
        confidence_score: rel.confidence_score,
      });
    }
    await this.write(TABLES.quoteRelationships, relationshipRows, summary);
  }

  private async recordCharts(analysis: ChartAnalysis, base: StoreRecord, summary: PersistenceSummary): Promise<void> {
    const ids = analysis.chart_elements.map(() => this.newId());
    const chartRows: StoreRecord[] = analysis.chart_elements.map((c, i) => ({
      id: ids[i],
      ...base,
      chart_type: c.chart_type,
      title: c.title,
      description: c.description || null,
      data_points: c.data_points,
      source_page: c.source_page > 0 ? c.source_page : null,
      confidence_score: c.confidence_score,
      metadata: json(c.metadata),
    }));
    if (!(await this.write(TABLES.charts, chartRows, summary))) return;

    const relationshipRows: StoreRecord[] = [];
    for (const rel of analysis.chart_relationships) {
      const chartId = resolveIndex(rel.chart_id, ids);
      if (!chartId) {
        this.logger.warn('chart relationship skipped: unknown chart reference', { chartId: rel.chart_id });
        continue;
      }
      relationshipRows.push({
        id: this.newId(),
        chart_id: chartId,
        related_text: rel.related_text,
        relationship_type: rel.relationship_type,
        confidence_score: rel.confidence_score,
      });
    }
    await this.write(TABLES.chartRelationships, relationshipRows, summary);
  }

  private logRows(results: AgentResults, base: StoreRecord): StoreRecord[] {
    const rows: StoreRecord[] = [];
    for (const name of ALL_AGENTS) {
      const result = results[name];
      if (!result) continue;
      rows.push({
        id: this.newId(),
        ...base,
        agent_name: result.agent,
        log_type: result.status === 'success' ? 'info' : 'error',
        message: result.status === 'success' ? `${result.agent} completed` : result.error,
        log_lines: [...result.log],
      });
    }
    return rows;
  }
}
