// Batch document runs
// Runs N independent documents with concurrency control and produces
// individual run reports plus a comparative summary table.

import { Orchestrator, type OrchestratorConfig, type RunOptions } from './coordinator.js';
import { ALL_AGENTS } from '../types/agents.js';
import type { CimDocument } from '../types/document.js';
import type { RunReport } from '../types/run.js';
import { toErrorMessage } from '../utils/errors.js';

export interface BatchOptions {
  /** Max concurrent documents (default: 3) */
  concurrency?: number;
  /** Passed to every run */
  run?: Omit<RunOptions, 'dealId'>;
  /** Progress callback */
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface DocumentRunResult {
  documentId: string;
  report?: RunReport;
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  documents: DocumentRunResult[];
  summary: string;
  totalDurationMs: number;
}

export class BatchRunner {
  private orchestrator: Orchestrator;

  constructor(config: OrchestratorConfig | Orchestrator) {
    this.orchestrator = config instanceof Orchestrator ? config : new Orchestrator(config);
  }

  /**
   * Run multiple documents in parallel with concurrency control.
   */
  async runDocuments(documents: CimDocument[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 3, onProgress } = options;
    const size = Math.max(1, Math.floor(concurrency));
    const totalStart = Date.now();
    const results: DocumentRunResult[] = [];

    // Process in batches respecting concurrency limit
    for (let i = 0; i < documents.length; i += size) {
      const batch = documents.slice(i, i + size);

      const batchResults = await Promise.all(batch.map(async (doc): Promise<DocumentRunResult> => {
        const started = Date.now();
        onProgress?.({ completed: results.length, total: documents.length, current: doc.id, status: 'running' });

        try {
          const report = await this.orchestrator.runPipeline(doc.text, doc.id, options.run);
          const status = report.status === 'complete' ? 'completed' : 'failed';
          onProgress?.({
            completed: results.length + 1,
            total: documents.length,
            current: doc.id,
            status,
            error: report.errors[0],
          });
          return { documentId: doc.id, report, durationMs: Date.now() - started };
        } catch (err) {
          const error = toErrorMessage(err);
          onProgress?.({ completed: results.length + 1, total: documents.length, current: doc.id, status: 'failed', error });
          return { documentId: doc.id, error, durationMs: Date.now() - started };
        }
      }));

      results.push(...batchResults);
    }

    return {
      documents: results,
      summary: buildSummary(results),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

function succeededAgents(report: RunReport): number {
  return ALL_AGENTS.filter(name => report.results[name]?.status === 'success').length;
}

function ranAgents(report: RunReport): number {
  return ALL_AGENTS.filter(name => report.results[name] !== undefined).length;
}

/**
 * Comparative markdown summary: one row per document, failures listed below.
 */
export function buildSummary(results: DocumentRunResult[]): string {
  if (results.length === 0) {
    return '## Batch Summary\n\nNo documents were run.';
  }

  const complete = results.filter(r => r.report?.status === 'complete').length;
  const lines: string[] = [
    '## Batch Summary',
    '',
    `**Documents complete:** ${complete}/${results.length}`,
    '',
    '| Document | Status | Agents OK | Metrics | Grade | Duration |',
    '|----------|--------|-----------|---------|-------|----------|',
  ];

  for (const r of results) {
    const duration = `${(r.durationMs / 1000).toFixed(1)}s`;
    if (!r.report) {
      lines.push(`| ${r.documentId} | failed | 0/0 | - | - | ${duration} |`);
      continue;
    }
    const { financial, memo } = r.report.results;
    const metrics = financial?.status === 'success' ? String(financial.output.length) : '-';
    const grade = memo?.status === 'success' ? memo.output.investment_grade : '-';
    lines.push(
      `| ${r.documentId} | ${r.report.status} | ${succeededAgents(r.report)}/${ranAgents(r.report)} | ${metrics} | ${grade} | ${duration} |`,
    );
  }

  const failures = results.filter(r => r.error || (r.report && r.report.errors.length > 0));
  if (failures.length > 0) {
    lines.push('', '### Errors', '');
    for (const r of failures) {
      const messages = r.error ? [r.error] : r.report?.errors ?? [];
      for (const message of messages) lines.push(`- **${r.documentId}**: ${message}`);
    }
  }

  return lines.join('\n');
}
