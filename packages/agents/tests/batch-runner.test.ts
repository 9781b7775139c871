import { describe, it, expect } from 'vitest';
import { BatchRunner, buildSummary, type BatchProgress, type DocumentRunResult } from '../orchestrator/batch-runner.js';
import { Orchestrator } from '../orchestrator/coordinator.js';
import type { RunReport } from '../types/run.js';
import { silentLogger } from '../utils/logger.js';
import { fakeModel } from './fake-model.js';

function report(overrides: Partial<RunReport> = {}): RunReport {
  return {
    documentId: 'doc',
    status: 'complete',
    results: {},
    errors: [],
    states: ['started', 'complete'],
    cancelled: false,
    startedAt: '2026-01-05T10:00:00.000Z',
    completedAt: '2026-01-05T10:00:01.000Z',
    ...overrides,
  };
}

describe('BatchRunner', () => {
  it('runs every document and reports progress', async () => {
    const fake = fakeModel({ financial: '[{"metric_name": "Revenue", "metric_value": "$5M"}]' });
    const runner = new BatchRunner({ model: fake.model, includeAuxiliary: false, logger: silentLogger });

    const progress: BatchProgress[] = [];
    const result = await runner.runDocuments(
      [{ id: 'alpha', text: 'Alpha Inc. revenue $5M.' }, { id: 'beta', text: '' }],
      { concurrency: 2, onProgress: (p) => progress.push({ ...p }) },
    );

    expect(result.documents.map(d => d.documentId)).toEqual(['alpha', 'beta']);
    expect(result.documents[0].report?.status).toBe('complete');
    expect(result.documents[1].report?.errors).toEqual(['Document text is empty; no agents were run']);
    expect(progress.filter(p => p.status === 'running')).toHaveLength(2);
    expect(progress.find(p => p.current === 'beta' && p.status !== 'running')).toMatchObject({
      status: 'failed',
      error: 'Document text is empty; no agents were run',
    });
    expect(result.summary).toContain('**Documents complete:** 1/2');
    expect(result.summary).toContain('- **beta**: Document text is empty; no agents were run');
  });

  it('never runs more documents at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const orchestrator = new Orchestrator({ model: fakeModel().model, logger: silentLogger });
    orchestrator.runPipeline = async (_text, documentId) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 10));
      active--;
      return report({ documentId });
    };

    const docs = ['a', 'b', 'c', 'd', 'e'].map(id => ({ id, text: 'text' }));
    const result = await new BatchRunner(orchestrator).runDocuments(docs, { concurrency: 2 });

    expect(peak).toBe(2);
    expect(result.documents).toHaveLength(5);
  });

  it('records a thrown run as a failed document', async () => {
    const orchestrator = new Orchestrator({ model: fakeModel().model, logger: silentLogger });
    orchestrator.runPipeline = async () => {
      throw new Error('store connection lost');
    };

    const result = await new BatchRunner(orchestrator).runDocuments([{ id: 'gamma', text: 'text' }]);

    expect(result.documents[0]).toMatchObject({ documentId: 'gamma', error: 'store connection lost' });
    expect(result.documents[0].report).toBeUndefined();
  });
});

describe('buildSummary', () => {
  it('handles an empty batch', () => {
    expect(buildSummary([])).toBe('## Batch Summary\n\nNo documents were run.');
  });

  it('renders one row per document and lists failures', () => {
    const results: DocumentRunResult[] = [
      {
        documentId: 'alpha',
        durationMs: 1500,
        report: report({
          documentId: 'alpha',
          results: {
            financial: { agent: 'financial', status: 'success', output: [], error: null, log: [], durationMs: 10 },
            risk: { agent: 'risk', status: 'error', output: null, error: 'timeout', log: [], durationMs: 10 },
          },
          status: 'error',
          errors: ['risk: timeout'],
        }),
      },
      { documentId: 'beta', durationMs: 0, error: 'boom' },
    ];

    expect(buildSummary(results)).toBe([
      '## Batch Summary',
      '',
      '**Documents complete:** 0/2',
      '',
      '| Document | Status | Agents OK | Metrics | Grade | Duration |',
      '|----------|--------|-----------|---------|-------|----------|',
      '| alpha | error | 1/2 | 0 | - | 1.5s |',
      '| beta | failed | 0/0 | - | - | 0.0s |',
      '',
      '### Errors',
      '',
      '- **alpha**: risk: timeout',
      '- **beta**: boom',
    ].join('\n'));
  });
});
