// Orchestrator: runs the CIM agents over a document and assembles the run report
// financial → risk → consistency → memo in order; quote and chart alongside the chain

import { randomUUID } from 'node:crypto';
import {
  ALL_AGENTS,
  type AgentContext, type AgentName, type AgentResult, type AgentResults,
} from '../types/agents.js';
import type { Chunk } from '../types/document.js';
import type { ChunkedRunReport, PersistenceSummary, RunReport, RunState } from '../types/run.js';
import {
  DOMAIN_EVENT_TYPES, SimpleEventBus,
  type DomainEvent, type DomainEventType, type EventBus, type EventPayloads,
} from '../types/events.js';
import type { ModelClient } from '../bridge/model-client.js';
import { sourceToText, type DocumentSource, type TextExtractor } from '../bridge/text-extractor.js';
import { DocumentChunker, type ChunkerOptions } from '../chunking/document-chunker.js';
import { ResultRecorder } from '../store/result-recorder.js';
import type { RecordStore } from '../store/record-store.js';
import { createAgentSet, type AgentSet } from './agent-factory.js';
import { OrchestrationFailure, toErrorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface OrchestratorConfig {
  model: ModelClient;
  /** Model identifier per agent */
  models?: Partial<Record<AgentName, string>>;
  /** Replace individual agents, e.g. with test doubles */
  agents?: Partial<AgentSet>;
  chunker?: ChunkerOptions;
  extractor?: TextExtractor;
  store?: RecordStore;
  /** Persist results to `store` when a run finishes. Default: true when a store is given */
  persist?: boolean;
  /** Run the quote and chart agents. Default: true */
  includeAuxiliary?: boolean;
  logger?: Logger;
  onEvent?: (event: { type: DomainEventType; payload: unknown }) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  includeAuxiliary?: boolean;
  persist?: boolean;
  dealId?: string;
}

/** Mutable bookkeeping for one pass; frozen into a RunReport at the end */
interface ActiveRun {
  documentId: string;
  mode: 'full' | 'chunked';
  startedAt: string;
  states: RunState[];
  results: AgentResults;
  skipped: AgentName[];
}

export class Orchestrator {
  private readonly agents: AgentSet;
  private readonly eventBus: EventBus;
  private readonly chunker: DocumentChunker;
  private readonly recorder?: ResultRecorder;
  private readonly logger: Logger;

  constructor(private readonly config: OrchestratorConfig) {
    this.logger = config.logger ?? createLogger('Orchestrator');
    this.eventBus = new SimpleEventBus();
    this.chunker = new DocumentChunker(config.chunker);
    this.agents = {
      ...createAgentSet({ model: config.model, models: config.models, logger: config.logger }),
      ...config.agents,
    };
    if (config.store) {
      this.recorder = new ResultRecorder(config.store, { logger: config.logger });
    }

    if (config.onEvent) {
      const handler = config.onEvent;
      // A throwing listener must not reject the run
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, (e) => {
          try {
            handler({ type: e.type, payload: e.payload });
          } catch (err) {
            this.logger.warn(`onEvent listener failed for ${e.type}`, { error: toErrorMessage(err) });
          }
        });
      }
    }
  }

  private emit<K extends DomainEventType>(type: K, payload: EventPayloads[K]): void {
    const event: DomainEvent<K> = {
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'orchestrator',
      payload,
    };
    this.eventBus.emit(event);
  }

  private transition(run: ActiveRun, state: RunState): void {
    run.states.push(state);
    this.emit('RunStateChanged', { documentId: run.documentId, state });
  }

  private beginRun(documentId: string, mode: 'full' | 'chunked'): ActiveRun {
    const run: ActiveRun = {
      documentId,
      mode,
      startedAt: new Date().toISOString(),
      states: [],
      results: {},
      skipped: [],
    };
    this.emit('RunStarted', { documentId, mode });
    this.transition(run, 'started');
    return run;
  }

  /** Run every agent over plain document text. Never throws. */
  async runPipeline(text: string, documentId: string, options: RunOptions = {}): Promise<RunReport> {
    const run = this.beginRun(documentId, 'full');
    return this.afterExtraction(run, text, options);
  }

  /** Extract text from a document source, then run the pipeline. Extraction failure aborts the run. */
  async runDocument(source: DocumentSource, documentId: string, options: RunOptions = {}): Promise<RunReport> {
    const run = this.beginRun(documentId, 'full');
    let text: string;
    try {
      text = await sourceToText(source, this.config.extractor);
    } catch (err) {
      const failure = new OrchestrationFailure(`Text extraction failed: ${toErrorMessage(err)}`, 'text_extraction', err);
      return this.finish(run, [failure.message], options);
    }
    return this.afterExtraction(run, text, options);
  }

  private async afterExtraction(run: ActiveRun, text: string, options: RunOptions): Promise<RunReport> {
    if (text.trim().length === 0) {
      const failure = new OrchestrationFailure('Document text is empty; no agents were run', 'text_extraction');
      this.logger.error(failure.message, { documentId: run.documentId });
      return this.finish(run, [failure.message], options);
    }
    this.transition(run, 'text_extracted');
    await this.runAgents(run, text, options);
    return this.finish(run, [], options);
  }

  private async step<N extends AgentName>(
    run: ActiveRun,
    name: N,
    text: string,
    context: AgentContext,
    signal?: AbortSignal,
  ): Promise<AgentResult<N> | undefined> {
    if (signal?.aborted) {
      run.skipped.push(name);
      return undefined;
    }
    this.transition(run, `running:${name}`);
    this.emit('AgentStarted', { documentId: run.documentId, agent: name });

    const result = await this.agents[name].execute(text, context, { signal });

    if (result.status === 'success') {
      this.emit('AgentSucceeded', { documentId: run.documentId, agent: name, durationMs: result.durationMs });
    } else {
      this.logger.warn(`Agent ${name} failed`, { documentId: run.documentId, error: result.error });
      this.emit('AgentFailed', { documentId: run.documentId, agent: name, error: result.error });
    }
    return result;
  }

  private async runChain(run: ActiveRun, text: string, signal?: AbortSignal): Promise<void> {
    let context: AgentContext = {};

    const financial = await this.step(run, 'financial', text, context, signal);
    run.results.financial = financial;
    if (financial?.status === 'success') context = { ...context, financialMetrics: financial.output };

    const risk = await this.step(run, 'risk', text, context, signal);
    run.results.risk = risk;
    if (risk?.status === 'success') context = { ...context, risks: risk.output };

    const consistency = await this.step(run, 'consistency', text, context, signal);
    run.results.consistency = consistency;
    if (consistency?.status === 'success') context = { ...context, consistencyAnalysis: consistency.output };

    run.results.memo = await this.step(run, 'memo', text, context, signal);
  }

  private async runAuxiliary(run: ActiveRun, text: string, signal?: AbortSignal): Promise<void> {
    const [quote, chart] = await Promise.all([
      this.step(run, 'quote', text, {}, signal),
      this.step(run, 'chart', text, {}, signal),
    ]);
    run.results.quote = quote;
    run.results.chart = chart;
  }

  private async runAgents(run: ActiveRun, text: string, options: RunOptions): Promise<void> {
    const includeAuxiliary = options.includeAuxiliary ?? this.config.includeAuxiliary ?? true;
    await Promise.all([
      this.runChain(run, text, options.signal),
      includeAuxiliary ? this.runAuxiliary(run, text, options.signal) : Promise.resolve(),
    ]);
  }

  private async finish(run: ActiveRun, fatal: string[], options: RunOptions): Promise<RunReport> {
    const errors = [...fatal];
    for (const name of ALL_AGENTS) {
      const result = run.results[name];
      if (result?.status === 'error') errors.push(`${name}: ${result.error}`);
    }

    const cancelled = run.skipped.length > 0;
    if (cancelled) {
      const skipped = ALL_AGENTS.filter(a => run.skipped.includes(a));
      errors.push(`Run cancelled; skipped agents: ${skipped.join(', ')}`);
      this.emit('RunCancelled', { documentId: run.documentId, skipped });
    }

    const status = errors.length === 0 ? 'complete' : 'error';
    this.transition(run, status);

    const report: RunReport = {
      documentId: run.documentId,
      status,
      results: run.results,
      errors,
      states: run.states,
      cancelled,
      startedAt: run.startedAt,
      completedAt: new Date().toISOString(),
    };

    this.logger.info('run finished', {
      documentId: run.documentId,
      status,
      errors: errors.length,
    });
    this.emit('RunCompleted', { documentId: run.documentId, mode: run.mode, status, errorCount: errors.length });

    const persistence = fatal.length === 0 ? await this.persistRun(report, options) : undefined;
    return persistence ? { ...report, persistence } : report;
  }

  private shouldPersist(options: RunOptions): boolean {
    return this.recorder !== undefined && (options.persist ?? this.config.persist ?? true);
  }

  private async persistRun(report: RunReport, options: RunOptions): Promise<PersistenceSummary | undefined> {
    if (!this.recorder || !this.shouldPersist(options)) return undefined;
    const summary = await this.recorder.recordRun(report, { dealId: options.dealId });
    this.emit('RecordsPersisted', {
      documentId: report.documentId,
      inserted: summary.inserted,
      errorCount: summary.errors.length,
    });
    return summary;
  }

  /**
   * Chunk the document and run every agent over each chunk in turn.
   * perChunkResults[i] is the report for chunks[i]; chunk reports are not persisted individually.
   */
  async runChunkedPipeline(text: string, documentId: string, options: RunOptions = {}): Promise<ChunkedRunReport> {
    this.emit('RunStarted', { documentId, mode: 'chunked' });
    const chunks: Chunk[] = this.chunker.chunk(text);
    const perChunkResults: RunReport[] = [];

    for (const chunk of chunks) {
      const report = await this.runPipeline(chunk.text, documentId, { ...options, persist: false });
      perChunkResults.push(report);
      if (!report.cancelled) {
        chunk.processed = true;
        this.emit('ChunkProcessed', { documentId, sequence: chunk.sequence, sectionType: chunk.sectionType });
      }
    }

    this.logger.info('chunked run finished', {
      documentId,
      chunks: chunks.length,
      processed: chunks.filter(c => c.processed).length,
    });
    const errorCount = perChunkResults.reduce((n, r) => n + r.errors.length, 0);
    this.emit('RunCompleted', {
      documentId,
      mode: 'chunked',
      status: perChunkResults.some(r => r.status === 'error') ? 'error' : 'complete',
      errorCount,
    });

    if (!this.recorder || !this.shouldPersist(options)) {
      return { documentId, chunks, perChunkResults };
    }
    const persistence = await this.recorder.persistChunks(documentId, chunks);
    this.emit('RecordsPersisted', {
      documentId,
      inserted: persistence.inserted,
      errorCount: persistence.errors.length,
    });
    return { documentId, chunks, perChunkResults, persistence };
  }
}
