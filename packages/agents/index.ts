// CIM Analyst: agent orchestration core
// Runs LLM-backed agents over a Confidential Information Memorandum and assembles one run report

export { Orchestrator, BatchRunner, buildSummary, createAgent, createAgentSet } from './orchestrator/index.js';
export type {
  OrchestratorConfig, RunOptions, BatchOptions, BatchProgress, BatchResult, DocumentRunResult, AgentSet, AgentSetDeps,
} from './orchestrator/index.js';

export { BaseAgent, type AgentDeps } from './agents/base-agent.js';
export { FinancialAgent } from './agents/financial-agent.js';
export { RiskAgent } from './agents/risk-agent.js';
export { ConsistencyAgent } from './agents/consistency-agent.js';
export { MemoAgent } from './agents/memo-agent.js';
export { QuoteAgent } from './agents/quote-agent.js';
export { ChartAgent } from './agents/chart-agent.js';

export { DocumentChunker, chunkDocument, reassembleChunks, type ChunkerOptions } from './chunking/document-chunker.js';
export { classifySection } from './chunking/section-types.js';

export * from './schemas/index.js';

export { AnthropicModelClient, createModelClient, type ModelClient, type CompleteOptions } from './bridge/model-client.js';
export { sourceToText, sheetsToText, type TextExtractor, type DocumentSource, type Transcript } from './bridge/text-extractor.js';

export { LocalRecordStore, type RecordStore, type StoreRecord, type RecordFilter } from './store/record-store.js';
export { PgRecordStore } from './store/pg-record-store.js';
export { ResultRecorder, TABLES } from './store/result-recorder.js';

// Store factory: auto-selects backend from CIM_STORE_BACKEND env var
export { createRecordStore } from './config/store.js';
export { loadConfig, DEFAULT_MODEL, type CimConfig } from './config/index.js';

export { extractBlock, type BlockKind, type RawBlock } from './utils/response-extractor.js';
export { parseMetricValue, type ParsedMetricValue, type MetricUnit } from './utils/metric-value.js';
export * from './utils/errors.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';

export * from './types/index.js';
