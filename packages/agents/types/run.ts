// Orchestration run state and reports

import type { AgentName, AgentResults } from './agents.js';
import type { Chunk } from './document.js';

export type RunState =
  | 'started'
  | 'text_extracted'
  | `running:${AgentName}`
  | 'complete'
  | 'error';

export type RunStatus = 'complete' | 'error';

export interface PersistenceSummary {
  /** Rows written per table */
  inserted: Record<string, number>;
  errors: string[];
}

export interface RunReport {
  readonly documentId: string;
  readonly status: RunStatus;
  readonly results: AgentResults;
  /** Human-readable failures in fixed agent order */
  readonly errors: readonly string[];
  readonly states: readonly RunState[];
  readonly cancelled: boolean;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly persistence?: PersistenceSummary;
}

export interface ChunkedRunReport {
  readonly documentId: string;
  readonly chunks: readonly Chunk[];
  /** perChunkResults[i] is the report for chunks[i] */
  readonly perChunkResults: readonly RunReport[];
  readonly persistence?: PersistenceSummary;
}
