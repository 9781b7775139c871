// Agent identities, results and the typed context threaded between agents

import type { MetricRecord } from '../schemas/financial.js';
import type { RiskAnalysis } from '../schemas/risk.js';
import type { ConsistencyAnalysis } from '../schemas/consistency.js';
import type { InvestmentMemo } from '../schemas/memo.js';
import type { QuoteAnalysis } from '../schemas/quote.js';
import type { ChartAnalysis } from '../schemas/chart.js';
import type { ParsedMetricValue } from '../utils/metric-value.js';

export type AgentName = 'financial' | 'risk' | 'consistency' | 'memo' | 'quote' | 'chart';

/** Dependency chain, in execution order */
export const CORE_AGENTS = ['financial', 'risk', 'consistency', 'memo'] as const;
/** Independent of the chain; may run concurrently with it */
export const AUXILIARY_AGENTS = ['quote', 'chart'] as const;
export const ALL_AGENTS: readonly AgentName[] = [...CORE_AGENTS, ...AUXILIARY_AGENTS];

export type FinancialMetric = MetricRecord & ParsedMetricValue;

export interface AgentOutputs {
  financial: FinancialMetric[];
  risk: RiskAnalysis;
  consistency: ConsistencyAnalysis;
  memo: InvestmentMemo;
  quote: QuoteAnalysis;
  chart: ChartAnalysis;
}

export interface AgentSuccess<N extends AgentName = AgentName> {
  readonly agent: N;
  readonly status: 'success';
  readonly output: AgentOutputs[N];
  readonly error: null;
  readonly log: readonly string[];
  readonly durationMs: number;
}

export interface AgentFailure<N extends AgentName = AgentName> {
  readonly agent: N;
  readonly status: 'error';
  readonly output: null;
  readonly error: string;
  readonly log: readonly string[];
  readonly durationMs: number;
}

export type AgentResult<N extends AgentName = AgentName> = AgentSuccess<N> | AgentFailure<N>;

export type AgentResults = { [N in AgentName]?: AgentResult<N> };

/**
 * Validated outputs of upstream agents. Additive only: a key, once set, is never replaced.
 * Wire names: financial_metrics, risks, consistency_analysis.
 */
export interface AgentContext {
  readonly financialMetrics?: FinancialMetric[];
  readonly risks?: RiskAnalysis;
  readonly consistencyAnalysis?: ConsistencyAnalysis;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** The single operation every agent exposes. */
export interface Agent<N extends AgentName = AgentName> {
  readonly name: N;
  buildPrompt(text: string, context: AgentContext): string;
  execute(text: string, context: AgentContext, options?: ExecuteOptions): Promise<AgentResult<N>>;
}
