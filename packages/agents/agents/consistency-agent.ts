// Consistency Agent: cross-checks narrative claims against extracted metrics and disclosed risks

import { BaseAgent } from './base-agent.js';
import type { AgentContext } from '../types/agents.js';
import { consistencySchema, type ConsistencyAnalysis } from '../schemas/consistency.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';
import { contextJson } from '../utils/prompt.js';

const NOT_AVAILABLE = '(not available: the upstream analysis did not complete)';

export class ConsistencyAgent extends BaseAgent<'consistency'> {
  readonly name = 'consistency';
  readonly budget = 10_000;
  protected readonly schema = consistencySchema;

  buildPrompt(text: string, context: AgentContext): string {
    const metrics = context.financialMetrics ? contextJson(context.financialMetrics) : NOT_AVAILABLE;
    const risks = context.risks ? contextJson(context.risks) : NOT_AVAILABLE;

    return `You are a consistency analyst. Check the following CIM document for inconsistencies and contradictions between its narrative, its financials and its risk disclosures.

${this.outputFormat()}

Extracted financial metrics (financial_metrics):
${metrics}

Identified risks (risks):
${risks}

CIM Document:
${this.documentText(text)}

Cross-reference the document against the metrics and risks above. Focus on:
1. Financial statement consistency
2. Narrative consistency across sections
3. Metric consistency and calculations
4. Timeline consistency
5. Other potential contradictions
6. Recommendations for resolution

Return ONLY the JSON object with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<ConsistencyAnalysis> {
    return normalize(raw, consistencySchema);
  }
}
