// Risk Agent: categorized risk factors, per-category risk scores and mitigations

import { BaseAgent } from './base-agent.js';
import type { AgentContext } from '../types/agents.js';
import { riskSchema, type RiskAnalysis } from '../schemas/risk.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';

export class RiskAgent extends BaseAgent<'risk'> {
  readonly name = 'risk';
  readonly budget = 12_000;
  protected readonly schema = riskSchema;

  buildPrompt(text: string, _context: AgentContext): string {
    return `You are a risk analyst reviewing a Confidential Information Memorandum (CIM) for an investment committee.

${this.outputFormat()}
- Risk scores are 0.0 (no risk) to 1.0 (severe risk)

CIM Document:
${this.documentText(text)}

Identify and categorize the risks following the structure above. Focus on:
1. Market risks (competition, demand, pricing)
2. Financial risks (liquidity, leverage, growth)
3. Operational risks (execution, scalability, technology)
4. Regulatory risks (compliance, legal, policy)
5. Mitigation strategies for the most material risks

Return ONLY the JSON object with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<RiskAnalysis> {
    return normalize(raw, riskSchema);
  }
}
