// Financial Agent: extracts key metrics (revenue, EBITDA, margins, growth, multiples)
// Output rows match the deal_metrics table; numeric value and unit are derived from metric_value

import { BaseAgent } from './base-agent.js';
import type { AgentContext, FinancialMetric } from '../types/agents.js';
import type { BlockKind } from '../utils/response-extractor.js';
import { financialSchema } from '../schemas/financial.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';
import { parseMetricValue } from '../utils/metric-value.js';

export class FinancialAgent extends BaseAgent<'financial'> {
  readonly name = 'financial';
  readonly budget = 12_000;
  protected readonly schema = financialSchema;
  protected readonly blockKind: BlockKind = 'any';

  buildPrompt(text: string, _context: AgentContext): string {
    return `You are a financial analyst extracting key metrics from a Confidential Information Memorandum (CIM).

Return a JSON array with one object per metric found.

${this.outputFormat()}
- metric_value must keep the value exactly as written, including currency symbols and units (e.g. "$10M", "15%", "2.5x")
- Percentages stay as written; do not convert 15% to 0.15

Focus on:
1. Revenue and revenue growth
2. Profitability (EBITDA, EBITDA margin, gross margin, net income)
3. Growth rates and CAGRs
4. Valuation multiples
5. Any other quantitative KPI the document reports

CIM Document:
${this.documentText(text)}

Return ONLY the JSON array with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<FinancialMetric[]> {
    const { value, issues } = normalize(raw, financialSchema);
    return {
      value: value.map(metric => ({ ...metric, ...parseMetricValue(metric.metric_value) })),
      issues,
    };
  }
}
