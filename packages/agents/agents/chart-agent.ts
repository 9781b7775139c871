// Chart Agent: charts and tables described in the document, with their data points

import { BaseAgent } from './base-agent.js';
import type { AgentContext } from '../types/agents.js';
import { chartSchema, type ChartAnalysis } from '../schemas/chart.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';

export class ChartAgent extends BaseAgent<'chart'> {
  readonly name = 'chart';
  readonly budget = 8_000;
  protected readonly schema = chartSchema;

  buildPrompt(text: string, _context: AgentContext): string {
    return `You are an expert at analyzing charts, graphs and tables in a Confidential Information Memorandum (CIM).

${this.outputFormat()}
- chart_id must be the zero-based position of the element in "chart_elements"
- source_page is the page number where the chart appears, or 0 if unknown

CIM Document:
${this.documentText(text)}

For each chart or table, record its type, title, what it shows and the data points it contains. Link each element to the passages of text that explain it, reference it or use it as a data source.

Return ONLY the JSON object with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<ChartAnalysis> {
    return normalize(raw, chartSchema);
  }
}
