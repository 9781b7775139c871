// Memo Agent: investment memo built from the document and every upstream analysis
// Output matches the cim_analysis table

import { BaseAgent } from './base-agent.js';
import type { AgentContext } from '../types/agents.js';
import { memoSchema, type InvestmentMemo } from '../schemas/memo.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';
import { contextJson } from '../utils/prompt.js';

export class MemoAgent extends BaseAgent<'memo'> {
  readonly name = 'memo';
  readonly budget = 25_000;
  protected readonly schema = memoSchema;

  private upstreamSections(context: AgentContext): string {
    const sections: string[] = [];
    if (context.financialMetrics) {
      sections.push(`Financial metrics (financial_metrics):\n${contextJson(context.financialMetrics)}`);
    }
    if (context.risks) {
      sections.push(`Risk analysis (risks):\n${contextJson(context.risks)}`);
    }
    if (context.consistencyAnalysis) {
      sections.push(`Consistency analysis (consistency_analysis):\n${contextJson(context.consistencyAnalysis)}`);
    }
    return sections.length > 0
      ? sections.join('\n\n')
      : 'No upstream analysis is available; work from the document alone.';
  }

  buildPrompt(text: string, context: AgentContext): string {
    return `You are a senior private equity analyst writing an investment memo on the company described in a Confidential Information Memorandum (CIM).

${this.outputFormat()}

Grades: A+ (exceptional), A (strong), B+ (good with caveats), B (average), C (weak).

${this.upstreamSections(context)}

CIM Document:
${this.documentText(text)}

Write the memo following the structure above. Base the financial and risk sections on the analyses provided, flag any inconsistencies that affect the recommendation, and list the questions management must answer before a decision.

Return ONLY the JSON object with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<InvestmentMemo> {
    return normalize(raw, memoSchema);
  }
}
