// Quote Agent: significant quotes with speaker context, linked to the metrics they bear on

import { BaseAgent } from './base-agent.js';
import type { AgentContext } from '../types/agents.js';
import { quoteSchema, type QuoteAnalysis } from '../schemas/quote.js';
import { normalize, type NormalizeResult } from '../schemas/normalize.js';

export class QuoteAgent extends BaseAgent<'quote'> {
  readonly name = 'quote';
  readonly budget = 8_000;
  protected readonly schema = quoteSchema;

  buildPrompt(text: string, _context: AgentContext): string {
    return `You are an expert at identifying significant quotes in a Confidential Information Memorandum (CIM): statements from executives, customers, experts or testimonials that carry weight for an investor.

${this.outputFormat()}
- quote_id must be the zero-based position of the quote in "quotes"

CIM Document:
${this.documentText(text)}

For each quote, capture the exact wording, who said it, the surrounding context and how significant it is. Link quotes to the financial metrics or KPIs they support, contradict or put in context.

Return ONLY the JSON object with no additional text or explanation.`;
  }

  protected parse(raw: unknown): NormalizeResult<QuoteAnalysis> {
    return normalize(raw, quoteSchema);
  }
}
