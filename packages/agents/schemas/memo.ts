// Memo agent output: investment memo matching the cim_analysis table

import { arr, defineSchema, enumOf, obj, record, score, str, type SchemaOutput } from './field-spec.js';
import { INVESTMENT_GRADES, RECOMMENDATION_DECISIONS } from './common.js';

export const memoSchema = defineSchema('memo', obj({
  investment_grade: enumOf(INVESTMENT_GRADES, 'B', 'Grade reflecting risk/reward'),
  executive_summary: str('Brief overview of the investment opportunity'),
  business_model: obj({
    description: str(),
    revenue_streams: arr(str()),
    customer_base: str(),
    scalability: str(),
  }),
  financial_analysis: obj({
    summary: str(),
    key_metrics: record('Metric name to value'),
    trends: arr(str()),
  }),
  key_risks: obj({
    summary: str(),
    top_risks: arr(str()),
  }),
  competitive_position: obj({
    market_position: str(),
    advantages: arr(str()),
    competitors: arr(str()),
  }),
  recommendation: obj({
    decision: enumOf(RECOMMENDATION_DECISIONS, 'further_diligence'),
    rationale: str(),
    conditions: arr(str()),
  }),
  investment_highlights: arr(str()),
  management_questions: arr(str()),
  confidence_score: score('Confidence in the memo'),
}));

export type InvestmentMemo = SchemaOutput<typeof memoSchema>;
