// Risk agent output: categorized risks, per-category scores, mitigations

import { arr, defineSchema, enumOf, obj, score, str, type SchemaOutput } from './field-spec.js';
import { SEVERITIES } from './common.js';

const riskItem = obj({
  title: str('Short name of the risk'),
  description: str(),
  severity: enumOf(SEVERITIES, 'medium'),
  likelihood: enumOf(SEVERITIES, 'medium'),
  impact: str('Expected effect on the business or the investment'),
}, { fromString: 'description' });

export const riskSchema = defineSchema('risk', obj({
  risk_summary: str('Overall risk assessment'),
  risk_categories: obj({
    market_risks: arr(riskItem, { description: 'Competition, demand, pricing' }),
    financial_risks: arr(riskItem, { description: 'Liquidity, leverage, growth' }),
    operational_risks: arr(riskItem, { description: 'Execution, scalability, technology' }),
    regulatory_risks: arr(riskItem, { description: 'Compliance, legal, policy' }),
    other_risks: arr(riskItem),
  }),
  risk_scores: obj({
    market_risk: score(),
    financial_risk: score(),
    operational_risk: score(),
    regulatory_risk: score(),
    overall_risk: score(),
  }),
  mitigation_strategies: arr(str()),
  confidence_score: score('Confidence in the analysis'),
}));

export type RiskAnalysis = SchemaOutput<typeof riskSchema>;
export type RiskItem = RiskAnalysis['risk_categories']['market_risks'][number];
export type RiskCategory = keyof RiskAnalysis['risk_categories'];
