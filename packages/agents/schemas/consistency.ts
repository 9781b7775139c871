// Consistency agent output: inconsistency findings cross-referenced against upstream agents

import { arr, defineSchema, enumOf, obj, score, str, type SchemaOutput } from './field-spec.js';
import { INCONSISTENCY_TYPES, SEVERITIES } from './common.js';

export const consistencySchema = defineSchema('consistency', obj({
  consistency_summary: str('Overall consistency assessment'),
  inconsistencies: arr(obj({
    type: enumOf(INCONSISTENCY_TYPES, 'other'),
    description: str(),
    location: str('Where in the document the inconsistency appears'),
    severity: enumOf(SEVERITIES, 'medium'),
    impact: str('Impact on the analysis'),
    resolution: str('Suggested resolution'),
  })),
  consistency_scores: obj({
    financial_consistency: score(),
    narrative_consistency: score(),
    metric_consistency: score(),
    timeline_consistency: score(),
    overall_consistency: score(),
  }),
  recommendations: arr(str()),
  confidence_score: score('Confidence in the analysis'),
}));

export type ConsistencyAnalysis = SchemaOutput<typeof consistencySchema>;
export type Inconsistency = ConsistencyAnalysis['inconsistencies'][number];
