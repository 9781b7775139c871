// Financial agent output: an array of metric records matching the deal_metrics table

import { arr, defineSchema, enumOf, obj, score, str, type SchemaOutput } from './field-spec.js';
import { METRIC_TYPES } from './common.js';

export const financialSchema = defineSchema('financial', arr(
  obj({
    metric_name: str('Name of the metric, e.g. "Revenue", "EBITDA", "Gross Margin"'),
    metric_value: str('Value exactly as stated, units preserved, e.g. "$10M", "15%", "2.5x"'),
    metric_type: enumOf(METRIC_TYPES, 'other'),
    time_period: str('Period the metric applies to, e.g. "2023", "LTM", "5Y CAGR"'),
    source_section: str('Section of the document where the metric was found'),
    confidence_score: score('Confidence in the extraction'),
  }),
  { wrapSingle: true, unwrapKey: 'metrics' },
));

export type MetricRecord = SchemaOutput<typeof financialSchema>[number];
