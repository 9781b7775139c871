// Chart agent output: chart/table elements with data points and links to text

import { arr, defineSchema, enumOf, num, obj, record, score, str, type SchemaOutput } from './field-spec.js';
import { CHART_RELATIONSHIP_TYPES, CHART_TYPES } from './common.js';

export const chartSchema = defineSchema('chart', obj({
  chart_elements: arr(obj({
    chart_type: enumOf(CHART_TYPES, 'other'),
    title: str('Chart title or caption'),
    description: str(),
    data_points: record('Structured data read from the chart'),
    source_page: num({ min: 0, integer: true, description: 'Page where the chart appears, 0 if unknown' }),
    confidence_score: score(),
    metadata: obj({
      axis_labels: arr(str()),
      units: arr(str()),
      categories: arr(str()),
      time_period: str(),
      source: str('Data source if mentioned'),
    }),
  })),
  chart_relationships: arr(obj({
    chart_id: str('Zero-based index of the element in "chart_elements"'),
    related_text: str(),
    relationship_type: enumOf(CHART_RELATIONSHIP_TYPES, 'reference'),
    confidence_score: score(),
  })),
  analysis_summary: str(),
  confidence_score: score('Confidence in the analysis'),
}));

export type ChartAnalysis = SchemaOutput<typeof chartSchema>;
