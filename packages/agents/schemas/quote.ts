// Quote agent output: quotes with speaker context and links to metrics

import { arr, defineSchema, enumOf, obj, score, str, type SchemaOutput } from './field-spec.js';
import { QUOTE_RELATIONSHIP_TYPES, QUOTE_TYPES, SENTIMENTS } from './common.js';

export const quoteSchema = defineSchema('quote', obj({
  quotes: arr(obj({
    quote_text: str('The quote, verbatim'),
    speaker: str(),
    speaker_title: str(),
    context: str('Surrounding context'),
    significance_score: score(),
    quote_type: enumOf(QUOTE_TYPES, 'other'),
    metadata: obj({
      sentiment: enumOf(SENTIMENTS, 'neutral'),
      topics: arr(str()),
      key_points: arr(str()),
      source_section: str(),
    }),
  })),
  quote_relationships: arr(obj({
    quote_id: str('Zero-based index of the quote in "quotes"'),
    related_metric: str('Related metric or KPI'),
    relationship_type: enumOf(QUOTE_RELATIONSHIP_TYPES, 'contextualizes'),
    confidence_score: score(),
  })),
  analysis_summary: str(),
  confidence_score: score('Confidence in the analysis'),
}));

export type QuoteAnalysis = SchemaOutput<typeof quoteSchema>;
