// Documents and chunks

export const SECTION_TYPES = [
  'executive_summary',
  'financial_metrics',
  'risk_analysis',
  'business_model',
  'management',
  'market_analysis',
  'other',
] as const;

export type SectionType = (typeof SECTION_TYPES)[number];

export interface PageRange {
  start: number;
  end: number;
}

export interface Chunk {
  readonly sequence: number;
  readonly text: string;
  readonly length: number;
  readonly sectionType: SectionType;
  readonly title?: string;
  readonly pageRange?: PageRange;
  readonly metadata: Record<string, string | number | boolean>;
  /** Flipped once all agents have run over the chunk */
  processed: boolean;
}

export interface CimDocument {
  readonly id: string;
  readonly text: string;
}
