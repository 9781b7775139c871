// Shared enumerations used by several agent schemas

export const SEVERITIES = ['high', 'medium', 'low'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const METRIC_TYPES = ['revenue', 'profitability', 'growth', 'multiple', 'other'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export const INCONSISTENCY_TYPES = ['financial', 'narrative', 'metric', 'timeline', 'other'] as const;

export const INVESTMENT_GRADES = ['A+', 'A', 'B+', 'B', 'C'] as const;
export type InvestmentGrade = (typeof INVESTMENT_GRADES)[number];

export const RECOMMENDATION_DECISIONS = ['invest', 'pass', 'further_diligence'] as const;

export const QUOTE_TYPES = ['testimonial', 'executive', 'customer', 'expert', 'other'] as const;
export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;
export const QUOTE_RELATIONSHIP_TYPES = ['supports', 'contradicts', 'contextualizes'] as const;

export const CHART_TYPES = ['bar', 'line', 'pie', 'table', 'other'] as const;
export const CHART_RELATIONSHIP_TYPES = ['explanation', 'reference', 'data_source'] as const;
