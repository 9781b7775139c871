export * from './field-spec.js';
export * from './normalize.js';
export * from './describe.js';
export * from './common.js';
export { financialSchema, type MetricRecord } from './financial.js';
export { riskSchema, type RiskAnalysis, type RiskItem, type RiskCategory } from './risk.js';
export { consistencySchema, type ConsistencyAnalysis, type Inconsistency } from './consistency.js';
export { memoSchema, type InvestmentMemo } from './memo.js';
export { quoteSchema, type QuoteAnalysis } from './quote.js';
export { chartSchema, type ChartAnalysis } from './chart.js';
