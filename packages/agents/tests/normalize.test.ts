import { describe, it, expect } from 'vitest';
import { normalize, conforms, assertConforms, formatIssue } from '../schemas/normalize.js';
import { riskSchema } from '../schemas/risk.js';
import { consistencySchema } from '../schemas/consistency.js';
import { financialSchema } from '../schemas/financial.js';
import { chartSchema } from '../schemas/chart.js';
import { memoSchema } from '../schemas/memo.js';
import { ValidationImpossible } from '../utils/errors.js';

describe('normalize', () => {
  it('clamps out-of-range scores and records each clamp', () => {
    const { value, issues } = normalize(
      { risk_scores: { market_risk: 1.7, financial_risk: -0.2, operational_risk: 0.4 } },
      riskSchema,
    );

    expect(value.risk_scores.market_risk).toBe(1);
    expect(value.risk_scores.financial_risk).toBe(0);
    expect(value.risk_scores.operational_risk).toBe(0.4);
    expect(issues).toContainEqual({ path: '$.risk_scores.market_risk', kind: 'clamped', detail: '1.7 → 1' });
    expect(issues).toContainEqual({ path: '$.risk_scores.financial_risk', kind: 'clamped', detail: '-0.2 → 0' });
  });

  it('falls back on unknown enum values', () => {
    const { value, issues } = normalize(
      { inconsistencies: [{ type: 'financial', description: 'Revenue differs', severity: 'catastrophic' }] },
      consistencySchema,
    );

    expect(value.inconsistencies[0].severity).toBe('medium');
    expect(value.inconsistencies[0].type).toBe('financial');
    expect(issues).toContainEqual({
      path: '$.inconsistencies[0].severity',
      kind: 'enum_fallback',
      detail: '"catastrophic" not in {high, medium, low}; using "medium"',
    });
  });

  it('matches enum values case-insensitively', () => {
    const { value, issues } = normalize(
      { risk_categories: { market_risks: [{ title: 'Churn', severity: 'HIGH' }] } },
      riskSchema,
    );

    expect(value.risk_categories.market_risks[0].severity).toBe('high');
    expect(issues).toContainEqual({
      path: '$.risk_categories.market_risks[0].severity',
      kind: 'coerced',
      detail: '"HIGH" → "high"',
    });
  });

  it('fills every field of an empty object with defaults', () => {
    const { value } = normalize({}, riskSchema);

    expect(value).toEqual({
      risk_summary: '',
      risk_categories: {
        market_risks: [],
        financial_risks: [],
        operational_risks: [],
        regulatory_risks: [],
        other_risks: [],
      },
      risk_scores: {
        market_risk: 0,
        financial_risk: 0,
        operational_risk: 0,
        regulatory_risk: 0,
        overall_risk: 0,
      },
      mitigation_strategies: [],
      confidence_score: 0,
    });
  });

  it('applies schema defaults to a memo missing its grade and decision', () => {
    const { value } = normalize({ executive_summary: 'Solid niche business' }, memoSchema);

    expect(value.investment_grade).toBe('B');
    expect(value.recommendation.decision).toBe('further_diligence');
    expect(value.executive_summary).toBe('Solid niche business');
  });

  it('coerces numeric strings', () => {
    const { value, issues } = normalize({ confidence_score: '0.85' }, riskSchema);

    expect(value.confidence_score).toBe(0.85);
    expect(issues).toContainEqual({
      path: '$.confidence_score',
      kind: 'coerced',
      detail: 'numeric string "0.85" → 0.85',
    });
  });

  it('places a bare string risk into its description', () => {
    const { value } = normalize(
      { risk_categories: { regulatory_risks: ['Pending FDA review'] } },
      riskSchema,
    );

    expect(value.risk_categories.regulatory_risks).toEqual([
      { title: '', description: 'Pending FDA review', severity: 'medium', likelihood: 'medium', impact: '' },
    ]);
  });

  it('unwraps a metrics array nested under "metrics"', () => {
    const metric = {
      metric_name: 'Revenue',
      metric_value: '$10M',
      metric_type: 'revenue',
      time_period: '2023',
      source_section: 'Financials',
      confidence_score: 0.9,
    };
    const { value, issues } = normalize({ metrics: [metric] }, financialSchema);

    expect(value).toEqual([metric]);
    expect(issues).toEqual([{ path: '$', kind: 'coerced', detail: 'unwrapped "metrics"' }]);
  });

  it('wraps a single metric object into an array', () => {
    const { value } = normalize({ metric_name: 'EBITDA', metric_value: '$2M' }, financialSchema);

    expect(value).toHaveLength(1);
    expect(value[0].metric_name).toBe('EBITDA');
    expect(value[0].metric_type).toBe('other');
  });

  it('drops scalars found in a list of records', () => {
    const metric = {
      metric_name: 'EBITDA',
      metric_value: '$2M',
      metric_type: 'profitability',
      time_period: '2023',
      source_section: 'Financials',
      confidence_score: 0.8,
    };
    const { value, issues } = normalize([1, metric, null], financialSchema);

    expect(value).toEqual([metric]);
    expect(issues).toEqual([
      { path: '$[0]', kind: 'dropped_item', detail: 'number 1 is not an object' },
      { path: '$[2]', kind: 'dropped_item', detail: 'null is not an object' },
    ]);
  });

  it('drops undeclared keys and records them', () => {
    const { value, issues } = normalize({ risk_summary: 'ok', extra_field: 42 }, riskSchema);

    expect(value).not.toHaveProperty('extra_field');
    expect(issues).toContainEqual({ path: '$.extra_field', kind: 'dropped_key', detail: 'not declared in schema' });
  });

  it('returns the default value when nothing was extracted', () => {
    const { value, issues } = normalize(undefined, financialSchema);

    expect(value).toEqual([]);
    expect(issues).toEqual([{ path: '$', kind: 'missing', detail: 'field absent, default applied' }]);
  });

  it('truncates and floors integer fields', () => {
    const { value } = normalize(
      { chart_elements: [{ title: 'Revenue by year', source_page: 3.7 }, { title: 'Mix', source_page: -2 }] },
      chartSchema,
    );

    expect(value.chart_elements.map(c => c.source_page)).toEqual([3, 0]);
  });

  it('always produces a value that conforms to its schema', () => {
    const inputs: unknown[] = [null, 'text', 42, [], { risk_scores: 'high' }, { risk_categories: { market_risks: {} } }];
    for (const input of inputs) {
      const { value } = normalize(input, riskSchema);
      expect(conforms(value, riskSchema)).toBe(true);
    }
  });
});

describe('assertConforms', () => {
  it('throws ValidationImpossible listing the problems', () => {
    expect(() => assertConforms({ risk_summary: 3 }, riskSchema)).toThrow(ValidationImpossible);
  });

  it('accepts a normalized value', () => {
    const { value } = normalize({}, consistencySchema);
    expect(() => assertConforms(value, consistencySchema)).not.toThrow();
  });
});

describe('formatIssue', () => {
  it('renders kind, path and detail', () => {
    expect(formatIssue({ path: '$.a', kind: 'missing', detail: 'field absent, default applied' }))
      .toBe('missing $.a: field absent, default applied');
  });
});
