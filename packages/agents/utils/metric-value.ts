// Derives a numeric value and unit from a metric value as written in a CIM
// "$10M" → 10000000 USD, "15%" → 15 %, "2.5x" → 2.5 x, "($1.2M)" → -1200000 USD

export type MetricUnit = 'USD' | '%' | 'x' | '';

export interface ParsedMetricValue {
  numeric_value: number | null;
  unit: MetricUnit;
}

const MULTIPLIERS: Record<string, number> = {
  t: 1e12, trillion: 1e12,
  b: 1e9, bn: 1e9, billion: 1e9,
  m: 1e6, mm: 1e6, mn: 1e6, million: 1e6,
  k: 1e3, thousand: 1e3,
};

const NUMBER = String.raw`(\d[\d,]*(?:\.\d+)?|\.\d+)`;

const PCT_RE = new RegExp(`${NUMBER}\\s*(?:%|percent\\b)`, 'i');
const MULT_RE = new RegExp(`${NUMBER}\\s*x(?![a-z])`, 'i');
const AMOUNT_RE = new RegExp(`${NUMBER}\\s*(trillion|billion|million|thousand|bn|mm|mn|t|b|m|k)?(?![a-z])`, 'i');

const CURRENCY_RE = /\$|\busd\b/i;

function toNumber(digits: string): number {
  return parseFloat(digits.replace(/,/g, ''));
}

function isNegative(text: string): boolean {
  return /^\(.*\)$/.test(text) || /^(?:\$\s*|usd\s*)?[-−]/i.test(text);
}

export function parseMetricValue(value: string): ParsedMetricValue {
  const text = value.trim();
  const sign = isNegative(text) ? -1 : 1;

  const pct = PCT_RE.exec(text);
  if (pct) return { numeric_value: sign * toNumber(pct[1]), unit: '%' };

  const mult = MULT_RE.exec(text);
  if (mult) return { numeric_value: sign * toNumber(mult[1]), unit: 'x' };

  const amount = AMOUNT_RE.exec(text);
  if (!amount) return { numeric_value: null, unit: '' };

  const base = toNumber(amount[1]);
  const suffix = amount[2]?.toLowerCase();
  const scaled = suffix ? base * (MULTIPLIERS[suffix] ?? 1) : base;
  return {
    numeric_value: sign * scaled,
    unit: CURRENCY_RE.test(text) ? 'USD' : '',
  };
}
