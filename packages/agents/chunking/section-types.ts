// Header → section type classification
// First matching row wins, so more specific keywords sit above broader ones

import type { SectionType } from '../types/document.js';

const SECTION_KEYWORDS: ReadonlyArray<readonly [SectionType, readonly string[]]> = [
  ['executive_summary', ['executive summary', 'overview', 'introduction', 'investment highlights']],
  ['risk_analysis', ['risk']],
  ['financial_metrics', ['financial', 'revenue', 'ebitda', 'income', 'earnings', 'margin']],
  ['business_model', ['business model', 'business', 'products', 'services', 'operations', 'customers']],
  ['management', ['management', 'leadership', 'team', 'board', 'founder']],
  ['market_analysis', ['market', 'industry', 'competition', 'competitive']],
];

export function classifySection(header: string | undefined): SectionType {
  if (!header) return 'other';
  const lower = header.toLowerCase();
  for (const [type, keywords] of SECTION_KEYWORDS) {
    if (keywords.some(k => lower.includes(k))) return type;
  }
  return 'other';
}

// Currency or percent signs, decimals and "LABEL: 12" shapes mark a data line, not a heading
const DATA_LINE_RE = /[$€£¥%]|\d[.,]\d|:\s*[-+(]?\d/;

/** A short single-line block written entirely in upper case that carries no figures */
export function isSectionHeader(block: string, maxChars: number): boolean {
  if (block.length === 0 || block.length > maxChars || block.includes('\n')) return false;
  if (DATA_LINE_RE.test(block)) return false;
  return /[A-Z]/.test(block) && block === block.toUpperCase();
}
