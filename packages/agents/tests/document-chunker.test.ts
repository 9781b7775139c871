import { describe, it, expect } from 'vitest';
import {
  DocumentChunker, chunkDocument, hardSplit, reassembleChunks,
} from '../chunking/document-chunker.js';
import { classifySection, isSectionHeader } from '../chunking/section-types.js';

const SAMPLE = [
  'Prepared for qualified buyers only.',
  'EXECUTIVE SUMMARY',
  'Acme Corp makes industrial widgets.',
  'It has 40 years of operating history.',
  'FINANCIAL PERFORMANCE',
  'Revenue grew to $10M in 2023.',
  'KEY RISKS',
  'Customer concentration is high.',
  'MANAGEMENT TEAM',
  'The CEO founded the company.',
].join('\n\n');

describe('DocumentChunker', () => {
  it('splits on section headers and classifies each section', () => {
    const chunks = chunkDocument(SAMPLE);

    expect(chunks.map(c => c.sectionType)).toEqual([
      'other', 'executive_summary', 'financial_metrics', 'risk_analysis', 'management',
    ]);
    expect(chunks.map(c => c.sequence)).toEqual([0, 1, 2, 3, 4]);
    expect(chunks.map(c => c.metadata.section_index)).toEqual([0, 1, 2, 3, 4]);
    expect(chunks[0].title).toBeUndefined();
    expect(chunks[1].title).toBe('EXECUTIVE SUMMARY');
    expect(chunks[1].text).toBe('Acme Corp makes industrial widgets.\n\nIt has 40 years of operating history.');
    expect(chunks[1].metadata.block_count).toBe(2);
    expect(chunks.every(c => c.length === c.text.length && !c.processed)).toBe(true);
  });

  it('packs blocks up to the size bound', () => {
    const text = 'one two three\n\nfour five six\n\nseven eight';
    const chunks = chunkDocument(text, { maxChars: 30 });

    expect(chunks.map(c => c.text)).toEqual(['one two three\n\nfour five six', 'seven eight']);
    expect(chunks.map(c => c.metadata.block_count)).toEqual([2, 1]);
    expect(chunks.every(c => c.length <= 30)).toBe(true);
  });

  it('hard-splits an oversize block at whitespace and can be reassembled', () => {
    const text = 'alpha beta gamma delta';
    const chunks = chunkDocument(text, { maxChars: 10 });

    expect(chunks.map(c => c.text)).toEqual(['alpha beta', ' gamma', ' delta']);
    expect(chunks.map(c => c.metadata.continued)).toEqual([undefined, true, true]);
    expect(reassembleChunks(chunks)).toBe(text);
  });

  it('tracks page ranges from page markers', () => {
    const text = '[Page 1]\n\nFirst page text.\n\n[Page 2]\n\nSecond page text.';
    const [chunk, ...rest] = chunkDocument(text);

    expect(rest).toHaveLength(0);
    expect(chunk.text).toBe('First page text.\n\nSecond page text.');
    expect(chunk.pageRange).toEqual({ start: 1, end: 2 });
  });

  it('skips a header with no body of its own', () => {
    const chunks = chunkDocument('OVERVIEW\n\nMARKET\n\nThe market is large.');

    expect(chunks).toHaveLength(1);
    expect(chunks[0].title).toBe('MARKET');
    expect(chunks[0].sectionType).toBe('market_analysis');
    expect(chunks[0].metadata.section_index).toBe(2);
  });

  it('is deterministic', () => {
    const chunker = new DocumentChunker({ maxChars: 40 });
    expect(chunker.chunk(SAMPLE)).toEqual(chunker.chunk(SAMPLE));
  });

  it('yields chunks lazily in order', () => {
    const iterator = new DocumentChunker().iterate(SAMPLE);
    const first = iterator.next();
    expect(first.done).toBe(false);
    expect(first.value?.sequence).toBe(0);
  });

  it('returns no chunks for blank text', () => {
    expect(chunkDocument('  \n\n \n')).toEqual([]);
  });

  it('keeps upper-case figure lines in the body', () => {
    const chunks = chunkDocument('FINANCIAL OVERVIEW\n\nEBITDA: $2M\n\nRevenue rose in 2023.');

    expect(chunks.map(c => c.title)).toEqual(['FINANCIAL OVERVIEW']);
    expect(chunks[0].text).toBe('EBITDA: $2M\n\nRevenue rose in 2023.');
  });

  it.each([0, -5, 2.5, Number.NaN])('rejects maxChars %s', (maxChars) => {
    expect(() => new DocumentChunker({ maxChars })).toThrow(RangeError);
    expect(() => chunkDocument('alpha beta', { maxChars })).toThrow('maxChars must be a positive integer');
  });

  it('rejects a non-positive headerMaxChars', () => {
    expect(() => new DocumentChunker({ headerMaxChars: 0 })).toThrow('headerMaxChars must be a positive integer, got 0');
  });

  it('normalizes CRLF line endings', () => {
    expect(chunkDocument('one\r\n\r\ntwo').map(c => c.text)).toEqual(['one\n\ntwo']);
  });
});

describe('hardSplit', () => {
  it('cuts at maxChars when there is no whitespace', () => {
    expect(hardSplit('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('refuses a zero bound', () => {
    expect(() => hardSplit('abc', 0)).toThrow('maxChars must be a positive integer, got 0');
  });
});

describe('classifySection', () => {
  it.each([
    ['INVESTMENT HIGHLIGHTS', 'executive_summary'],
    ['RISK FACTORS', 'risk_analysis'],
    ['EBITDA BRIDGE', 'financial_metrics'],
    ['PRODUCTS AND SERVICES', 'business_model'],
    ['BOARD OF DIRECTORS', 'management'],
    ['INDUSTRY OVERVIEW', 'executive_summary'],
    ['COMPETITIVE LANDSCAPE', 'market_analysis'],
    ['APPENDIX', 'other'],
  ])('%s → %s', (header, type) => {
    expect(classifySection(header)).toBe(type);
  });

  it('returns other for a missing header', () => {
    expect(classifySection(undefined)).toBe('other');
  });
});

describe('isSectionHeader', () => {
  it('requires a short upper-case single line', () => {
    expect(isSectionHeader('KEY RISKS', 80)).toBe(true);
    expect(isSectionHeader('Key Risks', 80)).toBe(false);
    expect(isSectionHeader('2023', 80)).toBe(false);
    expect(isSectionHeader('KEY\nRISKS', 80)).toBe(false);
    expect(isSectionHeader('A'.repeat(81), 80)).toBe(false);
  });

  it('treats lines carrying figures as data', () => {
    expect(isSectionHeader('EBITDA: $2M', 80)).toBe(false);
    expect(isSectionHeader('GROSS MARGIN 42%', 80)).toBe(false);
    expect(isSectionHeader('NET DEBT 1.5X', 80)).toBe(false);
    expect(isSectionHeader('FY2023 HIGHLIGHTS', 80)).toBe(true);
  });
});
