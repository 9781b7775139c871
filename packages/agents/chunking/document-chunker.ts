// Document chunker: splits CIM text into bounded, ordered, classified chunks
// Pure function of the input: same text and options always give the same chunks

import type { Chunk, PageRange, SectionType } from '../types/document.js';
import { classifySection, isSectionHeader } from './section-types.js';

export interface ChunkerOptions {
  /** Upper bound on chunk text length */
  maxChars?: number;
  /** Longest block still considered a section header */
  headerMaxChars?: number;
}

export const DEFAULT_CHUNK_MAX_CHARS = 4000;
export const DEFAULT_HEADER_MAX_CHARS = 80;

const PAGE_MARKER_RE = /\[Page\s+(\d+)\]/gi;
const PAGE_ONLY_RE = /^\[Page\s+\d+\]$/i;
const BLOCK_SEPARATOR = '\n\n';

interface Block {
  text: string;
  pages?: PageRange;
}

interface Section {
  index: number;
  title?: string;
  type: SectionType;
  blocks: Block[];
}

interface Piece {
  text: string;
  pages?: PageRange;
  blockCount: number;
  continued: boolean;
}

function splitBlocks(text: string): string[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n[ \t]*\n/)
    .map(b => b.trim())
    .filter(b => b.length > 0);
}

function mergePages(a: PageRange | undefined, b: PageRange | undefined): PageRange | undefined {
  if (!a) return b;
  if (!b) return a;
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

/** Groups blocks under the header that precedes them; page markers only move the page cursor. */
function buildSections(text: string, headerMaxChars: number): Section[] {
  const sections: Section[] = [];
  let current: Section = { index: 0, type: 'other', blocks: [] };
  let page: number | undefined;

  for (const block of splitBlocks(text)) {
    const markers = [...block.matchAll(PAGE_MARKER_RE)].map(m => Number(m[1]));

    if (PAGE_ONLY_RE.test(block)) {
      page = markers[0];
      continue;
    }
    if (isSectionHeader(block, headerMaxChars)) {
      if (current.blocks.length > 0) sections.push(current);
      current = { index: current.index + 1, title: block, type: classifySection(block), blocks: [] };
      continue;
    }

    const start = page ?? markers[0];
    if (markers.length > 0) page = markers[markers.length - 1];
    const pages = start !== undefined && page !== undefined
      ? { start: Math.min(start, page), end: Math.max(start, page) }
      : undefined;
    current.blocks.push({ text: block, pages });
  }
  if (current.blocks.length > 0) sections.push(current);
  return sections;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/** Cuts an oversize block at whitespace into exact substrings of at most maxChars. */
export function hardSplit(text: string, maxChars: number): string[] {
  requirePositiveInteger('maxChars', maxChars);
  const pieces: string[] = [];
  let rest = text;
  while (rest.length > maxChars) {
    let cut = maxChars;
    while (cut > 0 && !/\s/.test(rest[cut])) cut--;
    if (cut === 0) cut = maxChars;
    pieces.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  pieces.push(rest);
  return pieces;
}

function* packSection(section: Section, maxChars: number): Generator<Piece> {
  let texts: string[] = [];
  let pages: PageRange | undefined;
  let length = 0;

  const flush = (): Piece | undefined => {
    if (texts.length === 0) return undefined;
    const piece: Piece = { text: texts.join(BLOCK_SEPARATOR), pages, blockCount: texts.length, continued: false };
    texts = [];
    pages = undefined;
    length = 0;
    return piece;
  };

  for (const block of section.blocks) {
    if (block.text.length > maxChars) {
      const pending = flush();
      if (pending) yield pending;
      const parts = hardSplit(block.text, maxChars);
      for (let i = 0; i < parts.length; i++) {
        yield { text: parts[i], pages: block.pages, blockCount: 1, continued: i > 0 };
      }
      continue;
    }

    const added = texts.length === 0 ? block.text.length : length + BLOCK_SEPARATOR.length + block.text.length;
    if (added > maxChars) {
      const pending = flush();
      if (pending) yield pending;
      texts.push(block.text);
      length = block.text.length;
    } else {
      texts.push(block.text);
      length = added;
    }
    pages = mergePages(pages, block.pages);
  }

  const last = flush();
  if (last) yield last;
}

export class DocumentChunker {
  private readonly maxChars: number;
  private readonly headerMaxChars: number;

  constructor(options: ChunkerOptions = {}) {
    this.maxChars = requirePositiveInteger('maxChars', options.maxChars ?? DEFAULT_CHUNK_MAX_CHARS);
    this.headerMaxChars = requirePositiveInteger('headerMaxChars', options.headerMaxChars ?? DEFAULT_HEADER_MAX_CHARS);
  }

  /** Lazily yields chunks in document order. Each call starts over from the beginning. */
  *iterate(text: string): Generator<Chunk> {
    let sequence = 0;
    for (const section of buildSections(text, this.headerMaxChars)) {
      for (const piece of packSection(section, this.maxChars)) {
        const metadata: Chunk['metadata'] = {
          section_index: section.index,
          block_count: piece.blockCount,
        };
        if (piece.continued) metadata.continued = true;

        yield {
          sequence: sequence++,
          text: piece.text,
          length: piece.text.length,
          sectionType: section.type,
          title: section.title,
          pageRange: piece.pages,
          metadata,
          processed: false,
        };
      }
    }
  }

  chunk(text: string): Chunk[] {
    return [...this.iterate(text)];
  }
}

export function chunkDocument(text: string, options?: ChunkerOptions): Chunk[] {
  return new DocumentChunker(options).chunk(text);
}

/**
 * Joins chunks back in sequence order. Hard-split continuations are glued directly,
 * everything else with a blank line, so the result is the document's body text
 * without section headers or page-marker blocks.
 */
export function reassembleChunks(chunks: readonly Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.sequence - b.sequence);
  return ordered
    .map((c, i) => (i === 0 ? c.text : (c.metadata.continued === true ? '' : BLOCK_SEPARATOR) + c.text))
    .join('');
}
