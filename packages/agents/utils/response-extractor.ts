// Pulls the first balanced structured block out of free-form model text
// Prose, markdown fences and trailing commentary around the block are ignored

import { MalformedStructure, NoStructuredBlockFound } from './errors.js';
import { isPlainObject } from '../schemas/normalize.js';

export type BlockKind = 'object' | 'array' | 'any';

export type RawBlock = Record<string, unknown> | unknown[];

const OPENERS: Record<BlockKind, readonly string[]> = {
  object: ['{'],
  array: ['['],
  any: ['{', '['],
};

const CLOSER: Record<string, string> = { '{': '}', '[': ']' };

function firstOpening(text: string, kind: BlockKind): number {
  let index = -1;
  for (const opener of OPENERS[kind]) {
    const i = text.indexOf(opener);
    if (i !== -1 && (index === -1 || i < index)) index = i;
  }
  return index;
}

/**
 * Returns the substring from `start` to its balanced closing bracket.
 * Brackets inside JSON strings (including escaped quotes) are skipped.
 */
export function balancedSpan(text: string, start: number): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(CLOSER[ch]);
    } else if (ch === '}' || ch === ']') {
      const expected = stack.pop();
      if (ch !== expected) {
        throw new MalformedStructure(`unexpected "${ch}" at offset ${i}`, text.slice(start, i + 1));
      }
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  throw new MalformedStructure('block is never closed', text.slice(start));
}

/**
 * Extract the first `{...}` (or `[...]`) block from a model response and parse it.
 * First match wins, so identical input always yields the same block.
 */
export function extractBlock(response: string, kind: BlockKind = 'object'): RawBlock {
  const start = firstOpening(response, kind);
  if (start === -1) {
    throw new NoStructuredBlockFound(kind === 'any' ? 'an object or array' : `an ${kind}`);
  }

  const fragment = balancedSpan(response, start);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fragment);
  } catch (err) {
    throw new MalformedStructure(err instanceof Error ? err.message : String(err), fragment, err);
  }

  if (Array.isArray(parsed) || isPlainObject(parsed)) return parsed;
  throw new MalformedStructure('parsed block is not an object or array', fragment);
}
