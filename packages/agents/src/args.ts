// Argument parsing for the `cim` CLI

import { basename, extname } from 'node:path';

export interface AnalyzeArgs {
  file: string;
  documentId: string;
  chunked: boolean;
  includeAuxiliary: boolean;
  json: boolean;
}

export type ParsedArgs =
  | { ok: true; args: AnalyzeArgs }
  | { ok: false; error: string }
  | { ok: false; help: true };

export function defaultDocumentId(file: string): string {
  return basename(file, extname(file));
}

export function parseAnalyzeArgs(args: string[]): ParsedArgs {
  let documentId: string | undefined;
  let chunked = false;
  let includeAuxiliary = true;
  let json = false;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return { ok: false, help: true };
    } else if (arg === '--id') {
      const value = args[i + 1];
      if (!value || value.startsWith('--')) return { ok: false, error: '--id requires a value' };
      documentId = value;
      i++;
    } else if (arg === '--chunked') {
      chunked = true;
    } else if (arg === '--no-aux') {
      includeAuxiliary = false;
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option ${arg}` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) return { ok: false, error: 'No input file provided' };
  if (positional.length > 1) return { ok: false, error: `Expected one input file, got ${positional.length}` };

  const file = positional[0];
  return {
    ok: true,
    args: { file, documentId: documentId ?? defaultDocumentId(file), chunked, includeAuxiliary, json },
  };
}
