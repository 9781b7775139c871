// Text extraction boundary: PDF/Word, spreadsheet and audio sources are parsed elsewhere
// The core only turns what the extractor returns into plain document text

export interface Transcript {
  text: string;
  segments: Array<{ start: number; end: number; text: string }>;
  detectedLanguage: string;
  durationSeconds: number;
}

export type SheetRow = Record<string, string | number | boolean | null>;

export interface TextExtractor {
  extractText(fileHandle: string): Promise<string>;
  extractSheets(fileHandle: string): Promise<Record<string, SheetRow[]>>;
  transcribe(fileHandle: string): Promise<Transcript>;
}

export type DocumentSource =
  | { kind: 'text'; text: string }
  | { kind: 'document'; fileHandle: string }
  | { kind: 'spreadsheet'; fileHandle: string }
  | { kind: 'audio'; fileHandle: string };

function formatCell(value: SheetRow[string]): string {
  return value === null ? '' : String(value);
}

/** Renders sheets as `## Sheet: <name>` blocks, one `key: value | ...` line per row. */
export function sheetsToText(sheets: Record<string, SheetRow[]>): string {
  return Object.entries(sheets)
    .map(([name, rows]) => {
      const lines = rows.map(row =>
        Object.entries(row).map(([key, value]) => `${key}: ${formatCell(value)}`).join(' | '),
      );
      return [`## Sheet: ${name}`, ...lines].join('\n');
    })
    .join('\n\n');
}

export async function sourceToText(source: DocumentSource, extractor?: TextExtractor): Promise<string> {
  if (source.kind === 'text') return source.text;
  if (!extractor) {
    throw new Error(`No text extractor configured for ${source.kind} sources`);
  }
  switch (source.kind) {
    case 'document':
      return extractor.extractText(source.fileHandle);
    case 'spreadsheet':
      return sheetsToText(await extractor.extractSheets(source.fileHandle));
    case 'audio':
      return (await extractor.transcribe(source.fileHandle)).text;
  }
}
