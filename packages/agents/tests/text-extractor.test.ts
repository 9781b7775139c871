import { describe, it, expect, vi } from 'vitest';
import { sheetsToText, sourceToText, type TextExtractor } from '../bridge/text-extractor.js';

describe('sheetsToText', () => {
  it('renders each sheet as a titled block of key/value rows', () => {
    const text = sheetsToText({
      Summary: [{ metric: 'Revenue', value: 10, audited: true, note: null }],
      Notes: [],
    });
    expect(text).toBe('## Sheet: Summary\nmetric: Revenue | value: 10 | audited: true | note: \n\n## Sheet: Notes');
  });
});

describe('sourceToText', () => {
  const extractor: TextExtractor = {
    extractText: vi.fn(async (handle: string) => `text of ${handle}`),
    extractSheets: vi.fn(async () => ({})),
    transcribe: vi.fn(async () => ({ text: 'Management call transcript', segments: [], detectedLanguage: 'en', durationSeconds: 90 })),
  };

  it('passes plain text through', async () => {
    expect(await sourceToText({ kind: 'text', text: 'hello' })).toBe('hello');
  });

  it('delegates documents and audio to the extractor', async () => {
    expect(await sourceToText({ kind: 'document', fileHandle: 'cim.pdf' }, extractor)).toBe('text of cim.pdf');
    expect(await sourceToText({ kind: 'audio', fileHandle: 'call.m4a' }, extractor)).toBe('Management call transcript');
  });

  it('rejects non-text sources without an extractor', async () => {
    await expect(sourceToText({ kind: 'spreadsheet', fileHandle: 'model.xlsx' }))
      .rejects.toThrow('No text extractor configured for spreadsheet sources');
  });
});
