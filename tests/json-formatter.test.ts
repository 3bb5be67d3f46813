import { describe, it, expect } from 'vitest';
import packageJson from '../package.json';
import { JsonFormatter } from '../src/output/json-formatter';
import { TokenizerType } from '../src/tokenizers/tokenizer-factory';
import type { SplitSettings } from '../src/cli/types';

const SETTINGS: SplitSettings = {
  chunkSize: 4,
  overlapSize: 1,
  tokenizer: TokenizerType.Basic,
  lowercase: false,
};

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('JsonFormatter', () => {
  it('formats chunks with a summary and metadata', () => {
    const formatter = new JsonFormatter('notes.txt', SETTINGS);
    formatter.addChunk('a b c', ['a', 'b', 'c']);
    formatter.addChunk('c d', ['c', 'd']);

    const parsed: unknown = JSON.parse(formatter.toJson(NOW));

    expect(parsed).toEqual({
      source: 'notes.txt',
      chunks: [
        { index: 0, text: 'a b c', tokenCount: 3, tokens: ['a', 'b', 'c'] },
        { index: 1, text: 'c d', tokenCount: 2, tokens: ['c', 'd'] },
      ],
      summary: { chunks: 2, tokens: 5, chunkSize: 4, overlapSize: 1, tokenizer: 'basic' },
      metadata: { version: packageJson.version, timestamp: '2026-01-02T03:04:05.000Z' },
    });
  });

  it('omits the round trip section unless one was recorded', () => {
    const formatter = new JsonFormatter('<stdin>', SETTINGS);
    expect(JSON.parse(formatter.toJson(NOW))).not.toHaveProperty('roundTrip');

    formatter.setRoundTrip(false, [1]);
    expect(JSON.parse(formatter.toJson(NOW))).toHaveProperty('roundTrip', { ok: false, mismatches: [1] });
  });

  it('keeps numeric token ids', () => {
    const formatter = new JsonFormatter('ids.txt', { ...SETTINGS, tokenizer: TokenizerType.Gpt });
    formatter.addChunk('hello', [15339]);

    expect(JSON.parse(formatter.toJson(NOW))).toMatchObject({
      chunks: [{ index: 0, text: 'hello', tokenCount: 1, tokens: [15339] }],
      summary: { tokenizer: 'gpt' },
    });
  });
});
