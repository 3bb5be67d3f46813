import { describe, it, expect } from 'vitest';
import { WindowAccumulator, computeOverlapSeed } from '../src/splitting/window-accumulator';
import { OutputAssembler, assembleChunk } from '../src/splitting/output-assembler';
import type { Segment } from '../src/splitting/types';

function segment(text: string, tokenCount: number): Segment {
  const tokens = Array.from({ length: tokenCount }, (_, i) => `${text.trim()}${i}`);
  return { text, tokens, tokenCount };
}

function pack(segments: Segment[], targetChunkSize: number, requestedOverlap: number) {
  const assembler = new OutputAssembler<string>();
  new WindowAccumulator<string>({ targetChunkSize, requestedOverlap }, assembler).pushAll(segments).finish();
  return assembler.result();
}

describe('computeOverlapSeed', () => {
  const previous = [segment('a ', 1), segment('bb ', 2), segment('ccc ', 3)];

  it('takes whole segments from the tail until the request is covered', () => {
    expect(computeOverlapSeed(previous, 4).map((s) => s.text)).toEqual(['bb ', 'ccc ']);
  });

  it('may overshoot the request by less than one segment', () => {
    expect(computeOverlapSeed(previous, 1).map((s) => s.text)).toEqual(['ccc ']);
  });

  it('stops when the previous window runs out', () => {
    expect(computeOverlapSeed(previous, 50).map((s) => s.text)).toEqual(['a ', 'bb ', 'ccc ']);
  });

  it('is empty for a zero request', () => {
    expect(computeOverlapSeed(previous, 0)).toEqual([]);
  });
});

describe('WindowAccumulator', () => {
  it('packs greedily while segments fit', () => {
    const result = pack([segment('a ', 2), segment('b ', 2), segment('c ', 2)], 4, 0);
    expect(result.chunks).toEqual(['a b', 'c']);
    expect(result.chunkTokens).toEqual([['a0', 'a1', 'b0', 'b1'], ['c0', 'c1']]);
  });

  it('seeds the next window with the overlap when both fit', () => {
    const result = pack([segment('a ', 1), segment('b ', 1), segment('c ', 1), segment('d ', 1)], 3, 1);
    expect(result.chunks).toEqual(['a b c', 'c d']);
  });

  it('opens the next window with the segment alone when the seed does not fit beside it', () => {
    const result = pack([segment('a ', 2), segment('b ', 3), segment('c ', 1)], 3, 2);
    expect(result.chunks).toEqual(['a', 'b', 'c']);
  });

  it('emits whitespace-only windows with their tokens', () => {
    const result = pack([segment('a ', 2), segment('\n\n ', 1), segment('b', 2)], 2, 0);
    expect(result.chunks).toEqual(['a', '', 'b']);
    expect(result.chunkTokens?.map((tokens) => tokens.length)).toEqual([2, 1, 2]);
  });

  it('emits nothing for an empty segment sequence', () => {
    expect(pack([], 3, 0)).toEqual({ chunks: [], chunkTokens: [] });
  });

  it('never emits a window above the budget', () => {
    const segments = Array.from({ length: 40 }, (_, i) => segment(`s${i} `, (i % 3) + 1));
    const result = pack(segments, 5, 3);
    for (const tokens of result.chunkTokens ?? []) {
      expect(tokens.length).toBeLessThanOrEqual(5);
    }
  });
});

describe('assembleChunk', () => {
  it('trims only the outer whitespace and concatenates tokens in order', () => {
    const chunk = assembleChunk([segment('\n\nfirst\n', 1), segment('second  \n\n', 2)]);
    expect(chunk).toEqual({ text: 'first\nsecond', tokens: ['first0', 'second0', 'second1'] });
  });
});
