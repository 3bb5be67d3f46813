import type { Token, Tokenizer } from '../tokenizers/tokenizer';
import type { Segment } from './types';

export function createSegment<T extends Token>(text: string, tokenizer: Tokenizer<T>): Segment<T> {
  const tokens = Object.freeze(tokenizer.tokenize(text));
  return Object.freeze({ text, tokens, tokenCount: tokens.length });
}

export function totalTokenCount<T extends Token>(segments: readonly Segment<T>[]): number {
  return segments.reduce((sum, segment) => sum + segment.tokenCount, 0);
}
