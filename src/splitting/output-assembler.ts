import type { Token } from '../tokenizers/tokenizer';
import type { Chunk, Segment, SplitResult } from './types';
import type { WindowSink } from './window-accumulator';

/**
 * Builds one chunk from a closed window. Text comes from the original
 * substrings with only the outer whitespace trimmed; tokens are the segments'
 * own tokens, never re-tokenized.
 */
export function assembleChunk<T extends Token>(window: readonly Segment<T>[]): Chunk<T> {
  return {
    text: window.map((segment) => segment.text).join('').trim(),
    tokens: window.flatMap((segment) => segment.tokens),
  };
}

export class OutputAssembler<T extends Token> implements WindowSink<T> {
  private readonly chunks: string[] = [];
  private readonly chunkTokens: T[][] = [];

  emit(window: readonly Segment<T>[]): void {
    const chunk = assembleChunk(window);
    this.chunks.push(chunk.text);
    this.chunkTokens.push(chunk.tokens);
  }

  result(): SplitResult<T> {
    return { chunks: [...this.chunks], chunkTokens: this.chunkTokens.map((tokens) => [...tokens]) };
  }
}
