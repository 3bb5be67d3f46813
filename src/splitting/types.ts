import type { Token } from '../tokenizers/tokenizer';

/**
 * A text span paired with its tokenization. The text always carries the
 * separator that followed it in the source, so segment texts concatenate back
 * into the original input.
 */
export interface Segment<T extends Token = string> {
  readonly text: string;
  readonly tokens: readonly T[];
  readonly tokenCount: number;
}

export interface Budget {
  targetChunkSize: number;
  requestedOverlap: number;
}

export interface Chunk<T extends Token = string> {
  text: string;
  tokens: T[];
}

/**
 * Parallel arrays: `chunkTokens[i]` is the token array of `chunks[i]`.
 * `chunkTokens` is absent for empty input and when no separator produced a
 * valid split.
 */
export interface SplitResult<T extends Token = string> {
  chunks: string[];
  chunkTokens?: T[][];
}

export interface SplitOptions {
  chunkSize?: number; // Maximum tokens per chunk, capped at 510
  overlapSize?: number; // Tokens carried from the end of one chunk into the next
}

export interface TextSplitter<T extends Token = string> {
  split(text: string, options?: SplitOptions): SplitResult<T>;
}
