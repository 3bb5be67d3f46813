import type { Token, Tokenizer } from '../tokenizers/tokenizer';
import { createSegment } from './segment';
import type { Segment } from './types';

/**
 * Paragraph, line, sentence, word, then code point. The empty separator
 * always comes last: it is the finest granularity there is.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

export interface SeparatorRejection {
  separator: string;
  segmentIndex: number;
  tokenCount: number;
}

export type CascadeOutcome<T extends Token> =
  | { accepted: true; separator: string; segments: Segment<T>[]; rejections: SeparatorRejection[] }
  | { accepted: false; rejections: SeparatorRejection[] };

type SegmentAttempt<T extends Token> =
  | { ok: true; segments: Segment<T>[] }
  | { ok: false; rejection: SeparatorRejection };

/**
 * Splits `text` on `separator`, dropping empty parts, and re-attaches each
 * separator occurrence to the text before it. Runs of separators stay with
 * the preceding part; a run at the very start goes onto the first part.
 * Joining the result gives back `text` unchanged.
 *
 * The empty separator splits at code point boundaries.
 */
export function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }

  const parts = text.split(separator);
  const pieces: string[] = [];
  let pending = '';

  parts.forEach((part, i) => {
    const trailing = i < parts.length - 1 ? separator : '';
    if (part !== '') {
      pieces.push(pending + part + trailing);
      pending = '';
      return;
    }
    const last = pieces.pop();
    if (last === undefined) {
      pending += trailing;
    } else {
      pieces.push(last + trailing);
    }
  });

  return pieces;
}

/**
 * Tokenizes every part produced by `separator`, giving up at the first
 * segment that cannot fit in a window on its own.
 */
export function buildSegments<T extends Token>(
  text: string,
  separator: string,
  tokenizer: Tokenizer<T>,
  targetChunkSize: number
): SegmentAttempt<T> {
  const segments: Segment<T>[] = [];

  for (const piece of splitKeepingSeparator(text, separator)) {
    const segment = createSegment(piece, tokenizer);
    if (segment.tokenCount > targetChunkSize) {
      return {
        ok: false,
        rejection: { separator, segmentIndex: segments.length, tokenCount: segment.tokenCount },
      };
    }
    segments.push(segment);
  }

  return { ok: true, segments };
}

/**
 * Tries each separator from coarse to fine and accepts the first one whose
 * segments all fit the budget individually.
 */
export function runSeparatorCascade<T extends Token>(
  text: string,
  separators: readonly string[],
  tokenizer: Tokenizer<T>,
  targetChunkSize: number
): CascadeOutcome<T> {
  const rejections: SeparatorRejection[] = [];

  for (const separator of separators) {
    const attempt = buildSegments(text, separator, tokenizer, targetChunkSize);
    if (attempt.ok) {
      return { accepted: true, separator, segments: attempt.segments, rejections };
    }
    rejections.push(attempt.rejection);
  }

  return { accepted: false, rejections };
}
