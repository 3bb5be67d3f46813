import type { Token, Tokenizer } from '../tokenizers/tokenizer';

export interface RoundTripMismatch<T extends Token> {
  index: number;
  expected: readonly T[];
  actual: T[];
}

export interface RoundTripReport<T extends Token> {
  ok: boolean;
  checked: number;
  mismatches: RoundTripMismatch<T>[];
}

function sameTokens<T extends Token>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i]);
}

/**
 * Checks that each chunk's tokens survive `detokenize` followed by
 * `tokenize`. This is a caller-side check; the splitter itself never
 * detokenizes.
 */
export function verifyRoundTrip<T extends Token>(
  tokenizer: Tokenizer<T>,
  chunkTokens: readonly (readonly T[])[]
): RoundTripReport<T> {
  const mismatches: RoundTripMismatch<T>[] = [];

  chunkTokens.forEach((expected, index) => {
    const actual = tokenizer.tokenize(tokenizer.detokenize(expected));
    if (!sameTokens(expected, actual)) {
      mismatches.push({ index, expected, actual });
    }
  });

  return { ok: mismatches.length === 0, checked: chunkTokens.length, mismatches };
}
