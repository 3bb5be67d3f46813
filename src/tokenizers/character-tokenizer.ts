import type { Tokenizer } from './tokenizer';

const WHITESPACE_RE = /^\s$/u;

/**
 * One token per non-whitespace Unicode code point. Surrogate pairs stay whole;
 * multi-scalar symbols (ZWJ sequences, flags, combining marks) come out as one
 * token per scalar.
 */
export class CharacterTokenizer implements Tokenizer<string> {
  readonly name = 'character';

  tokenize(text: string): string[] {
    return Array.from(text).filter((char) => !WHITESPACE_RE.test(char));
  }

  detokenize(tokens: readonly string[]): string {
    return tokens.join('');
  }
}
