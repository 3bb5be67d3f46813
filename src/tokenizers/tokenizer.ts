/**
 * A token is whatever atomic unit a tokenizer emits: subword strings for
 * vocabulary-free tokenizers, numeric ids for byte-pair encoders.
 */
export type Token = string | number;

/**
 * Capability the splitter needs from a tokenizer. Implementations must be
 * deterministic and side-effect free, and must document whether a single
 * instance may be shared between concurrent callers.
 *
 * For any sequence produced by `tokenize`, `tokenize(detokenize(tokens))`
 * is expected to return the same sequence.
 */
export interface Tokenizer<T extends Token = string> {
  readonly name: string;
  tokenize(text: string): T[];
  detokenize(tokens: readonly T[]): string;
}
