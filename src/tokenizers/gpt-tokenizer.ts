import { decode, encode } from 'gpt-tokenizer';
import { TokenizerError, handleUnknownError } from '../errors/index';
import type { Tokenizer } from './tokenizer';

/**
 * Byte-pair encoding backed by the `gpt-tokenizer` package. Tokens are the
 * encoder's numeric ids. Special-token strings such as `<|endoftext|>` are
 * encoded as ordinary text.
 *
 * Chunk token arrays are concatenations of per-segment encodings, so
 * re-encoding a detokenized chunk may merge across segment boundaries and
 * produce different ids even though the decoded text is identical.
 */
export class GptTokenizer implements Tokenizer<number> {
  readonly name = 'gpt';

  tokenize(text: string): number[] {
    try {
      return encode(text, { disallowedSpecial: new Set() });
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Encoding text');
      throw new TokenizerError(`gpt tokenizer failed to encode text: ${err.message}`, this.name, e);
    }
  }

  detokenize(tokens: readonly number[]): string {
    try {
      return decode([...tokens]);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Decoding tokens');
      throw new TokenizerError(`gpt tokenizer failed to decode tokens: ${err.message}`, this.name, e);
    }
  }
}
