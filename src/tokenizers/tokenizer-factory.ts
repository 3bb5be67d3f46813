import type { Token, Tokenizer } from './tokenizer';
import { BasicTokenizer } from './basic-tokenizer';
import { CharacterTokenizer } from './character-tokenizer';
import { GptTokenizer } from './gpt-tokenizer';

export interface TokenizerOptions {
  lowercase?: boolean;
}

export enum TokenizerType {
  Basic = 'basic',
  Character = 'character',
  Gpt = 'gpt',
}

/**
 * Creates the tokenizer named by configuration.
 * @param type - Tokenizer kind
 * @param options - Only `lowercase` is honoured, and only by the basic tokenizer
 */
export function createTokenizer(type: TokenizerType, options: TokenizerOptions = {}): Tokenizer<Token> {
  switch (type) {
    case TokenizerType.Basic:
      return new BasicTokenizer({
        ...(options.lowercase !== undefined && { lowercase: options.lowercase }),
      });
    case TokenizerType.Character:
      return new CharacterTokenizer();
    case TokenizerType.Gpt:
      return new GptTokenizer();
  }
}
