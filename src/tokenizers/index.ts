export type { Token, Tokenizer } from './tokenizer';
export { BasicTokenizer, type BasicTokenizerOptions } from './basic-tokenizer';
export { CharacterTokenizer } from './character-tokenizer';
export { GptTokenizer } from './gpt-tokenizer';
export { createTokenizer, TokenizerType, type TokenizerOptions } from './tokenizer-factory';
