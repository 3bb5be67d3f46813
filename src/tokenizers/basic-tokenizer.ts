import type { Tokenizer } from './tokenizer';

export interface BasicTokenizerOptions {
  lowercase?: boolean;
}

const WHITESPACE_RE = /\s+/u;
const UNICODE_PUNCTUATION_RE = /^\p{P}$/u;
const CLOSING_PUNCTUATION_RE = / ([.,!?;:])/g;

// ASCII symbols are treated as punctuation even where Unicode files them
// under another category ("$", "+", "^", "`", "|", "~" ...).
function isPunctuation(char: string): boolean {
  const cp = char.codePointAt(0) ?? 0;
  if ((cp >= 33 && cp <= 47) || (cp >= 58 && cp <= 64) || (cp >= 91 && cp <= 96) || (cp >= 123 && cp <= 126)) {
    return true;
  }
  return UNICODE_PUNCTUATION_RE.test(char);
}

/**
 * Whitespace and punctuation tokenizer. Every whitespace-delimited word is a
 * token, except that each punctuation code point becomes a token of its own:
 * `"UIs."` yields `["UIs", "."]`.
 *
 * Stateless; one instance can be shared freely.
 */
export class BasicTokenizer implements Tokenizer<string> {
  readonly name = 'basic';
  private readonly lowercase: boolean;

  constructor(options: BasicTokenizerOptions = {}) {
    this.lowercase = options.lowercase ?? false;
  }

  tokenize(text: string): string[] {
    const source = this.lowercase ? text.toLowerCase() : text;
    const tokens: string[] = [];

    for (const word of source.split(WHITESPACE_RE)) {
      if (!word) continue;
      let current = '';
      for (const char of word) {
        if (isPunctuation(char)) {
          if (current) tokens.push(current);
          tokens.push(char);
          current = '';
        } else {
          current += char;
        }
      }
      if (current) tokens.push(current);
    }

    return tokens;
  }

  detokenize(tokens: readonly string[]): string {
    return tokens.join(' ').replace(CLOSING_PUNCTUATION_RE, '$1');
  }
}
