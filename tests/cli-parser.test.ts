import { describe, it, expect } from 'vitest';
import { parseSplitOptions, parseTokenizeOptions } from '../src/boundaries/cli-parser';
import { OutputFormat } from '../src/cli/types';
import { ValidationError } from '../src/errors/index';
import { TokenizerType } from '../src/tokenizers/tokenizer-factory';

describe('CLI option parsing', () => {
  it('coerces numeric split flags from strings', () => {
    const options = parseSplitOptions({ chunkSize: '64', overlap: '8', tokenizer: 'gpt', output: 'json', verify: true });

    expect(options).toEqual({
      chunkSize: 64,
      overlap: 8,
      tokenizer: TokenizerType.Gpt,
      output: OutputFormat.Json,
      verify: true,
      verbose: false,
    });
  });

  it('applies defaults for omitted split flags', () => {
    expect(parseSplitOptions({})).toEqual({ output: OutputFormat.Line, verbose: false, verify: false });
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => parseSplitOptions({ chunkSize: '0' })).toThrow(ValidationError);
    expect(() => parseSplitOptions({ chunkSize: '-3' })).toThrow(/Invalid split options/);
  });

  it('rejects an unknown output format', () => {
    expect(() => parseSplitOptions({ output: 'xml' })).toThrow(/Invalid split options/);
  });

  it('parses tokenize options', () => {
    expect(parseTokenizeOptions({ tokenizer: 'character', lowercase: true })).toEqual({
      tokenizer: TokenizerType.Character,
      lowercase: true,
      output: OutputFormat.Line,
      verbose: false,
    });
  });

  it('rejects an unknown tokenizer', () => {
    expect(() => parseTokenizeOptions({ tokenizer: 'wordpiece' })).toThrow(/Invalid tokenize options/);
  });
});
