import {
  SPLIT_OPTIONS_SCHEMA,
  TOKENIZE_OPTIONS_SCHEMA,
  type SplitCommandOptions,
  type TokenizeCommandOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseSplitOptions(raw: unknown): SplitCommandOptions {
  try {
    return SPLIT_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid split options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Split option parsing');
    throw new ValidationError(`Split option parsing failed: ${err.message}`);
  }
}

export function parseTokenizeOptions(raw: unknown): TokenizeCommandOptions {
  try {
    return TOKENIZE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid tokenize options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Tokenize option parsing');
    throw new ValidationError(`Tokenize option parsing failed: ${err.message}`);
  }
}
