import { z } from 'zod';
import { OutputFormat } from '../cli/types';
import { TokenizerType } from '../tokenizers/tokenizer-factory';

// Options shared by every command that builds a tokenizer
const TOKENIZER_OPTIONS_SCHEMA = z.object({
  tokenizer: z.nativeEnum(TokenizerType).optional(),
  lowercase: z.boolean().optional(),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  config: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

// Split command options schema; commander hands numeric flags over as strings
export const SPLIT_OPTIONS_SCHEMA = TOKENIZER_OPTIONS_SCHEMA.extend({
  chunkSize: z.coerce.number().int().positive().optional(),
  overlap: z.coerce.number().int().nonnegative().optional(),
  verify: z.boolean().default(false),
});

// Tokenize command options schema
export const TOKENIZE_OPTIONS_SCHEMA = TOKENIZER_OPTIONS_SCHEMA;

// Inferred types
export type SplitCommandOptions = z.infer<typeof SPLIT_OPTIONS_SCHEMA>;
export type TokenizeCommandOptions = z.infer<typeof TOKENIZE_OPTIONS_SCHEMA>;
