import { z } from 'zod';
import { TokenizerType } from '../tokenizers/tokenizer-factory';

// Configuration file schema for .tokensplit.ini validation
export const CONFIG_SCHEMA = z.object({
  chunkSize: z.number().int().positive().optional(),
  overlapSize: z.number().int().nonnegative().optional(),
  tokenizer: z.nativeEnum(TokenizerType).optional(),
  lowercase: z.boolean().optional(),
  configPath: z.string().min(1).optional(),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
