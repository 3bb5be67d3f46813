import { z } from 'zod';
import { TokenizerType } from '../tokenizers/tokenizer-factory';

// Environment overrides; every variable is optional
export const ENV_SCHEMA = z.object({
  TOKENSPLIT_TOKENIZER: z.nativeEnum(TokenizerType).optional(),
  TOKENSPLIT_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  TOKENSPLIT_OVERLAP_SIZE: z.coerce.number().int().nonnegative().optional(),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
