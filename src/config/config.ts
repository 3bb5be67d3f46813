import { DEFAULT_SPLIT_OPTIONS } from '../splitting/budget';
import { TokenizerType } from '../tokenizers/tokenizer-factory';
import type { SplitSettings } from '../cli/types';
import type { Config } from '../schemas/config-schemas';
import type { EnvConfig } from '../schemas/env-schemas';

// Re-export the type from schemas
export type { Config } from '../schemas/config-schemas';

export interface SettingsSources {
  cli: {
    chunkSize?: number | undefined;
    overlap?: number | undefined;
    tokenizer?: TokenizerType | undefined;
    lowercase?: boolean | undefined;
  };
  env: EnvConfig;
  file: Config;
}

export const DEFAULT_TOKENIZER = TokenizerType.Basic;

/**
 * Merges settings with precedence CLI flag > environment > config file > defaults.
 */
export function resolveSettings({ cli, env, file }: SettingsSources): SplitSettings {
  return {
    chunkSize:
      cli.chunkSize ?? env.TOKENSPLIT_CHUNK_SIZE ?? file.chunkSize ?? DEFAULT_SPLIT_OPTIONS.chunkSize,
    overlapSize:
      cli.overlap ?? env.TOKENSPLIT_OVERLAP_SIZE ?? file.overlapSize ?? DEFAULT_SPLIT_OPTIONS.overlapSize,
    tokenizer: cli.tokenizer ?? env.TOKENSPLIT_TOKENIZER ?? file.tokenizer ?? DEFAULT_TOKENIZER,
    lowercase: cli.lowercase ?? file.lowercase ?? false,
  };
}
