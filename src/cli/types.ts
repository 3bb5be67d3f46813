import type { TokenizerType } from '../tokenizers/tokenizer-factory';

export enum OutputFormat {
  Line = 'line',
  Json = 'json',
}

export interface SplitSettings {
  chunkSize: number;
  overlapSize: number;
  tokenizer: TokenizerType;
  lowercase: boolean;
}

export interface CommandIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
}

