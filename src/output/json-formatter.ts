import { z } from 'zod';
import packageJson from '../../package.json';
import type { Token } from '../tokenizers/tokenizer';
import type { SplitSettings } from '../cli/types';

const PACKAGE_JSON_SCHEMA = z.object({
  version: z.string(),
});

const PKG = PACKAGE_JSON_SCHEMA.parse(packageJson);

export interface JsonChunk {
  index: number;
  text: string;
  tokenCount: number;
  tokens: Token[];
}

export interface RoundTripSection {
  ok: boolean;
  mismatches: number[];
}

export interface Result {
  source: string;
  chunks: JsonChunk[];
  summary: {
    chunks: number;
    tokens: number;
    chunkSize: number;
    overlapSize: number;
    tokenizer: string;
  };
  roundTrip?: RoundTripSection;
  metadata: {
    version: string;
    timestamp: string;
  };
}

export class JsonFormatter {
  private chunks: JsonChunk[] = [];
  private tokenTotal = 0;
  private roundTrip: RoundTripSection | undefined;

  constructor(
    private readonly source: string,
    private readonly settings: SplitSettings
  ) {}

  addChunk(text: string, tokens: readonly Token[]): void {
    this.chunks.push({ index: this.chunks.length, text, tokenCount: tokens.length, tokens: [...tokens] });
    this.tokenTotal += tokens.length;
  }

  setRoundTrip(ok: boolean, mismatches: readonly number[]): void {
    this.roundTrip = { ok, mismatches: [...mismatches] };
  }

  toJson(now: Date = new Date()): string {
    const result: Result = {
      source: this.source,
      chunks: this.chunks,
      summary: {
        chunks: this.chunks.length,
        tokens: this.tokenTotal,
        chunkSize: this.settings.chunkSize,
        overlapSize: this.settings.overlapSize,
        tokenizer: this.settings.tokenizer,
      },
      ...(this.roundTrip !== undefined && { roundTrip: this.roundTrip }),
      metadata: {
        version: PKG.version,
        timestamp: now.toISOString(),
      },
    };
    return JSON.stringify(result, null, 2);
  }
}
