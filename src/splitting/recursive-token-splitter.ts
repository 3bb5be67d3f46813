import type { Token, Tokenizer } from '../tokenizers/tokenizer';
import { debug } from '../output/logger';
import { DEFAULT_SPLIT_OPTIONS, resolveBudget } from './budget';
import { OutputAssembler } from './output-assembler';
import { DEFAULT_SEPARATORS, runSeparatorCascade, type SeparatorRejection } from './separator-cascade';
import type { SplitOptions, SplitResult, TextSplitter } from './types';
import { WindowAccumulator } from './window-accumulator';

export interface RecursiveTokenSplitterOptions {
  separators?: readonly string[]; // Coarse to fine; "" splits at code points
  debug?: boolean; // Log separator decisions
}

function describeSeparator(separator: string): string {
  return separator === '' ? 'code point' : JSON.stringify(separator);
}

/**
 * Splits text into token-bounded chunks by cascading through progressively
 * finer separators until every piece fits the budget on its own, then packing
 * the pieces greedily into windows. Chunk text is cut from the input, never
 * rebuilt from tokens, so punctuation and out-of-vocabulary text survive
 * unchanged.
 *
 * The splitter keeps no state between calls beyond its tokenizer; it is as
 * safe to share as the tokenizer is.
 */
export class RecursiveTokenSplitter<T extends Token = string> implements TextSplitter<T> {
  private readonly separators: readonly string[];
  private readonly verbose: boolean;

  constructor(
    private readonly tokenizer: Tokenizer<T>,
    options: RecursiveTokenSplitterOptions = {}
  ) {
    const separators = options.separators ?? DEFAULT_SEPARATORS;
    this.separators = separators.length > 0 ? [...separators] : DEFAULT_SEPARATORS;
    this.verbose = options.debug ?? false;
  }

  split(text: string, options: SplitOptions = {}): SplitResult<T> {
    if (!text) return { chunks: [] };

    const budget = resolveBudget({ ...DEFAULT_SPLIT_OPTIONS, ...options });
    const outcome = runSeparatorCascade(text, this.separators, this.tokenizer, budget.targetChunkSize);

    if (this.verbose) this.logRejections(outcome.rejections, budget.targetChunkSize);

    if (!outcome.accepted) {
      if (this.verbose) {
        debug(`no separator fits a budget of ${budget.targetChunkSize} tokens; returning no chunks`);
      }
      return { chunks: [] };
    }

    const assembler = new OutputAssembler<T>();
    new WindowAccumulator<T>(budget, assembler).pushAll(outcome.segments).finish();
    const result = assembler.result();

    if (this.verbose) {
      debug(
        `accepted ${describeSeparator(outcome.separator)} separator: ${outcome.segments.length} segment(s), ` +
          `${result.chunks.length} chunk(s), budget ${budget.targetChunkSize}, overlap ${budget.requestedOverlap}`
      );
    }

    return result;
  }

  private logRejections(rejections: readonly SeparatorRejection[], targetChunkSize: number): void {
    for (const rejection of rejections) {
      debug(
        `rejected ${describeSeparator(rejection.separator)} separator: segment ${rejection.segmentIndex} ` +
          `has ${rejection.tokenCount} tokens (budget ${targetChunkSize})`
      );
    }
  }
}
