export { RecursiveTokenSplitter, type RecursiveTokenSplitterOptions } from './recursive-token-splitter';
export { DEFAULT_SPLIT_OPTIONS, MAX_CHUNK_SIZE, resolveBudget } from './budget';
export {
  DEFAULT_SEPARATORS,
  buildSegments,
  runSeparatorCascade,
  splitKeepingSeparator,
  type CascadeOutcome,
  type SeparatorRejection,
} from './separator-cascade';
export { WindowAccumulator, computeOverlapSeed, type WindowSink } from './window-accumulator';
export { OutputAssembler, assembleChunk } from './output-assembler';
export { createSegment, totalTokenCount } from './segment';
export { verifyRoundTrip, type RoundTripMismatch, type RoundTripReport } from './round-trip';
export type { Budget, Chunk, Segment, SplitOptions, SplitResult, TextSplitter } from './types';
export * from '../tokenizers/index';
