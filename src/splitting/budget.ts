import type { Budget, SplitOptions } from './types';

// Two positions are left for the start/end marker tokens an embedding model
// adds around its input.
export const MAX_CHUNK_SIZE = 510;

export const DEFAULT_SPLIT_OPTIONS: Required<SplitOptions> = {
  chunkSize: MAX_CHUNK_SIZE,
  overlapSize: 0,
};

function toInteger(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.trunc(value) : fallback;
}

/**
 * Clamps the requested sizes. Overlap stays strictly below the budget so every
 * window holds at least one token of new content.
 */
export function resolveBudget(options: Required<SplitOptions>): Budget {
  const targetChunkSize = Math.min(
    toInteger(options.chunkSize, DEFAULT_SPLIT_OPTIONS.chunkSize),
    MAX_CHUNK_SIZE
  );
  const overlap = Math.abs(toInteger(options.overlapSize, DEFAULT_SPLIT_OPTIONS.overlapSize));
  const requestedOverlap = Math.max(0, Math.min(overlap, Math.max(0, targetChunkSize - 1)));

  return { targetChunkSize, requestedOverlap };
}
