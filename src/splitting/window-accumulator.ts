import type { Token } from '../tokenizers/tokenizer';
import { totalTokenCount } from './segment';
import type { Budget, Segment } from './types';

export interface WindowSink<T extends Token> {
  emit(window: readonly Segment<T>[]): void;
}

/**
 * Collects whole segments from the tail of `previous` until at least
 * `requestedOverlap` tokens are covered or the segments run out. Order is
 * preserved. A segment is never cut, so the seed may land short of or past
 * the request by less than one segment.
 */
export function computeOverlapSeed<T extends Token>(
  previous: readonly Segment<T>[],
  requestedOverlap: number
): Segment<T>[] {
  const seed: Segment<T>[] = [];
  let tokensNeeded = requestedOverlap;

  for (let i = previous.length - 1; i >= 0 && tokensNeeded > 0; i--) {
    const segment = previous[i];
    if (!segment) break;
    seed.unshift(segment);
    tokensNeeded -= segment.tokenCount;
  }

  return seed;
}

/**
 * Greedy window packer. Segments are appended while they fit; the segment
 * that would overflow closes the current window and opens the next one,
 * seeded with the overlap carried from the closed window when seed and
 * segment fit together, or with the segment alone when they do not.
 *
 * One accumulator serves one split call.
 */
export class WindowAccumulator<T extends Token> {
  private currentWindow: Segment<T>[] = [];
  private currentTokenCount = 0;

  constructor(
    private readonly budget: Budget,
    private readonly sink: WindowSink<T>
  ) {}

  push(segment: Segment<T>): void {
    if (this.currentTokenCount + segment.tokenCount <= this.budget.targetChunkSize) {
      this.currentWindow.push(segment);
      this.currentTokenCount += segment.tokenCount;
      return;
    }

    const previous = this.closeWindow();
    this.openWindow(computeOverlapSeed(previous, this.budget.requestedOverlap), segment);
  }

  pushAll(segments: Iterable<Segment<T>>): this {
    for (const segment of segments) {
      this.push(segment);
    }
    return this;
  }

  finish(): void {
    this.closeWindow();
  }

  private closeWindow(): Segment<T>[] {
    const closed = this.currentWindow;
    if (closed.length > 0) {
      this.sink.emit(closed);
    }
    this.currentWindow = [];
    this.currentTokenCount = 0;
    return closed;
  }

  private openWindow(seed: Segment<T>[], segment: Segment<T>): void {
    const seedCount = totalTokenCount(seed);
    if (seedCount + segment.tokenCount <= this.budget.targetChunkSize) {
      this.currentWindow = [...seed, segment];
      this.currentTokenCount = seedCount + segment.tokenCount;
    } else {
      this.currentWindow = [segment];
      this.currentTokenCount = segment.tokenCount;
    }
  }
}
