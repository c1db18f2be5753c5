/**
 * Two-level traversal over a list of chunks.
 *
 * Keeps a cursor into the outer chunk list and a cursor into the current
 * chunk. Chunk boundaries are never exposed and nothing is flattened into a
 * single buffer. Read-only and mutable iteration differ only in the
 * projection applied at each position.
 */

import type { GrowableArray } from './growable-array.ts';

/**
 * Maps a (chunk, offset) position to the value the traversal yields.
 * `chunkIndex` is the position of `chunk` in the outer list.
 */
export type Projection<T, R> = (
  chunk: GrowableArray<T>,
  offset: number,
  chunkIndex: number
) => R;

export class ChunkTraversal<T, R> implements IterableIterator<R> {
  private chunkIndex = -1;
  private current: GrowableArray<T> | null = null;
  private offset = 0;
  private finished = false;

  constructor(
    private readonly chunks: readonly GrowableArray<T>[],
    private readonly project: Projection<T, R>,
    private readonly onDone?: () => void
  ) {}

  next(): IteratorResult<R> {
    if (this.finished) return { done: true, value: undefined };

    if (this.current !== null && this.offset < this.current.length) {
      return { done: false, value: this.project(this.current, this.offset++, this.chunkIndex) };
    }

    // Current chunk exhausted: step to the next one and retry once.
    // Chunks fill in order, so an empty next chunk means nothing follows.
    if (this.chunkIndex + 1 < this.chunks.length) {
      this.chunkIndex++;
      this.current = this.chunks[this.chunkIndex];
      this.offset = 0;
      if (this.offset < this.current.length) {
        return { done: false, value: this.project(this.current, this.offset++, this.chunkIndex) };
      }
    }

    return this.finish();
  }

  /**
   * Stop early. Called by `for...of` on `break`, `return` or a throw.
   */
  return(): IteratorResult<R> {
    return this.finish();
  }

  [Symbol.iterator](): IterableIterator<R> {
    return this;
  }

  private finish(): IteratorResult<R> {
    if (!this.finished) {
      this.finished = true;
      this.current = null;
      this.onDone?.();
    }
    return { done: true, value: undefined };
  }
}
