/**
 * Growable, indexable sequence backed by fixed-size chunks.
 *
 * Storage is a list of chunks, each reserved with exactly `chunkSize` slots.
 * A new chunk is appended only when every existing chunk is full, so growing
 * never moves an element that was already written. Element `i` lives in
 * chunk `floor(i / chunkSize)` at offset `i % chunkSize`. Chunks are never
 * freed: `pop` and `clear` leave the capacity where it was.
 *
 * Access discipline: at any moment a sequence may have any number of
 * readers (`get`, `at`, `iter`) or a single writer (`push`, `pop`, `clear`,
 * `swap`, `set`, `slotAt`, `getMut`, `iterMut`), never both. This is a
 * precondition of every method. Pass `borrowCheck: 'warn' | 'throw'` to have
 * violations reported at runtime.
 *
 * Two accessor tiers:
 * - defensive (`get`, `getMut`) return undefined for an out-of-range index
 * - trusted (`at`, `set`, `slotAt`, `swap`) throw RangeError, for call
 *   sites that have already validated the index
 */

import type { ChunkSize } from '../types/branded.ts';
import { chunkSize, DEFAULT_CHUNK_SIZE } from '../types/branded.ts';
import type {
  BorrowState,
  ChunkedSequenceConfig,
  ChunkedSequenceOptions,
  SequenceStats,
  Slot,
} from '../types/sequence.ts';
import { assertInBounds, isInBounds } from './core/bounds.ts';
import { BorrowTracker } from './core/borrow.ts';
import { GrowableArray } from './core/growable-array.ts';
import { ChunkTraversal } from './core/traversal.ts';

/** Slots from getMut/slotAt hold no borrow of their own. */
const unowned = (): boolean => false;

// =============================================================================
// Sequence
// =============================================================================

export class ChunkedSequence<T> implements Iterable<T> {
  /** Slots per chunk, fixed for the life of the sequence */
  readonly chunkSize: ChunkSize;

  private readonly chunks: GrowableArray<T>[] = [];
  private len = 0;
  private cap = 0;
  /** Bumped by pop and clear; slots created under an older epoch are stale */
  private epoch = 0;
  private readonly options: ChunkedSequenceOptions;
  private readonly borrows: BorrowTracker;

  constructor(size: ChunkSize, options: ChunkedSequenceOptions = {}) {
    this.chunkSize = size;
    this.options = options;
    this.borrows = new BorrowTracker(options.borrowCheck, options.logger);
  }

  /**
   * Build a sequence holding `values` in iteration order.
   */
  static from<T>(
    values: Iterable<T>,
    size: ChunkSize,
    options?: ChunkedSequenceOptions
  ): ChunkedSequence<T> {
    const sequence = new ChunkedSequence<T>(size, options);
    for (const value of values) {
      sequence.push(value);
    }
    return sequence;
  }

  // ---------------------------------------------------------------------------
  // Size
  // ---------------------------------------------------------------------------

  /** Number of live elements. */
  get length(): number {
    return this.len;
  }

  /** Slots allocated across all chunks. Never decreases. */
  get capacity(): number {
    return this.cap;
  }

  isEmpty(): boolean {
    return this.len === 0;
  }

  // ---------------------------------------------------------------------------
  // Element access
  // ---------------------------------------------------------------------------

  /**
   * Element at `index`, or undefined when `index` is not below `length`.
   */
  get(index: number): T | undefined {
    this.borrows.assertReadable('get');
    if (!isInBounds(index, this.len)) return undefined;
    return this.element(index);
  }

  /**
   * Mutable reference to the element at `index`, or undefined when out of range.
   */
  getMut(index: number): Slot<T> | undefined {
    this.borrows.assertWritable('getMut');
    if (!isInBounds(index, this.len)) return undefined;
    return this.slot(index, unowned);
  }

  /**
   * Element at `index`.
   * @throws RangeError when `index` is not below `length`
   */
  at(index: number): T {
    this.borrows.assertReadable('at');
    assertInBounds(index, this.len);
    return this.element(index);
  }

  /**
   * Mutable reference to the element at `index`.
   * @throws RangeError when `index` is not below `length`
   */
  slotAt(index: number): Slot<T> {
    this.borrows.assertWritable('slotAt');
    assertInBounds(index, this.len);
    return this.slot(index, unowned);
  }

  /**
   * Replace the element at `index`.
   * @throws RangeError when `index` is not below `length`
   */
  set(index: number, value: T): void {
    this.borrows.assertWritable('set');
    assertInBounds(index, this.len);
    this.chunkOf(index).set(this.offsetOf(index), value);
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Append a value. Allocates one chunk when every existing chunk is full.
   */
  push(value: T): void {
    this.borrows.assertWritable('push');
    if (this.len === this.cap) {
      this.chunks.push(GrowableArray.withCapacity<T>(this.chunkSize));
      this.cap += this.chunkSize;
    }
    this.chunkOf(this.len).push(value);
    this.len++;
  }

  /**
   * Remove and return the last element, or undefined when empty.
   * Capacity is unchanged.
   */
  pop(): T | undefined {
    this.borrows.assertWritable('pop');
    if (this.len === 0) return undefined;
    this.epoch++;
    this.len--;
    return this.chunkOf(this.len).pop();
  }

  /**
   * Remove every element. All chunks stay allocated.
   */
  clear(): void {
    this.borrows.assertWritable('clear');
    for (const chunk of this.chunks) {
      chunk.clear();
    }
    this.epoch++;
    this.len = 0;
  }

  /**
   * Exchange the elements at `a` and `b` in place.
   * @throws RangeError when either index is not below `length`
   */
  swap(a: number, b: number): void {
    this.borrows.assertWritable('swap');
    assertInBounds(a, this.len);
    assertInBounds(b, this.len);
    if (a === b) return;

    const chunkA = this.chunkOf(a);
    const chunkB = this.chunkOf(b);
    const offsetA = this.offsetOf(a);
    const offsetB = this.offsetOf(b);
    const saved = chunkA.at(offsetA);
    chunkA.set(offsetA, chunkB.at(offsetB));
    chunkB.set(offsetB, saved);
  }

  // ---------------------------------------------------------------------------
  // Traversal
  // ---------------------------------------------------------------------------

  /**
   * Lazy traversal of every element in index order.
   * Holds a shared borrow until exhausted or returned.
   */
  iter(): IterableIterator<T> {
    const release = this.borrows.shared('iter');
    return new ChunkTraversal<T, T>(this.chunks, (chunk, offset) => chunk.at(offset), release);
  }

  /**
   * Lazy traversal yielding a mutable reference to every element in index
   * order. Holds an exclusive borrow until exhausted or returned.
   */
  iterMut(): IterableIterator<Slot<T>> {
    const release = this.borrows.exclusive('iterMut');
    let live = true;
    const isLive = (): boolean => live;
    return new ChunkTraversal<T, Slot<T>>(
      this.chunks,
      (_chunk, offset, chunkIndex) => this.slot(chunkIndex * this.chunkSize + offset, isLive),
      () => {
        live = false;
        release();
      }
    );
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.iter();
  }

  toArray(): T[] {
    return Array.from(this.iter());
  }

  // ---------------------------------------------------------------------------
  // Copying and comparison
  // ---------------------------------------------------------------------------

  /**
   * Shallow copy with the same chunk size, chunk count and elements.
   */
  clone(): ChunkedSequence<T> {
    this.borrows.assertReadable('clone');
    const copy = new ChunkedSequence<T>(this.chunkSize, this.options);
    for (const chunk of this.chunks) {
      const chunkCopy = GrowableArray.withCapacity<T>(this.chunkSize);
      for (const value of chunk.values()) {
        chunkCopy.push(value);
      }
      copy.chunks.push(chunkCopy);
    }
    copy.len = this.len;
    copy.cap = this.cap;
    return copy;
  }

  /**
   * Structural equality: same chunk size, length, capacity and elements.
   */
  equals(
    other: ChunkedSequence<T>,
    eq: (a: T, b: T) => boolean = Object.is
  ): boolean {
    if (other === this) return true;
    if (
      other.chunkSize !== this.chunkSize ||
      other.len !== this.len ||
      other.cap !== this.cap
    ) {
      return false;
    }
    for (let i = 0; i < this.len; i++) {
      if (!eq(this.element(i), other.element(i))) return false;
    }
    return true;
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  getStats(): SequenceStats {
    return {
      length: this.len,
      capacity: this.cap,
      chunkSize: this.chunkSize,
      chunkCount: this.chunks.length,
      chunkCapacities: this.chunks.map((chunk) => chunk.capacity),
    };
  }

  /** Outstanding borrows; always zero when borrow checking is off. */
  borrowState(): BorrowState {
    return this.borrows.active();
  }

  toString(): string {
    return `ChunkedSequence(len=${this.len}, cap=${this.cap}, chunkSize=${this.chunkSize})`;
  }

  // ---------------------------------------------------------------------------
  // Addressing
  // ---------------------------------------------------------------------------

  private chunkOf(index: number): GrowableArray<T> {
    return this.chunks[Math.floor(index / this.chunkSize)];
  }

  private offsetOf(index: number): number {
    return index % this.chunkSize;
  }

  /**
   * Mutable reference to a live element; caller has checked `index < length`.
   * The slot goes stale on the next pop or clear, even if its position is
   * refilled later. While `ownerLive()` holds, the slot is covered by its
   * traversal's exclusive borrow; otherwise every access is checked against
   * the borrows outstanding at that moment.
   */
  private slot(index: number, ownerLive: () => boolean): Slot<T> {
    const chunk = this.chunkOf(index);
    const offset = this.offsetOf(index);
    const epoch = this.epoch;
    const borrows = this.borrows;
    const assertFresh = (): void => {
      if (this.epoch !== epoch) {
        throw new RangeError(`Stale slot: index ${index} (length ${this.len})`);
      }
    };
    return {
      index,
      get value(): T {
        assertFresh();
        if (!ownerLive()) borrows.assertReadable('slotRead');
        return chunk.at(offset);
      },
      set value(next: T) {
        assertFresh();
        if (!ownerLive()) borrows.assertWritable('slotWrite');
        chunk.set(offset, next);
      },
    };
  }

  /** Caller has checked `index < length`. */
  private element(index: number): T {
    return this.chunkOf(index).at(this.offsetOf(index));
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a sequence from a config object.
 * @throws RangeError when `config.chunkSize` is not a positive integer
 */
export function createChunkedSequence<T>(
  config: ChunkedSequenceConfig<T> = {}
): ChunkedSequence<T> {
  const { chunkSize: size = DEFAULT_CHUNK_SIZE, initialValues, ...options } = config;
  const sequence = new ChunkedSequence<T>(chunkSize(size), options);
  if (initialValues !== undefined) {
    for (const value of initialValues) {
      sequence.push(value);
    }
  }
  return sequence;
}
