/**
 * Growable array that tracks its own reserved capacity.
 *
 * Each chunk of a ChunkedSequence is one of these, reserved up front with
 * exactly `chunkSize` slots so that filling it never triggers growth.
 * When pushed past its capacity the array grows by doubling; a sequence
 * never pushes a chunk past `chunkSize`, so that path is not taken there.
 * Elements in [0, length) are live; reserved slots beyond are not observable.
 */

import { assertInBounds, isInBounds } from './bounds.ts';
import { isValidIndex } from '../../types/branded.ts';

export class GrowableArray<T> {
  /** Live elements */
  private readonly items: T[] = [];
  /** Slots reserved for this array; never below items.length */
  private reserved: number;

  private constructor(capacity: number) {
    this.reserved = capacity;
  }

  /**
   * Create an empty GrowableArray with exactly the given capacity.
   * @throws RangeError when capacity is not a non-negative integer
   */
  static withCapacity<T>(capacity: number = 0): GrowableArray<T> {
    if (!isValidIndex(capacity)) {
      throw new RangeError(`Invalid capacity: ${capacity}`);
    }
    return new GrowableArray<T>(capacity);
  }

  get length(): number {
    return this.items.length;
  }

  get capacity(): number {
    return this.reserved;
  }

  /**
   * Append a value, doubling the capacity first when the array is full.
   */
  push(value: T): void {
    const length = this.items.length;
    if (length === this.reserved) {
      this.reserved = Math.max(this.reserved * 2, length + 1);
    }
    this.items.push(value);
  }

  /**
   * Remove and return the last value, or undefined when empty.
   * Capacity is unchanged.
   */
  pop(): T | undefined {
    return this.items.pop();
  }

  /**
   * Element at `index`, or undefined when out of range.
   */
  get(index: number): T | undefined {
    if (!isInBounds(index, this.items.length)) return undefined;
    return this.items[index];
  }

  /**
   * Element at `index`.
   * @throws RangeError when out of range
   */
  at(index: number): T {
    assertInBounds(index, this.items.length);
    return this.items[index];
  }

  /**
   * Replace the element at `index`.
   * @throws RangeError when out of range
   */
  set(index: number, value: T): void {
    assertInBounds(index, this.items.length);
    this.items[index] = value;
  }

  /**
   * Ensure room for at least `additional` more elements without growth.
   */
  reserve(additional: number): void {
    const needed = this.items.length + additional;
    if (needed > this.reserved) {
      this.reserved = needed;
    }
  }

  /**
   * Drop every element. Capacity is kept.
   */
  clear(): void {
    this.items.length = 0;
  }

  values(): IterableIterator<T> {
    return this.items.values();
  }
}
