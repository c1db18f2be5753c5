/**
 * Tests for the two-level chunk traversal.
 */

import { describe, it, expect, vi } from 'vitest';
import { GrowableArray } from './growable-array.ts';
import { ChunkTraversal } from './traversal.ts';

function chunkOf(values: number[]): GrowableArray<number> {
  const chunk = GrowableArray.withCapacity<number>(3);
  for (const value of values) chunk.push(value);
  return chunk;
}

const read = (chunk: GrowableArray<number>, offset: number): number => chunk.at(offset);

describe('ChunkTraversal', () => {
  it('should yield nothing for no chunks', () => {
    const traversal = new ChunkTraversal<number, number>([], read);
    expect([...traversal]).toEqual([]);
  });

  it('should cross chunk boundaries in order', () => {
    const chunks = [chunkOf([1, 2, 3]), chunkOf([4, 5, 6]), chunkOf([7])];
    const traversal = new ChunkTraversal<number, number>(chunks, read);
    expect([...traversal]).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should stop at the first empty chunk', () => {
    const chunks = [chunkOf([1, 2, 3]), chunkOf([]), chunkOf([])];
    const traversal = new ChunkTraversal<number, number>(chunks, read);
    expect([...traversal]).toEqual([1, 2, 3]);
  });

  it('should pass the chunk index to the projection', () => {
    const chunks = [chunkOf([10, 11, 12]), chunkOf([13])];
    const traversal = new ChunkTraversal<number, string>(
      chunks,
      (chunk, offset, chunkIndex) => `${chunkIndex}:${offset}=${chunk.at(offset)}`
    );
    expect([...traversal]).toEqual(['0:0=10', '0:1=11', '0:2=12', '1:0=13']);
  });

  it('should stay done once exhausted', () => {
    const traversal = new ChunkTraversal<number, number>([chunkOf([1])], read);
    expect(traversal.next()).toEqual({ done: false, value: 1 });
    expect(traversal.next()).toEqual({ done: true, value: undefined });
    expect(traversal.next()).toEqual({ done: true, value: undefined });
  });

  it('should call onDone exactly once when exhausted', () => {
    const onDone = vi.fn();
    const traversal = new ChunkTraversal<number, number>([chunkOf([1, 2])], read, onDone);
    traversal.next();
    expect(onDone).not.toHaveBeenCalled();
    traversal.next();
    traversal.next();
    traversal.next();
    expect(onDone).toHaveBeenCalledTimes(1);
  });

  it('should call onDone when a for...of loop breaks', () => {
    const onDone = vi.fn();
    const traversal = new ChunkTraversal<number, number>(
      [chunkOf([1, 2, 3]), chunkOf([4])],
      read,
      onDone
    );
    for (const value of traversal) {
      if (value === 2) break;
    }
    expect(onDone).toHaveBeenCalledTimes(1);
    expect(traversal.next()).toEqual({ done: true, value: undefined });
  });
});
