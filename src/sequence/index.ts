/**
 * Sequence module exports.
 */

export { ChunkedSequence, createChunkedSequence } from './chunked-sequence.ts';
export { BorrowError, BorrowTracker, type Release } from './core/borrow.ts';
export { GrowableArray } from './core/growable-array.ts';
export { ChunkTraversal, type Projection } from './core/traversal.ts';
