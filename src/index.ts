/**
 * chunked-seq - growable sequence backed by fixed-size chunks
 *
 * Main entry point exporting the container, its building blocks and types.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Slot,
  BorrowCheckMode,
  BorrowKind,
  BorrowState,
  SequenceLogger,
  ChunkedSequenceOptions,
  ChunkedSequenceConfig,
  SequenceStats,
  ChunkSize,
} from './types/index.ts';

export {
  chunkSize,
  isValidChunkSize,
  isValidIndex,
  DEFAULT_CHUNK_SIZE,
} from './types/index.ts';

// =============================================================================
// Sequence
// =============================================================================

export {
  ChunkedSequence,
  createChunkedSequence,
  BorrowError,
  BorrowTracker,
  GrowableArray,
  ChunkTraversal,
} from './sequence/index.ts';

export type { Release, Projection } from './sequence/index.ts';
