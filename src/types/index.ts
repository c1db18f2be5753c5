/**
 * Type exports for the chunked sequence.
 */

export type {
  Slot,
  BorrowCheckMode,
  BorrowKind,
  BorrowState,
  SequenceLogger,
  ChunkedSequenceOptions,
  ChunkedSequenceConfig,
  SequenceStats,
} from './sequence.ts';

export type { ChunkSize } from './branded.ts';

export {
  chunkSize,
  isValidChunkSize,
  isValidIndex,
  DEFAULT_CHUNK_SIZE,
} from './branded.ts';
