/**
 * Type definitions for the chunked sequence.
 */

import type { ChunkSize } from './branded.ts';

// =============================================================================
// References
// =============================================================================

/**
 * Mutable reference to one element of a sequence.
 * Reading `value` returns the element currently stored at the slot's
 * position; assigning to it replaces that element in place.
 * A slot goes stale on the next `pop` or `clear` and throws on access.
 */
export interface Slot<T> {
  /** Logical index the slot is bound to */
  readonly index: number;
  value: T;
}

// =============================================================================
// Borrow Checking
// =============================================================================

/**
 * How access-discipline violations are reported.
 * - 'off': no bookkeeping (default)
 * - 'warn': log through the configured logger and carry on
 * - 'throw': throw a BorrowError
 */
export type BorrowCheckMode = 'off' | 'warn' | 'throw';

/**
 * Kind of borrow currently held over a sequence.
 */
export type BorrowKind = 'shared' | 'exclusive';

/**
 * Counts of outstanding borrows.
 */
export interface BorrowState {
  readonly shared: number;
  readonly exclusive: number;
}

/**
 * Sink for diagnostic warnings. `console` satisfies it.
 */
export type SequenceLogger = Pick<Console, 'warn'>;

// =============================================================================
// Configuration
// =============================================================================

/**
 * Options accepted by the ChunkedSequence constructor.
 */
export interface ChunkedSequenceOptions {
  /** Access-discipline checking (default: 'off') */
  borrowCheck?: BorrowCheckMode;
  /** Destination for borrow warnings (default: console) */
  logger?: SequenceLogger;
}

/**
 * Configuration for createChunkedSequence.
 */
export interface ChunkedSequenceConfig<T> extends ChunkedSequenceOptions {
  /** Slots per chunk (default: 1024) */
  chunkSize?: number;
  /** Elements pushed in order after construction */
  initialValues?: Iterable<T>;
}

// =============================================================================
// Inspection
// =============================================================================

/**
 * Allocation snapshot of a sequence.
 */
export interface SequenceStats {
  readonly length: number;
  readonly capacity: number;
  readonly chunkSize: ChunkSize;
  readonly chunkCount: number;
  /** Reserved capacity of each chunk, in chunk order */
  readonly chunkCapacities: readonly number[];
}
