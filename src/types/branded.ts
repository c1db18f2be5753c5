/**
 * Branded types for sequence sizing.
 *
 * A branded type (also called an "opaque" or "nominal" type) keeps a raw
 * number from being passed where a validated one is required. A `ChunkSize`
 * can only be obtained through `chunkSize()` or `isValidChunkSize()`, so a
 * sequence can never be constructed with a zero, negative or fractional
 * chunk size.
 *
 * Usage:
 * ```typescript
 * const size = chunkSize(64);
 * const seq = new ChunkedSequence<string>(size);
 *
 * // Type error: number is not assignable to ChunkSize
 * new ChunkedSequence<string>(64);
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * Never present at runtime.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Size Types
// =============================================================================

/**
 * Number of element slots in one chunk.
 * Always a positive safe integer.
 */
export type ChunkSize = Branded<number, 'ChunkSize'>;

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value can be used as a chunk size (positive safe integer).
 */
export function isValidChunkSize(value: number): value is ChunkSize {
  return Number.isSafeInteger(value) && value > 0;
}

/**
 * Check if a value is a usable element index (non-negative safe integer).
 * Says nothing about whether the index is in bounds for a given sequence.
 */
export function isValidIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a ChunkSize from a number.
 * @throws RangeError when the value is not a positive safe integer
 */
export function chunkSize(value: number): ChunkSize {
  if (!isValidChunkSize(value)) {
    throw new RangeError(`Invalid chunk size: ${value}`);
  }
  return value;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Chunk size used when a config does not name one.
 */
export const DEFAULT_CHUNK_SIZE: ChunkSize = chunkSize(1024);
