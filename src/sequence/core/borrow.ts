/**
 * Runtime guard for the shared/exclusive access discipline.
 *
 * A sequence may have any number of readers or exactly one writer at a time.
 * Nothing in the language enforces this, so callers are expected to uphold
 * it; the tracker exists to catch violations in tests and debug builds.
 * With mode 'off' it keeps no state and every check is a no-op.
 */

import type {
  BorrowCheckMode,
  BorrowKind,
  BorrowState,
  SequenceLogger,
} from '../../types/sequence.ts';

/**
 * Thrown in 'throw' mode when an operation breaks the access discipline.
 */
export class BorrowError extends Error {
  constructor(readonly operation: string, readonly held: BorrowKind) {
    super(`${operation}() called during ${held === 'shared' ? 'a shared' : 'an exclusive'} borrow`);
    this.name = 'BorrowError';
  }
}

/** Releases a borrow. Safe to call more than once. */
export type Release = () => void;

const noopRelease: Release = () => {};

export class BorrowTracker {
  private sharedCount = 0;
  private exclusiveCount = 0;

  constructor(
    readonly mode: BorrowCheckMode = 'off',
    private readonly logger: SequenceLogger = console
  ) {}

  /**
   * Acquire a shared (read-only) borrow.
   */
  shared(operation: string): Release {
    if (this.mode === 'off') return noopRelease;
    this.assertReadable(operation);
    this.sharedCount++;
    return this.once(() => {
      this.sharedCount--;
    });
  }

  /**
   * Acquire an exclusive (read-write) borrow.
   */
  exclusive(operation: string): Release {
    if (this.mode === 'off') return noopRelease;
    this.assertWritable(operation);
    this.exclusiveCount++;
    return this.once(() => {
      this.exclusiveCount--;
    });
  }

  /**
   * Report a violation if a read would overlap an exclusive borrow.
   */
  assertReadable(operation: string): void {
    if (this.mode === 'off') return;
    if (this.exclusiveCount > 0) {
      this.violation(operation, 'exclusive');
    }
  }

  /**
   * Report a violation if a write would overlap any borrow.
   */
  assertWritable(operation: string): void {
    if (this.mode === 'off') return;
    if (this.exclusiveCount > 0) {
      this.violation(operation, 'exclusive');
    } else if (this.sharedCount > 0) {
      this.violation(operation, 'shared');
    }
  }

  active(): BorrowState {
    return { shared: this.sharedCount, exclusive: this.exclusiveCount };
  }

  private violation(operation: string, held: BorrowKind): void {
    const error = new BorrowError(operation, held);
    if (this.mode === 'throw') {
      throw error;
    }
    this.logger.warn(`Borrow violation: ${error.message}`);
  }

  private once(release: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }
}
