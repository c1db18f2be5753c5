/**
 * Bounds checks shared by the trusted accessors.
 */

import { isValidIndex } from '../../types/branded.ts';

/**
 * Check that an index addresses a live element.
 */
export function isInBounds(index: number, length: number): boolean {
  return isValidIndex(index) && index < length;
}

/**
 * Throw unless `index` addresses a live element.
 * Out-of-range access through a trusted accessor is a caller bug, not a
 * recoverable condition.
 * @throws RangeError
 */
export function assertInBounds(index: number, length: number): void {
  if (!isInBounds(index, length)) {
    throw new RangeError(`Index out of bounds: ${index} (length ${length})`);
  }
}
