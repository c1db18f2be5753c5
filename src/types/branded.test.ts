/**
 * Tests for branded size types.
 */

import { describe, it, expect } from 'vitest';
import {
  chunkSize,
  isValidChunkSize,
  isValidIndex,
  DEFAULT_CHUNK_SIZE,
  type ChunkSize,
} from './branded.ts';

describe('Branded Types', () => {
  describe('chunkSize', () => {
    it('should create ChunkSize from a positive integer', () => {
      const size: ChunkSize = chunkSize(8);
      expect(size).toBe(8);
    });

    it('should accept a chunk size of one', () => {
      expect(chunkSize(1)).toBe(1);
    });

    it('should reject zero', () => {
      expect(() => chunkSize(0)).toThrow(RangeError);
      expect(() => chunkSize(0)).toThrow('Invalid chunk size: 0');
    });

    it('should reject negative, fractional and non-finite values', () => {
      expect(() => chunkSize(-4)).toThrow('Invalid chunk size: -4');
      expect(() => chunkSize(2.5)).toThrow('Invalid chunk size: 2.5');
      expect(() => chunkSize(NaN)).toThrow('Invalid chunk size: NaN');
      expect(() => chunkSize(Infinity)).toThrow('Invalid chunk size: Infinity');
    });
  });

  describe('validation functions', () => {
    it('should validate chunk sizes', () => {
      expect(isValidChunkSize(1)).toBe(true);
      expect(isValidChunkSize(4096)).toBe(true);
      expect(isValidChunkSize(0)).toBe(false);
      expect(isValidChunkSize(-1)).toBe(false);
      expect(isValidChunkSize(1.5)).toBe(false);
    });

    it('should narrow a number to ChunkSize', () => {
      const raw = 16;
      if (isValidChunkSize(raw)) {
        const size: ChunkSize = raw;
        expect(size).toBe(16);
      } else {
        expect.unreachable();
      }
    });

    it('should validate indices', () => {
      expect(isValidIndex(0)).toBe(true);
      expect(isValidIndex(1000000)).toBe(true);
      expect(isValidIndex(-1)).toBe(false);
      expect(isValidIndex(0.5)).toBe(false);
      expect(isValidIndex(NaN)).toBe(false);
      expect(isValidIndex(Infinity)).toBe(false);
    });
  });

  describe('constants', () => {
    it('should have a positive default chunk size', () => {
      expect(DEFAULT_CHUNK_SIZE).toBe(1024);
      expect(isValidChunkSize(DEFAULT_CHUNK_SIZE)).toBe(true);
    });
  });
});
