/**
 * Tests for CPU backend helpers
 */

import { describe, it, expect } from 'vitest';
import { InvalidParameterError, ShapeMismatchError } from '@named-arrays/core';
import {
  broadcastStrides,
  computeFlatIndex,
  flattenNested,
  inferShape,
  nestValues,
  storeResult,
  stridedOffsets,
  toTypedArray,
} from './utils';

describe('CPU utils', () => {
  describe('toTypedArray', () => {
    it('should store nonzero values as 1 in bool arrays', () => {
      const data = toTypedArray([0, 2, -1, Number.NaN], 'bool');

      expect(data).toBeInstanceOf(Uint8Array);
      expect(Array.from(data)).toEqual([0, 1, 1, 1]);
    });

    it('should truncate toward zero in int32 arrays', () => {
      expect(Array.from(toTypedArray([1.9, -1.9], 'int32'))).toEqual([1, -1]);
    });
  });

  describe('storeResult', () => {
    it('should store results that fit the dtype', () => {
      const data = new Int32Array(1);
      storeResult(data, 0, -2147483648, 'int32', 'sub');

      expect(data[0]).toBe(-2147483648);
    });

    it('should refuse int32 results that would wrap or truncate', () => {
      const data = new Int32Array(1);

      expect(() => storeResult(data, 0, 2147483648, 'int32', 'add')).toThrow(InvalidParameterError);
      expect(() => storeResult(data, 0, 0.5, 'int32', 'pow')).toThrow(
        "Invalid parameter 'pow': result 0.5 does not fit in int32",
      );
      expect(data[0]).toBe(0);
    });

    it('should store any value in float arrays', () => {
      const data = new Float64Array(1);
      storeResult(data, 0, 0.5, 'float64', 'pow');

      expect(data[0]).toBe(0.5);
    });
  });

  describe('stridedOffsets', () => {
    it('should walk contiguous strides in order', () => {
      expect(Array.from(stridedOffsets([2, 3], [3, 1]))).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('should walk transposed strides', () => {
      expect(Array.from(stridedOffsets([2, 3], [1, 2]))).toEqual([0, 2, 4, 1, 3, 5]);
    });

    it('should repeat elements along zero strides', () => {
      expect(Array.from(stridedOffsets([2, 3], [0, 1]))).toEqual([0, 1, 2, 0, 1, 2]);
    });

    it('should produce nothing for empty shapes', () => {
      expect(stridedOffsets([0, 3], [3, 1])).toHaveLength(0);
    });
  });

  describe('broadcastStrides', () => {
    it('should zero the strides of stretched dimensions', () => {
      expect(broadcastStrides([1, 3], [2, 3])).toEqual([0, 1]);
    });

    it('should reject incompatible shapes', () => {
      expect(() => broadcastStrides([2], [3])).toThrow(ShapeMismatchError);
      expect(() => broadcastStrides([2], [2, 2])).toThrow('Cannot broadcast rank 1 to rank 2');
    });
  });

  describe('nested data', () => {
    it('should infer shapes', () => {
      expect(inferShape(5)).toEqual([]);
      expect(inferShape([])).toEqual([0]);
      expect(
        inferShape([
          [1, 2],
          [3, 4],
          [5, 6],
        ]),
      ).toEqual([3, 2]);
    });

    it('should reject ragged data', () => {
      expect(() => inferShape([[1], [2, 3]])).toThrow(
        'Ragged nested data: found sub-shapes [1] and [2]',
      );
    });

    it('should flatten in row-major order', () => {
      expect(
        flattenNested([
          [1, 2],
          [3, 4],
        ]),
      ).toEqual([1, 2, 3, 4]);
    });

    it('should rebuild nested lists', () => {
      expect(nestValues([1, 2, 3, 4, 5, 6], [2, 3], false)).toEqual([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      expect(nestValues([1, 0], [2], true)).toEqual([true, false]);
      expect(nestValues([7], [], false)).toBe(7);
    });
  });

  it('should compute flat indices from strides', () => {
    expect(computeFlatIndex([1, 2], [3, 1])).toBe(5);
  });
});
