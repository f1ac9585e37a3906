/**
 * Tests for elementwise kernels
 */

import { describe, it, expect } from 'vitest';
import { broadcastShapes, executeBinaryOp, floorMod } from './binary';
import { executeUnaryOp, roundHalfEven } from './unary';
import type { DenseArray } from './types';

const dense = (values: number[], shape: number[]): DenseArray => ({
  data: Float64Array.from(values),
  shape,
  dtype: 'float64',
});

describe('Binary kernels', () => {
  it('should take the floor modulo', () => {
    expect(floorMod(7, 3)).toBe(1);
    expect(floorMod(-7, 3)).toBe(2);
    expect(floorMod(7, -3)).toBe(-2);
  });

  describe('broadcastShapes', () => {
    it('should stretch size-1 dimensions', () => {
      expect(broadcastShapes([3, 1], [1, 2])).toEqual([3, 2]);
    });

    it('should pass rank-0 operands through', () => {
      expect(broadcastShapes([], [2, 2])).toEqual([2, 2]);
      expect(broadcastShapes([4], [])).toEqual([4]);
    });

    it('should reject different ranks and conflicting sizes', () => {
      expect(() => broadcastShapes([2], [2, 2])).toThrow('ranks differ');
      expect(() => broadcastShapes([3], [5])).toThrow('dimension 0 has sizes 3 and 5');
    });
  });

  it('should compute the outer combination of broadcast operands', () => {
    const result = executeBinaryOp('sub', dense([10, 20, 30], [3, 1]), dense([1, 2], [1, 2]));

    expect(result.shape).toEqual([3, 2]);
    expect(Array.from(result.data)).toEqual([9, 8, 19, 18, 29, 28]);
  });

  it('should produce bool data for comparisons', () => {
    const result = executeBinaryOp('ge', dense([1, 2, 3], [3]), dense([2], []));

    expect(result.dtype).toBe('bool');
    expect(result.data).toBeInstanceOf(Uint8Array);
    expect(Array.from(result.data)).toEqual([0, 1, 1]);
  });
});

describe('Unary kernels', () => {
  it('should round halves to even', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(-2.5)).toBe(-2);
    expect(roundHalfEven(2.6)).toBe(3);
  });

  it('should keep the shape', () => {
    const result = executeUnaryOp('square', dense([1, 2, 3, 4], [2, 2]));

    expect(result.shape).toEqual([2, 2]);
    expect(Array.from(result.data)).toEqual([1, 4, 9, 16]);
  });
});
