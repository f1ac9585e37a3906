/**
 * Tests for reduction kernels
 */

import { describe, it, expect } from 'vitest';
import { executePercentileOp, executeReductionOp, percentileOf } from './reduction';
import type { DenseArray } from './types';

const matrix: DenseArray = {
  data: Float64Array.from([1, 2, 3, 4, 5, 6]),
  shape: [2, 3],
  dtype: 'float64',
};

describe('Reduction kernels', () => {
  it('should reduce the leading dimension', () => {
    const result = executeReductionOp('sum', matrix, 0);

    expect(result.shape).toEqual([3]);
    expect(Array.from(result.data)).toEqual([5, 7, 9]);
  });

  it('should reduce the trailing dimension', () => {
    const result = executeReductionOp('max', matrix, 1);

    expect(result.shape).toEqual([2]);
    expect(Array.from(result.data)).toEqual([3, 6]);
  });

  it('should propagate NaN through min and max', () => {
    const withNaN: DenseArray = {
      data: Float64Array.from([1, Number.NaN, 3]),
      shape: [3],
      dtype: 'float64',
    };

    expect(executeReductionOp('min', withNaN, 0).data[0]).toBeNaN();
    expect(executeReductionOp('max', withNaN, 0).data[0]).toBeNaN();
  });

  it('should give bool results for all and any', () => {
    const result = executeReductionOp('any', matrix, 0);

    expect(result.dtype).toBe('bool');
    expect(Array.from(result.data)).toEqual([1, 1, 1]);
  });

  it('should reject a missing dimension', () => {
    expect(() => executeReductionOp('sum', matrix, 2)).toThrow(
      'dimension 2 does not exist in a rank 2 buffer',
    );
  });

  it('should sum int32 lanes past the int32 range', () => {
    const large: DenseArray = {
      data: Int32Array.from([2147483647, 2147483647]),
      shape: [2],
      dtype: 'int32',
    };
    const result = executeReductionOp('sum', large, 0);

    expect(result.dtype).toBe('float64');
    expect(result.data[0]).toBe(4294967294);
  });
});

describe('Percentile kernels', () => {
  it('should interpolate between ranks', () => {
    const lane = Float64Array.from([3, 1, 2, 4]);

    expect(percentileOf(lane, 0)).toBe(1);
    expect(percentileOf(lane, 25)).toBe(1.75);
    expect(percentileOf(lane, 50)).toBe(2.5);
    expect(percentileOf(lane, 100)).toBe(4);
    expect(Array.from(lane)).toEqual([3, 1, 2, 4]);
  });

  it('should propagate NaN', () => {
    expect(percentileOf(Float64Array.from([1, Number.NaN]), 50)).toBeNaN();
  });

  it('should reduce one dimension into floats', () => {
    const ints: DenseArray = { data: Int32Array.from([1, 2, 3, 4, 5, 6]), shape: [2, 3], dtype: 'int32' };
    const result = executePercentileOp(50, ints, 1);

    expect(result.dtype).toBe('float64');
    expect(result.shape).toEqual([2]);
    expect(Array.from(result.data)).toEqual([2, 5]);
  });

  it('should reject percentiles outside 0 to 100', () => {
    expect(() => executePercentileOp(101, matrix, 0)).toThrow(
      'percentile must be between 0 and 100, got 101',
    );
  });
});
