/**
 * Tests for layout kernels
 */

import { describe, it, expect } from 'vitest';
import type { DenseArray } from './types';
import {
  executeBroadcastToOp,
  executeReshapeOp,
  executeSelectOp,
  executeTransposeOp,
} from './view';

const matrix: DenseArray = {
  data: Float64Array.from([1, 2, 3, 4, 5, 6]),
  shape: [2, 3],
  dtype: 'float64',
};

describe('Layout kernels', () => {
  it('should reshape without copying', () => {
    const result = executeReshapeOp(matrix, [6]);

    expect(result.data).toBe(matrix.data);
    expect(result.shape).toEqual([6]);
  });

  it('should transpose', () => {
    const result = executeTransposeOp(matrix, [1, 0]);

    expect(result.shape).toEqual([3, 2]);
    expect(Array.from(result.data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it('should reject an invalid permutation', () => {
    expect(() => executeTransposeOp(matrix, [0, 0])).toThrow(
      '[0, 0] is not a permutation of 2 dimensions',
    );
  });

  it('should broadcast size-1 dimensions', () => {
    const row: DenseArray = { data: Float64Array.from([1, 2]), shape: [1, 2], dtype: 'float64' };
    const result = executeBroadcastToOp(row, [3, 2]);

    expect(Array.from(result.data)).toEqual([1, 2, 1, 2, 1, 2]);
  });

  describe('select', () => {
    it('should drop indexed dimensions', () => {
      const result = executeSelectOp(matrix, [{ kind: 'index', index: 1 }, { kind: 'all' }]);

      expect(result.shape).toEqual([3]);
      expect(Array.from(result.data)).toEqual([4, 5, 6]);
    });

    it('should select each dimension independently', () => {
      const result = executeSelectOp(matrix, [
        { kind: 'mask', mask: [true, true] },
        { kind: 'slice', start: 2, stop: -1, step: -2 },
      ]);

      expect(result.shape).toEqual([2, 2]);
      expect(Array.from(result.data)).toEqual([3, 1, 6, 4]);
    });

    it('should reject a selector count that differs from the rank', () => {
      expect(() => executeSelectOp(matrix, [{ kind: 'all' }])).toThrow(
        'Got 1 selectors for a buffer of rank 2',
      );
    });
  });
});
