/**
 * Test generators for name-keyed indexing
 *
 * These generators test integer offsets, slices and boolean masks, alone
 * and combined in one index expression, and linear interpolation at
 * fractional positions.
 */

import type { Backend } from '@named-arrays/core';
import { LinearSpace, array, slice } from '@named-arrays/core';
import { thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for indexing operations
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateIndexingOperationTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  const matrix = () =>
    array(
      [
        [1, 2, 3],
        [4, 5, 6],
      ],
      ['x', 'y'],
      { backend },
    );

  describe(`Indexing Operations Tests (${backend.type}:${backend.id})`, () => {
    describe('integer offsets', () => {
      it('should pick one position and drop the axis', () => {
        const result = matrix().index({ x: 0 });

        expect(result.axes).toEqual(['y']);
        expect(result.toArray()).toEqual([1, 2, 3]);
      });

      it('should count negative offsets from the end', () => {
        expect(matrix().index({ x: -1 }).toArray()).toEqual([4, 5, 6]);
        expect(matrix().index({ y: -3 }).toArray()).toEqual([1, 4]);
      });

      it('should reach rank 0 when every axis is offset', () => {
        const result = matrix().index({ x: 1, y: 2 });

        expect(result.ndim).toBe(0);
        expect(result.item()).toBe(6);
      });

      it('should reject offsets outside the axis', () => {
        expect(thrownCode(() => matrix().index({ x: 2 }))).toBe('INDEX_OUT_OF_BOUNDS');
        expect(thrownCode(() => matrix().index({ x: -3 }))).toBe('INDEX_OUT_OF_BOUNDS');
        expect(() => matrix().index({ x: 2 })).toThrow(
          "Invalid parameter 'x': index 2 is out of bounds for axis of extent 2",
        );
      });

      it('should reject fractional offsets', () => {
        expect(thrownCode(() => matrix().index({ y: 0.5 }))).toBe('INDEX_OUT_OF_BOUNDS');
      });
    });

    describe('slices', () => {
      it('should keep the axis with the sliced extent', () => {
        const result = matrix().index({ y: slice(0, 2) });

        expect(result.shape).toEqual({ x: 2, y: 2 });
        expect(result.toArray()).toEqual([
          [1, 2],
          [4, 5],
        ]);
      });

      it('should step and reverse', () => {
        expect(matrix().index({ y: slice(0, undefined, 2) }).toArray()).toEqual([
          [1, 3],
          [4, 6],
        ]);
        expect(matrix().index({ y: slice(undefined, undefined, -1) }).toArray()).toEqual([
          [3, 2, 1],
          [6, 5, 4],
        ]);
      });

      it('should clamp bounds past the ends', () => {
        expect(matrix().index({ y: slice(1, 10) }).toArray()).toEqual([
          [2, 3],
          [5, 6],
        ]);
      });

      it('should allow empty slices', () => {
        const result = matrix().index({ y: slice(2, 1) });

        expect(result.shape).toEqual({ x: 2, y: 0 });
        expect(result.size).toBe(0);
      });

      it('should reject a zero step', () => {
        expect(thrownCode(() => matrix().index({ y: slice(0, 3, 0) }))).toBe('INVALID_PARAMETER');
      });
    });

    describe('boolean masks', () => {
      it('should keep the positions marked true', () => {
        const result = matrix().index({ y: [true, false, true] });

        expect(result.shape).toEqual({ x: 2, y: 2 });
        expect(result.toArray()).toEqual([
          [1, 3],
          [4, 6],
        ]);
      });

      it('should accept a bool NamedArray along the same axis', () => {
        const m = matrix();
        const mask = m.index({ x: 0 }).gt(1);
        const result = m.index({ y: mask });

        expect(result.toArray()).toEqual([
          [2, 3],
          [5, 6],
        ]);
      });

      it('should reject a mask of the wrong length', () => {
        expect(() => matrix().index({ y: [true] })).toThrow(
          "Mask for axis 'y' has length 1 but the axis has extent 3",
        );
      });

      it('should reject array masks along another axis or of another dtype', () => {
        const m = matrix();
        const alongX = array([true, false], ['x'], { backend });
        const numeric = array([1, 0, 1], ['y'], { backend });

        expect(thrownCode(() => m.index({ y: alongX }))).toBe('SHAPE_MISMATCH');
        expect(() => m.index({ y: numeric })).toThrow(
          "Mask for axis 'y' must have dtype bool, got float64",
        );
      });
    });

    describe('expressions', () => {
      it('should combine selectors on several axes', () => {
        const result = matrix().index({ x: 1, y: slice(1) });

        expect(result.axes).toEqual(['y']);
        expect(result.toArray()).toEqual([5, 6]);
      });

      it('should keep the array axis order whatever the key order', () => {
        const result = matrix().index({ y: slice(0, 1), x: slice(0, 1) });

        expect(result.axes).toEqual(['x', 'y']);
        expect(result.toArray()).toEqual([[1]]);
      });

      it('should return an equal array for an empty expression', () => {
        const m = matrix();

        expect(m.index({}).equals(m)).toBe(true);
      });

      it('should check every key before selecting', () => {
        expect(thrownCode(() => matrix().index({ x: 5, z: 0 }))).toBe('AXIS_NOT_FOUND');
        expect(() => matrix().index({ z: 0 })).toThrow("Axis 'z' not found in index");
      });
    });

    describe('linear interpolation', () => {
      const line = () => array([0, 10, 20], ['x'], { backend });

      it('should interpolate between neighbouring samples', () => {
        const result = line().interpLinear({ x: 1.5 });

        expect(result.axes).toEqual([]);
        expect(result.item()).toBe(15);
        expect(line().interpLinear({ x: 2 }).item()).toBe(20);
      });

      it('should extrapolate from the outer pairs', () => {
        expect(line().interpLinear({ x: -1 }).item()).toBe(-10);
        expect(line().interpLinear({ x: 3 }).item()).toBe(30);
      });

      it('should take positions from an array', () => {
        const positions = array([0.5, 2, -1], ['p'], { backend });
        const result = line().interpLinear({ x: positions });

        expect(result.axes).toEqual(['p']);
        expect(result.toArray()).toEqual([5, 20, -10]);
      });

      it('should interpolate several axes together', () => {
        const grid = array(
          [
            [0, 1],
            [10, 11],
          ],
          ['x', 'y'],
          { backend },
        );

        expect(grid.interpLinear({ x: 0.5, y: 0.5 }).item()).toBe(5.5);
        const alongX = grid.interpLinear({ x: 0.25 });
        expect(alongX.axes).toEqual(['y']);
        expect(alongX.toArray()).toEqual([2.5, 3.5]);
      });

      it('should return float64 for integer samples', () => {
        const result = array([1, 3], ['x'], { backend, dtype: 'int32' }).interpLinear({ x: 1 });

        expect(result.dtype).toBe('float64');
        expect(result.item()).toBe(3);
      });

      it('should interpolate implicit arrays', () => {
        expect(new LinearSpace(0, 1, 'z', 5, { backend }).interpLinear({ z: 2 }).item()).toBe(0.5);
      });

      it('should reject unusable coordinates', () => {
        const loose = array<string>([0, 10, 20], ['x'], { backend });

        expect(thrownCode(() => loose.interpLinear({}))).toBe('INVALID_PARAMETER');
        expect(thrownCode(() => loose.interpLinear({ z: 1 }))).toBe('AXIS_NOT_FOUND');
        expect(thrownCode(() => loose.interpLinear({ x: Number.NaN }))).toBe('INVALID_PARAMETER');
        expect(
          thrownCode(() => array([4], ['x'], { backend }).interpLinear({ x: 0 })),
        ).toBe('INVALID_PARAMETER');
        expect(() => loose.interpLinear({ x: array([0, 1], ['x'], { backend }) })).toThrow(
          "Invalid parameter 'coordinates': positions along 'x' cannot themselves carry axis 'x'",
        );
      });
    });
  });
}
