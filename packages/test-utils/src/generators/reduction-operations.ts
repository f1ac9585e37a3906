/**
 * Test generators for reduction operations
 *
 * These generators test reductions over named axes: one axis, a list of
 * axes, or every axis when none is given.
 */

import type { Backend } from '@named-arrays/core';
import { ArrayRange, array, zeros } from '@named-arrays/core';
import { expectAllClose, thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for reduction operations
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateReductionOperationTests(backend: Backend, testFramework: TestFramework) {
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

  describe(`Reduction Operations Tests (${backend.type}:${backend.id})`, () => {
    describe('sum', () => {
      it('should reduce every axis when none is named', () => {
        const result = matrix().sum();

        expect(result.ndim).toBe(0);
        expect(result.axes).toEqual([]);
        expect(result.item()).toBe(21);
      });

      it('should drop exactly the named axis', () => {
        const m = matrix();

        expect(m.sum('x').axes).toEqual(['y']);
        expect(m.sum('x').toArray()).toEqual([5, 7, 9]);
        expect(m.sum('y').axes).toEqual(['x']);
        expect(m.sum('y').toArray()).toEqual([6, 15]);
      });

      it('should reduce a list of axes in any order', () => {
        const m = matrix();

        expect(m.sum(['x', 'y']).item()).toBe(21);
        expect(m.sum(['y', 'x']).item()).toBe(21);
      });

      it('should reach an empty axis set by chaining', () => {
        const result = matrix().sum('x').sum('y');

        expect(result.axes).toEqual([]);
        expect(result.shape).toEqual({});
        expect(result.item()).toBe(21);
      });

      it('should reduce non-adjacent axes together', () => {
        const cube = array(
          [
            [
              [1, 2],
              [3, 4],
            ],
            [
              [5, 6],
              [7, 8],
            ],
          ],
          ['a', 'b', 'c'],
          { backend },
        );
        const result = cube.sum(['a', 'c']);

        expect(result.axes).toEqual(['b']);
        expect(result.toArray()).toEqual([14, 22]);
      });

      it('should ignore repeated names', () => {
        expect(matrix().sum(['x', 'x']).toArray()).toEqual([5, 7, 9]);
      });

      it('should return the array unchanged for an empty list', () => {
        const m = matrix();
        const result = m.sum([]);

        expect(result.axes).toEqual(['x', 'y']);
        expect(result.equals(m)).toBe(true);
      });

      it('should sum a zero-extent axis to zeros', () => {
        const result = zeros({ x: 0, y: 2 }, { backend }).sum('x');

        expect(result.toArray()).toEqual([0, 0]);
      });

      it('should reject an unknown axis', () => {
        expect(thrownCode(() => matrix().sum('z'))).toBe('AXIS_NOT_FOUND');
        expect(() => matrix().sum('z')).toThrow(
          "Axis 'z' not found in sum reduction. Available axes: ['x', 'y']",
        );
      });
    });

    describe('statistics', () => {
      it('should compute mean and product', () => {
        const m = matrix();

        expect(m.mean('y').toArray()).toEqual([2, 5]);
        expect(m.prod('y').toArray()).toEqual([6, 120]);
      });

      it('should compute population variance and standard deviation', () => {
        const m = matrix();

        expectAllClose(expect, m.var('y').toArray(), [2 / 3, 2 / 3]);
        expectAllClose(expect, m.std('y').toArray(), [Math.sqrt(2 / 3), Math.sqrt(2 / 3)]);
        expect(m.var().item()).toBeCloseTo(17.5 / 6, 10);
      });

      it('should compute extrema and their spread', () => {
        const m = matrix();

        expect(m.min('x').toArray()).toEqual([1, 2, 3]);
        expect(m.max('y').toArray()).toEqual([3, 6]);
        expect(m.ptp('y').toArray()).toEqual([2, 2]);
        expect(m.ptp().item()).toBe(5);
      });

      it('should compute the root mean square', () => {
        expect(array([3, 4], ['x'], { backend }).rms().item()).toBeCloseTo(Math.sqrt(12.5), 10);
      });

      it('should reject min and max over a zero-extent axis', () => {
        const empty = zeros({ x: 0, y: 2 }, { backend });

        expect(thrownCode(() => empty.min('x'))).toBe('EMPTY_REDUCTION');
        expect(thrownCode(() => empty.max())).toBe('EMPTY_REDUCTION');
      });
    });

    describe('percentile', () => {
      const grid = () =>
        array(
          [
            [1, 2, 3],
            [4, 5, 6],
          ],
          ['x', 'y'],
          { backend },
        );

      it('should take percentiles along one axis', () => {
        const result = grid().percentile(50, 'y');

        expect(result.axes).toEqual(['x']);
        expect(result.toArray()).toEqual([2, 5]);
        expect(grid().median('x').toArray()).toEqual([2.5, 3.5, 4.5]);
      });

      it('should interpolate over every element of a group', () => {
        expect(grid().percentile(25).item()).toBe(2.25);
        expect(grid().percentile(50, ['x', 'y']).item()).toBe(3.5);
        expect(grid().percentile(0, 'x').toArray()).toEqual([1, 2, 3]);
        expect(grid().percentile(100, 'x').toArray()).toEqual([4, 5, 6]);
      });

      it('should give float64 for integer input', () => {
        const result = array([1, 2], ['x'], { backend, dtype: 'int32' }).median();

        expect(result.dtype).toBe('float64');
        expect(result.item()).toBe(1.5);
      });

      it('should reject bad percentiles, missing axes and empty axes', () => {
        expect(() => grid().percentile(120)).toThrow('percentile must be between 0 and 100, got 120');
        expect(thrownCode(() => grid().percentile(Number.NaN))).toBe('INVALID_PARAMETER');
        expect(thrownCode(() => grid().percentile(50, 'z'))).toBe('AXIS_NOT_FOUND');
        expect(thrownCode(() => zeros({ x: 0 }, { backend }).median())).toBe('EMPTY_REDUCTION');
      });
    });

    describe('logical reductions', () => {
      it('should reduce masks with all and any', () => {
        const mask = array(
          [
            [true, false],
            [true, true],
          ],
          ['x', 'y'],
          { backend },
        );

        expect(mask.all('y').toArray()).toEqual([false, true]);
        expect(mask.any('x').toArray()).toEqual([true, true]);
        expect(mask.all().item()).toBe(false);
        expect(mask.any().item()).toBe(true);
      });
    });

    describe('result dtypes', () => {
      it('should accumulate integer sums in float64 and use float64 for means', () => {
        const a = array([1, 2], ['x'], { backend, dtype: 'int32' });

        expect(a.sum().dtype).toBe('float64');
        expect(a.sum().item()).toBe(3);
        expect(a.mean().dtype).toBe('float64');
        expect(a.mean().item()).toBe(1.5);
        expect(a.max().dtype).toBe('int32');
      });

      it('should count booleans when summing', () => {
        const result = array([true, false, true], ['m'], { backend }).sum();

        expect(result.dtype).toBe('float64');
        expect(result.item()).toBe(2);
      });

      it('should not wrap integer sums beyond the int32 range', () => {
        const range = new ArrayRange(0, 100000, 't', { backend });

        expect(range.dtype).toBe('int32');
        expect(range.sum().item()).toBe(4999950000);
      });

      it('should not wrap integer products beyond the int32 range', () => {
        const a = array([100000, 100000], ['x'], { backend, dtype: 'int32' });

        expect(a.prod().item()).toBe(10000000000);
      });

      it('should use the reduction dtype when no axis is reduced', () => {
        const a = array(3, [], { backend, dtype: 'int32' });

        expect(a.sum().dtype).toBe('float64');
        expect(a.any().dtype).toBe('bool');
        expect(a.any().item()).toBe(true);
      });
    });
  });
}
