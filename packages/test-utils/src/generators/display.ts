/**
 * Test generators for text rendering
 *
 * These generators test `format()` and `toString()` on materialized and
 * implicit arrays.
 */

import type { Backend } from '@named-arrays/core';
import { ArrayRange, LinearSpace, array, scalar } from '@named-arrays/core';
import type { TestFramework } from '../framework';

/**
 * Generates tests for array display
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateDisplayTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Display Tests (${backend.type}:${backend.id})`, () => {
    describe('format()', () => {
      it('should render vectors on one line with their axes', () => {
        expect(array([1.5, 2], ['x'], { backend }).format()).toBe(
          "NamedArray([1.5, 2], axes=['x'])",
        );
      });

      it('should align matrix rows under the opening bracket', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5], ['y'], { backend });

        expect(a.add(b).format()).toBe(
          [
            'NamedArray([[5, 6],',
            '            [6, 7],',
            "            [7, 8]], axes=['x', 'y'])",
          ].join('\n'),
        );
      });

      it('should separate the blocks of higher-rank arrays with a blank line', () => {
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

        expect(cube.format()).toBe(
          [
            'NamedArray([[[1, 2],',
            '             [3, 4]],',
            '',
            '            [[5, 6],',
            "             [7, 8]]], axes=['a', 'b', 'c'])",
          ].join('\n'),
        );
      });

      it('should limit decimals to the precision', () => {
        const a = array([1 / 3], ['x'], { backend });

        expect(a.format()).toBe("NamedArray([0.3333], axes=['x'])");
        expect(a.format({ precision: 2 })).toBe("NamedArray([0.33], axes=['x'])");
      });

      it('should name non-default dtypes', () => {
        expect(array([1, 2], ['x'], { backend, dtype: 'int32' }).format()).toBe(
          "NamedArray([1, 2], axes=['x'], dtype=int32)",
        );
        expect(array([true, false], ['m'], { backend }).format()).toBe(
          "NamedArray([true, false], axes=['m'])",
        );
      });

      it('should render rank-0 arrays as their value', () => {
        expect(scalar(3, { backend }).format()).toBe('NamedArray(3, axes=[])');
      });

      it('should summarize arrays above the threshold', () => {
        const range = new ArrayRange(0, 10, 't', { backend });

        expect(range.format({ threshold: 5, edgeItems: 2 })).toBe(
          "NamedArray([0, 1, ..., 8, 9], axes=['t'], dtype=int32)",
        );
      });
    });

    describe('toString()', () => {
      it('should match format() for materialized arrays', () => {
        const a = array([1, 2], ['x'], { backend });

        expect(a.toString()).toBe(a.format());
        expect(`${a}`).toBe("NamedArray([1, 2], axes=['x'])");
      });

      it('should show the generating rule of implicit arrays', () => {
        expect(new LinearSpace(0, 1, 'z', 4, { backend }).toString()).toBe(
          "LinearSpace(start=0, stop=1, axis='z', num=4, endpoint=true)",
        );
        expect(new ArrayRange(0, 3, 't', { backend, step: 1 }).toString()).toBe(
          "ArrayRange(start=0, stop=3, axis='t', step=1)",
        );
      });
    });
  });
}
