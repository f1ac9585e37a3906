/**
 * Test generators for binary operations
 *
 * These generators test elementwise binary operations, where operands are
 * aligned by axis name before the backend sees them.
 */

import type { Backend } from '@named-arrays/core';
import { array } from '@named-arrays/core';
import { thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for binary operations and name-based alignment
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateBinaryOperationTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Binary Operations Tests (${backend.type}:${backend.id})`, () => {
    describe('alignment by name', () => {
      it('should take the outer combination of disjoint axes', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5], ['y'], { backend });
        const result = a.add(b);

        expect(result.axes).toEqual(['x', 'y']);
        expect(result.shape).toEqual({ x: 3, y: 2 });
        expect(result.toArray()).toEqual([
          [5, 6],
          [6, 7],
          [7, 8],
        ]);
      });

      it('should order result axes by first appearance', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5], ['y'], { backend });
        const result = b.add(a);

        expect(result.axes).toEqual(['y', 'x']);
        expect(result.toArray()).toEqual([
          [5, 6, 7],
          [6, 7, 8],
        ]);
      });

      it('should give equal results for swapped operands of a commutative op', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5], ['y'], { backend });

        expect(a.add(b).equals(b.add(a))).toBe(true);
        expect(a.mul(b).equals(b.mul(a))).toBe(true);
      });

      it('should match shared axes by name, not by position', () => {
        const c = array(
          [
            [1, 2],
            [3, 4],
          ],
          ['x', 'y'],
          { backend },
        );
        const d = array(
          [
            [10, 30],
            [20, 40],
          ],
          ['y', 'x'],
          { backend },
        );

        expect(c.add(d).toArray()).toEqual([
          [11, 22],
          [33, 44],
        ]);
      });

      it('should broadcast an operand missing some axes', () => {
        const m = array(
          [
            [1, 2],
            [3, 4],
          ],
          ['x', 'y'],
          { backend },
        );
        const v = array([10, 20], ['y'], { backend });
        const result = v.add(m);

        expect(result.axes).toEqual(['y', 'x']);
        expect(result.toArray()).toEqual([
          [11, 13],
          [22, 24],
        ]);
      });

      it('should stretch a shared axis of extent 1', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const p = array([10], ['x'], { backend });
        const result = a.add(p);

        expect(result.shape).toEqual({ x: 3 });
        expect(result.toArray()).toEqual([11, 12, 13]);
      });

      it('should reject a shared axis with two different extents above 1', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const c = array([1, 2, 3, 4, 5], ['x'], { backend });

        expect(thrownCode(() => a.add(c))).toBe('AXIS_MISMATCH');
        expect(() => a.add(c)).toThrow("Axis 'x' has incompatible extents 3 and 5");
      });

      it('should leave operands untouched when an operation fails', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const c = array([1, 2], ['x'], { backend });

        expect(() => a.sub(c)).toThrow();
        expect(a.toArray()).toEqual([1, 2, 3]);
        expect(c.toArray()).toEqual([1, 2]);
      });

      it('should chain across several axes', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5], ['y'], { backend });
        const z = array([100, 200], ['z'], { backend });
        const result = a.add(b).add(z);

        expect(result.axes).toEqual(['x', 'y', 'z']);
        expect(result.shape).toEqual({ x: 3, y: 2, z: 2 });
        expect(result.index({ x: 2, y: 1 }).toArray()).toEqual([108, 208]);
      });
    });

    describe('scalar operands', () => {
      it('should apply a bare number to every element', () => {
        const a = array([1, 2, 3], ['x'], { backend });

        expect(a.mul(2).toArray()).toEqual([2, 4, 6]);
        expect(a.sub(1).toArray()).toEqual([0, 1, 2]);
        expect(a.mul(2).axes).toEqual(['x']);
      });

      it('should keep int32 for integer scalars and promote for fractional ones', () => {
        const a = array([1, 2], ['x'], { backend, dtype: 'int32' });

        expect(a.add(1).dtype).toBe('int32');
        const promoted = a.add(0.5);
        expect(promoted.dtype).toBe('float64');
        expect(promoted.toArray()).toEqual([1.5, 2.5]);
      });
    });

    describe('arithmetic', () => {
      it('should divide integers into floats', () => {
        const a = array([1, 2], ['x'], { backend, dtype: 'int32' });
        const result = a.div(2);

        expect(result.dtype).toBe('float64');
        expect(result.toArray()).toEqual([0.5, 1]);
      });

      it('should take the modulo with the sign of the divisor', () => {
        expect(array([-3, 3], ['x'], { backend }).mod(2).toArray()).toEqual([1, 1]);
        expect(array([3], ['x'], { backend }).mod(-2).toArray()).toEqual([-1]);
      });

      it('should raise to a power', () => {
        expect(array([1, 2, 3], ['x'], { backend }).pow(2).toArray()).toEqual([1, 4, 9]);
      });

      it('should raise integers to negative powers in float64', () => {
        const result = array([2, 4], ['x'], { backend, dtype: 'int32' }).pow(-1);

        expect(result.dtype).toBe('float64');
        expect(result.toArray()).toEqual([0.5, 0.25]);
      });

      it('should refuse int32 results that overflow', () => {
        const a = array([2147483647], ['x'], { backend, dtype: 'int32' });

        expect(thrownCode(() => a.add(1))).toBe('INTEGER_OVERFLOW');
        expect(thrownCode(() => a.mul(a))).toBe('INTEGER_OVERFLOW');
        expect(a.astype('float64').add(1).item()).toBe(2147483648);
      });

      it('should refuse an integer modulo by zero', () => {
        const a = array([3], ['x'], { backend, dtype: 'int32' });

        expect(thrownCode(() => a.mod(0))).toBe('INTEGER_OVERFLOW');
        expect(Number.isNaN(a.astype('float64').mod(0).item())).toBe(true);
      });

      it('should take elementwise maximum and minimum', () => {
        const a = array([1, 2, 3], ['x'], { backend });

        expect(a.maximum(2).toArray()).toEqual([2, 2, 3]);
        expect(a.minimum(2).toArray()).toEqual([1, 2, 2]);
      });

      it('should add booleans as integers', () => {
        const p = array([true, true], ['m'], { backend });
        const q = array([true, false], ['m'], { backend });
        const result = p.add(q);

        expect(result.dtype).toBe('int32');
        expect(result.toArray()).toEqual([2, 1]);
      });
    });

    describe('comparison and logic', () => {
      it('should compare into bool arrays', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const result = a.gt(1);

        expect(result.dtype).toBe('bool');
        expect(result.toArray()).toEqual([false, true, true]);
        expect(a.eq(2).toArray()).toEqual([false, true, false]);
        expect(a.ne(2).toArray()).toEqual([true, false, true]);
        expect(a.le(2).toArray()).toEqual([true, true, false]);
        expect(a.lt(2).toArray()).toEqual([true, false, false]);
        expect(a.ge(2).toArray()).toEqual([false, true, true]);
      });

      it('should combine masks', () => {
        const p = array([true, false], ['m'], { backend });
        const q = array([true, true], ['m'], { backend });

        expect(p.and(q).toArray()).toEqual([true, false]);
        expect(p.or(q).toArray()).toEqual([true, true]);
      });

      it('should compare across different axes', () => {
        const a = array([1, 2], ['x'], { backend });
        const b = array([1, 2], ['y'], { backend });

        expect(a.lt(b).toArray()).toEqual([
          [false, true],
          [false, false],
        ]);
      });
    });
  });
}
