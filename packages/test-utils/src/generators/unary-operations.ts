/**
 * Test generators for unary operations
 */

import type { Backend } from '@named-arrays/core';
import { array } from '@named-arrays/core';
import { expectAllClose } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for elementwise unary operations
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateUnaryOperationTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Unary Operations Tests (${backend.type}:${backend.id})`, () => {
    describe('sign and magnitude', () => {
      it('should negate', () => {
        expect(array([-2, 3], ['x'], { backend }).neg().toArray()).toEqual([2, -3]);
      });

      it('should take absolute values and signs', () => {
        const a = array([-2, 0, 3], ['x'], { backend });

        expect(a.abs().toArray()).toEqual([2, 0, 3]);
        expect(a.sign().toArray()).toEqual([-1, 0, 1]);
      });

      it('should square', () => {
        expect(array([-2, 3], ['x'], { backend }).square().toArray()).toEqual([4, 9]);
      });

      it('should turn booleans into integers when negating', () => {
        const result = array([true, false], ['m'], { backend }).neg();

        expect(result.dtype).toBe('int32');
        expect(result.values()).toEqual([-1, 0]);
      });
    });

    describe('transcendental functions', () => {
      it('should produce floats from integer input', () => {
        const result = array([4, 9], ['x'], { backend, dtype: 'int32' }).sqrt();

        expect(result.dtype).toBe('float64');
        expect(result.toArray()).toEqual([2, 3]);
      });

      it('should compute exp and log', () => {
        expectAllClose(expect, array([0, 1], ['x'], { backend }).exp().toArray(), [1, Math.E]);
        expectAllClose(expect, array([1, Math.E], ['x'], { backend }).log().toArray(), [0, 1]);
      });

      it('should compute trigonometric functions', () => {
        const angles = array([0, Math.PI / 2], ['theta'], { backend });

        expectAllClose(expect, angles.sin().toArray(), [0, 1]);
        expectAllClose(expect, angles.cos().toArray(), [1, 0]);
        expectAllClose(expect, array([0, Math.PI / 4], ['theta'], { backend }).tan().toArray(), [0, 1]);
      });
    });

    describe('rounding', () => {
      it('should floor and ceil', () => {
        const a = array([-1.5, 1.5], ['x'], { backend });

        expect(a.floor().toArray()).toEqual([-2, 1]);
        expect(a.ceil().toArray()).toEqual([-1, 2]);
      });

      it('should round halves to even', () => {
        const a = array([0.5, 1.5, 2.5, -1.5, 2.4], ['x'], { backend });

        expect(a.round().toArray()).toEqual([0, 2, 2, -2, 2]);
      });
    });

    describe('logic', () => {
      it('should invert masks', () => {
        expect(array([true, false], ['m'], { backend }).not().toArray()).toEqual([false, true]);
      });

      it('should treat nonzero numbers as true', () => {
        const result = array([0, 2], ['x'], { backend }).not();

        expect(result.dtype).toBe('bool');
        expect(result.toArray()).toEqual([true, false]);
      });
    });

    it('should keep axes and their order', () => {
      const a = array(
        [
          [-1, 2],
          [3, -4],
        ],
        ['y', 'x'],
        { backend },
      );
      const result = a.abs();

      expect(result.axes).toEqual(['y', 'x']);
      expect(result.toArray()).toEqual([
        [1, 2],
        [3, 4],
      ]);
    });
  });
}
