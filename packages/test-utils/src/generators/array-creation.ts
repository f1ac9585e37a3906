/**
 * Test generators for array creation and properties
 *
 * These generators test the creation functions and the metadata every
 * NamedArray reports: axes, named shape, rank, size, dtype and backend.
 */

import type { Backend } from '@named-arrays/core';
import { array, full, ones, scalar, zeros } from '@named-arrays/core';
import { thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for array creation
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateArrayCreationTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Array Creation Tests (${backend.type}:${backend.id})`, () => {
    describe('array()', () => {
      it('should pair each nesting level with a name', () => {
        const a = array(
          [
            [1, 2, 3],
            [4, 5, 6],
          ],
          ['row', 'col'],
          { backend },
        );

        expect(a.axes).toEqual(['row', 'col']);
        expect(a.shape).toEqual({ row: 2, col: 3 });
        expect(a.ndim).toBe(2);
        expect(a.size).toBe(6);
        expect(a.dtype).toBe('float64');
        expect(a.backend).toBe(backend);
        expect(a.toArray()).toEqual([
          [1, 2, 3],
          [4, 5, 6],
        ]);
      });

      it('should infer bool for boolean data', () => {
        const mask = array([true, false, true], ['m'], { backend });

        expect(mask.dtype).toBe('bool');
        expect(mask.toArray()).toEqual([true, false, true]);
        expect(mask.values()).toEqual([1, 0, 1]);
      });

      it('should honour an explicit dtype', () => {
        const a = array([1.7, -2.7], ['x'], { backend, dtype: 'int32' });

        expect(a.dtype).toBe('int32');
        expect(a.values()).toEqual([1, -2]);
      });

      it('should create a rank-0 array from a bare number', () => {
        const a = array(7, [], { backend });

        expect(a.ndim).toBe(0);
        expect(a.shape).toEqual({});
        expect(a.size).toBe(1);
        expect(a.item()).toBe(7);
      });

      it('should reject ragged data', () => {
        expect(thrownCode(() => array([[1, 2], [3]], ['a', 'b'], { backend }))).toBe(
          'SHAPE_MISMATCH',
        );
      });

      it('should reject a name count that differs from the data rank', () => {
        expect(() => array([1, 2], ['a', 'b'], { backend })).toThrow(
          'Got 2 axis names for a buffer of rank 1',
        );
      });

      it('should reject repeated axis names', () => {
        expect(() => array([[1]], ['a', 'a'], { backend })).toThrow("Duplicate axis name 'a'");
      });
    });

    describe('scalar()', () => {
      it('should create float64 scalars from numbers', () => {
        const s = scalar(2.5, { backend });

        expect(s.axes).toEqual([]);
        expect(s.dtype).toBe('float64');
        expect(s.item()).toBe(2.5);
      });

      it('should create bool scalars from booleans', () => {
        const s = scalar(true, { backend });

        expect(s.dtype).toBe('bool');
        expect(s.item()).toBe(true);
      });
    });

    describe('full(), zeros(), ones()', () => {
      it('should fill the named shape in key order', () => {
        const a = full({ x: 2, y: 3 }, 7, { backend });

        expect(a.axes).toEqual(['x', 'y']);
        expect(a.toArray()).toEqual([
          [7, 7, 7],
          [7, 7, 7],
        ]);
      });

      it('should create zeros and ones', () => {
        expect(zeros({ n: 3 }, { backend }).values()).toEqual([0, 0, 0]);

        const o = ones({ n: 2 }, { backend, dtype: 'int32' });
        expect(o.dtype).toBe('int32');
        expect(o.values()).toEqual([1, 1]);
      });

      it('should allow zero extents', () => {
        const empty = zeros({ x: 0, y: 2 }, { backend });

        expect(empty.size).toBe(0);
        expect(empty.shape).toEqual({ x: 0, y: 2 });
        expect(empty.values()).toEqual([]);
      });

      it('should reject negative or fractional extents', () => {
        expect(thrownCode(() => full({ x: -1 }, 0, { backend }))).toBe('INVALID_PARAMETER');
        expect(thrownCode(() => full({ x: 1.5 }, 0, { backend }))).toBe('INVALID_PARAMETER');
      });
    });

    describe('item()', () => {
      it('should extract the element of any one-element array', () => {
        expect(array([[4]], ['a', 'b'], { backend }).item()).toBe(4);
      });

      it('should reject arrays with more than one element', () => {
        expect(() => array([1, 2], ['x'], { backend }).item()).toThrow(
          'item() needs exactly one element, array has 2',
        );
      });
    });
  });
}
