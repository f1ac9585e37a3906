/**
 * Test generators for multi-step workflows
 *
 * These generators chain creation, alignment, reduction and indexing the way
 * calling code does, checking axes and values after every step.
 */

import type { Backend } from '@named-arrays/core';
import { ArrayRange, LinearSpace, array, slice } from '@named-arrays/core';
import type { TestFramework } from '../framework';

/**
 * Generates end-to-end workflow tests
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateWorkflowTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Workflow Tests (${backend.type}:${backend.id})`, () => {
    it('should add, reduce and index two vectors on different axes', () => {
      const a = array([1, 2, 3], ['x'], { backend });
      const b = array([4, 5], ['y'], { backend });

      const sum = a.add(b);
      expect(sum.axes).toEqual(['x', 'y']);
      expect(sum.toArray()).toEqual([
        [5, 6],
        [6, 7],
        [7, 8],
      ]);

      const mean = sum.mean('x');
      expect(mean.axes).toEqual(['y']);
      expect(mean.toArray()).toEqual([6, 7]);

      const first = sum.index({ x: 0 });
      expect(first.axes).toEqual(['y']);
      expect(first.toArray()).toEqual([5, 6]);
    });

    it('should combine partly overlapping axis sets in either order', () => {
      const p = array(
        [
          [1, 2],
          [3, 4],
          [5, 6],
        ],
        ['x', 'y'],
        { backend },
      );
      const q = array(
        [
          [1, 10, 100],
          [2, 20, 200],
        ],
        ['y', 'z'],
        { backend },
      );

      const pq = p.add(q);
      const qp = q.add(p);
      expect(pq.axes).toEqual(['x', 'y', 'z']);
      expect(qp.axes).toEqual(['y', 'z', 'x']);
      expect(pq.shape).toEqual({ x: 3, y: 2, z: 3 });
      expect(pq.equals(qp)).toBe(true);
      expect(pq.index({ x: 1, y: 0, z: 2 }).item()).toBe(103);
    });

    it('should reduce down to an empty axis set', () => {
      const m = array(
        [
          [1, 2],
          [3, 4],
          [5, 6],
        ],
        ['x', 'y'],
        { backend },
      );

      const bySum = m.sum('x');
      expect(bySum.shape).toEqual({ y: 2 });
      const total = bySum.sum('y');
      expect(total.shape).toEqual({});
      expect(total.item()).toBe(21);
    });

    it('should slice without changing the axis order', () => {
      const m = array(
        [
          [1, 2],
          [3, 4],
          [5, 6],
        ],
        ['x', 'y'],
        { backend },
      );

      expect(m.index({ x: 0 }).shape).toEqual({ y: 2 });
      const head = m.index({ x: slice(0, 2) });
      expect(head.axes).toEqual(['x', 'y']);
      expect(head.shape).toEqual({ x: 2, y: 2 });
    });

    it('should center each row on its mean', () => {
      const m = array(
        [
          [1, 2, 3],
          [4, 5, 6],
        ],
        ['x', 'y'],
        { backend },
      );
      const centered = m.sub(m.mean('y'));

      expect(centered.axes).toEqual(['x', 'y']);
      expect(centered.toArray()).toEqual([
        [-1, 0, 1],
        [-1, 0, 1],
      ]);
      expect(centered.sum('y').toArray()).toEqual([0, 0]);
    });

    it('should evaluate a function on a grid of implicit axes', () => {
      const x = new LinearSpace(0, 1, 'x', 3, { backend });
      const t = new ArrayRange(0, 2, 't', { backend });
      const grid = x.mul(t);

      expect(grid.axes).toEqual(['x', 't']);
      expect(grid.dtype).toBe('float64');
      expect(grid.toArray()).toEqual([
        [0, 0],
        [0, 0.5],
        [0, 1],
      ]);
      expect(grid.max('x').toArray()).toEqual([0, 1]);
    });
  });
}
