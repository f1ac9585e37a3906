/**
 * Test generators for axis manipulation
 *
 * These generators test operations that rearrange, add, merge or broadcast
 * named axes, plus the multi-array helpers built on them.
 */

import type { Backend } from '@named-arrays/core';
import { array, ndindex, shapeBroadcasted, stack } from '@named-arrays/core';
import { thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for axis manipulation
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateAxisOperationTests(backend: Backend, testFramework: TestFramework) {
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

  const cube = () =>
    array(
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

  describe(`Axis Operations Tests (${backend.type}:${backend.id})`, () => {
    describe('transpose', () => {
      it('should reverse the axes by default', () => {
        const result = matrix().transpose();

        expect(result.axes).toEqual(['y', 'x']);
        expect(result.toArray()).toEqual([
          [1, 4],
          [2, 5],
          [3, 6],
        ]);
      });

      it('should return the same array for the current order', () => {
        const m = matrix();

        expect(m.transpose(['x', 'y'])).toBe(m);
      });

      it('should require every axis exactly once', () => {
        expect(thrownCode(() => matrix().transpose(['x']))).toBe('SHAPE_MISMATCH');
        expect(thrownCode(() => matrix().transpose(['x', 'x']))).toBe('SHAPE_MISMATCH');
        expect(thrownCode(() => matrix().transpose(['x', 'z']))).toBe('AXIS_NOT_FOUND');
      });
    });

    describe('broadcastTo', () => {
      it('should add missing axes in the target order', () => {
        const v = array([1, 2, 3], ['y'], { backend });
        const result = v.broadcastTo({ x: 2, y: 3 });

        expect(result.axes).toEqual(['x', 'y']);
        expect(result.toArray()).toEqual([
          [1, 2, 3],
          [1, 2, 3],
        ]);
      });

      it('should stretch extent-1 axes and reorder', () => {
        const result = array([[7]], ['x', 'y'], { backend }).broadcastTo({ y: 2, x: 3 });

        expect(result.axes).toEqual(['y', 'x']);
        expect(result.toArray()).toEqual([
          [7, 7, 7],
          [7, 7, 7],
        ]);
      });

      it('should reject targets that drop an axis or conflict with an extent', () => {
        const v = array([1, 2, 3], ['y'], { backend });

        expect(thrownCode(() => matrix().broadcastTo({ x: 2 }))).toBe('AXIS_NOT_FOUND');
        expect(thrownCode(() => v.broadcastTo({ y: 4 }))).toBe('AXIS_MISMATCH');
      });
    });

    describe('addAxes', () => {
      it('should append axes of extent 1', () => {
        const m = matrix();

        expect(m.addAxes('z').shape).toEqual({ x: 2, y: 3, z: 1 });
        expect(m.addAxes(['p', 'q']).axes).toEqual(['x', 'y', 'p', 'q']);
        expect(m.addAxes('z').values()).toEqual([1, 2, 3, 4, 5, 6]);
      });

      it('should reject a name already present', () => {
        expect(thrownCode(() => matrix().addAxes('x'))).toBe('SHAPE_MISMATCH');
      });
    });

    describe('combineAxes', () => {
      it('should merge axes under the joined name by default', () => {
        const result = matrix().combineAxes(['x', 'y']);

        expect(result.axes).toEqual(['x*y']);
        expect(result.toArray()).toEqual([1, 2, 3, 4, 5, 6]);
      });

      it('should merge in the given order', () => {
        const result = matrix().combineAxes(['y', 'x'], 'flat');

        expect(result.axes).toEqual(['flat']);
        expect(result.toArray()).toEqual([1, 4, 2, 5, 3, 6]);
      });

      it('should put the merged axis after the remaining ones', () => {
        const result = cube().combineAxes(['a', 'c'], 'ac');

        expect(result.shape).toEqual({ b: 2, ac: 4 });
        expect(result.toArray()).toEqual([
          [1, 2, 5, 6],
          [3, 4, 7, 8],
        ]);
      });

      it('should reject an empty list', () => {
        expect(thrownCode(() => matrix().combineAxes([]))).toBe('INVALID_PARAMETER');
      });
    });

    describe('astype', () => {
      it('should convert values to the dtype', () => {
        const result = array([1.7, 2.2], ['x'], { backend }).astype('int32');

        expect(result.dtype).toBe('int32');
        expect(result.toArray()).toEqual([1, 2]);
      });

      it('should return the same array for its own dtype', () => {
        const m = matrix();

        expect(m.astype('float64')).toBe(m);
      });
    });

    describe('equals', () => {
      it('should ignore axis order', () => {
        const m = matrix();

        expect(m.equals(m.transpose())).toBe(true);
      });

      it('should compare values', () => {
        expect(matrix().equals(matrix().add(1))).toBe(false);
      });

      it('should not treat an extent-1 axis as a missing one', () => {
        const one = array([1], ['x'], { backend });
        const bare = array(1, [], { backend });

        expect(one.equals(bare)).toBe(false);
        expect(one.equals(one.broadcastTo({ x: 1 }))).toBe(true);
      });
    });

    describe('ndindex', () => {
      it('should iterate named positions in row-major order', () => {
        const positions = [...array([[1, 2]], ['x', 'y'], { backend }).ndindex()];

        expect(positions).toEqual([
          { x: 0, y: 0 },
          { x: 0, y: 1 },
        ]);
      });

      it('should leave out ignored axes', () => {
        const positions = [...matrix().ndindex('y')];

        expect(positions).toEqual([{ x: 0 }, { x: 1 }]);
      });

      it('should visit every element through index()', () => {
        const m = matrix();
        const visited = [...ndindex(m.axisSet)].map((position) => m.index(position).item());

        expect(visited).toEqual([1, 2, 3, 4, 5, 6]);
      });
    });

    describe('stack', () => {
      it('should stack along a new leading axis', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([4, 5, 6], ['x'], { backend });
        const result = stack([a, b], 's');

        expect(result.axes).toEqual(['s', 'x']);
        expect(result.toArray()).toEqual([
          [1, 2, 3],
          [4, 5, 6],
        ]);
      });

      it('should broadcast inputs against each other', () => {
        const a = array([1, 2], ['x'], { backend });
        const b = array([10, 20], ['y'], { backend });
        const result = stack([a, b], 'k');

        expect(result.shape).toEqual({ k: 2, x: 2, y: 2 });
        expect(result.toArray()).toEqual([
          [
            [1, 1],
            [2, 2],
          ],
          [
            [10, 20],
            [10, 20],
          ],
        ]);
      });

      it('should fill scalar inputs', () => {
        const a = array([1, 2, 3], ['x'], { backend });

        expect(stack([a, 0], 's').toArray()).toEqual([
          [1, 2, 3],
          [0, 0, 0],
        ]);
      });

      it('should need at least one array', () => {
        expect(thrownCode(() => stack([1, 2], 's'))).toBe('INVALID_PARAMETER');
      });
    });

    describe('shapeBroadcasted', () => {
      it('should combine named shapes and skip scalars', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const b = array([[1, 2]], ['w', 'y'], { backend });

        expect(shapeBroadcasted(a, 2, b).toRecord()).toEqual({ x: 3, w: 1, y: 2 });
      });

      it('should reject conflicting extents', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const c = array([1, 2], ['x'], { backend });

        expect(thrownCode(() => shapeBroadcasted(a, c))).toBe('AXIS_MISMATCH');
      });
    });
  });
}
