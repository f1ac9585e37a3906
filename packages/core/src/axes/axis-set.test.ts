import { describe, it, expect } from 'vitest';
import { AxisSet } from './axis-set';
import { AxisNotFoundError, InvalidParameterError, ShapeMismatchError } from '../errors';

describe('AxisSet', () => {
  const xy = new AxisSet([
    ['x', 3],
    ['y', 2],
  ]);

  describe('construction', () => {
    it('keeps names and extents in order', () => {
      expect(xy.names).toEqual(['x', 'y']);
      expect(xy.extents).toEqual([3, 2]);
      expect(xy.rank).toBe(2);
      expect(xy.size).toBe(6);
      expect(xy.isScalar).toBe(false);
    });

    it('builds from a record or from names and a shape', () => {
      expect(AxisSet.fromRecord({ x: 3, y: 2 }).orderedEquals(xy)).toBe(true);
      expect(AxisSet.fromNames(['x', 'y'], [3, 2]).orderedEquals(xy)).toBe(true);
    });

    it('has an empty set of rank 0 and size 1', () => {
      expect(AxisSet.EMPTY.rank).toBe(0);
      expect(AxisSet.EMPTY.size).toBe(1);
      expect(AxisSet.EMPTY.isScalar).toBe(true);
    });

    it('rejects duplicate names', () => {
      expect(
        () =>
          new AxisSet([
            ['x', 3],
            ['x', 2],
          ]),
      ).toThrow(ShapeMismatchError);
    });

    it('rejects empty names and bad extents', () => {
      expect(() => new AxisSet([['', 3]])).toThrow(InvalidParameterError);
      expect(() => new AxisSet([['x', -1]])).toThrow(InvalidParameterError);
      expect(() => new AxisSet([['x', 1.5]])).toThrow(InvalidParameterError);
    });

    it('rejects a name count that differs from the rank', () => {
      expect(() => AxisSet.fromNames(['x'], [3, 2])).toThrow(
        'Got 1 axis names for a buffer of rank 2',
      );
    });
  });

  describe('lookup', () => {
    it('finds axes by name', () => {
      expect(xy.has('y')).toBe(true);
      expect(xy.has('z')).toBe(false);
      expect(xy.indexOf('y')).toBe(1);
      expect(xy.get('x')).toBe(3);
    });

    it('throws AxisNotFoundError for unknown names', () => {
      expect(() => xy.get('z', 'sum reduction')).toThrow(AxisNotFoundError);
      expect(() => xy.get('z', 'sum reduction')).toThrow(
        "Axis 'z' not found in sum reduction. Available axes: ['x', 'y']",
      );
    });
  });

  describe('derivation', () => {
    it('drops axes', () => {
      expect(xy.without('x').toRecord()).toEqual({ y: 2 });
      expect(xy.without(['x', 'y']).isScalar).toBe(true);
      expect(() => xy.without('z')).toThrow(AxisNotFoundError);
    });

    it('replaces or appends an axis', () => {
      expect(xy.with('x', 1).toRecord()).toEqual({ x: 1, y: 2 });
      expect(xy.with('z', 4).names).toEqual(['x', 'y', 'z']);
    });

    it('picks a subset in the given order', () => {
      expect(xy.pick(['y', 'x']).names).toEqual(['y', 'x']);
    });

    it('leaves the original untouched', () => {
      xy.with('z', 4);
      xy.without('x');
      expect(xy.names).toEqual(['x', 'y']);
    });
  });

  describe('equality', () => {
    const yx = new AxisSet([
      ['y', 2],
      ['x', 3],
    ]);

    it('compares as mappings', () => {
      expect(xy.equals(yx)).toBe(true);
      expect(xy.orderedEquals(yx)).toBe(false);
    });

    it('distinguishes extents and names', () => {
      expect(xy.equals(xy.with('y', 1))).toBe(false);
      expect(xy.equals(xy.with('z', 1))).toBe(false);
    });
  });

  it('formats as a record', () => {
    expect(xy.toString()).toBe('{x: 3, y: 2}');
    expect(AxisSet.EMPTY.toString()).toBe('{}');
  });
});
