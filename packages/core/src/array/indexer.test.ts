import { describe, it, expect } from 'vitest';
import { AxisSet } from '../axes/axis-set';
import { AxisNotFoundError, InvalidParameterError, ShapeMismatchError } from '../errors';
import { normalizeSlice, resolveIndex, slice } from './indexer';

const xy = AxisSet.fromRecord({ x: 3, y: 2 });

describe('normalizeSlice', () => {
  it('defaults to the whole axis', () => {
    expect(normalizeSlice(slice(), 5)).toEqual({ start: 0, stop: 5, step: 1, length: 5 });
  });

  it('counts negative bounds from the end', () => {
    expect(normalizeSlice(slice(-2), 5)).toEqual({ start: 3, stop: 5, step: 1, length: 2 });
    expect(normalizeSlice(slice(0, -1), 5)).toEqual({ start: 0, stop: 4, step: 1, length: 4 });
  });

  it('clamps out-of-range bounds', () => {
    expect(normalizeSlice(slice(2, 100), 5).length).toBe(3);
    expect(normalizeSlice(slice(4, 1), 5).length).toBe(0);
  });

  it('steps', () => {
    expect(normalizeSlice(slice(0, 5, 2), 5)).toEqual({ start: 0, stop: 5, step: 2, length: 3 });
  });

  it('walks backwards with a negative step', () => {
    expect(normalizeSlice(slice(undefined, undefined, -1), 4)).toEqual({
      start: 3,
      stop: -1,
      step: -1,
      length: 4,
    });
    expect(normalizeSlice(slice(3, 0, -2), 4).length).toBe(2);
  });

  it('rejects a zero step', () => {
    expect(() => normalizeSlice(slice(0, 3, 0), 3)).toThrow(InvalidParameterError);
  });
});

describe('resolveIndex', () => {
  it('drops axes selected by an integer offset', () => {
    const { selectors, axes } = resolveIndex(xy, { x: 0 });
    expect(axes.toRecord()).toEqual({ y: 2 });
    expect(selectors).toEqual([{ kind: 'index', index: 0 }, { kind: 'all' }]);
  });

  it('normalizes negative offsets', () => {
    expect(resolveIndex(xy, { x: -1 }).selectors[0]).toEqual({ kind: 'index', index: 2 });
  });

  it('keeps sliced axes in their original order', () => {
    const { axes } = resolveIndex(xy, { y: slice(0, 1), x: slice(0, 2) });
    expect(axes.names).toEqual(['x', 'y']);
    expect(axes.toRecord()).toEqual({ x: 2, y: 1 });
  });

  it('keeps masked axes with the count of true entries', () => {
    const { selectors, axes } = resolveIndex(xy, { x: [true, false, true] });
    expect(axes.toRecord()).toEqual({ x: 2, y: 2 });
    expect(selectors[0]).toEqual({ kind: 'mask', mask: [true, false, true] });
  });

  it('passes the whole array through for an empty expression', () => {
    expect(resolveIndex(xy, {}).axes.orderedEquals(xy)).toBe(true);
  });

  it('rejects unknown axes before anything else', () => {
    expect(() => resolveIndex(xy, { x: 99, z: 0 })).toThrow(AxisNotFoundError);
  });

  it('rejects out-of-range and fractional offsets', () => {
    expect(() => resolveIndex(xy, { x: 3 })).toThrow(InvalidParameterError);
    expect(() => resolveIndex(xy, { x: -4 })).toThrow(InvalidParameterError);
    expect(() => resolveIndex(xy, { x: 0.5 })).toThrow(InvalidParameterError);
  });

  it('rejects masks of the wrong length', () => {
    expect(() => resolveIndex(xy, { x: [true, false] })).toThrow(ShapeMismatchError);
    expect(() => resolveIndex(xy, { x: [true, false] })).toThrow(
      "Mask for axis 'x' has length 2 but the axis has extent 3",
    );
  });
});
