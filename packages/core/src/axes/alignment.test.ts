import { describe, it, expect } from 'vitest';
import { AxisSet } from './axis-set';
import {
  alignAxes,
  broadcastAxes,
  isIdentityPermutation,
  planAlignment,
} from './alignment';
import { AxisMismatchError } from '../errors';

const axes = (record: Record<string, number>): AxisSet => AxisSet.fromRecord(record);

describe('broadcastAxes', () => {
  it('orders names by first appearance', () => {
    expect(broadcastAxes(axes({ x: 3, y: 2 }), axes({ y: 2, z: 4 })).names).toEqual(['x', 'y', 'z']);
    expect(broadcastAxes(axes({ y: 2, z: 4 }), axes({ x: 3, y: 2 })).names).toEqual(['y', 'z', 'x']);
  });

  it('expands extents of 1', () => {
    expect(broadcastAxes(axes({ x: 1 }), axes({ x: 3 })).toRecord()).toEqual({ x: 3 });
    expect(broadcastAxes(axes({ x: 3 }), axes({ x: 1 })).toRecord()).toEqual({ x: 3 });
  });

  it('keeps the other operand when broadcasting a size-1 axis', () => {
    const big = axes({ x: 3, y: 2 });
    expect(broadcastAxes(big, axes({ y: 1 })).orderedEquals(big)).toBe(true);
  });

  it('rejects unequal extents greater than 1', () => {
    expect(() => broadcastAxes(axes({ x: 3 }), axes({ x: 5 }))).toThrow(AxisMismatchError);
    expect(() => broadcastAxes(axes({ x: 3 }), axes({ x: 5 }))).toThrow(
      "Axis 'x' has incompatible extents 3 and 5",
    );
  });

  it('returns the empty set for no inputs', () => {
    expect(broadcastAxes().isScalar).toBe(true);
  });
});

describe('planAlignment', () => {
  it('inserts 1 for missing axes', () => {
    const plan = planAlignment(axes({ y: 2 }), axes({ x: 3, y: 2 }));
    expect(plan.permutation).toEqual([0]);
    expect(plan.shape).toEqual([1, 2]);
  });

  it('orders own axes by the unified order', () => {
    const plan = planAlignment(axes({ z: 4, x: 3 }), axes({ x: 3, y: 2, z: 4 }));
    expect(plan.permutation).toEqual([1, 0]);
    expect(plan.shape).toEqual([3, 1, 4]);
  });
});

describe('alignAxes', () => {
  it('plans every operand against the union', () => {
    const { axes: unified, plans } = alignAxes([axes({ x: 3 }), axes({ y: 2 })]);
    expect(unified.toRecord()).toEqual({ x: 3, y: 2 });
    expect(plans.map((p) => p.shape)).toEqual([
      [3, 1],
      [1, 2],
    ]);
  });
});

describe('isIdentityPermutation', () => {
  it('detects the identity', () => {
    expect(isIdentityPermutation([0, 1, 2])).toBe(true);
    expect(isIdentityPermutation([])).toBe(true);
    expect(isIdentityPermutation([1, 0])).toBe(false);
  });
});
