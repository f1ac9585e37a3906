/**
 * Type tests for axis-name tracking
 *
 * Checked by the compiler only; no values are created.
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import type { Backend } from '../buffer/types';
import type { LinearSpace, UniformRandomSample } from '../implicit';
import type { AnyArray } from './array-like';
import { array, scalar } from './creation';
import { slice } from './indexer';
import type { NamedArray } from './named-array';

declare const backend: Backend;
declare const space: LinearSpace<'z'>;
declare const sample: UniformRandomSample<'trial'>;

type AxesOf<T> = T extends NamedArray<infer A> ? A : never;

const a = array([1, 2, 3], ['x'], { backend });
const b = array([4, 5], ['y'], { backend });
const ab = a.add(b);

describe('NamedArray axis names', () => {
  it('infers names from creation', () => {
    expectTypeOf<AxesOf<typeof a>>().toEqualTypeOf<'x'>();
    expectTypeOf<AxesOf<ReturnType<typeof scalar>>>().toEqualTypeOf<never>();
  });

  it('unions names in binary operations', () => {
    expectTypeOf<AxesOf<typeof ab>>().toEqualTypeOf<'x' | 'y'>();
  });

  it('keeps names for scalar operands', () => {
    const scaled = a.mul(2);
    expectTypeOf<AxesOf<typeof scaled>>().toEqualTypeOf<'x'>();
  });

  it('unions names with implicit operands', () => {
    const mixed = a.add(space);
    expectTypeOf<AxesOf<typeof mixed>>().toEqualTypeOf<'x' | 'z'>();
  });

  it('drops reduced names', () => {
    const reduced = ab.mean('x');
    expectTypeOf<AxesOf<typeof reduced>>().toEqualTypeOf<'y'>();
    const both = ab.sum(['x', 'y']);
    expectTypeOf<AxesOf<typeof both>>().toEqualTypeOf<never>();
    const all = ab.std();
    expectTypeOf<AxesOf<typeof all>>().toEqualTypeOf<never>();
  });

  it('drops names selected by an integer offset only', () => {
    const row = ab.index({ x: 0 });
    expectTypeOf<AxesOf<typeof row>>().toEqualTypeOf<'y'>();
    const sliced = ab.index({ x: slice(0, 2) });
    expectTypeOf<AxesOf<typeof sliced>>().toEqualTypeOf<'x' | 'y'>();
    const masked = ab.index({ y: [true, false] });
    expectTypeOf<AxesOf<typeof masked>>().toEqualTypeOf<'x' | 'y'>();
  });

  it('tracks axis additions and merges', () => {
    const added = a.addAxes('w');
    expectTypeOf<AxesOf<typeof added>>().toEqualTypeOf<'x' | 'w'>();
    const merged = ab.combineAxes(['x', 'y'], 'xy');
    expectTypeOf<AxesOf<typeof merged>>().toEqualTypeOf<'xy'>();
  });

  it('accepts every array kind where AnyArray is expected', () => {
    expectTypeOf(space).toMatchTypeOf<AnyArray<'z'>>();
    expectTypeOf(a).toMatchTypeOf<AnyArray<'x'>>();
    expectTypeOf(sample).toMatchTypeOf<AnyArray<'trial'>>();
  });

  it('drops interpolated axes and adds those of the positions', () => {
    const atPoint = ab.interpLinear({ x: 0.5 });
    expectTypeOf<AxesOf<typeof atPoint>>().toEqualTypeOf<'y'>();
    const alongP = ab.interpLinear({ x: array([0.5], ['p'], { backend }) });
    expectTypeOf<AxesOf<typeof alongP>>().toEqualTypeOf<'y' | 'p'>();
  });
});
