/**
 * The closed family of array values
 *
 * Every operation accepts any member of `AnyArray` (and bare scalars) and
 * resolves implicit arrays to materialized ones at its boundary.
 */

import type { Scalar } from '../buffer/types';
import type {
  ArrayRange,
  GeometricSpace,
  ImplicitKind,
  LinearSpace,
  LogarithmicSpace,
  NormalRandomSample,
  UniformRandomSample,
} from '../implicit';
import { assertExhaustiveSwitch } from '../utils';
import type { NamedArray } from './named-array';

export type ImplicitArray<A extends string = string> =
  | LinearSpace<A>
  | LogarithmicSpace<A>
  | GeometricSpace<A>
  | ArrayRange<A>
  | UniformRandomSample<A>
  | NormalRandomSample<A>;

export type AnyArray<A extends string = string> = NamedArray<A> | ImplicitArray<A>;

/** Operand of an elementwise operation */
export type ArrayLike<A extends string = string> = AnyArray<A> | Scalar;

export type ArrayKind = 'materialized' | ImplicitKind;

export const ARRAY_KINDS: readonly ArrayKind[] = [
  'materialized',
  'linear-space',
  'logarithmic-space',
  'geometric-space',
  'array-range',
  'uniform-random-sample',
  'normal-random-sample',
];

/**
 * Resolve any array value to a NamedArray
 */
export function materialize<A extends string>(value: AnyArray<A>): NamedArray<A> {
  switch (value.kind) {
    case 'materialized':
      return value;
    case 'linear-space':
    case 'logarithmic-space':
    case 'geometric-space':
    case 'array-range':
    case 'uniform-random-sample':
    case 'normal-random-sample':
      return value.materialize();
    default:
      return assertExhaustiveSwitch(value);
  }
}

export function isAnyArray(value: unknown): value is AnyArray {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  const { kind } = value;
  return ARRAY_KINDS.some((k) => k === kind);
}
