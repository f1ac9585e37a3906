/**
 * NamedArray creation functions
 *
 * Creation always names a backend; the library has no default backend.
 */

import type { Backend, NestedArray, Scalar } from '../buffer/types';
import type { DType } from '../dtype';
import { AxisSet } from '../axes/axis-set';
import { NamedArray, axisNames } from './named-array';

export interface ArrayOptions {
  readonly backend: Backend;
  /** Inferred from the data when omitted: booleans give `bool`, numbers `float64` */
  readonly dtype?: DType;
}

/**
 * Create a NamedArray from nested data and one name per nesting level
 *
 * @throws {ShapeMismatchError} If the data is ragged or its rank differs from the number of names
 *
 * @example
 * const a = array([[1, 2, 3], [4, 5, 6]], ['row', 'col'], { backend: cpu });
 * a.shape; // { row: 2, col: 3 }
 */
export function array<A extends string>(
  data: NestedArray,
  axes: readonly A[],
  options: ArrayOptions,
): NamedArray<A> {
  return new NamedArray(options.backend.fromNested(data, options.dtype), axes);
}

/**
 * Create a rank-0 NamedArray
 */
export function scalar(value: Scalar, options: ArrayOptions): NamedArray<never> {
  return new NamedArray<never>(
    options.backend.full([], value, options.dtype ?? (typeof value === 'boolean' ? 'bool' : 'float64')),
    [],
  );
}

/**
 * Create a NamedArray of the given named shape filled with one value
 *
 * @example
 * full({ x: 2, y: 3 }, 7, { backend: cpu });
 */
export function full<A extends string>(
  shape: Readonly<Record<A, number>>,
  value: Scalar,
  options: ArrayOptions,
): NamedArray<A> {
  const axes = AxisSet.fromRecord(shape);
  const dtype = options.dtype ?? (typeof value === 'boolean' ? 'bool' : 'float64');
  return new NamedArray(options.backend.full(axes.extents, value, dtype), axisNames<A>(axes.names));
}

export function zeros<A extends string>(
  shape: Readonly<Record<A, number>>,
  options: ArrayOptions,
): NamedArray<A> {
  return full(shape, 0, options);
}

export function ones<A extends string>(
  shape: Readonly<Record<A, number>>,
  options: ArrayOptions,
): NamedArray<A> {
  return full(shape, 1, options);
}
