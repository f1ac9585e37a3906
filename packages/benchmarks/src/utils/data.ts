/**
 * Data generation utilities for benchmarks
 */

import { AxisSet, NamedArray, axisNames } from '@named-arrays/core';
import type { Backend } from '@named-arrays/core';

/**
 * Random values of the given size
 */
export function generateRandomValues(size: number): Float64Array {
  const values = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    values[i] = Math.random();
  }
  return values;
}

/**
 * Random NamedArray of a named shape
 */
export function randomArray<A extends string>(
  shape: Readonly<Record<A, number>>,
  backend: Backend,
): NamedArray<A> {
  const axes = AxisSet.fromRecord(shape);
  return new NamedArray(
    backend.fromFlat(generateRandomValues(axes.size), axes.extents),
    axisNames<A>(axes.names),
  );
}

/**
 * Random mask keeping about `density` of the positions of one axis
 */
export function randomMask(extent: number, density = 0.5): boolean[] {
  return Array.from({ length: extent }, () => Math.random() < density);
}
