/**
 * Operations over several arrays at once
 */

import type { Scalar } from '../buffer/types';
import { broadcastAxes } from '../axes/alignment';
import type { HasAxes } from '../axes/alignment';
import type { AxisSet } from '../axes/axis-set';
import { promoteTypes, scalarDType } from '../dtype';
import type { DType } from '../dtype';
import { InvalidParameterError } from '../errors';
import { materialize } from './array-like';
import type { ArrayLike } from './array-like';
import { NamedArray, assertSameBackend, axisNames } from './named-array';

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Broadcast named shape of any mix of arrays and scalars
 *
 * Implicit arrays contribute their shape without materializing.
 *
 * @throws {AxisMismatchError} If a shared axis has incompatible extents
 */
export function shapeBroadcasted(...values: readonly (Scalar | HasAxes)[]): AxisSet {
  const sets: AxisSet[] = [];
  for (const value of values) {
    if (!isScalar(value)) {
      sets.push(value.axisSet);
    }
  }
  return broadcastAxes(...sets);
}

/**
 * Broadcast every input against the others and stack them along a new leading axis
 *
 * @throws {InvalidParameterError} If no input is an array (there is no backend to build on)
 * @throws {ShapeMismatchError} If `axis` already names an axis of the inputs
 *
 * @example
 * stack([a, b], 'sample'); // a, b: (x: 3) => (sample: 2, x: 3)
 */
export function stack<A extends string, N extends string>(
  values: readonly ArrayLike<A>[],
  axis: N,
): NamedArray<A | N> {
  const operands = values.map((value) => (isScalar(value) ? value : materialize(value)));
  const arrays: NamedArray<A>[] = [];
  for (const operand of operands) {
    if (!isScalar(operand)) {
      arrays.push(operand);
    }
  }

  const [first] = arrays;
  if (first === undefined) {
    throw new InvalidParameterError('values', 'at least one array is needed to stack');
  }
  arrays.forEach((other) => assertSameBackend(first.buffer, other.buffer));

  const axes = broadcastAxes(...arrays.map((a) => a.axisSet));
  const arrayDType = arrays.map((a) => a.dtype).reduce(promoteTypes);
  const dtype = operands.reduce<DType>(
    (acc, operand) => (isScalar(operand) ? promoteTypes(acc, scalarDType(operand, arrayDType)) : acc),
    arrayDType,
  );

  const target = axes.toRecord();
  const data = new Float64Array(operands.length * axes.size);
  operands.forEach((operand, i) => {
    if (isScalar(operand)) {
      data.fill(Number(operand), i * axes.size, (i + 1) * axes.size);
    } else {
      data.set(operand.broadcastTo(target).values(), i * axes.size);
    }
  });

  return new NamedArray(
    first.backend.fromFlat(data, [operands.length, ...axes.extents], dtype),
    axisNames<A | N>([axis, ...axes.names]),
  );
}
