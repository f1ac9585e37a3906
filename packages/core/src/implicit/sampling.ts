/**
 * Sample generation for the progression arrays
 */

import type { Backend } from '../buffer/types';
import { broadcastAxes } from '../axes/alignment';
import type { AxisSet } from '../axes/axis-set';
import { InvalidParameterError } from '../errors';
import { NamedArray } from '../array/named-array';
import type { ParameterLike } from './validation';

/** Endpoint of a progression: a number, or an array of them */
export type SpaceParameter<A extends string> = number | NamedArray<A>;

export function asNamedArray<A extends string>(
  value: SpaceParameter<A>,
  backend: Backend,
): NamedArray<A> {
  if (typeof value === 'number') {
    return new NamedArray<A>(backend.full([], value, 'float64'), []);
  }
  return value.astype('float64');
}

/**
 * Broadcast axes of the parameters followed by the sampled axis
 *
 * @throws {InvalidParameterError} If a parameter already carries the sampled axis
 */
export function parameterAxes(
  parameters: readonly ParameterLike[],
  axis: string,
  num: number,
): AxisSet {
  const sets: AxisSet[] = [];
  for (const parameter of parameters) {
    if (typeof parameter !== 'number') {
      sets.push(parameter.axisSet);
    }
  }
  const broadcast = broadcastAxes(...sets);
  if (broadcast.has(axis)) {
    throw new InvalidParameterError('axis', `axis '${axis}' already appears in the parameters`, {
      axis,
      parameters: broadcast.toString(),
    });
  }
  return broadcast.with(axis, num);
}

/** Number of intervals between samples */
export function intervals(num: number, endpoint: boolean): number {
  return endpoint ? num - 1 : num;
}

/**
 * Evenly spaced samples from `start` to `stop` along `axis`
 *
 * With scalar bounds and `endpoint`, the last sample is exactly `stop`.
 */
export function linearSamples<A extends string>(
  start: SpaceParameter<A>,
  stop: SpaceParameter<A>,
  axis: A,
  num: number,
  endpoint: boolean,
  backend: Backend,
): NamedArray<A> {
  const div = intervals(num, endpoint);

  if (typeof start === 'number' && typeof stop === 'number') {
    const step = div > 0 ? (stop - start) / div : 0;
    const values = new Float64Array(num);
    for (let i = 0; i < num; i++) {
      values[i] = start + i * step;
    }
    if (endpoint && num > 1) {
      values[num - 1] = stop;
    }
    return new NamedArray(backend.fromFlat(values, [num], 'float64'), [axis]);
  }

  const first = asNamedArray(start, backend);
  const range = first.neg().add(stop);
  const step = div > 0 ? range.div(div) : range.mul(0);
  const positions = new NamedArray(
    backend.fromFlat(
      Float64Array.from({ length: num }, (_, i) => i),
      [num],
      'float64',
    ),
    [axis],
  );
  return first.add(step.mul(positions));
}
