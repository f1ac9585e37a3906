/**
 * Evenly spaced samples along a named axis
 */

import type { Backend } from '../buffer/types';
import type { AxisSet } from '../axes/axis-set';
import type { DType } from '../dtype';
import type { NamedArray } from '../array/named-array';
import { ImplicitArrayBase } from './base';
import { asNamedArray, intervals, linearSamples, parameterAxes } from './sampling';
import type { SpaceParameter } from './sampling';
import { validateAxisName, validateNum, validateParameter } from './validation';

export interface SpaceOptions {
  readonly backend: Backend;
  /** Whether `stop` is the last sample (default true) */
  readonly endpoint?: boolean;
}

/**
 * `num` samples from `start` to `stop`
 *
 * `start` and `stop` may be arrays; the result then carries their broadcast
 * axes followed by `axis`.
 *
 * @example
 * new LinearSpace(0, 1, 'z', 4, { backend: cpu }).toArray(); // [0, 1/3, 2/3, 1]
 */
export class LinearSpace<A extends string = string> extends ImplicitArrayBase<A> {
  override readonly kind: 'linear-space' = 'linear-space';
  override readonly dtype: DType = 'float64';
  readonly endpoint: boolean;
  override readonly backend: Backend;
  override readonly axisSet: AxisSet;

  /**
   * @throws {InvalidParameterError} If `num` is not a non-negative integer, `axis` is empty,
   *   or a scalar bound is not finite
   */
  constructor(
    readonly start: SpaceParameter<A>,
    readonly stop: SpaceParameter<A>,
    readonly axis: A,
    readonly num: number,
    options: SpaceOptions,
  ) {
    super();
    validateAxisName(axis);
    validateNum(num);
    validateParameter('start', start, options.backend);
    validateParameter('stop', stop, options.backend);
    this.endpoint = options.endpoint ?? true;
    this.backend = options.backend;
    this.axisSet = parameterAxes([start, stop], axis, num);
  }

  /**
   * Distance between consecutive samples; 0 when there is no interval
   */
  get step(): SpaceParameter<A> {
    const div = intervals(this.num, this.endpoint);
    if (typeof this.start === 'number' && typeof this.stop === 'number') {
      return div > 0 ? (this.stop - this.start) / div : 0;
    }
    const range = asNamedArray(this.start, this.backend).neg().add(this.stop);
    return div > 0 ? range.div(div) : range.mul(0);
  }

  protected override generate(): NamedArray<A> {
    return linearSamples(this.start, this.stop, this.axis, this.num, this.endpoint, this.backend);
  }

  protected override describe(): ReadonlyArray<readonly [string, unknown]> {
    return [
      ['start', this.start],
      ['stop', this.stop],
      ['axis', this.axis],
      ['num', this.num],
      ['endpoint', this.endpoint],
    ];
  }
}
