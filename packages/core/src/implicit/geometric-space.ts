/**
 * Samples with a constant ratio between neighbours
 */

import type { Backend } from '../buffer/types';
import type { AxisSet } from '../axes/axis-set';
import type { DType } from '../dtype';
import { InvalidParameterError } from '../errors';
import { NamedArray } from '../array/named-array';
import { ImplicitArrayBase } from './base';
import type { SpaceOptions } from './linear-space';
import { asNamedArray, linearSamples, parameterAxes } from './sampling';
import type { SpaceParameter } from './sampling';
import { validateAxisName, validateNum, validateParameter } from './validation';

/**
 * `num` samples from `start` to `stop` in geometric progression
 *
 * Both endpoints must be nonzero and share a sign; negative endpoints give
 * the negated progression of their magnitudes.
 *
 * @example
 * new GeometricSpace(1, 1000, 'g', 4, { backend: cpu }).toArray(); // [1, 10, 100, 1000]
 */
export class GeometricSpace<A extends string = string> extends ImplicitArrayBase<A> {
  override readonly kind: 'geometric-space' = 'geometric-space';
  override readonly dtype: DType = 'float64';
  readonly endpoint: boolean;
  override readonly backend: Backend;
  override readonly axisSet: AxisSet;

  /**
   * @throws {InvalidParameterError} If an endpoint is zero or the endpoints differ in sign
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

    const sameSign =
      typeof start === 'number' && typeof stop === 'number'
        ? start * stop > 0
        : asNamedArray(start, this.backend).mul(stop).gt(0).all().item() === true;
    if (!sameSign) {
      throw new InvalidParameterError('stop', 'start and stop must be nonzero and share a sign', {
        start: String(start),
        stop: String(stop),
      });
    }
  }

  protected override generate(): NamedArray<A> {
    const { start, stop, axis, num, endpoint, backend } = this;

    if (typeof start === 'number' && typeof stop === 'number') {
      const sign = start < 0 ? -1 : 1;
      const exponents = linearSamples(
        Math.log(Math.abs(start)),
        Math.log(Math.abs(stop)),
        axis,
        num,
        endpoint,
        backend,
      ).values();
      const values = new Float64Array(exponents.map((e) => sign * Math.exp(e)));
      if (num > 0) {
        values[0] = start;
      }
      if (endpoint && num > 1) {
        values[num - 1] = stop;
      }
      return new NamedArray(backend.fromFlat(values, [num], 'float64'), [axis]);
    }

    const first = asNamedArray(start, backend);
    const last = asNamedArray(stop, backend);
    return linearSamples(first.abs().log(), last.abs().log(), axis, num, endpoint, backend)
      .exp()
      .mul(first.sign());
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
