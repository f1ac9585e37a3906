/**
 * Samples evenly spaced on a log scale
 */

import type { Backend } from '../buffer/types';
import type { AxisSet } from '../axes/axis-set';
import type { DType } from '../dtype';
import { InvalidParameterError } from '../errors';
import { NamedArray } from '../array/named-array';
import { ImplicitArrayBase } from './base';
import type { SpaceOptions } from './linear-space';
import { linearSamples, parameterAxes } from './sampling';
import type { SpaceParameter } from './sampling';
import { validateAxisName, validateFinite, validateNum, validateParameter } from './validation';

/**
 * `base ** e` for `num` exponents evenly spaced from `startExponent` to `stopExponent`
 *
 * @example
 * new LogarithmicSpace(0, 2, 'f', 3, 10, { backend: cpu }).toArray(); // [1, 10, 100]
 */
export class LogarithmicSpace<A extends string = string> extends ImplicitArrayBase<A> {
  override readonly kind: 'logarithmic-space' = 'logarithmic-space';
  override readonly dtype: DType = 'float64';
  readonly endpoint: boolean;
  override readonly backend: Backend;
  override readonly axisSet: AxisSet;

  /**
   * @throws {InvalidParameterError} If `base` is not positive and finite, or another
   *   parameter is out of its domain
   */
  constructor(
    readonly startExponent: SpaceParameter<A>,
    readonly stopExponent: SpaceParameter<A>,
    readonly axis: A,
    readonly num: number,
    readonly base: number,
    options: SpaceOptions,
  ) {
    super();
    validateAxisName(axis);
    validateNum(num);
    validateParameter('startExponent', startExponent, options.backend);
    validateParameter('stopExponent', stopExponent, options.backend);
    validateFinite('base', base);
    if (base <= 0) {
      throw new InvalidParameterError('base', `must be positive, got ${base}`);
    }
    this.endpoint = options.endpoint ?? true;
    this.backend = options.backend;
    this.axisSet = parameterAxes([startExponent, stopExponent], axis, num);
  }

  /** First sample: `base ** startExponent` */
  get start(): SpaceParameter<A> {
    return this.power(this.startExponent);
  }

  /** Last sample when `endpoint`: `base ** stopExponent` */
  get stop(): SpaceParameter<A> {
    return this.power(this.stopExponent);
  }

  private power(exponent: SpaceParameter<A>): SpaceParameter<A> {
    if (typeof exponent === 'number') {
      return this.base ** exponent;
    }
    return this.baseArray().pow(exponent);
  }

  private baseArray(): NamedArray<A> {
    return new NamedArray<A>(this.backend.full([], this.base, 'float64'), []);
  }

  protected override generate(): NamedArray<A> {
    const exponents = linearSamples(
      this.startExponent,
      this.stopExponent,
      this.axis,
      this.num,
      this.endpoint,
      this.backend,
    );
    return this.baseArray().pow(exponents);
  }

  protected override describe(): ReadonlyArray<readonly [string, unknown]> {
    return [
      ['startExponent', this.startExponent],
      ['stopExponent', this.stopExponent],
      ['axis', this.axis],
      ['num', this.num],
      ['base', this.base],
      ['endpoint', this.endpoint],
    ];
  }
}
