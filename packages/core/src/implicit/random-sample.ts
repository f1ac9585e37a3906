/**
 * Seeded random draws over a named shape
 */

import type { Backend } from '../buffer/types';
import { broadcastAxes } from '../axes/alignment';
import { AxisSet } from '../axes/axis-set';
import type { AxisEntry } from '../axes/axis-set';
import type { DType } from '../dtype';
import { InvalidParameterError } from '../errors';
import { NamedArray } from '../array/named-array';
import { SeededRandom, randomSeed, validateSeed } from '../random/rng';
import { ImplicitArrayBase } from './base';
import { asNamedArray } from './sampling';
import type { SpaceParameter } from './sampling';
import { validateParameter } from './validation';
import type { ParameterLike } from './validation';

/** Extents of the axes drawn along, beyond those of the parameters */
export type RandomShape<A extends string> = { readonly [P in A]?: number };

export interface RandomOptions {
  readonly backend: Backend;
  /** Integer in [0, 2^32 - 1]; drawn at random when omitted */
  readonly seed?: number;
}

function sampleAxes<A extends string>(parameters: readonly ParameterLike[], shape: RandomShape<A>): AxisSet {
  const drawn: AxisEntry[] = [];
  for (const [name, extent] of Object.entries(shape)) {
    if (typeof extent === 'number') {
      drawn.push([name, extent]);
    }
  }
  const sets: AxisSet[] = [];
  for (const parameter of parameters) {
    if (typeof parameter !== 'number') {
      sets.push(parameter.axisSet);
    }
  }
  return broadcastAxes(...sets, new AxisSet(drawn));
}

export abstract class RandomSampleBase<A extends string> extends ImplicitArrayBase<A> {
  override readonly dtype: DType = 'float64';
  override readonly backend: Backend;
  override readonly axisSet: AxisSet;
  readonly seed: number;

  constructor(parameters: readonly ParameterLike[], shape: RandomShape<A>, options: RandomOptions) {
    super();
    this.backend = options.backend;
    this.seed = options.seed ?? randomSeed();
    validateSeed(this.seed);
    this.axisSet = sampleAxes(parameters, shape);
  }

  /** The draws laid out over every axis of the result */
  protected draws(kind: 'uniform' | 'normal'): NamedArray<A> {
    const rng = new SeededRandom(this.seed);
    const count = this.axisSet.size;
    const values = kind === 'uniform' ? rng.uniform(count) : rng.normal(count);
    return new NamedArray(this.backend.fromFlat(values, this.axisSet.extents, 'float64'), this.axes);
  }
}

/**
 * Uniform draws in `[start, stop)`
 *
 * The result carries the broadcast axes of `start` and `stop` together with
 * the axes of `shape`. The same seed gives the same values. When array
 * bounds and `shape` name different axes, give the union of the names as the
 * type argument.
 *
 * @example
 * new UniformRandomSample(0, 1, { trial: 1000 }, { backend: cpu, seed: 42 });
 */
export class UniformRandomSample<A extends string = string> extends RandomSampleBase<A> {
  override readonly kind: 'uniform-random-sample' = 'uniform-random-sample';

  /**
   * @throws {InvalidParameterError} If a scalar bound is not finite, an extent is not a
   *   non-negative integer, or the seed is out of range
   * @throws {AxisMismatchError} If the parameters and `shape` disagree on an extent
   */
  constructor(
    readonly start: SpaceParameter<A>,
    readonly stop: SpaceParameter<A>,
    readonly shapeRandom: RandomShape<A>,
    options: RandomOptions,
  ) {
    super([start, stop], shapeRandom, options);
    validateParameter('start', start, options.backend);
    validateParameter('stop', stop, options.backend);
  }

  protected override generate(): NamedArray<A> {
    const low = asNamedArray(this.start, this.backend);
    return low.add(this.draws('uniform').mul(low.neg().add(this.stop))).transpose(this.axisSet.names);
  }

  protected override describe(): ReadonlyArray<readonly [string, unknown]> {
    return [
      ['start', this.start],
      ['stop', this.stop],
      ['shape', this.axisSet],
      ['seed', this.seed],
    ];
  }
}

/**
 * Normal draws with mean `center` and standard deviation `width`
 *
 * `start` and `stop` report the interval one standard deviation either side
 * of the center.
 *
 * @example
 * new NormalRandomSample(10, 0.5, { trial: 1000 }, { backend: cpu, seed: 42 });
 */
export class NormalRandomSample<A extends string = string> extends RandomSampleBase<A> {
  override readonly kind: 'normal-random-sample' = 'normal-random-sample';

  /**
   * @throws {InvalidParameterError} If a scalar parameter is not finite, `width` is negative,
   *   an extent is not a non-negative integer, or the seed is out of range
   * @throws {AxisMismatchError} If the parameters and `shape` disagree on an extent
   */
  constructor(
    readonly center: SpaceParameter<A>,
    readonly width: SpaceParameter<A>,
    readonly shapeRandom: RandomShape<A>,
    options: RandomOptions,
  ) {
    super([center, width], shapeRandom, options);
    validateParameter('center', center, options.backend);
    validateParameter('width', width, options.backend);
    if (typeof width === 'number') {
      if (width < 0) {
        throw new InvalidParameterError('width', `must be non-negative, got ${width}`, { width });
      }
    } else if (width.lt(0).any().item() === true) {
      throw new InvalidParameterError('width', 'must be non-negative everywhere');
    }
  }

  get start(): SpaceParameter<A> {
    if (typeof this.center === 'number' && typeof this.width === 'number') {
      return this.center - this.width;
    }
    return asNamedArray(this.center, this.backend).sub(this.width);
  }

  get stop(): SpaceParameter<A> {
    if (typeof this.center === 'number' && typeof this.width === 'number') {
      return this.center + this.width;
    }
    return asNamedArray(this.center, this.backend).add(this.width);
  }

  protected override generate(): NamedArray<A> {
    const center = asNamedArray(this.center, this.backend);
    return center.add(this.draws('normal').mul(this.width)).transpose(this.axisSet.names);
  }

  protected override describe(): ReadonlyArray<readonly [string, unknown]> {
    return [
      ['center', this.center],
      ['width', this.width],
      ['shape', this.axisSet],
      ['seed', this.seed],
    ];
  }
}
