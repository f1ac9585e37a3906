/**
 * Evenly stepped values in a half-open interval
 */

import type { Backend } from '../buffer/types';
import { AxisSet } from '../axes/axis-set';
import type { DType } from '../dtype';
import { InvalidParameterError } from '../errors';
import { NamedArray, axisNames } from '../array/named-array';
import { ImplicitArrayBase } from './base';
import { validateAxisName, validateFinite } from './validation';

export interface RangeOptions {
  readonly backend: Backend;
  /** Distance between values (default 1) */
  readonly step?: number;
  /** Defaults to int32 when every parameter is an int32 integer, else float64 */
  readonly dtype?: DType;
}

const INT32_LIMIT = 2 ** 31;

/**
 * `start, start + step, ...` up to but excluding `stop`
 *
 * @example
 * new ArrayRange(0, 5, 't', { backend: cpu, step: 2 }).toArray(); // [0, 2, 4]
 */
export class ArrayRange<A extends string = string> extends ImplicitArrayBase<A> {
  override readonly kind: 'array-range' = 'array-range';
  readonly step: number;
  override readonly dtype: DType;
  override readonly backend: Backend;
  override readonly axisSet: AxisSet;

  /**
   * @throws {InvalidParameterError} If a bound is not finite or `step` is zero
   */
  constructor(
    readonly start: number,
    readonly stop: number,
    readonly axis: A,
    options: RangeOptions,
  ) {
    super();
    validateAxisName(axis);
    validateFinite('start', start);
    validateFinite('stop', stop);
    this.step = options.step ?? 1;
    validateFinite('step', this.step);
    if (this.step === 0) {
      throw new InvalidParameterError('step', 'must be nonzero');
    }
    this.backend = options.backend;
    this.dtype =
      options.dtype ??
      ([start, stop, this.step].every((v) => Number.isInteger(v) && Math.abs(v) < INT32_LIMIT)
        ? 'int32'
        : 'float64');
    this.axisSet = new AxisSet([[axis, this.num]]);
  }

  get num(): number {
    return Math.max(0, Math.ceil((this.stop - this.start) / this.step));
  }

  protected override generate(): NamedArray<A> {
    const values = new Float64Array(this.num);
    for (let i = 0; i < values.length; i++) {
      values[i] = this.start + i * this.step;
    }
    return new NamedArray(this.backend.fromFlat(values, [values.length], this.dtype), [this.axis]);
  }

  protected override describe(): ReadonlyArray<readonly [string, unknown]> {
    return [
      ['start', this.start],
      ['stop', this.stop],
      ['axis', this.axis],
      ['step', this.step],
    ];
  }
}

/**
 * One integer range per axis of `shape`, in the shape's key order
 *
 * Combined with elementwise operations, the ranges broadcast to a grid of
 * positions over the whole shape.
 *
 * @example
 * const [x, y] = indices({ x: 2, y: 3 }, { backend: cpu });
 * x.mul(10).add(y).toArray(); // [[0, 1, 2], [10, 11, 12]]
 *
 * @throws {InvalidParameterError} If an extent is not a non-negative integer
 */
export function indices<A extends string>(
  shape: Readonly<Record<A, number>>,
  options: { readonly backend: Backend },
): ArrayRange<A>[] {
  const axes = AxisSet.fromRecord(shape);
  return axisNames<A>(axes.names).map(
    (name, i) => new ArrayRange(0, axes.extents[i] ?? 0, name, { backend: options.backend }),
  );
}
