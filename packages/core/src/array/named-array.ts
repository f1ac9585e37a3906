/**
 * Named-axis array
 *
 * A NamedArray pairs a positional NumericBuffer with one name per dimension.
 * Every operation resolves axes by name: operands are aligned against each
 * other before the positional kernel runs, reductions and indexing take axis
 * names, and the result carries the names of the axes it kept.
 *
 * The type parameter tracks axis names at compile time:
 * ```typescript
 * const a = array([1, 2, 3], ['x'], { backend: cpu });  // NamedArray<'x'>
 * const b = array([4, 5], ['y'], { backend: cpu });     // NamedArray<'y'>
 * const c = a.add(b);                                   // NamedArray<'x' | 'y'>
 * const d = c.mean('x');                                // NamedArray<'y'>
 * ```
 */

import type {
  Backend,
  BinaryOp,
  NestedArray,
  NumericBuffer,
  ReductionOp,
  Scalar,
  UnaryOp,
} from '../buffer/types';
import type { DType } from '../dtype';
import { reductionResultDType, scalarDType, toFloatDType } from '../dtype';
import { AxisSet } from '../axes/axis-set';
import type { AxisEntry } from '../axes/axis-set';
import { align, applyAlignmentPlan, isIdentityPermutation, planAlignment } from '../axes/alignment';
import {
  AxisMismatchError,
  AxisNotFoundError,
  InvalidParameterError,
  ShapeMismatchError,
} from '../errors';
import type { PrintOptions } from '../config';
import { resolvePrintOptions } from '../config';
import { computeSize } from '../utils';
import { formatNested, indentContinuation } from './format';
import { resolveIndex } from './indexer';
import type { IndexExpression, OffsetKeys } from './indexer';
import { materialize } from './array-like';
import type { AnyArray, ArrayLike } from './array-like';
import { flattenAxes, ndindex } from '../axes/iteration';

/**
 * Axis names are tracked only at the type level; kernels return plain strings.
 */
export function axisNames<T extends string>(names: readonly string[]): readonly T[] {
  return names as readonly T[];
}

function withAxes<T extends string>(buffer: NumericBuffer, names: readonly string[]): NamedArray<T> {
  return new NamedArray(buffer, axisNames<T>(names));
}

export function assertSameBackend(a: NumericBuffer, b: NumericBuffer): void {
  if (a.backend.id !== b.backend.id) {
    throw new InvalidParameterError(
      'backend',
      `operands live on different backends ('${a.backend.id}' and '${b.backend.id}')`,
      { backends: [a.backend.id, b.backend.id] },
      'BACKEND_MISMATCH',
    );
  }
}

/**
 * Array with a name on every axis
 */
export class NamedArray<A extends string = string> {
  readonly kind: 'materialized' = 'materialized';
  readonly buffer: NumericBuffer;
  readonly axes: readonly A[];
  readonly axisSet: AxisSet;

  /**
   * @throws {ShapeMismatchError} If the number of names differs from the buffer rank, or a name repeats
   */
  constructor(buffer: NumericBuffer, axes: readonly A[]) {
    this.axisSet = AxisSet.fromNames(axes, buffer.shape);
    this.buffer = buffer;
    this.axes = [...axes];
  }

  // =============================================================================
  // Properties
  // =============================================================================

  /** Extent of every axis, keyed by name */
  get shape(): Readonly<Record<string, number>> {
    return this.axisSet.toRecord();
  }

  get ndim(): number {
    return this.axisSet.rank;
  }

  get size(): number {
    return this.buffer.size;
  }

  get dtype(): DType {
    return this.buffer.dtype;
  }

  get backend(): Backend {
    return this.buffer.backend;
  }

  // =============================================================================
  // Elementwise binary operations
  // =============================================================================

  /**
   * Apply a binary operation after aligning both operands by axis name
   *
   * The result's axes are the union of both operands' axes in first-seen order.
   *
   * @throws {AxisMismatchError} If a shared axis has incompatible extents
   */
  binary<B extends string = never>(op: BinaryOp, other: ArrayLike<B>): NamedArray<A | B> {
    if (typeof other === 'number' || typeof other === 'boolean') {
      const operand = this.backend.full([], other, scalarDType(other, this.dtype));
      return withAxes(this.buffer.binary(op, operand), this.axes);
    }

    const operand = materialize(other);
    assertSameBackend(this.buffer, operand.buffer);

    const { axes, plans } = align([this, operand]);
    const [own, theirs] = plans;
    if (own === undefined || theirs === undefined) {
      throw new Error('Alignment produced no plan for an operand');
    }
    const result = applyAlignmentPlan(this.buffer, own).binary(
      op,
      applyAlignmentPlan(operand.buffer, theirs),
    );
    return withAxes(result, axes.names);
  }

  add<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('add', other);
  }

  sub<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('sub', other);
  }

  mul<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('mul', other);
  }

  div<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('div', other);
  }

  mod<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('mod', other);
  }

  pow<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('pow', other);
  }

  maximum<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('maximum', other);
  }

  minimum<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('minimum', other);
  }

  eq<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('eq', other);
  }

  ne<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('ne', other);
  }

  lt<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('lt', other);
  }

  le<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('le', other);
  }

  gt<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('gt', other);
  }

  ge<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('ge', other);
  }

  and<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('and', other);
  }

  or<B extends string = never>(other: ArrayLike<B>): NamedArray<A | B> {
    return this.binary('or', other);
  }

  // =============================================================================
  // Elementwise unary operations
  // =============================================================================

  unary(op: UnaryOp): NamedArray<A> {
    return new NamedArray(this.buffer.unary(op), this.axes);
  }

  neg(): NamedArray<A> {
    return this.unary('neg');
  }

  abs(): NamedArray<A> {
    return this.unary('abs');
  }

  sign(): NamedArray<A> {
    return this.unary('sign');
  }

  sqrt(): NamedArray<A> {
    return this.unary('sqrt');
  }

  square(): NamedArray<A> {
    return this.unary('square');
  }

  exp(): NamedArray<A> {
    return this.unary('exp');
  }

  log(): NamedArray<A> {
    return this.unary('log');
  }

  sin(): NamedArray<A> {
    return this.unary('sin');
  }

  cos(): NamedArray<A> {
    return this.unary('cos');
  }

  tan(): NamedArray<A> {
    return this.unary('tan');
  }

  floor(): NamedArray<A> {
    return this.unary('floor');
  }

  ceil(): NamedArray<A> {
    return this.unary('ceil');
  }

  round(): NamedArray<A> {
    return this.unary('round');
  }

  not(): NamedArray<A> {
    return this.unary('not');
  }

  // =============================================================================
  // Reductions
  // =============================================================================

  /**
   * Reduce over one axis, a list of axes, or every axis when omitted
   *
   * @throws {AxisNotFoundError} If a name is not an axis of this array
   * @throws {InvalidParameterError} If `min`/`max` would reduce a zero-extent axis
   */
  reduce<X extends string>(op: ReductionOp, axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    const names = this.reductionAxes(axis, `${op} reduction`);
    if (op === 'min' || op === 'max') {
      this.assertNonEmpty(names, op);
    }
    const dtype = reductionResultDType(op, this.dtype);
    return this.reduceGroup<Exclude<A, X>>(
      names,
      (buffer) => buffer.astype(dtype),
      (buffer, position) => buffer.reduce(op, position),
    );
  }

  /**
   * `q`-th percentile (0 to 100), interpolating linearly between ranks
   *
   * @throws {InvalidParameterError} If `q` is outside [0, 100] or an axis has extent 0
   */
  percentile<X extends string>(q: number, axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    if (!Number.isFinite(q) || q < 0 || q > 100) {
      throw new InvalidParameterError('q', `percentile must be between 0 and 100, got ${q}`, { q });
    }
    const names = this.reductionAxes(axis, 'percentile reduction');
    this.assertNonEmpty(names, 'percentile');
    const dtype = toFloatDType(this.dtype);
    return this.reduceGroup<Exclude<A, X>>(
      names,
      (buffer) => buffer.astype(dtype),
      (buffer, position) => buffer.percentile(q, position),
    );
  }

  median<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.percentile(50, axis);
  }

  private reductionAxes(axis: string | readonly string[] | undefined, operation: string): string[] {
    const requested: readonly string[] =
      axis === undefined ? this.axes : typeof axis === 'string' ? [axis] : axis;
    const names = [...new Set(requested)];
    for (const name of names) {
      this.axisSet.indexOf(name, operation);
    }
    return names;
  }

  private assertNonEmpty(names: readonly string[], operation: string): void {
    if (names.some((name) => this.axisSet.get(name) === 0)) {
      throw new InvalidParameterError(
        'axis',
        `cannot compute ${operation} over a zero-extent axis`,
        { axes: names, shape: this.axisSet.toRecord() },
        'EMPTY_REDUCTION',
      );
    }
  }

  /**
   * Several axes are moved to the end, merged into one and reduced in a
   * single pass, so `var`, `std` and `percentile` see the whole group at once.
   */
  private reduceGroup<R extends string>(
    names: readonly string[],
    noAxes: (buffer: NumericBuffer) => NumericBuffer,
    kernel: (buffer: NumericBuffer, position: number) => NumericBuffer,
  ): NamedArray<R> {
    if (names.length === 0) {
      return withAxes(noAxes(this.buffer), this.axes);
    }

    const kept = this.axisSet.without(names);
    const positions = names.map((name) => this.axisSet.indexOf(name));
    const [single] = positions;
    if (positions.length === 1 && single !== undefined) {
      return withAxes(kernel(this.buffer, single), kept.names);
    }

    const keptPositions = kept.names.map((name) => this.axisSet.indexOf(name));
    const permutation = [...keptPositions, ...positions];
    const ordered = isIdentityPermutation(permutation)
      ? this.buffer
      : this.buffer.transpose(permutation);
    const merged = ordered.reshape([
      ...kept.extents,
      computeSize(names.map((name) => this.axisSet.get(name))),
    ]);
    return withAxes(kernel(merged, kept.rank), kept.names);
  }

  sum<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('sum', axis);
  }

  prod<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('prod', axis);
  }

  mean<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('mean', axis);
  }

  /** Population variance (ddof = 0) */
  var<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('var', axis);
  }

  /** Population standard deviation (ddof = 0) */
  std<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('std', axis);
  }

  min<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('min', axis);
  }

  max<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('max', axis);
  }

  all<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('all', axis);
  }

  any<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('any', axis);
  }

  /** Peak to peak: `max - min` */
  ptp<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.max(axis).sub(this.min(axis));
  }

  /** Root mean square */
  rms<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.square().mean(axis).sqrt();
  }

  // =============================================================================
  // Indexing and axis manipulation
  // =============================================================================

  /**
   * Select by axis name
   *
   * Integer offsets drop their axis; slices and masks keep it. Axes not named
   * in the expression pass through, and the axis order is never changed.
   *
   * @example
   * a.index({ x: 0 });               // drops x
   * a.index({ x: slice(0, 2) });     // keeps x with extent 2
   * a.index({ y: [true, false] });   // keeps y with extent 1
   */
  index<E extends IndexExpression>(expr: E): NamedArray<Exclude<A, OffsetKeys<E>>> {
    const { selectors, axes } = resolveIndex(this.axisSet, expr);
    return withAxes(this.buffer.select(selectors), axes.names);
  }

  /**
   * Linear interpolation at fractional positions along named axes
   *
   * A coordinate is a number, which drops its axis, or an array, whose axes
   * take the place of the interpolated one. Positions outside
   * `[0, extent - 1]` extrapolate from the first or last pair of samples.
   * Axes are interpolated one after the other, so several coordinates give
   * multilinear interpolation.
   *
   * @example
   * array([0, 10, 20], ['x'], { backend: cpu }).interpLinear({ x: 1.5 }).item(); // 15
   *
   * @throws {InvalidParameterError} If no coordinate is given, an axis has fewer than two samples,
   *   a position is not finite, or a coordinate array carries the axis it interpolates
   * @throws {AxisNotFoundError} If a coordinate names an axis this array lacks
   */
  interpLinear<K extends A, X extends string = never>(
    coordinates: { readonly [P in K]: number | NamedArray<X> },
  ): NamedArray<Exclude<A, K> | X> {
    const entries: [string, number | NamedArray<X>][] = Object.entries(coordinates);
    if (entries.length === 0) {
      throw new InvalidParameterError('coordinates', 'at least one axis must be interpolated');
    }

    let result: NamedArray<string> = this.astype(toFloatDType(this.dtype));
    for (const [axis, position] of entries) {
      const extent = this.axisSet.get(axis, 'interpolation');
      if (extent < 2) {
        throw new InvalidParameterError(
          'coordinates',
          `axis '${axis}' needs at least 2 samples to interpolate, has ${extent}`,
          { axis, extent },
        );
      }
      if (typeof position === 'number') {
        if (!Number.isFinite(position)) {
          throw new InvalidParameterError('coordinates', `position along '${axis}' must be finite, got ${position}`);
        }
        const lower = Math.min(Math.max(Math.floor(position), 0), extent - 2);
        const y0 = result.index({ [axis]: lower });
        const y1 = result.index({ [axis]: lower + 1 });
        result = y0.add(y1.sub(y0).mul(position - lower));
      } else {
        if (position.axisSet.has(axis)) {
          throw new InvalidParameterError(
            'coordinates',
            `positions along '${axis}' cannot themselves carry axis '${axis}'`,
            { axis },
          );
        }
        const x = position.astype('float64');
        const lower = x.floor().maximum(0).minimum(extent - 2);
        const upper = lower.add(1);
        const samples = new NamedArray(
          this.backend.fromFlat(Float64Array.from({ length: extent }, (_, i) => i), [extent], 'float64'),
          [axis],
        );
        const weights = samples.eq(lower).mul(upper.sub(x)).add(samples.eq(upper).mul(x.sub(lower)));
        result = result.mul(weights).sum(axis);
      }
    }
    return withAxes(result.buffer, result.axes);
  }

  /**
   * Reorder axes to the given permutation of names (reversed by default)
   */
  transpose(axes?: readonly string[]): NamedArray<A> {
    const order = axes ?? [...this.axes].reverse();
    const permutation = order.map((name) => this.axisSet.indexOf(name, 'transpose'));
    if (order.length !== this.ndim || new Set(order).size !== order.length) {
      throw new ShapeMismatchError(
        `transpose needs each of the ${this.ndim} axes exactly once, got [${order.join(', ')}]`,
        { axes: this.axes, requested: order },
      );
    }
    if (isIdentityPermutation(permutation)) {
      return this;
    }
    return withAxes(this.buffer.transpose(permutation), order);
  }

  /**
   * Broadcast to exactly the given named shape, in its key order
   *
   * @throws {AxisNotFoundError} If this array has an axis the target lacks
   * @throws {AxisMismatchError} If an extent is neither equal to the target nor 1
   */
  broadcastTo<B extends string>(shape: Readonly<Record<B, number>>): NamedArray<B> {
    const target = AxisSet.fromRecord(shape);
    for (const [name, extent] of this.axisSet.entries()) {
      if (!target.has(name)) {
        throw new AxisNotFoundError(name, target.names, 'broadcastTo');
      }
      const wanted = target.get(name);
      if (extent !== wanted && extent !== 1) {
        throw new AxisMismatchError(name, [extent, wanted], { target: target.toString() });
      }
    }
    const aligned = applyAlignmentPlan(this.buffer, planAlignment(this.axisSet, target));
    return withAxes(aligned.broadcastTo(target.extents), target.names);
  }

  /**
   * Append axes of extent 1
   */
  addAxes<B extends string>(names: B | readonly B[]): NamedArray<A | B> {
    const added = typeof names === 'string' ? [names] : names;
    const axes = new AxisSet([
      ...this.axisSet.entries(),
      ...added.map((name): AxisEntry => [name, 1]),
    ]);
    return withAxes(this.buffer.reshape(axes.extents), axes.names);
  }

  /**
   * Merge the named axes, in the given order, into one trailing axis
   *
   * @param axisNew - Name of the merged axis; defaults to the names joined with `*`
   */
  combineAxes<X extends string, N extends string = string>(
    names: readonly X[],
    axisNew?: N,
  ): NamedArray<Exclude<A, X> | N> {
    if (names.length === 0) {
      throw new InvalidParameterError('names', 'at least one axis must be combined');
    }
    const positions = names.map((name) => this.axisSet.indexOf(name, 'combineAxes'));
    const kept = this.axisSet.without(names, 'combineAxes');
    const keptPositions = kept.names.map((name) => this.axisSet.indexOf(name));
    const combined = new AxisSet([
      ...kept.entries(),
      [axisNew ?? flattenAxes(names), computeSize(positions.map((p) => this.axisSet.extents[p] ?? 0))],
    ]);

    const permutation = [...keptPositions, ...positions];
    const ordered = isIdentityPermutation(permutation)
      ? this.buffer
      : this.buffer.transpose(permutation);
    return withAxes(ordered.reshape(combined.extents), combined.names);
  }

  astype(dtype: DType): NamedArray<A> {
    if (dtype === this.dtype) {
      return this;
    }
    return new NamedArray(this.buffer.astype(dtype), this.axes);
  }

  // =============================================================================
  // Comparison and extraction
  // =============================================================================

  /**
   * Same axes (in any order) and the same values at every named position
   *
   * Never broadcasts: an axis of extent 1 does not equal a missing axis.
   */
  equals<B extends string>(other: AnyArray<B>): boolean {
    const that = materialize(other);
    if (!this.axisSet.equals(that.axisSet) || this.backend.id !== that.backend.id) {
      return false;
    }
    return this.buffer.equals(that.transpose(this.axes).buffer);
  }

  /** Nested plain-array copy in this array's axis order */
  toArray(): NestedArray {
    return this.buffer.toArray();
  }

  /** Row-major values; booleans become 0 and 1 */
  values(): number[] {
    return this.buffer.values();
  }

  /**
   * The single element of a one-element array
   *
   * @throws {ShapeMismatchError} If the array does not hold exactly one element
   */
  item(): Scalar {
    if (this.size !== 1) {
      throw new ShapeMismatchError(`item() needs exactly one element, array has ${this.size}`, {
        shape: this.axisSet.toRecord(),
      });
    }
    const value = this.buffer.get(new Array<number>(this.ndim).fill(0));
    return this.dtype === 'bool' ? value !== 0 : value;
  }

  /**
   * Iterate named positions in row-major order
   */
  ndindex(ignored?: string | readonly string[]): Generator<Record<string, number>> {
    return ndindex(this.axisSet, ignored);
  }

  // =============================================================================
  // Display
  // =============================================================================

  /**
   * Render contents next to the axis names
   *
   * @example
   * array([[5, 6], [6, 7]], ['x', 'y'], { backend: cpu }).format();
   * // NamedArray([[5, 6],
   * //             [6, 7]], axes=['x', 'y'])
   */
  format(options?: Partial<PrintOptions>): string {
    const prefix = 'NamedArray(';
    const body = formatNested(this.toArray(), this.buffer.shape, resolvePrintOptions(options));
    const annotations = [`axes=[${this.axes.map((name) => `'${name}'`).join(', ')}]`];
    if (this.dtype === 'int32' || this.dtype === 'float32') {
      annotations.push(`dtype=${this.dtype}`);
    }
    return `${prefix}${indentContinuation(body, prefix.length)}, ${annotations.join(', ')})`;
  }

  toString(): string {
    return this.format();
  }
}
