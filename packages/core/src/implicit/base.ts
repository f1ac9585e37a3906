/**
 * Shared surface of the implicit arrays
 *
 * An implicit array is defined by a generating rule: a progression along
 * one named axis, or seeded random draws over a named shape. Its axes and
 * extents are known from the parameters alone; values are
 * produced on the first operation that needs them and memoized. Every
 * NamedArray operation is available and runs on the materialized result.
 */

import type { Backend, BinaryOp, NestedArray, ReductionOp, Scalar, UnaryOp } from '../buffer/types';
import type { AxisSet } from '../axes/axis-set';
import { ndindex } from '../axes/iteration';
import type { PrintOptions } from '../config';
import type { DType } from '../dtype';
import type { AnyArray, ArrayLike } from '../array/array-like';
import type { IndexExpression, OffsetKeys } from '../array/indexer';
import { axisNames } from '../array/named-array';
import type { NamedArray } from '../array/named-array';

export type ImplicitKind =
  | 'linear-space'
  | 'logarithmic-space'
  | 'geometric-space'
  | 'array-range'
  | 'uniform-random-sample'
  | 'normal-random-sample';

export abstract class ImplicitArrayBase<A extends string = string> {
  abstract readonly kind: ImplicitKind;
  abstract readonly backend: Backend;
  abstract readonly dtype: DType;
  /** Named shape, computed from the parameters */
  abstract readonly axisSet: AxisSet;

  private materialized: NamedArray<A> | undefined;

  protected abstract generate(): NamedArray<A>;

  /** Parameters shown by `toString()` */
  protected abstract describe(): ReadonlyArray<readonly [string, unknown]>;

  /**
   * Produce the values; repeated calls return the same array
   */
  materialize(): NamedArray<A> {
    if (this.materialized === undefined) {
      this.materialized = this.generate();
    }
    return this.materialized;
  }

  get axes(): readonly A[] {
    return axisNames<A>(this.axisSet.names);
  }

  get shape(): Readonly<Record<string, number>> {
    return this.axisSet.toRecord();
  }

  get ndim(): number {
    return this.axisSet.rank;
  }

  get size(): number {
    return this.axisSet.size;
  }

  // Binary

  binary<B extends string = never>(op: BinaryOp, other: ArrayLike<B>): NamedArray<A | B> {
    return this.materialize().binary(op, other);
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

  // Unary

  unary(op: UnaryOp): NamedArray<A> {
    return this.materialize().unary(op);
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

  // Reductions

  reduce<X extends string>(op: ReductionOp, axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.materialize().reduce(op, axis);
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

  var<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.reduce('var', axis);
  }

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

  ptp<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.materialize().ptp(axis);
  }

  percentile<X extends string>(q: number, axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.materialize().percentile(q, axis);
  }

  median<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.materialize().median(axis);
  }

  rms<X extends string>(axis?: X | readonly X[]): NamedArray<Exclude<A, X>> {
    return this.materialize().rms(axis);
  }

  // Indexing and axis manipulation

  index<E extends IndexExpression>(expr: E): NamedArray<Exclude<A, OffsetKeys<E>>> {
    return this.materialize().index(expr);
  }

  interpLinear<K extends A, X extends string = never>(
    coordinates: { readonly [P in K]: number | NamedArray<X> },
  ): NamedArray<Exclude<A, K> | X> {
    return this.materialize().interpLinear(coordinates);
  }

  transpose(axes?: readonly string[]): NamedArray<A> {
    return this.materialize().transpose(axes);
  }

  broadcastTo<B extends string>(shape: Readonly<Record<B, number>>): NamedArray<B> {
    return this.materialize().broadcastTo(shape);
  }

  addAxes<B extends string>(names: B | readonly B[]): NamedArray<A | B> {
    return this.materialize().addAxes(names);
  }

  combineAxes<X extends string, N extends string = string>(
    names: readonly X[],
    axisNew?: N,
  ): NamedArray<Exclude<A, X> | N> {
    return this.materialize().combineAxes(names, axisNew);
  }

  astype(dtype: DType): NamedArray<A> {
    return this.materialize().astype(dtype);
  }

  // Comparison and extraction

  equals<B extends string>(other: AnyArray<B>): boolean {
    return this.materialize().equals(other);
  }

  toArray(): NestedArray {
    return this.materialize().toArray();
  }

  values(): number[] {
    return this.materialize().values();
  }

  item(): Scalar {
    return this.materialize().item();
  }

  ndindex(ignored?: string | readonly string[]): Generator<Record<string, number>> {
    return ndindex(this.axisSet, ignored);
  }

  // Display

  /** Contents of the materialized array */
  format(options?: Partial<PrintOptions>): string {
    return this.materialize().format(options);
  }

  /**
   * The generating rule, without materializing
   *
   * @example
   * new LinearSpace(0, 1, 'z', 4, { backend: cpu }).toString();
   * // "LinearSpace(start=0, stop=1, axis='z', num=4, endpoint=true)"
   */
  toString(): string {
    const parameters = this.describe()
      .map(([name, value]) => `${name}=${formatParameter(value)}`)
      .join(', ');
    return `${this.constructor.name}(${parameters})`;
  }
}

function formatParameter(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return String(value);
}
