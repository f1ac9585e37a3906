/**
 * Numeric buffer abstraction
 *
 * The core library never touches element storage directly. It talks to a
 * dense positional n-d buffer through this capability interface, which a
 * backend package (for example `@named-arrays/backend-cpu`) implements.
 * Every method returns a new buffer; implementations must not mutate `this`
 * or their arguments.
 */

import type { DType } from '../dtype';

/**
 * Union of all elementwise unary operations
 *
 * Adding an operation here causes TypeScript errors in backend kernels
 * until they handle it.
 */
export type UnaryOp =
  | 'neg' // Negation
  | 'abs' // Absolute value
  | 'sign' // -1, 0 or 1
  | 'sqrt' // Square root
  | 'square' // Square
  | 'exp' // Exponential
  | 'log' // Natural logarithm
  | 'sin' // Sine
  | 'cos' // Cosine
  | 'tan' // Tangent
  | 'floor'
  | 'ceil'
  | 'round'
  | 'not'; // Logical not

/**
 * Union of all elementwise binary operations
 */
export type BinaryOp =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'mod'
  | 'pow'
  | 'maximum'
  | 'minimum'
  | 'eq'
  | 'ne'
  | 'lt'
  | 'le'
  | 'gt'
  | 'ge'
  | 'and'
  | 'or';

/**
 * Union of all reductions along a single positional axis
 */
export type ReductionOp = 'sum' | 'prod' | 'mean' | 'var' | 'std' | 'min' | 'max' | 'all' | 'any';

export const UNARY_OPS: readonly UnaryOp[] = [
  'neg',
  'abs',
  'sign',
  'sqrt',
  'square',
  'exp',
  'log',
  'sin',
  'cos',
  'tan',
  'floor',
  'ceil',
  'round',
  'not',
];

export const BINARY_OPS: readonly BinaryOp[] = [
  'add',
  'sub',
  'mul',
  'div',
  'mod',
  'pow',
  'maximum',
  'minimum',
  'eq',
  'ne',
  'lt',
  'le',
  'gt',
  'ge',
  'and',
  'or',
];

export const REDUCTION_OPS: readonly ReductionOp[] = [
  'sum',
  'prod',
  'mean',
  'var',
  'std',
  'min',
  'max',
  'all',
  'any',
];

export type Scalar = number | boolean;

/**
 * Arbitrarily nested array of values
 *
 * @example
 * const scalar: NestedArray = 5;
 * const matrix: NestedArray = [[1, 2], [3, 4]];
 */
export type NestedArray<T = Scalar> = T | readonly NestedArray<T>[];

/**
 * Positional selector for one buffer dimension
 *
 * Indices are already normalized by the caller: offsets are in range and
 * slice bounds are concrete.
 */
export type PositionalSelector =
  | { readonly kind: 'all' }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'slice'; readonly start: number; readonly stop: number; readonly step: number }
  | { readonly kind: 'mask'; readonly mask: readonly boolean[] };

/**
 * Dense positional n-d array
 */
export interface NumericBuffer {
  /** Backend that created this buffer */
  readonly backend: Backend;

  readonly dtype: DType;

  /** Positional extents, outermost first */
  readonly shape: readonly number[];

  /** Number of dimensions */
  readonly rank: number;

  /** Total number of elements */
  readonly size: number;

  /**
   * Reinterpret with a new shape holding the same number of elements
   *
   * Used with broadcast placeholders: `[3]` reshaped to `[3, 1]`.
   */
  reshape(shape: readonly number[]): NumericBuffer;

  /**
   * Expand size-1 dimensions to the target shape (same rank)
   */
  broadcastTo(shape: readonly number[]): NumericBuffer;

  /**
   * Reorder dimensions; `permutation[i]` is the source position of output dimension i
   */
  transpose(permutation: readonly number[]): NumericBuffer;

  unary(op: UnaryOp): NumericBuffer;

  /**
   * Elementwise operation with positional broadcasting
   *
   * Operands have equal rank, or one of them is rank 0.
   */
  binary(op: BinaryOp, other: NumericBuffer): NumericBuffer;

  /**
   * Reduce one positional dimension away
   */
  reduce(op: ReductionOp, position: number): NumericBuffer;

  /**
   * `q`-th percentile (0 to 100) along one positional dimension, removing it
   *
   * Interpolates linearly between the two nearest ranks; a NaN lane yields NaN.
   */
  percentile(q: number, position: number): NumericBuffer;

  /**
   * Orthogonal positional indexing, one selector per dimension
   *
   * `index` selectors drop their dimension; every other selector keeps it.
   */
  select(selectors: readonly PositionalSelector[]): NumericBuffer;

  astype(dtype: DType): NumericBuffer;

  /** Element at a full positional index */
  get(indices: readonly number[]): number;

  /** Elements in row-major order */
  values(): number[];

  /** Nested plain-array copy; `bool` buffers yield booleans */
  toArray(): NestedArray;

  /** Same shape and elementwise equal values */
  equals(other: NumericBuffer): boolean;
}

/**
 * Factory for buffers living on one backend
 */
export interface Backend {
  /** Unique identifier for this backend instance */
  readonly id: string;

  /** Backend type identifier (e.g. 'cpu') */
  readonly type: string;

  /**
   * Build a buffer from nested values, inferring the shape
   *
   * Without a dtype, booleans infer `bool` and numbers `float64`.
   */
  fromNested(data: NestedArray, dtype?: DType): NumericBuffer;

  /**
   * Build a buffer from row-major values and an explicit shape
   */
  fromFlat(values: ArrayLike<number>, shape: readonly number[], dtype?: DType): NumericBuffer;

  full(shape: readonly number[], value: Scalar, dtype?: DType): NumericBuffer;
}
