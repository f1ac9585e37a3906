export * from './errors';
export * from './dtype';
export * from './utils';
export * from './config';
export type * from './buffer/types';
export { UNARY_OPS, BINARY_OPS, REDUCTION_OPS } from './buffer/types';

// Named shapes and alignment
export { AxisSet } from './axes/axis-set';
export type { AxisEntry } from './axes/axis-set';
export {
  align,
  alignAxes,
  applyAlignmentPlan,
  broadcastAxes,
  isIdentityPermutation,
  planAlignment,
} from './axes/alignment';
export type { Alignment, AlignmentPlan, HasAxes } from './axes/alignment';
export { flattenAxes, ndindex } from './axes/iteration';

// Arrays
export { NamedArray, assertSameBackend, axisNames } from './array/named-array';
export { array, full, ones, scalar, zeros } from './array/creation';
export type { ArrayOptions } from './array/creation';
export { shapeBroadcasted, stack } from './array/functions';
export { ARRAY_KINDS, isAnyArray, materialize } from './array/array-like';
export type { AnyArray, ArrayKind, ArrayLike, ImplicitArray } from './array/array-like';
export { normalizeSlice, resolveIndex, slice } from './array/indexer';
export type {
  IndexExpression,
  OffsetKeys,
  ResolvedIndex,
  Selector,
  SliceSpec,
} from './array/indexer';
export { formatNested, formatValue } from './array/format';

// Implicit arrays
export * from './implicit';

// Random draws
export { MAX_SEED, SeededRandom } from './random/rng';
