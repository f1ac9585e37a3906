/**
 * Utility functions for CPU backend operations
 *
 * Provides helpers for typed array storage, nested data conversion and
 * strided index calculations.
 */

import {
  InvalidParameterError,
  ShapeMismatchError,
  computeSize,
  computeStrides,
  createTypedArray,
  formatShape,
  isInt32Value,
} from '@named-arrays/core';
import type { DType, NestedArray, TypedArray } from '@named-arrays/core';

/**
 * Store a value as the dtype holds it
 *
 * Integer arrays truncate toward zero; `bool` stores 1 for any nonzero value (NaN included).
 */
export function storeValue(target: TypedArray, index: number, value: number, dtype: DType): void {
  target[index] = dtype === 'bool' ? (value !== 0 ? 1 : 0) : value;
}

/**
 * Store the result of an operation, refusing integer results int32 cannot hold
 *
 * @throws {InvalidParameterError} If an int32 result is fractional, NaN or out of range
 */
export function storeResult(
  target: TypedArray,
  index: number,
  value: number,
  dtype: DType,
  op: string,
): void {
  if (dtype === 'int32' && !isInt32Value(value)) {
    throw new InvalidParameterError(
      op,
      `result ${value} does not fit in int32; convert the operands with astype('float64') first`,
      { op, value },
      'INTEGER_OVERFLOW',
    );
  }
  storeValue(target, index, value, dtype);
}

/**
 * Copy numbers into a new TypedArray of the dtype
 */
export function toTypedArray(values: ArrayLike<number>, dtype: DType): TypedArray {
  const result = createTypedArray(dtype, values.length);
  for (let i = 0; i < values.length; i++) {
    storeValue(result, i, values[i] ?? 0, dtype);
  }
  return result;
}

/**
 * Compute the flat index for a multi-dimensional position
 */
export function computeFlatIndex(indices: readonly number[], strides: readonly number[]): number {
  let flatIndex = 0;
  for (let i = 0; i < indices.length; i++) {
    flatIndex += (indices[i] ?? 0) * (strides[i] ?? 0);
  }
  return flatIndex;
}

/**
 * Flat source offsets visited when walking `shape` in row-major order with `strides`
 *
 * A stride of 0 repeats the same element along that dimension (broadcasting).
 */
export function stridedOffsets(shape: readonly number[], strides: readonly number[]): Int32Array {
  const size = computeSize(shape);
  const offsets = new Int32Array(size);
  if (size === 0) {
    return offsets;
  }

  const rank = shape.length;
  const counters = new Array<number>(rank).fill(0);
  let offset = 0;
  for (let i = 0; i < size; i++) {
    offsets[i] = offset;
    for (let dim = rank - 1; dim >= 0; dim--) {
      const stride = strides[dim] ?? 0;
      const next = (counters[dim] ?? 0) + 1;
      if (next < (shape[dim] ?? 1)) {
        counters[dim] = next;
        offset += stride;
        break;
      }
      offset -= (next - 1) * stride;
      counters[dim] = 0;
    }
  }
  return offsets;
}

/**
 * Strides of `shape` with 0 on every dimension that broadcasts to `target`
 */
export function broadcastStrides(
  shape: readonly number[],
  target: readonly number[],
): number[] {
  if (shape.length !== target.length) {
    throw new ShapeMismatchError(
      `Cannot broadcast rank ${shape.length} to rank ${target.length}`,
      { shape, target },
    );
  }
  const strides = computeStrides(shape);
  return shape.map((dim, i) => {
    const wanted = target[i] ?? 1;
    if (dim === wanted) {
      return strides[i] ?? 0;
    }
    if (dim === 1) {
      return 0;
    }
    throw new ShapeMismatchError(
      `Cannot broadcast shape ${formatShape(shape)} to ${formatShape(target)}: dimension ${i} has size ${dim}`,
      { shape, target },
    );
  });
}

function isNestedList(data: NestedArray): data is readonly NestedArray[] {
  return Array.isArray(data);
}

/**
 * Positional shape of nested data
 *
 * @throws {ShapeMismatchError} If sibling lists differ in length or depth
 */
export function inferShape(data: NestedArray): number[] {
  if (!isNestedList(data)) {
    return [];
  }
  const [first] = data;
  if (first === undefined) {
    return [0];
  }
  const inner = inferShape(first);
  for (const item of data) {
    const itemShape = inferShape(item);
    if (itemShape.length !== inner.length || itemShape.some((dim, i) => dim !== inner[i])) {
      throw new ShapeMismatchError(
        `Ragged nested data: found sub-shapes ${formatShape(inner)} and ${formatShape(itemShape)}`,
        { shapes: [inner, itemShape] },
      );
    }
  }
  return [data.length, ...inner];
}

/**
 * Leaves of nested data in row-major order
 */
export function flattenNested(data: NestedArray, into: (number | boolean)[] = []): (number | boolean)[] {
  if (!isNestedList(data)) {
    into.push(data);
    return into;
  }
  for (const item of data) {
    flattenNested(item, into);
  }
  return into;
}

/**
 * Rebuild nested lists from row-major values
 */
export function nestValues(
  values: ArrayLike<number>,
  shape: readonly number[],
  asBoolean: boolean,
): NestedArray {
  const leaf = (i: number): number | boolean => {
    const value = values[i] ?? 0;
    return asBoolean ? value !== 0 : value;
  };
  if (shape.length === 0) {
    return leaf(0);
  }

  const build = (dim: number, offset: number): NestedArray => {
    const extent = shape[dim] ?? 0;
    const inner = computeSize(shape.slice(dim + 1));
    const items: NestedArray[] = [];
    for (let i = 0; i < extent; i++) {
      items.push(dim === shape.length - 1 ? leaf(offset + i) : build(dim + 1, offset + i * inner));
    }
    return items;
  };
  return build(0, 0);
}
