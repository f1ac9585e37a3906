/**
 * Layout operations for CPU backend
 *
 * - reshape: no copying, the result shares the input elements
 * - broadcastTo, transpose, select: gather into a new contiguous array
 */

import {
  InvalidParameterError,
  ShapeMismatchError,
  assertExhaustiveSwitch,
  computeSize,
  computeStrides,
  createTypedArray,
  formatShape,
} from '@named-arrays/core';
import type { PositionalSelector } from '@named-arrays/core';
import { broadcastStrides, stridedOffsets } from '../utils';
import type { DenseArray } from './types';

function gather(input: DenseArray, offsets: Int32Array, shape: readonly number[]): DenseArray {
  const data = createTypedArray(input.dtype, offsets.length);
  for (let i = 0; i < offsets.length; i++) {
    data[i] = input.data[offsets[i] ?? 0] ?? 0;
  }
  return { data, shape, dtype: input.dtype };
}

/**
 * Reinterpret the elements with a new shape
 *
 * @throws {ShapeMismatchError} If the element count changes
 */
export function executeReshapeOp(input: DenseArray, shape: readonly number[]): DenseArray {
  if (computeSize(shape) !== input.data.length) {
    throw new ShapeMismatchError(
      `Cannot reshape ${formatShape(input.shape)} (${input.data.length} elements) to ${formatShape(shape)}`,
      { from: input.shape, to: shape },
    );
  }
  return { data: input.data, shape: [...shape], dtype: input.dtype };
}

/**
 * Stretch size-1 dimensions to the target shape of the same rank
 */
export function executeBroadcastToOp(input: DenseArray, shape: readonly number[]): DenseArray {
  const strides = broadcastStrides(input.shape, shape);
  return gather(input, stridedOffsets(shape, strides), [...shape]);
}

/**
 * Reorder dimensions; output dimension i is input dimension `permutation[i]`
 *
 * @throws {InvalidParameterError} If `permutation` is not a permutation of the dimensions
 */
export function executeTransposeOp(input: DenseArray, permutation: readonly number[]): DenseArray {
  const rank = input.shape.length;
  const seen = new Set(permutation);
  if (
    permutation.length !== rank ||
    seen.size !== rank ||
    permutation.some((p) => !Number.isInteger(p) || p < 0 || p >= rank)
  ) {
    throw new InvalidParameterError(
      'permutation',
      `[${permutation.join(', ')}] is not a permutation of ${rank} dimensions`,
    );
  }

  const sourceStrides = computeStrides(input.shape);
  const shape = permutation.map((p) => input.shape[p] ?? 0);
  const strides = permutation.map((p) => sourceStrides[p] ?? 0);
  return gather(input, stridedOffsets(shape, strides), shape);
}

function selectorPositions(selector: PositionalSelector, extent: number): number[] {
  switch (selector.kind) {
    case 'all':
      return Array.from({ length: extent }, (_, i) => i);
    case 'index':
      if (selector.index < 0 || selector.index >= extent) {
        throw new InvalidParameterError(
          'index',
          `${selector.index} is out of bounds for dimension of size ${extent}`,
        );
      }
      return [selector.index];
    case 'slice': {
      const { start, stop, step } = selector;
      const length =
        step > 0
          ? Math.max(0, Math.ceil((stop - start) / step))
          : Math.max(0, Math.ceil((start - stop) / -step));
      return Array.from({ length }, (_, i) => start + i * step);
    }
    case 'mask': {
      if (selector.mask.length !== extent) {
        throw new ShapeMismatchError(
          `Mask of length ${selector.mask.length} for dimension of size ${extent}`,
        );
      }
      const positions: number[] = [];
      selector.mask.forEach((keep, i) => {
        if (keep) {
          positions.push(i);
        }
      });
      return positions;
    }
    default:
      return assertExhaustiveSwitch(selector);
  }
}

/**
 * Orthogonal selection: each dimension is filtered independently
 */
export function executeSelectOp(
  input: DenseArray,
  selectors: readonly PositionalSelector[],
): DenseArray {
  if (selectors.length !== input.shape.length) {
    throw new ShapeMismatchError(
      `Got ${selectors.length} selectors for a buffer of rank ${input.shape.length}`,
    );
  }

  const strides = computeStrides(input.shape);
  const lists = selectors.map((selector, dim) => selectorPositions(selector, input.shape[dim] ?? 0));
  const shape = lists.filter((_, dim) => selectors[dim]?.kind !== 'index').map((l) => l.length);

  // Cartesian product of the per-dimension positions, row-major
  let offsets = [0];
  lists.forEach((positions, dim) => {
    const stride = strides[dim] ?? 0;
    const next: number[] = [];
    for (const base of offsets) {
      for (const p of positions) {
        next.push(base + p * stride);
      }
    }
    offsets = next;
  });

  return gather(input, Int32Array.from(offsets), shape);
}
