/**
 * Reduction operations for CPU backend
 *
 * Each reduction removes one positional dimension. Elements along that
 * dimension are gathered per output position and folded in float64.
 */

import {
  InvalidParameterError,
  assertExhaustiveSwitch,
  computeSize,
  createTypedArray,
  reductionResultDType,
  toFloatDType,
} from '@named-arrays/core';
import type { DType, ReductionOp } from '@named-arrays/core';
import { storeResult } from '../utils';
import type { DenseArray } from './types';

function sum(values: Float64Array): number {
  let total = 0;
  for (const v of values) {
    total += v;
  }
  return total;
}

/**
 * Population variance (two passes over the values)
 */
function variance(values: Float64Array): number {
  const mean = sum(values) / values.length;
  let squares = 0;
  for (const v of values) {
    squares += (v - mean) * (v - mean);
  }
  return squares / values.length;
}

function reduceValues(op: ReductionOp, values: Float64Array): number {
  switch (op) {
    case 'sum':
      return sum(values);
    case 'prod': {
      let product = 1;
      for (const v of values) {
        product *= v;
      }
      return product;
    }
    case 'mean':
      return sum(values) / values.length;
    case 'var':
      return variance(values);
    case 'std':
      return Math.sqrt(variance(values));
    case 'min': {
      let min = Infinity;
      for (const v of values) {
        if (v < min || Number.isNaN(v)) {
          min = v;
        }
        if (Number.isNaN(min)) {
          break;
        }
      }
      return min;
    }
    case 'max': {
      let max = -Infinity;
      for (const v of values) {
        if (v > max || Number.isNaN(v)) {
          max = v;
        }
        if (Number.isNaN(max)) {
          break;
        }
      }
      return max;
    }
    case 'all':
      return values.every((v) => v !== 0) ? 1 : 0;
    case 'any':
      return values.some((v) => v !== 0) ? 1 : 0;
    default:
      return assertExhaustiveSwitch(op);
  }
}

/**
 * Percentile of one lane with linear interpolation between ranks
 */
export function percentileOf(values: Float64Array, q: number): number {
  if (values.some(Number.isNaN)) {
    return NaN;
  }
  const sorted = Float64Array.from(values).sort();
  const rank = (q / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const low = sorted[lower] ?? NaN;
  const high = sorted[upper] ?? NaN;
  return lower === upper ? low : low + (high - low) * (rank - lower);
}

/**
 * Fold every lane along `position` into one value
 *
 * @throws {InvalidParameterError} If `position` is not a dimension of the input
 */
function reduceLanes(
  input: DenseArray,
  position: number,
  dtype: DType,
  label: string,
  fold: (lane: Float64Array) => number,
): DenseArray {
  const { shape } = input;
  if (!Number.isInteger(position) || position < 0 || position >= shape.length) {
    throw new InvalidParameterError(
      'position',
      `dimension ${position} does not exist in a rank ${shape.length} buffer`,
    );
  }

  const outer = computeSize(shape.slice(0, position));
  const extent = shape[position] ?? 0;
  const inner = computeSize(shape.slice(position + 1));
  const outputShape = shape.filter((_, i) => i !== position);
  const data = createTypedArray(dtype, outer * inner);
  const lane = new Float64Array(extent);

  for (let o = 0; o < outer; o++) {
    for (let i = 0; i < inner; i++) {
      for (let k = 0; k < extent; k++) {
        lane[k] = input.data[(o * extent + k) * inner + i] ?? 0;
      }
      storeResult(data, o * inner + i, fold(lane), dtype, label);
    }
  }

  return { data, shape: outputShape, dtype };
}

/**
 * Execute a reduction along one positional dimension
 *
 * @throws {InvalidParameterError} If `position` is not a dimension of the input
 */
export function executeReductionOp(op: ReductionOp, input: DenseArray, position: number): DenseArray {
  return reduceLanes(input, position, reductionResultDType(op, input.dtype), op, (lane) =>
    reduceValues(op, lane),
  );
}

/**
 * Execute a percentile along one positional dimension
 *
 * @throws {InvalidParameterError} If `q` is outside [0, 100] or `position` is not a dimension
 */
export function executePercentileOp(q: number, input: DenseArray, position: number): DenseArray {
  if (!Number.isFinite(q) || q < 0 || q > 100) {
    throw new InvalidParameterError('q', `percentile must be between 0 and 100, got ${q}`, { q });
  }
  return reduceLanes(input, position, toFloatDType(input.dtype), 'percentile', (lane) =>
    percentileOf(lane, q),
  );
}
