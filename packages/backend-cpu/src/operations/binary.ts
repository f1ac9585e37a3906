/**
 * Binary operations for CPU backend
 *
 * Implements element-wise binary operations with positional broadcasting:
 * operands have the same rank (dimensions of size 1 stretch) or one of them
 * is rank 0.
 */

import {
  ShapeMismatchError,
  assertExhaustiveSwitch,
  binaryResultDType,
  computeSize,
  createTypedArray,
  formatShape,
} from '@named-arrays/core';
import type { BinaryOp } from '@named-arrays/core';
import { broadcastStrides, storeResult, stridedOffsets } from '../utils';
import type { DenseArray } from './types';

/**
 * Modulo with the sign of the divisor
 */
export function floorMod(a: number, b: number): number {
  return a - Math.floor(a / b) * b;
}

function binaryFunction(op: BinaryOp): (a: number, b: number) => number {
  switch (op) {
    case 'add':
      return (a, b) => a + b;
    case 'sub':
      return (a, b) => a - b;
    case 'mul':
      return (a, b) => a * b;
    case 'div':
      return (a, b) => a / b;
    case 'mod':
      return floorMod;
    case 'pow':
      return (a, b) => a ** b;
    case 'maximum':
      return Math.max;
    case 'minimum':
      return Math.min;
    case 'eq':
      return (a, b) => (a === b ? 1 : 0);
    case 'ne':
      return (a, b) => (a !== b ? 1 : 0);
    case 'lt':
      return (a, b) => (a < b ? 1 : 0);
    case 'le':
      return (a, b) => (a <= b ? 1 : 0);
    case 'gt':
      return (a, b) => (a > b ? 1 : 0);
    case 'ge':
      return (a, b) => (a >= b ? 1 : 0);
    case 'and':
      return (a, b) => (a !== 0 && b !== 0 ? 1 : 0);
    case 'or':
      return (a, b) => (a !== 0 || b !== 0 ? 1 : 0);
    default:
      return assertExhaustiveSwitch(op);
  }
}

/**
 * Output shape of two positionally broadcast operands
 *
 * @throws {ShapeMismatchError} If ranks differ (neither being 0) or a dimension pair is incompatible
 */
export function broadcastShapes(shapeA: readonly number[], shapeB: readonly number[]): number[] {
  if (shapeA.length === 0) {
    return [...shapeB];
  }
  if (shapeB.length === 0) {
    return [...shapeA];
  }
  if (shapeA.length !== shapeB.length) {
    throw new ShapeMismatchError(
      `Cannot broadcast shapes ${formatShape(shapeA)} and ${formatShape(shapeB)}: ranks differ`,
      { shapes: [shapeA, shapeB] },
    );
  }
  return shapeA.map((dimA, i) => {
    const dimB = shapeB[i] ?? 1;
    if (dimA === dimB || dimB === 1) {
      return dimA;
    }
    if (dimA === 1) {
      return dimB;
    }
    throw new ShapeMismatchError(
      `Cannot broadcast shapes ${formatShape(shapeA)} and ${formatShape(shapeB)}: ` +
        `dimension ${i} has sizes ${dimA} and ${dimB}`,
      { shapes: [shapeA, shapeB] },
    );
  });
}

function operandOffsets(shape: readonly number[], outputShape: readonly number[]): Int32Array {
  if (shape.length === 0) {
    return new Int32Array(computeSize(outputShape));
  }
  return stridedOffsets(outputShape, broadcastStrides(shape, outputShape));
}

/**
 * Execute a binary operation with broadcasting
 */
export function executeBinaryOp(op: BinaryOp, a: DenseArray, b: DenseArray): DenseArray {
  const shape = broadcastShapes(a.shape, b.shape);
  const dtype = binaryResultDType(op, a.dtype, b.dtype);
  const fn = binaryFunction(op);
  const data = createTypedArray(dtype, computeSize(shape));

  const sameShape =
    a.shape.length === b.shape.length && a.shape.every((dim, i) => dim === b.shape[i]);

  if (sameShape) {
    // Fast path: no broadcasting needed
    for (let i = 0; i < data.length; i++) {
      storeResult(data, i, fn(a.data[i] ?? 0, b.data[i] ?? 0), dtype, op);
    }
  } else {
    const offsetsA = operandOffsets(a.shape, shape);
    const offsetsB = operandOffsets(b.shape, shape);
    for (let i = 0; i < data.length; i++) {
      storeResult(
        data,
        i,
        fn(a.data[offsetsA[i] ?? 0] ?? 0, b.data[offsetsB[i] ?? 0] ?? 0),
        dtype,
        op,
      );
    }
  }

  return { data, shape, dtype };
}
