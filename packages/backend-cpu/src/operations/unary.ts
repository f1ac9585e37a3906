/**
 * Unary operations for CPU backend
 *
 * Implements element-wise unary operations like negation, absolute value, etc.
 */

import { assertExhaustiveSwitch, createTypedArray, unaryResultDType } from '@named-arrays/core';
import type { UnaryOp } from '@named-arrays/core';
import { storeResult } from '../utils';
import type { DenseArray } from './types';

/**
 * Round half to even, matching the rounding of the usual numeric libraries
 */
export function roundHalfEven(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded;
}

function unaryFunction(op: UnaryOp): (value: number) => number {
  switch (op) {
    case 'neg':
      return (v) => -v;
    case 'abs':
      return Math.abs;
    case 'sign':
      return Math.sign;
    case 'sqrt':
      return Math.sqrt;
    case 'square':
      return (v) => v * v;
    case 'exp':
      return Math.exp;
    case 'log':
      return Math.log;
    case 'sin':
      return Math.sin;
    case 'cos':
      return Math.cos;
    case 'tan':
      return Math.tan;
    case 'floor':
      return Math.floor;
    case 'ceil':
      return Math.ceil;
    case 'round':
      return roundHalfEven;
    case 'not':
      return (v) => (v === 0 ? 1 : 0);
    default:
      return assertExhaustiveSwitch(op);
  }
}

/**
 * Execute a unary operation element by element
 */
export function executeUnaryOp(op: UnaryOp, input: DenseArray): DenseArray {
  const dtype = unaryResultDType(op, input.dtype);
  const fn = unaryFunction(op);
  const data = createTypedArray(dtype, input.data.length);
  for (let i = 0; i < data.length; i++) {
    storeResult(data, i, fn(input.data[i] ?? 0), dtype, op);
  }
  return { data, shape: input.shape, dtype };
}
