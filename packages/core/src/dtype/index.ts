/**
 * Data types and promotion rules
 *
 * A deliberately small set of numeric kinds. Each maps to one TypedArray
 * constructor; results of mixed-type operations follow a linear promotion
 * order bool < int32 < float32 < float64.
 */

import type { BinaryOp, ReductionOp, UnaryOp } from '../buffer/types';
import { assertExhaustiveSwitch } from '../utils';

export type DType = 'bool' | 'int32' | 'float32' | 'float64';

export type TypedArray = Uint8Array | Int32Array | Float32Array | Float64Array;

export const DTYPES: readonly DType[] = ['bool', 'int32', 'float32', 'float64'];

const PROMOTION_RANK: Readonly<Record<DType, number>> = {
  bool: 0,
  int32: 1,
  float32: 2,
  float64: 3,
};

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export function isDType(value: unknown): value is DType {
  return typeof value === 'string' && DTYPES.some((dtype) => dtype === value);
}

export function isInt32Value(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function isFloatDType(dtype: DType): boolean {
  return dtype === 'float32' || dtype === 'float64';
}

/**
 * Allocate a zero-filled TypedArray for the dtype
 */
export function createTypedArray(dtype: DType, length: number): TypedArray {
  switch (dtype) {
    case 'bool':
      return new Uint8Array(length);
    case 'int32':
      return new Int32Array(length);
    case 'float32':
      return new Float32Array(length);
    case 'float64':
      return new Float64Array(length);
    default:
      return assertExhaustiveSwitch(dtype);
  }
}

export function promoteTypes(a: DType, b: DType): DType {
  return PROMOTION_RANK[a] >= PROMOTION_RANK[b] ? a : b;
}

/**
 * Smallest floating type that holds the dtype
 */
export function toFloatDType(dtype: DType): DType {
  return dtype === 'float32' ? 'float32' : 'float64';
}

/**
 * dtype of a bare scalar combined with an array of dtype `peer`
 *
 * Scalars are weak: they adopt the array's dtype whenever the value fits it.
 */
export function scalarDType(value: number | boolean, peer: DType): DType {
  if (typeof value === 'boolean') {
    return 'bool';
  }
  if (isFloatDType(peer)) {
    return peer;
  }
  if (isInt32Value(value)) {
    return 'int32';
  }
  return 'float64';
}

export function binaryResultDType(op: BinaryOp, a: DType, b: DType): DType {
  switch (op) {
    case 'eq':
    case 'ne':
    case 'lt':
    case 'le':
    case 'gt':
    case 'ge':
    case 'and':
    case 'or':
      return 'bool';
    case 'div':
    case 'pow':
      return toFloatDType(promoteTypes(a, b));
    case 'add':
    case 'sub':
    case 'mul':
    case 'mod':
    case 'maximum':
    case 'minimum': {
      const promoted = promoteTypes(a, b);
      return promoted === 'bool' ? 'int32' : promoted;
    }
    default:
      return assertExhaustiveSwitch(op);
  }
}

export function unaryResultDType(op: UnaryOp, dtype: DType): DType {
  switch (op) {
    case 'not':
      return 'bool';
    case 'sqrt':
    case 'exp':
    case 'log':
    case 'sin':
    case 'cos':
    case 'tan':
      return toFloatDType(dtype);
    case 'neg':
    case 'abs':
    case 'sign':
    case 'square':
      return dtype === 'bool' ? 'int32' : dtype;
    case 'floor':
    case 'ceil':
    case 'round':
      return dtype;
    default:
      return assertExhaustiveSwitch(op);
  }
}

export function reductionResultDType(op: ReductionOp, dtype: DType): DType {
  switch (op) {
    case 'all':
    case 'any':
      return 'bool';
    // Integer sums and products accumulate in float64, exact up to 2^53
    case 'sum':
    case 'prod':
    case 'mean':
    case 'var':
    case 'std':
      return toFloatDType(dtype);
    case 'min':
    case 'max':
      return dtype;
    default:
      return assertExhaustiveSwitch(op);
  }
}
