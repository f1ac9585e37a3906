/**
 * Runtime tests for dtype/index.ts
 */

import { describe, it, expect } from 'vitest';
import {
  DTYPES,
  binaryResultDType,
  createTypedArray,
  isDType,
  isFloatDType,
  promoteTypes,
  reductionResultDType,
  scalarDType,
  toFloatDType,
  unaryResultDType,
} from './index';

describe('DTYPES', () => {
  it('lists kinds in promotion order', () => {
    expect(DTYPES).toEqual(['bool', 'int32', 'float32', 'float64']);
  });

  it('recognizes dtype names', () => {
    expect(isDType('int32')).toBe(true);
    expect(isDType('int64')).toBe(false);
    expect(isDType(3)).toBe(false);
  });

  it('classifies floating types', () => {
    expect(isFloatDType('float32')).toBe(true);
    expect(isFloatDType('int32')).toBe(false);
  });
});

describe('createTypedArray', () => {
  it('allocates the matching TypedArray', () => {
    expect(createTypedArray('bool', 2)).toBeInstanceOf(Uint8Array);
    expect(createTypedArray('int32', 2)).toBeInstanceOf(Int32Array);
    expect(createTypedArray('float32', 2)).toBeInstanceOf(Float32Array);
    expect(createTypedArray('float64', 3)).toHaveLength(3);
  });
});

describe('promoteTypes', () => {
  it('picks the higher kind', () => {
    expect(promoteTypes('bool', 'int32')).toBe('int32');
    expect(promoteTypes('float32', 'int32')).toBe('float32');
    expect(promoteTypes('float32', 'float64')).toBe('float64');
    expect(promoteTypes('int32', 'int32')).toBe('int32');
  });

  it('is symmetric', () => {
    for (const a of DTYPES) {
      for (const b of DTYPES) {
        expect(promoteTypes(a, b)).toBe(promoteTypes(b, a));
      }
    }
  });

  it('widens to floats', () => {
    expect(toFloatDType('int32')).toBe('float64');
    expect(toFloatDType('float32')).toBe('float32');
    expect(toFloatDType('bool')).toBe('float64');
  });
});

describe('scalarDType', () => {
  it('treats scalars as weak', () => {
    expect(scalarDType(2, 'float32')).toBe('float32');
    expect(scalarDType(2, 'int32')).toBe('int32');
    expect(scalarDType(2.5, 'int32')).toBe('float64');
    expect(scalarDType(2, 'bool')).toBe('int32');
    expect(scalarDType(true, 'float64')).toBe('bool');
  });

  it('falls back to float64 outside the int32 range', () => {
    expect(scalarDType(2 ** 40, 'int32')).toBe('float64');
  });
});

describe('result dtypes', () => {
  it('gives booleans for comparisons and logic', () => {
    expect(binaryResultDType('lt', 'float64', 'int32')).toBe('bool');
    expect(binaryResultDType('and', 'bool', 'bool')).toBe('bool');
  });

  it('gives floats for division', () => {
    expect(binaryResultDType('div', 'int32', 'int32')).toBe('float64');
    expect(binaryResultDType('div', 'float32', 'bool')).toBe('float32');
  });

  it('promotes arithmetic and lifts bool to int32', () => {
    expect(binaryResultDType('add', 'int32', 'float32')).toBe('float32');
    expect(binaryResultDType('add', 'bool', 'bool')).toBe('int32');
    expect(binaryResultDType('pow', 'int32', 'int32')).toBe('float64');
    expect(binaryResultDType('pow', 'float32', 'int32')).toBe('float32');
  });

  it('maps unary operations', () => {
    expect(unaryResultDType('sqrt', 'int32')).toBe('float64');
    expect(unaryResultDType('neg', 'bool')).toBe('int32');
    expect(unaryResultDType('floor', 'float32')).toBe('float32');
    expect(unaryResultDType('not', 'float64')).toBe('bool');
  });

  it('maps reductions', () => {
    expect(reductionResultDType('mean', 'int32')).toBe('float64');
    expect(reductionResultDType('sum', 'bool')).toBe('float64');
    expect(reductionResultDType('prod', 'int32')).toBe('float64');
    expect(reductionResultDType('sum', 'float32')).toBe('float32');
    expect(reductionResultDType('max', 'int32')).toBe('int32');
    expect(reductionResultDType('any', 'float64')).toBe('bool');
  });
});
