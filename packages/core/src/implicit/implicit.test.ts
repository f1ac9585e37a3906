/**
 * Runtime tests for the implicit arrays that need no buffer work
 *
 * Construction, validation and shape queries never touch the backend, so a
 * backend that refuses every call is enough here. Materialized values are
 * covered by the shared generators in @named-arrays/test-utils.
 */

import { describe, it, expect } from 'vitest';
import type { Backend } from '../buffer/types';
import { InvalidParameterError } from '../errors';
import { isAnyArray } from '../array/array-like';
import { ArrayRange } from './array-range';
import { GeometricSpace } from './geometric-space';
import { LinearSpace } from './linear-space';
import { LogarithmicSpace } from './logarithmic-space';
import { NormalRandomSample, UniformRandomSample } from './random-sample';

const refusingBackend: Backend = {
  id: 'refusing',
  type: 'mock',
  fromNested: () => {
    throw new Error('backend used');
  },
  fromFlat: () => {
    throw new Error('backend used');
  },
  full: () => {
    throw new Error('backend used');
  },
};

const options = { backend: refusingBackend };

describe('LinearSpace', () => {
  it('knows its shape without materializing', () => {
    const space = new LinearSpace(0, 1, 'z', 4, options);
    expect(space.kind).toBe('linear-space');
    expect(space.axes).toEqual(['z']);
    expect(space.shape).toEqual({ z: 4 });
    expect(space.ndim).toBe(1);
    expect(space.size).toBe(4);
    expect(space.dtype).toBe('float64');
    expect([...space.ndindex()]).toHaveLength(4);
  });

  it('computes the step', () => {
    expect(new LinearSpace(0, 1, 'z', 5, options).step).toBe(0.25);
    expect(new LinearSpace(0, 1, 'z', 4, { ...options, endpoint: false }).step).toBe(0.25);
    expect(new LinearSpace(3, 7, 'z', 1, options).step).toBe(0);
    expect(new LinearSpace(3, 7, 'z', 0, options).step).toBe(0);
  });

  it('keeps its parameters readable', () => {
    const space = new LinearSpace(-1, 1, 'z', 3, options);
    expect(space.start).toBe(-1);
    expect(space.stop).toBe(1);
    expect(space.axis).toBe('z');
    expect(space.num).toBe(3);
    expect(space.endpoint).toBe(true);
  });

  it('describes its rule', () => {
    expect(new LinearSpace(0, 1, 'z', 4, options).toString()).toBe(
      "LinearSpace(start=0, stop=1, axis='z', num=4, endpoint=true)",
    );
  });

  it('validates eagerly', () => {
    expect(() => new LinearSpace(0, 1, 'z', -1, options)).toThrow(InvalidParameterError);
    expect(() => new LinearSpace(0, 1, 'z', 2.5, options)).toThrow(InvalidParameterError);
    expect(() => new LinearSpace(0, 1, '', 3, options)).toThrow(InvalidParameterError);
    expect(() => new LinearSpace(0, Number.NaN, 'z', 3, options)).toThrow(InvalidParameterError);
    expect(() => new LinearSpace(0, Infinity, 'z', 3, options)).toThrow(
      "Invalid parameter 'stop': must be a finite number, got Infinity",
    );
  });

  it('belongs to the array family', () => {
    expect(isAnyArray(new LinearSpace(0, 1, 'z', 2, options))).toBe(true);
    expect(isAnyArray({ kind: 'other' })).toBe(false);
    expect(isAnyArray(3)).toBe(false);
  });
});

describe('LogarithmicSpace', () => {
  it('reports its endpoints as powers of the base', () => {
    const space = new LogarithmicSpace(0, 3, 'f', 4, 10, options);
    expect(space.start).toBe(1);
    expect(space.stop).toBe(1000);
    expect(space.shape).toEqual({ f: 4 });
  });

  it('requires a positive finite base', () => {
    expect(() => new LogarithmicSpace(0, 3, 'f', 4, 0, options)).toThrow(InvalidParameterError);
    expect(() => new LogarithmicSpace(0, 3, 'f', 4, -2, options)).toThrow(InvalidParameterError);
    expect(() => new LogarithmicSpace(0, 3, 'f', 4, Infinity, options)).toThrow(
      InvalidParameterError,
    );
  });
});

describe('GeometricSpace', () => {
  it('accepts endpoints of one sign', () => {
    expect(new GeometricSpace(1, 1000, 'g', 4, options).shape).toEqual({ g: 4 });
    expect(new GeometricSpace(-1, -8, 'g', 4, options).shape).toEqual({ g: 4 });
  });

  it('rejects zero and mixed signs', () => {
    expect(() => new GeometricSpace(0, 10, 'g', 3, options)).toThrow(InvalidParameterError);
    expect(() => new GeometricSpace(-1, 10, 'g', 3, options)).toThrow(
      "Invalid parameter 'stop': start and stop must be nonzero and share a sign",
    );
  });
});

describe('ArrayRange', () => {
  it('counts values in the half-open interval', () => {
    expect(new ArrayRange(0, 5, 't', options).num).toBe(5);
    expect(new ArrayRange(0, 5, 't', { ...options, step: 2 }).num).toBe(3);
    expect(new ArrayRange(5, 0, 't', { ...options, step: -1 }).num).toBe(5);
    expect(new ArrayRange(5, 0, 't', options).num).toBe(0);
    expect(new ArrayRange(0, 1, 't', { ...options, step: 0.25 }).shape).toEqual({ t: 4 });
  });

  it('picks int32 for integer parameters', () => {
    expect(new ArrayRange(0, 5, 't', options).dtype).toBe('int32');
    expect(new ArrayRange(0, 1, 't', { ...options, step: 0.5 }).dtype).toBe('float64');
    expect(new ArrayRange(0, 5, 't', { ...options, dtype: 'float32' }).dtype).toBe('float32');
  });

  it('rejects a zero step', () => {
    expect(() => new ArrayRange(0, 5, 't', { ...options, step: 0 })).toThrow(
      "Invalid parameter 'step': must be nonzero",
    );
  });

  it('describes its rule', () => {
    expect(new ArrayRange(0, 5, 't', options).toString()).toBe(
      "ArrayRange(start=0, stop=5, axis='t', step=1)",
    );
  });
});

describe('UniformRandomSample', () => {
  it('knows its shape without drawing', () => {
    const sample = new UniformRandomSample(0, 1, { trial: 3, run: 2 }, { ...options, seed: 7 });
    expect(sample.axes).toEqual(['trial', 'run']);
    expect(sample.shape).toEqual({ trial: 3, run: 2 });
    expect(sample.size).toBe(6);
    expect(sample.dtype).toBe('float64');
    expect(sample.seed).toBe(7);
  });

  it('describes its rule', () => {
    expect(new UniformRandomSample(0, 1, { t: 4 }, { ...options, seed: 7 }).toString()).toBe(
      'UniformRandomSample(start=0, stop=1, shape={t: 4}, seed=7)',
    );
  });

  it('validates eagerly', () => {
    expect(() => new UniformRandomSample(0, 1, { t: 2 }, { ...options, seed: -1 })).toThrow(
      "Invalid parameter 'seed': seed must be an integer in [0, 4294967295], got -1",
    );
    expect(() => new UniformRandomSample(0, 1, { t: 2.5 }, options)).toThrow(InvalidParameterError);
    expect(() => new UniformRandomSample(Number.NaN, 1, { t: 2 }, options)).toThrow(
      InvalidParameterError,
    );
  });

  it('belongs to the array family', () => {
    expect(isAnyArray(new UniformRandomSample(0, 1, { t: 2 }, options))).toBe(true);
  });
});

describe('NormalRandomSample', () => {
  it('reports its interval and rule', () => {
    const sample = new NormalRandomSample(10, 2, { t: 4 }, { ...options, seed: 5 });
    expect(sample.start).toBe(8);
    expect(sample.stop).toBe(12);
    expect(sample.toString()).toBe('NormalRandomSample(center=10, width=2, shape={t: 4}, seed=5)');
  });

  it('rejects a negative width', () => {
    expect(() => new NormalRandomSample(0, -0.5, { t: 2 }, options)).toThrow(
      "Invalid parameter 'width': must be non-negative, got -0.5",
    );
  });
});
