/**
 * Tests for CPUBuffer
 */

import { describe, it, expect } from 'vitest';
import { CPUBackend } from './backend';
import { CPUBuffer } from './data';
import { cpu } from './index';

describe('CPUBuffer', () => {
  it('should check the element count against the shape', () => {
    expect(() => new CPUBuffer(cpu, new Float64Array(5), [2, 3], 'float64')).toThrow(
      'Buffer size mismatch: shape [2, 3] needs 6 elements, got 5',
    );
  });

  it('should keep the elements when reshaping', () => {
    const buffer = cpu.fromFlat([1, 2, 3, 4, 5, 6], [2, 3]);
    const reshaped = buffer.reshape([3, 2]);

    expect(reshaped.values()).toEqual([1, 2, 3, 4, 5, 6]);
    expect(reshaped.shape).toEqual([3, 2]);
    expect(() => buffer.reshape([4])).toThrow('Cannot reshape [2, 3] (6 elements) to [4]');
  });

  it('should not let reads write into shared elements', () => {
    const source = new Float64Array([1, 2, 3, 4]);
    const buffer = cpu.fromFlat(source, [2, 2]);
    const reshaped = buffer.reshape([4]);

    source[0] = 99;
    reshaped.values()[1] = 99;

    expect(buffer.values()).toEqual([1, 2, 3, 4]);
    expect(reshaped.values()).toEqual([1, 2, 3, 4]);
  });

  it('should read single elements by position', () => {
    const buffer = cpu.fromFlat([1, 2, 3, 4, 5, 6], [2, 3]);

    expect(buffer.get([1, 2])).toBe(6);
    expect(() => buffer.get([2, 0])).toThrow('[2, 0] is not a position in shape [2, 3]');
    expect(() => buffer.get([0])).toThrow();
  });

  it('should combine with rank-0 buffers', () => {
    const buffer = cpu.fromFlat([1, 2, 3], [3]);
    const result = buffer.binary('mul', cpu.full([], 2));

    expect(result.shape).toEqual([3]);
    expect(result.values()).toEqual([2, 4, 6]);
  });

  it('should reject buffers of another backend', () => {
    const other = new CPUBackend('cpu:1');
    const buffer = cpu.fromFlat([1, 2], [2]);

    expect(() => buffer.binary('add', other.fromFlat([1, 2], [2]))).toThrow(
      "operand lives on backend 'cpu:1', expected 'cpu:0'",
    );
  });

  it('should convert dtypes', () => {
    const buffer = cpu.fromFlat([0, 1.5, -2], [3]);

    expect(buffer.astype('bool').toArray()).toEqual([false, true, true]);
    expect(buffer.astype('int32').values()).toEqual([0, 1, -2]);
    expect(buffer.astype('float64')).toBe(buffer);
  });

  it('should compare shape and values', () => {
    const buffer = cpu.fromFlat([1, 2, 3, 4], [2, 2]);

    expect(buffer.equals(cpu.fromFlat([1, 2, 3, 4], [2, 2]))).toBe(true);
    expect(buffer.equals(cpu.fromFlat([1, 2, 3, 4], [4]))).toBe(false);
    expect(buffer.equals(cpu.fromFlat([1, 2, 3, 5], [2, 2]))).toBe(false);
  });
});

describe('CPUBackend', () => {
  it('should infer dtypes from nested data', () => {
    expect(cpu.fromNested([true, false]).dtype).toBe('bool');
    expect(cpu.fromNested([1, 2]).dtype).toBe('float64');
    expect(cpu.fromNested([true, 2]).dtype).toBe('float64');
    expect(cpu.fromNested([]).dtype).toBe('float64');
  });

  it('should fill shapes', () => {
    const buffer = cpu.full([2, 2], true);

    expect(buffer.dtype).toBe('bool');
    expect(buffer.toArray()).toEqual([
      [true, true],
      [true, true],
    ]);
  });
});
