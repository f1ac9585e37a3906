/**
 * Test generators for implicit arrays
 *
 * These generators test the values produced by the progression arrays and
 * the seeded random samples, their memoized materialization and their use as
 * operands of ordinary operations.
 */

import type { Backend } from '@named-arrays/core';
import {
  ArrayRange,
  GeometricSpace,
  LinearSpace,
  LogarithmicSpace,
  NormalRandomSample,
  UniformRandomSample,
  array,
  indices,
  isAnyArray,
  materialize,
} from '@named-arrays/core';
import { expectAllClose, thrownCode } from '../framework';
import type { TestFramework } from '../framework';

/**
 * Generates tests for implicit arrays
 *
 * @param backend - Backend instance to test against
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateImplicitArrayTests(backend: Backend, testFramework: TestFramework) {
  const { describe, it, expect } = testFramework;

  describe(`Implicit Arrays Tests (${backend.type}:${backend.id})`, () => {
    describe('LinearSpace', () => {
      it('should produce evenly spaced samples including the endpoint', () => {
        const space = new LinearSpace(0, 1, 'z', 4, { backend });

        expect(space.axes).toEqual(['z']);
        expect(space.shape).toEqual({ z: 4 });
        expectAllClose(expect, space.toArray(), [0, 1 / 3, 2 / 3, 1]);
        expect(space.index({ z: 3 }).item()).toBe(1);
      });

      it('should materialize once', () => {
        const space = new LinearSpace(0, 1, 'z', 4, { backend });
        const first = space.materialize();

        expect(space.materialize()).toBe(first);
        expect(materialize(space)).toBe(first);
        expect(first.kind).toBe('materialized');
        expect(first.axes).toEqual(['z']);
      });

      it('should leave out the endpoint on request', () => {
        const space = new LinearSpace(0, 1, 'z', 4, { backend, endpoint: false });

        expect(space.toArray()).toEqual([0, 0.25, 0.5, 0.75]);
      });

      it('should handle one and zero samples', () => {
        expect(new LinearSpace(2, 5, 'z', 1, { backend }).toArray()).toEqual([2]);
        expect(new LinearSpace(2, 5, 'z', 0, { backend }).size).toBe(0);
      });

      it('should broadcast array bounds and append the sampled axis', () => {
        const start = array<string>([0, 10], ['x'], { backend });
        const space = new LinearSpace(start, 20, 'z', 3, { backend });

        expect(space.shape).toEqual({ x: 2, z: 3 });
        expect(space.toArray()).toEqual([
          [0, 10, 20],
          [10, 15, 20],
        ]);
      });

      it('should reject a sampled axis already carried by a bound', () => {
        const start = array<string>([0, 1], ['z'], { backend });

        expect(thrownCode(() => new LinearSpace(start, 1, 'z', 3, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
      });

      it('should reject bad sample counts and bounds', () => {
        expect(() => new LinearSpace(0, 1, 'z', -1, { backend })).toThrow(
          'num must be a non-negative integer, got -1',
        );
        expect(thrownCode(() => new LinearSpace(0, 1, 'z', 1.5, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
        expect(thrownCode(() => new LinearSpace(Number.NaN, 1, 'z', 3, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
        expect(thrownCode(() => new LinearSpace(0, 1, '', 3, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
      });
    });

    describe('LogarithmicSpace', () => {
      it('should raise the base to evenly spaced exponents', () => {
        const space = new LogarithmicSpace(0, 2, 'f', 3, 10, { backend });

        expect(space.toArray()).toEqual([1, 10, 100]);
        expect(space.start).toBe(1);
        expect(space.stop).toBe(100);
      });

      it('should use any positive base', () => {
        expect(new LogarithmicSpace(0, 3, 'f', 4, 2, { backend }).toArray()).toEqual([1, 2, 4, 8]);
      });

      it('should reject a base that is not positive', () => {
        expect(thrownCode(() => new LogarithmicSpace(0, 2, 'f', 3, 0, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
        expect(() => new LogarithmicSpace(0, 2, 'f', 3, -2, { backend })).toThrow(
          'must be positive, got -2',
        );
      });
    });

    describe('GeometricSpace', () => {
      it('should keep a constant ratio between neighbours', () => {
        const space = new GeometricSpace(1, 1000, 'g', 4, { backend });

        expectAllClose(expect, space.toArray(), [1, 10, 100, 1000]);
        expect(space.index({ g: 0 }).item()).toBe(1);
        expect(space.index({ g: 3 }).item()).toBe(1000);
      });

      it('should negate the progression of negative endpoints', () => {
        const space = new GeometricSpace(-1, -100, 'g', 3, { backend });

        expectAllClose(expect, space.toArray(), [-1, -10, -100]);
        expect(space.index({ g: 2 }).item()).toBe(-100);
      });

      it('should accept array endpoints of one sign', () => {
        const start = array<string>([1, 2], ['x'], { backend });
        const space = new GeometricSpace(start, 8, 'g', 2, { backend });

        expect(space.shape).toEqual({ x: 2, g: 2 });
        expectAllClose(expect, space.toArray(), [
          [1, 8],
          [2, 8],
        ]);
      });

      it('should reject zero endpoints and endpoints of opposite sign', () => {
        expect(() => new GeometricSpace(-1, 10, 'g', 3, { backend })).toThrow(
          'start and stop must be nonzero and share a sign',
        );
        expect(thrownCode(() => new GeometricSpace(0, 10, 'g', 3, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
        const mixed = array<string>([1, -2], ['x'], { backend });
        expect(thrownCode(() => new GeometricSpace(mixed, 8, 'g', 2, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
      });
    });

    describe('ArrayRange', () => {
      it('should count up to but excluding stop', () => {
        const range = new ArrayRange(0, 5, 't', { backend });

        expect(range.dtype).toBe('int32');
        expect(range.toArray()).toEqual([0, 1, 2, 3, 4]);
        expect(range.materialize().dtype).toBe('int32');
      });

      it('should follow the step in either direction', () => {
        expect(new ArrayRange(0, 5, 't', { backend, step: 2 }).toArray()).toEqual([0, 2, 4]);
        expect(new ArrayRange(5, 0, 't', { backend, step: -2 }).toArray()).toEqual([5, 3, 1]);
      });

      it('should use float64 for fractional steps', () => {
        const range = new ArrayRange(0, 1, 't', { backend, step: 0.25 });

        expect(range.dtype).toBe('float64');
        expect(range.toArray()).toEqual([0, 0.25, 0.5, 0.75]);
      });

      it('should be empty when stop is not beyond start', () => {
        expect(new ArrayRange(3, 3, 't', { backend }).size).toBe(0);
        expect(new ArrayRange(3, 1, 't', { backend }).size).toBe(0);
      });

      it('should reject a zero step', () => {
        expect(() => new ArrayRange(0, 5, 't', { backend, step: 0 })).toThrow('must be nonzero');
      });
    });

    describe('indices', () => {
      it('should give one range per axis in shape order', () => {
        const ranges = indices({ x: 2, y: 3 }, { backend });

        expect(ranges.map((range) => range.axes)).toEqual([['x'], ['y']]);
        expect(ranges.map((range) => range.toArray())).toEqual([
          [0, 1],
          [0, 1, 2],
        ]);
        expect(ranges[0]?.mul(10).add(ranges[1] ?? 0).toArray()).toEqual([
          [0, 1, 2],
          [10, 11, 12],
        ]);
      });

      it('should reject a negative extent', () => {
        expect(thrownCode(() => indices({ x: -1 }, { backend }))).toBe('INVALID_PARAMETER');
      });
    });

    describe('UniformRandomSample', () => {
      it('should draw within the bounds over the requested shape', () => {
        const sample = new UniformRandomSample(2, 5, { trial: 10000 }, { backend, seed: 1 });

        expect(sample.axes).toEqual(['trial']);
        expect(sample.shape).toEqual({ trial: 10000 });
        expect(sample.materialize().dtype).toBe('float64');
        expect(sample.values().every((v) => v >= 2 && v < 5)).toBe(true);
        expect(sample.mean().item()).toBeCloseTo(3.5, 1);
      });

      it('should repeat its values for the same seed', () => {
        const first = new UniformRandomSample(0, 1, { t: 5 }, { backend, seed: 42 });
        const again = new UniformRandomSample(0, 1, { t: 5 }, { backend, seed: 42 });
        const other = new UniformRandomSample(0, 1, { t: 5 }, { backend, seed: 43 });

        expect(first.equals(again)).toBe(true);
        expect(first.equals(other)).toBe(false);
        expect(first.materialize()).toBe(first.materialize());
      });

      it('should draw a seed when none is given', () => {
        const sample = new UniformRandomSample(0, 1, { t: 2 }, { backend });

        expect(Number.isInteger(sample.seed)).toBe(true);
      });

      it('should broadcast over array bounds', () => {
        const low = array([0, 10], ['x'], { backend });
        const sample = new UniformRandomSample<'x' | 't'>(low, low.add(1), { t: 3 }, { backend, seed: 3 });

        expect(sample.axes).toEqual(['x', 't']);
        expect(sample.shape).toEqual({ x: 2, t: 3 });
        expect(
          sample
            .sub(low)
            .values()
            .every((v) => v >= 0 && v < 1),
        ).toBe(true);
        expect(
          sample
            .index({ x: 1 })
            .values()
            .every((v) => v >= 10 && v < 11),
        ).toBe(true);
      });

      it('should reject extents that disagree with the bounds', () => {
        const low = array([0, 10], ['x'], { backend });

        expect(thrownCode(() => new UniformRandomSample(low, 20, { x: 3 }, { backend }))).toBe(
          'AXIS_MISMATCH',
        );
        expect(thrownCode(() => new UniformRandomSample(0, 1, { t: -1 }, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
      });
    });

    describe('NormalRandomSample', () => {
      it('should draw around the center with the given spread', () => {
        const sample = new NormalRandomSample(10, 2, { trial: 40000 }, { backend, seed: 5 });

        expect(sample.mean().item()).toBeCloseTo(10, 1);
        expect(sample.std().item()).toBeCloseTo(2, 1);
      });

      it('should report the interval one spread either side of the center', () => {
        const sample = new NormalRandomSample(10, 2, { t: 4 }, { backend, seed: 5 });
        expect(sample.start).toBe(8);
        expect(sample.stop).toBe(12);

        const centers = array([0, 10], ['x'], { backend });
        const start = new NormalRandomSample<'x' | 't'>(centers, 1, { t: 4 }, { backend, seed: 5 }).start;
        expect(typeof start === 'number' ? start : start.toArray()).toEqual([-1, 9]);
      });

      it('should return the center for a zero width', () => {
        expect(new NormalRandomSample(3, 0, { t: 4 }, { backend, seed: 8 }).toArray()).toEqual([
          3, 3, 3, 3,
        ]);
      });

      it('should reject a negative width', () => {
        expect(thrownCode(() => new NormalRandomSample(0, -1, { t: 2 }, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
        const widths = array([1, -1], ['x'], { backend });
        expect(thrownCode(() => new NormalRandomSample<'x' | 't'>(0, widths, { t: 2 }, { backend }))).toBe(
          'INVALID_PARAMETER',
        );
      });
    });

    describe('as operands', () => {
      it('should align with materialized arrays by name', () => {
        const a = array([1, 2, 3], ['x'], { backend });
        const space = new LinearSpace(0, 1, 'x', 3, { backend });

        expect(a.add(space).toArray()).toEqual([1, 2.5, 4]);
        expect(space.mul(2).toArray()).toEqual([0, 1, 2]);
      });

      it('should combine with each other', () => {
        const rows = new ArrayRange(0, 2, 'r', { backend });
        const cols = new ArrayRange(0, 3, 'c', { backend });
        const grid = rows.mul(10).add(cols);

        expect(grid.axes).toEqual(['r', 'c']);
        expect(grid.toArray()).toEqual([
          [0, 1, 2],
          [10, 11, 12],
        ]);
      });

      it('should reduce like materialized arrays', () => {
        expect(new LinearSpace(0, 1, 'z', 5, { backend }).sum().item()).toBe(2.5);
        expect(new ArrayRange(1, 4, 't', { backend }).prod().item()).toBe(6);
      });

      it('should compare equal to the materialized values', () => {
        const range = new ArrayRange(0, 3, 't', { backend });
        const values = array([0, 1, 2], ['t'], { backend });

        expect(range.equals(values)).toBe(true);
        expect(values.equals(range)).toBe(true);
        expect(isAnyArray(range)).toBe(true);
        expect(isAnyArray(values)).toBe(true);
        expect(isAnyArray([0, 1, 2])).toBe(false);
      });
    });
  });
}
