/**
 * Implicit array benchmarks
 */

import { bench, describe } from 'vitest';
import { ArrayRange, GeometricSpace, LinearSpace } from '@named-arrays/core';
import { cpu } from '@named-arrays/backend-cpu';
import { VECTOR_SIZES } from '../utils/sizes';

describe('implicit materialization', () => {
  for (const size of VECTOR_SIZES) {
    const num = size.shape['x'] ?? 0;

    bench(`LinearSpace (${size.name})`, () => {
      new LinearSpace(0, 1, 'x', num, { backend: cpu }).materialize();
    });

    bench(`GeometricSpace (${size.name})`, () => {
      new GeometricSpace(1, 1000, 'x', num, { backend: cpu }).materialize();
    });

    bench(`ArrayRange (${size.name})`, () => {
      new ArrayRange(0, num, 'x', { backend: cpu }).materialize();
    });
  }
});

describe('implicit operands', () => {
  for (const size of VECTOR_SIZES) {
    const num = size.shape['x'] ?? 0;
    const space = new LinearSpace(0, 1, 'x', num, { backend: cpu });
    const range = new ArrayRange(0, num, 'x', { backend: cpu });

    bench(`space * range (${size.name})`, () => {
      space.mul(range);
    });
  }
});
