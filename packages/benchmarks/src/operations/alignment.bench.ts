/**
 * Alignment and reduction benchmarks
 */

import { bench, describe } from 'vitest';
import { cpu } from '@named-arrays/backend-cpu';
import { randomArray } from '../utils/data';
import { GRID_SIZES, VECTOR_SIZES } from '../utils/sizes';

describe('outer alignment', () => {
  for (const size of VECTOR_SIZES) {
    const extent = size.shape['x'] ?? 0;
    const x = randomArray({ x: extent }, cpu);
    const y = randomArray({ y: extent }, cpu);

    bench(`x + y (${size.name})`, () => {
      x.add(y);
    });
  }
});

describe('transposed alignment', () => {
  for (const size of GRID_SIZES) {
    const rows = size.shape['x'] ?? 0;
    const cols = size.shape['y'] ?? 0;
    const xy = randomArray({ x: rows, y: cols }, cpu);
    const yx = randomArray({ y: cols, x: rows }, cpu);
    const same = randomArray({ x: rows, y: cols }, cpu);

    bench(`matching order (${size.name})`, () => {
      xy.add(same);
    });

    bench(`reversed order (${size.name})`, () => {
      xy.add(yx);
    });
  }
});

describe('reductions', () => {
  for (const size of GRID_SIZES) {
    const rows = size.shape['x'] ?? 0;
    const cols = size.shape['y'] ?? 0;
    const xy = randomArray({ x: rows, y: cols }, cpu);

    bench(`sum x (${size.name})`, () => {
      xy.sum('x');
    });

    bench(`sum y (${size.name})`, () => {
      xy.sum('y');
    });

    bench(`var all (${size.name})`, () => {
      xy.var();
    });
  }
});
