#!/usr/bin/env tsx
/**
 * Named-array operation benchmarks using tinybench
 *
 * Usage: BENCHMARK_PROFILE=quick tsx src/runners/named-array-ops.ts
 */

import { Bench } from 'tinybench';
import { ArrayRange, LinearSpace, slice } from '@named-arrays/core';
import { cpu } from '@named-arrays/backend-cpu';
import {
  analyzeResults,
  getBenchmarkConfig,
  getBenchmarkProfile,
  getBenchmarkRecommendations,
} from '../utils/config';
import { randomArray, randomMask } from '../utils/data';
import {
  formatBenchResults,
  formatIndividualResults,
  resultsToMarkdownTable,
} from '../utils/formatting';
import { GRID_SIZES, VECTOR_SIZES, formatSize } from '../utils/sizes';

const profile = getBenchmarkProfile();
const bench = new Bench(getBenchmarkConfig(profile));

console.log(`🚀 Running named-array benchmarks (profile: ${profile})`);
for (const recommendation of getBenchmarkRecommendations()) {
  console.log(recommendation);
}

for (const size of VECTOR_SIZES) {
  const extent = size.shape['x'] ?? 0;
  const x = randomArray({ x: extent }, cpu);
  const y = randomArray({ y: extent }, cpu);
  const mask = randomMask(extent);

  bench
    .add(`outer add ${formatSize(size)}`, () => {
      x.add(y);
    })
    .add(`masked index ${formatSize(size)}`, () => {
      x.index({ x: mask });
    })
    .add(`strided slice ${formatSize(size)}`, () => {
      x.index({ x: slice(undefined, undefined, 2) });
    });
}

for (const size of GRID_SIZES) {
  const rows = size.shape['x'] ?? 0;
  const cols = size.shape['y'] ?? 0;
  const xy = randomArray({ x: rows, y: cols }, cpu);
  const yx = randomArray({ y: cols, x: rows }, cpu);

  bench
    .add(`transposed add ${formatSize(size)}`, () => {
      xy.add(yx);
    })
    .add(`sum over x ${formatSize(size)}`, () => {
      xy.sum('x');
    })
    .add(`mean over all ${formatSize(size)}`, () => {
      xy.mean();
    });
}

for (const size of VECTOR_SIZES) {
  const num = size.shape['x'] ?? 0;

  bench
    .add(`linear space ${formatSize(size)}`, () => {
      new LinearSpace(0, 1, 'x', num, { backend: cpu }).materialize();
    })
    .add(`array range ${formatSize(size)}`, () => {
      new ArrayRange(0, num, 'x', { backend: cpu }).materialize();
    });
}

await bench.warmup();
await bench.run();

console.table(bench.table());

const results = formatBenchResults(bench);
console.log('\n📊 Markdown summary:\n');
console.log(resultsToMarkdownTable(results));
console.log(`\n${formatIndividualResults(results)}`);

const unstable = bench.tasks.filter((task) => {
  const samples = task.result?.samples ?? [];
  return samples.length > 0 && !analyzeResults(samples).isStable;
});
if (unstable.length > 0) {
  console.log(`⚠️  ${unstable.length} of ${bench.tasks.length} scenarios had unstable timings:`);
  for (const task of unstable) {
    const { cv, outliers } = analyzeResults(task.result?.samples ?? []);
    console.log(`   ${task.name}: CV ${(cv * 100).toFixed(1)}%, ${outliers} outliers`);
  }
}
