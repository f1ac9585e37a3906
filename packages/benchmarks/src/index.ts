/**
 * @named-arrays/benchmarks
 *
 * Benchmark helpers for named-array operations
 */

export * from './utils/config';
export * from './utils/data';
export * from './utils/formatting';
export * from './utils/sizes';
