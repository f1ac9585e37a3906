/**
 * Benchmark configuration utilities for statistical reliability
 */

import type { Bench } from 'tinybench';

export type BenchOptions = NonNullable<ConstructorParameters<typeof Bench>[0]>;

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

const PROFILE_NAMES: readonly BenchmarkProfile[] = ['quick', 'standard', 'precise'];

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES: Readonly<Record<BenchmarkProfile, BenchOptions>> = {
  /**
   * Quick profile for development
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * High-precision profile for CI
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 250,
  },
};

function isBenchmarkProfile(value: string): value is BenchmarkProfile {
  return PROFILE_NAMES.some((name) => name === value);
}

/**
 * Profile named by `BENCHMARK_PROFILE`, `standard` when unset or unknown
 */
export function getBenchmarkProfile(
  value: string | undefined = process.env['BENCHMARK_PROFILE'],
): BenchmarkProfile {
  return value !== undefined && isBenchmarkProfile(value) ? value : 'standard';
}

export function getBenchmarkConfig(profile: BenchmarkProfile = getBenchmarkProfile()): BenchOptions {
  return BENCHMARK_PROFILES[profile];
}

export interface SampleAnalysis {
  mean: number;
  median: number;
  stdDev: number;
  /** Coefficient of variation */
  cv: number;
  outliers: number;
  isStable: boolean;
}

/**
 * Statistical summary of raw sample timings
 */
export function analyzeResults(samples: readonly number[]): SampleAnalysis {
  const n = samples.length;
  if (n === 0) {
    return { mean: 0, median: 0, stdDev: 0, cv: 0, outliers: 0, isStable: false };
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const at = (i: number): number => sorted[i] ?? 0;

  const mean = samples.reduce((sum, val) => sum + val, 0) / n;
  const median = n % 2 === 0 ? (at(n / 2 - 1) + at(n / 2)) / 2 : at(Math.floor(n / 2));

  // Sample standard deviation
  const variance = n > 1 ? samples.reduce((sum, val) => sum + (val - mean) ** 2, 0) / (n - 1) : 0;
  const stdDev = Math.sqrt(variance);
  const cv = mean > 0 ? stdDev / mean : 0;

  // Outlier detection using IQR method
  const q1 = at(Math.floor(n * 0.25));
  const q3 = at(Math.floor(n * 0.75));
  const iqr = q3 - q1;
  const outliers = samples.filter((val) => val < q1 - 1.5 * iqr || val > q3 + 1.5 * iqr).length;

  // Stable: CV under 5% and fewer than 5% outliers
  const isStable = cv < 0.05 && outliers / n < 0.05;

  return { mean, median, stdDev, cv, outliers, isStable };
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔇 Close unnecessary applications to reduce system noise',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (getBenchmarkProfile() !== 'quick') {
    recommendations.push('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  }

  if (process.env['CI']) {
    recommendations.push('🏗️  CI environments may have higher variance - consider dedicated runners');
  }

  return recommendations;
}
