import { describe, expect, it } from 'vitest';
import {
  BENCHMARK_PROFILES,
  analyzeResults,
  getBenchmarkConfig,
  getBenchmarkProfile,
  getBenchmarkRecommendations,
} from './config';

describe('benchmark profiles', () => {
  it('should pick known profiles by name', () => {
    expect(getBenchmarkProfile('quick')).toBe('quick');
    expect(getBenchmarkProfile('precise')).toBe('precise');
  });

  it('should fall back to the standard profile', () => {
    expect(getBenchmarkProfile('bogus')).toBe('standard');
    expect(getBenchmarkProfile('')).toBe('standard');
  });

  it('should return the options of a profile', () => {
    expect(getBenchmarkConfig('quick')).toEqual({ time: 250, iterations: 10, warmupTime: 50 });
    expect(getBenchmarkConfig('standard')).toBe(BENCHMARK_PROFILES.standard);
  });
});

describe('analyzeResults', () => {
  it('should summarize samples', () => {
    const analysis = analyzeResults([4, 1, 3, 2]);

    expect(analysis.mean).toBe(2.5);
    expect(analysis.median).toBe(2.5);
    expect(analysis.stdDev).toBeCloseTo(Math.sqrt(5 / 3), 10);
    expect(analysis.outliers).toBe(0);
    expect(analysis.isStable).toBe(false);
  });

  it('should treat constant samples as stable', () => {
    const analysis = analyzeResults([10, 10, 10, 10]);

    expect(analysis.stdDev).toBe(0);
    expect(analysis.cv).toBe(0);
    expect(analysis.isStable).toBe(true);
  });

  it('should count values outside the interquartile fences', () => {
    expect(analyzeResults([1, 1, 1, 1, 1, 1, 1, 100]).outliers).toBe(1);
  });

  it('should handle one and zero samples', () => {
    expect(analyzeResults([7])).toEqual({
      mean: 7,
      median: 7,
      stdDev: 0,
      cv: 0,
      outliers: 0,
      isStable: true,
    });
    expect(analyzeResults([]).isStable).toBe(false);
    expect(analyzeResults([]).mean).toBe(0);
  });
});

describe('getBenchmarkRecommendations', () => {
  it('should always start with the general advice', () => {
    expect(getBenchmarkRecommendations().slice(0, 3)).toEqual([
      '🔧 For best results, run benchmarks on a dedicated machine',
      '🔇 Close unnecessary applications to reduce system noise',
      '📊 Run multiple benchmark sessions and compare results',
    ]);
  });
});
