import { Bench } from 'tinybench';
import { describe, expect, it } from 'vitest';
import {
  formatBenchResults,
  formatIndividualResults,
  formatLatency,
  formatTaskResult,
  resultsToMarkdownTable,
} from './formatting';
import type { FormattedResult } from './formatting';
import { formatNamedShape } from './sizes';

const result: FormattedResult = {
  name: 'outer add',
  ops: 1234.5678,
  mean: 0.81,
  p75: 0.8,
  p99: 1.25,
  stdDev: 0.05,
  margin: 1.234,
  samples: 100,
  cv: 0.05 / 0.81,
};

describe('formatLatency', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatLatency(2.5)).toBe('2.500ms');
    expect(formatLatency(0.0125)).toBe('12.5µs');
    expect(formatLatency(0.00025)).toBe('250ns');
  });
});

describe('resultsToMarkdownTable', () => {
  it('should render one row per result', () => {
    const lines = resultsToMarkdownTable([result]).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(
      'Name | Ops/sec | Mean (ms) | P75 (ms) | P99 (ms) | Std Dev | Margin | Samples',
    );
    expect(lines[1]).toBe('---- | ------- | --------- | -------- | -------- | ------- | ------ | -------');
    expect(lines[2]).toBe('outer add | 1234.57 | 0.810 | 0.800 | 1.250 | 0.050 | ±1.23% | 100');
  });
});

describe('formatIndividualResults', () => {
  it('should rate stability from the coefficient of variation', () => {
    expect(formatIndividualResults([result]).split('\n')).toEqual([
      '## Individual Scenario Results',
      '',
      '### outer add',
      '- **Ops/sec**: 1234.57',
      '- **Mean latency**: 0.810ms',
      '- **P99 latency**: 1.250ms',
      '- **Samples**: 100 (CV: 6.2%) 🟡 Moderate',
      '',
    ]);
  });

  it('should mark low variance as stable', () => {
    const lines = formatIndividualResults([{ ...result, cv: 0.01 }]).split('\n');

    expect(lines[6]).toBe('- **Samples**: 100 (CV: 1.0%) 🟢 Stable');
  });
});

describe('task results', () => {
  it('should skip tasks that have not run', () => {
    const bench = new Bench().add('noop', () => {});
    const task = bench.tasks[0];

    expect(task).toBeDefined();
    expect(task ? formatTaskResult(task) : undefined).toBeNull();
    expect(formatBenchResults(bench)).toEqual([]);
  });
});

describe('formatNamedShape', () => {
  it('should list axes in order', () => {
    expect(formatNamedShape({ x: 32, y: 16 })).toBe('x=32×y=16');
  });
});
