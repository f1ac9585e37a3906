/**
 * Benchmark result formatting utilities
 */

import type { Bench } from 'tinybench';

type Task = Bench['tasks'][number];

export interface FormattedResult {
  name: string;
  ops: number;
  /** Latencies in milliseconds */
  mean: number;
  p75: number;
  p99: number;
  stdDev: number;
  /** Relative margin of error, in percent */
  margin: number;
  samples: number;
  /** Coefficient of variation */
  cv: number;
}

/**
 * Format a single benchmark task result
 */
export function formatTaskResult(task: Task): FormattedResult | null {
  const result = task.result;
  if (!result) {
    return null;
  }

  return {
    name: task.name,
    ops: result.hz,
    mean: result.mean,
    p75: result.p75,
    p99: result.p99,
    stdDev: result.sd,
    margin: result.rme,
    samples: result.samples.length,
    cv: result.mean > 0 ? result.sd / result.mean : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task);
    if (formatted) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Pick a unit for a latency given in milliseconds
 */
export function formatLatency(ms: number): string {
  if (ms >= 1) {
    return `${ms.toFixed(3)}ms`;
  }
  if (ms >= 0.001) {
    return `${(ms * 1000).toFixed(1)}µs`;
  }
  return `${(ms * 1_000_000).toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = [
    'Name',
    'Ops/sec',
    'Mean (ms)',
    'P75 (ms)',
    'P99 (ms)',
    'Std Dev',
    'Margin',
    'Samples',
  ];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    r.mean.toFixed(3),
    r.p75.toFixed(3),
    r.p99.toFixed(3),
    r.stdDev.toFixed(3),
    `±${r.margin.toFixed(2)}%`,
    String(r.samples),
  ]);

  return [headers, separator, ...rows].map((row) => row.join(' | ')).join('\n');
}

/**
 * One block per scenario with its stability rating
 */
export function formatIndividualResults(results: readonly FormattedResult[]): string {
  const lines: string[] = ['## Individual Scenario Results', ''];

  for (const result of results) {
    const stability =
      result.cv < 0.05 ? '🟢 Stable' : result.cv < 0.1 ? '🟡 Moderate' : '🔴 High variance';

    lines.push(`### ${result.name}`);
    lines.push(`- **Ops/sec**: ${result.ops.toFixed(2)}`);
    lines.push(`- **Mean latency**: ${formatLatency(result.mean)}`);
    lines.push(`- **P99 latency**: ${formatLatency(result.p99)}`);
    lines.push(`- **Samples**: ${result.samples} (CV: ${(result.cv * 100).toFixed(1)}%) ${stability}`);
    lines.push('');
  }

  return lines.join('\n');
}
