/**
 * Test framework adapter and shared assertion helpers
 *
 * Generators are written against this minimal interface so any runner can
 * drive them; each backend package passes an adapter over its own runner.
 */

import { NamedArrayError } from '@named-arrays/core';
import type { NestedArray } from '@named-arrays/core';

export interface Expectation {
  toBe: (expected: unknown) => void;
  toEqual: (expected: unknown) => void;
  toBeCloseTo: (expected: number, precision?: number) => void;
  toThrow: (error?: string | RegExp) => void;
  toBeTruthy: () => void;
  toBeFalsy: () => void;
  toHaveLength: (length: number) => void;
  toContain: (item: unknown) => void;
  not: {
    toBe: (expected: unknown) => void;
    toThrow: () => void;
  };
}

export interface TestFramework {
  describe: (name: string, fn: () => void) => void;
  it: (name: string, fn: () => void | Promise<void>) => void;
  expect: (actual: unknown) => Expectation;
}

/**
 * Code of the NamedArrayError thrown by `fn`, or undefined when it returns
 *
 * Errors of any other type are rethrown.
 */
export function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof NamedArrayError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

/**
 * Error thrown by `fn`, or undefined when it returns
 */
export function thrownError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

/**
 * Leaves of nested data as numbers, row-major
 */
export function flatNumbers(data: NestedArray): number[] {
  if (!isNestedList(data)) {
    return [Number(data)];
  }
  return data.flatMap((item) => flatNumbers(item));
}

function isNestedList(data: NestedArray): data is readonly NestedArray[] {
  return Array.isArray(data);
}

/**
 * Assert two nested arrays have the same layout and elementwise close values
 */
export function expectAllClose(
  expect: TestFramework['expect'],
  actual: NestedArray,
  expected: NestedArray,
  precision = 6,
): void {
  const a = flatNumbers(actual);
  const b = flatNumbers(expected);
  expect(a).toHaveLength(b.length);
  b.forEach((value, i) => {
    expect(a[i]).toBeCloseTo(value, precision);
  });
}
