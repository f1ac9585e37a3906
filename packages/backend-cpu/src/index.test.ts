/**
 * Integration tests for CPU backend using shared test generators
 *
 * This test suite uses the standardized test generators from @named-arrays/test-utils
 * to validate the CPU backend against the core named-array operations.
 */

import { describe, it, expect } from 'vitest';
import { array } from '@named-arrays/core';
import {
  generateArrayCreationTests,
  generateAxisOperationTests,
  generateBinaryOperationTests,
  generateDisplayTests,
  generateImplicitArrayTests,
  generateIndexingOperationTests,
  generateReductionOperationTests,
  generateUnaryOperationTests,
  generateWorkflowTests,
  thrownCode,
} from '@named-arrays/test-utils';
import type { TestFramework } from '@named-arrays/test-utils';
import { CPUBackend, cpu } from './index';

// Test framework adapter for vitest
const testFramework: TestFramework = {
  describe,
  it,
  expect: (actual: unknown) => ({
    toBe: (expected: unknown) => expect(actual).toBe(expected),
    toEqual: (expected: unknown) => expect(actual).toEqual(expected),
    toBeCloseTo: (expected: number, precision?: number) =>
      expect(actual).toBeCloseTo(expected, precision),
    toThrow: (error?: string | RegExp) => expect(actual).toThrow(error),
    toBeTruthy: () => expect(actual).toBeTruthy(),
    toBeFalsy: () => expect(actual).toBeFalsy(),
    toHaveLength: (length: number) => expect(actual).toHaveLength(length),
    toContain: (item: unknown) => expect(actual).toContain(item),
    not: {
      toBe: (expected: unknown) => expect(actual).not.toBe(expected),
      toThrow: () => expect(actual).not.toThrow(),
    },
  }),
};

describe('CPU Backend Integration Tests', () => {
  describe('Backend Information', () => {
    it('should provide correct backend metadata', () => {
      expect(cpu.type).toBe('cpu');
      expect(cpu.id).toBe('cpu:0');
      expect(new CPUBackend('cpu:1').id).toBe('cpu:1');
    });

    it('should refuse to mix arrays from two backends', () => {
      const other = new CPUBackend('cpu:1');
      const a = array([1, 2], ['x'], { backend: cpu });
      const b = array([3, 4], ['x'], { backend: other });

      expect(thrownCode(() => a.add(b))).toBe('BACKEND_MISMATCH');
      expect(() => a.add(b)).toThrow("operands live on different backends ('cpu:0' and 'cpu:1')");
      expect(a.equals(b)).toBe(false);
    });
  });

  // Run all standard test suites against the CPU backend
  generateArrayCreationTests(cpu, testFramework);
  generateBinaryOperationTests(cpu, testFramework);
  generateUnaryOperationTests(cpu, testFramework);
  generateReductionOperationTests(cpu, testFramework);
  generateIndexingOperationTests(cpu, testFramework);
  generateAxisOperationTests(cpu, testFramework);
  generateImplicitArrayTests(cpu, testFramework);
  generateDisplayTests(cpu, testFramework);
  generateWorkflowTests(cpu, testFramework);
});
