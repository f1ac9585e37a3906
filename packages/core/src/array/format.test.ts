import { describe, it, expect } from 'vitest';
import { DEFAULT_PRINT_OPTIONS, resolvePrintOptions } from '../config';
import { formatNested, formatValue, indentContinuation } from './format';

describe('formatValue', () => {
  it('prints integers as is', () => {
    expect(formatValue(5, 4)).toBe('5');
    expect(formatValue(-12, 4)).toBe('-12');
  });

  it('trims trailing zeros of floats', () => {
    expect(formatValue(0.5, 4)).toBe('0.5');
    expect(formatValue(1 / 3, 4)).toBe('0.3333');
    expect(formatValue(2 / 3, 2)).toBe('0.67');
  });

  it('prints booleans and non-finite values', () => {
    expect(formatValue(true, 4)).toBe('true');
    expect(formatValue(Number.NaN, 4)).toBe('NaN');
    expect(formatValue(-Infinity, 4)).toBe('-Infinity');
  });
});

describe('formatNested', () => {
  it('prints vectors on one line', () => {
    expect(formatNested([5, 6], [2], DEFAULT_PRINT_OPTIONS)).toBe('[5, 6]');
  });

  it('prints one row per line for matrices', () => {
    expect(
      formatNested(
        [
          [5, 6],
          [6, 7],
          [7, 8],
        ],
        [3, 2],
        DEFAULT_PRINT_OPTIONS,
      ),
    ).toBe('[[5, 6],\n [6, 7],\n [7, 8]]');
  });

  it('separates blocks of rank 3 with a blank line', () => {
    expect(
      formatNested(
        [
          [[1], [2]],
          [[3], [4]],
        ],
        [2, 2, 1],
        DEFAULT_PRINT_OPTIONS,
      ),
    ).toBe('[[[1],\n  [2]],\n\n [[3],\n  [4]]]');
  });

  it('prints empty and scalar data', () => {
    expect(formatNested([], [0], DEFAULT_PRINT_OPTIONS)).toBe('[]');
    expect(formatNested(2.5, [], DEFAULT_PRINT_OPTIONS)).toBe('2.5');
  });

  it('summarizes large arrays', () => {
    const options = resolvePrintOptions({ threshold: 5, edgeItems: 2 });
    expect(formatNested([1, 2, 3, 4, 5, 6], [6], options)).toBe('[1, 2, ..., 5, 6]');
  });

  it('does not summarize below the threshold', () => {
    expect(formatNested([1, 2, 3, 4, 5, 6], [6], DEFAULT_PRINT_OPTIONS)).toBe(
      '[1, 2, 3, 4, 5, 6]',
    );
  });
});

describe('indentContinuation', () => {
  it('indents every line but the first and blank ones', () => {
    expect(indentContinuation('a\nb\n\nc', 2)).toBe('a\n  b\n\n  c');
  });
});
