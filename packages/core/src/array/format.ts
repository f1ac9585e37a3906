/**
 * Text rendering of array contents
 *
 * @example
 * formatNested([[5, 6], [6, 7]], [2, 2], DEFAULT_PRINT_OPTIONS);
 * // [[5, 6],
 * //  [6, 7]]
 */

import type { NestedArray, Scalar } from '../buffer/types';
import type { PrintOptions } from '../config';
import { computeSize } from '../utils';

function isNestedList(data: NestedArray): data is readonly NestedArray[] {
  return Array.isArray(data);
}

/**
 * Format a single value for display
 */
export function formatValue(value: Scalar, precision: number): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Number.isInteger(value) || !Number.isFinite(value)) {
    return value.toString();
  }
  return value.toFixed(precision).replace(/\.?0+$/, '');
}

/**
 * Format nested values of the given positional shape
 *
 * Dimensions longer than `2 * edgeItems` are summarized with `...` when the
 * whole array holds more than `threshold` elements.
 */
export function formatNested(
  data: NestedArray,
  shape: readonly number[],
  options: PrintOptions,
): string {
  const truncate = computeSize(shape) > options.threshold;
  return formatLevel(data, shape.length, 0, truncate, options);
}

function formatLevel(
  data: NestedArray,
  rank: number,
  depth: number,
  truncate: boolean,
  options: PrintOptions,
): string {
  if (!isNestedList(data)) {
    return formatValue(data, options.precision);
  }

  const { edgeItems } = options;
  const elided = truncate && data.length > 2 * edgeItems;
  const kept = elided ? [...data.slice(0, edgeItems), ...data.slice(-edgeItems)] : data;
  const parts = kept.map((item) => formatLevel(item, rank - 1, depth + 1, truncate, options));
  if (elided) {
    parts.splice(edgeItems, 0, '...');
  }

  if (rank - depth <= 1) {
    return `[${parts.join(', ')}]`;
  }

  const separator = rank - depth > 2 ? ',\n\n' : ',\n';
  return `[${parts.join(separator + ' '.repeat(depth + 1))}]`;
}

/**
 * Indent every non-empty line after the first
 */
export function indentContinuation(text: string, width: number): string {
  const pad = ' '.repeat(width);
  return text
    .split('\n')
    .map((line, i) => (i === 0 || line.length === 0 ? line : pad + line))
    .join('\n');
}
