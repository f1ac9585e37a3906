/**
 * Name-keyed indexing
 *
 * Translates an index expression (axis name -> selector) into positional
 * selectors for the underlying buffer and the AxisSet of the result. The
 * whole expression is validated before any positional work happens.
 */

import type { PositionalSelector } from '../buffer/types';
import { AxisSet } from '../axes/axis-set';
import type { AxisEntry } from '../axes/axis-set';
import { AxisNotFoundError, InvalidParameterError, ShapeMismatchError } from '../errors';
import type { NamedArray } from './named-array';

/**
 * Start, stop and step of a slice; omitted bounds default to the full axis
 */
export interface SliceSpec {
  readonly kind: 'slice';
  readonly start?: number | undefined;
  readonly stop?: number | undefined;
  readonly step?: number | undefined;
}

/**
 * Selector for one axis
 *
 * - integer offset: picks one position and drops the axis
 * - slice: keeps the axis with the sliced extent
 * - boolean mask (plain array, or a one-axis `bool` NamedArray on the same axis):
 *   keeps the axis with extent equal to the number of `true` entries
 */
export type Selector = number | SliceSpec | readonly boolean[] | NamedArray<string>;

export type IndexExpression = { readonly [axis: string]: Selector };

/**
 * Keys of an index expression whose selector is an integer offset
 */
export type OffsetKeys<E extends IndexExpression> = {
  [K in keyof E]: E[K] extends number ? K : never;
}[keyof E] &
  string;

export interface ResolvedIndex {
  readonly selectors: readonly PositionalSelector[];
  readonly axes: AxisSet;
}

/**
 * Build a slice selector
 *
 * @example
 * a.index({ x: slice(0, 2) });      // first two positions along x
 * a.index({ x: slice(undefined, undefined, -1) }); // x reversed
 */
export function slice(start?: number, stop?: number, step?: number): SliceSpec {
  return { kind: 'slice', start, stop, step };
}

/**
 * Concrete bounds of a slice along an axis of the given extent
 */
export function normalizeSlice(
  spec: SliceSpec,
  extent: number,
): { start: number; stop: number; step: number; length: number } {
  const step = spec.step ?? 1;
  if (!Number.isInteger(step) || step === 0) {
    throw new InvalidParameterError('step', `slice step must be a nonzero integer, got ${step}`);
  }
  for (const [name, bound] of [
    ['start', spec.start],
    ['stop', spec.stop],
  ] as const) {
    if (bound !== undefined && !Number.isInteger(bound)) {
      throw new InvalidParameterError(name, `slice bounds must be integers, got ${bound}`);
    }
  }

  if (step > 0) {
    const start = clampBound(spec.start ?? 0, extent, 0, extent);
    const stop = clampBound(spec.stop ?? extent, extent, 0, extent);
    return { start, stop, step, length: Math.max(0, Math.ceil((stop - start) / step)) };
  }

  const start = spec.start === undefined ? extent - 1 : clampBound(spec.start, extent, -1, extent - 1);
  const stop = spec.stop === undefined ? -1 : clampBound(spec.stop, extent, -1, extent - 1);
  return { start, stop, step, length: Math.max(0, Math.ceil((start - stop) / -step)) };
}

function clampBound(bound: number, extent: number, lower: number, upper: number): number {
  const normalized = bound < 0 ? bound + extent : bound;
  return Math.min(Math.max(normalized, lower), upper);
}

function isSliceSpec(selector: Selector): selector is SliceSpec {
  return typeof selector === 'object' && 'kind' in selector && selector.kind === 'slice';
}

function isBooleanList(selector: Selector): selector is readonly boolean[] {
  return Array.isArray(selector);
}

function maskValues(axis: string, extent: number, selector: readonly boolean[] | NamedArray<string>): boolean[] {
  let mask: boolean[];
  if (isBooleanList(selector)) {
    if (!selector.every((value) => typeof value === 'boolean')) {
      throw new ShapeMismatchError(`Mask for axis '${axis}' must contain only booleans`);
    }
    mask = [...selector];
  } else {
    if (selector.axisSet.rank !== 1 || selector.axisSet.names[0] !== axis) {
      throw new ShapeMismatchError(
        `Mask for axis '${axis}' must be one-dimensional along '${axis}', got axes ${selector.axisSet.toString()}`,
      );
    }
    if (selector.dtype !== 'bool') {
      throw new ShapeMismatchError(`Mask for axis '${axis}' must have dtype bool, got ${selector.dtype}`);
    }
    mask = selector.buffer.values().map((value) => value !== 0);
  }

  if (mask.length !== extent) {
    throw new ShapeMismatchError(
      `Mask for axis '${axis}' has length ${mask.length} but the axis has extent ${extent}`,
      { axis, expected: extent, actual: mask.length },
    );
  }
  return mask;
}

/**
 * Validate an index expression and translate it to positional selectors
 *
 * @throws {AxisNotFoundError} If a key names an axis the array does not have
 * @throws {ShapeMismatchError} If a mask does not match its axis
 * @throws {InvalidParameterError} If an offset is out of range or not an integer
 */
export function resolveIndex(axisSet: AxisSet, expr: IndexExpression): ResolvedIndex {
  for (const axis of Object.keys(expr)) {
    if (!axisSet.has(axis)) {
      throw new AxisNotFoundError(axis, axisSet.names, 'index');
    }
  }

  const selectors: PositionalSelector[] = [];
  const entries: AxisEntry[] = [];

  axisSet.entries().forEach(([axis, extent]) => {
    const selector = expr[axis];

    if (selector === undefined) {
      selectors.push({ kind: 'all' });
      entries.push([axis, extent]);
    } else if (typeof selector === 'number') {
      if (!Number.isInteger(selector) || selector < -extent || selector >= extent) {
        throw new InvalidParameterError(
          axis,
          `index ${selector} is out of bounds for axis of extent ${extent}`,
          { axis, extent },
          'INDEX_OUT_OF_BOUNDS',
        );
      }
      selectors.push({ kind: 'index', index: selector < 0 ? selector + extent : selector });
    } else if (isSliceSpec(selector)) {
      const { start, stop, step, length } = normalizeSlice(selector, extent);
      selectors.push({ kind: 'slice', start, stop, step });
      entries.push([axis, length]);
    } else {
      const mask = maskValues(axis, extent, selector);
      selectors.push({ kind: 'mask', mask });
      entries.push([axis, mask.filter(Boolean).length]);
    }
  });

  return { selectors, axes: new AxisSet(entries) };
}
