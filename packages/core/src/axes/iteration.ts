/**
 * Iteration over named shapes
 */

import { AxisSet } from './axis-set';

/**
 * Default name of an axis built by merging others
 *
 * @example
 * flattenAxes(['x', 'y']); // 'x*y'
 */
export function flattenAxes(names: readonly string[]): string {
  return names.join('*');
}

/**
 * Iterate every position of a named shape in row-major order
 *
 * Ignored axes are left out of the yielded records.
 *
 * @example
 * [...ndindex({ x: 2, y: 2 })];
 * // [{x: 0, y: 0}, {x: 0, y: 1}, {x: 1, y: 0}, {x: 1, y: 1}]
 */
export function* ndindex(
  shape: AxisSet | Readonly<Record<string, number>>,
  ignored: string | readonly string[] = [],
): Generator<Record<string, number>> {
  const axes = shape instanceof AxisSet ? shape : AxisSet.fromRecord(shape);
  const skipped = typeof ignored === 'string' ? [ignored] : ignored;
  const entries = axes.entries().filter(([name]) => !skipped.includes(name));

  if (entries.some(([, extent]) => extent === 0)) {
    return;
  }

  const counters = entries.map(() => 0);
  while (true) {
    yield Object.fromEntries(entries.map(([name], i) => [name, counters[i] ?? 0]));

    let dim = entries.length - 1;
    for (; dim >= 0; dim--) {
      const extent = entries[dim]?.[1] ?? 0;
      const next = (counters[dim] ?? 0) + 1;
      if (next < extent) {
        counters[dim] = next;
        break;
      }
      counters[dim] = 0;
    }
    if (dim < 0) {
      return;
    }
  }
}
