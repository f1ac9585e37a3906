/**
 * Named shape of one array
 *
 * An AxisSet is the ordered sequence of (name, extent) pairs describing an
 * array's shape semantically. Order is positional (it matches the buffer's
 * dimensions), but equality between AxisSets compares them as mappings.
 */

import { AxisNotFoundError, InvalidParameterError, ShapeMismatchError } from '../errors';
import { computeSize, isNonNegativeInteger } from '../utils';

export type AxisEntry = readonly [name: string, extent: number];

/**
 * Immutable ordered mapping from axis name to extent
 */
export class AxisSet {
  static readonly EMPTY = new AxisSet([]);

  readonly names: readonly string[];
  readonly extents: readonly number[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(entries: Iterable<AxisEntry>) {
    const names: string[] = [];
    const extents: number[] = [];
    const positions = new Map<string, number>();

    for (const [name, extent] of entries) {
      if (typeof name !== 'string' || name.length === 0) {
        throw new InvalidParameterError('axis', 'axis names must be non-empty strings', {
          axis: name,
        });
      }
      if (positions.has(name)) {
        throw new ShapeMismatchError(`Duplicate axis name '${name}'`, { axes: [...names, name] });
      }
      if (!isNonNegativeInteger(extent)) {
        throw new InvalidParameterError(
          'extent',
          `extent of axis '${name}' must be a non-negative integer, got ${extent}`,
        );
      }
      positions.set(name, names.length);
      names.push(name);
      extents.push(extent);
    }

    this.names = names;
    this.extents = extents;
    this.positions = positions;
  }

  /**
   * Build from a name -> extent record, in the record's key order
   */
  static fromRecord(record: Readonly<Record<string, number>>): AxisSet {
    return new AxisSet(Object.entries(record));
  }

  /**
   * Pair axis names with a positional shape
   */
  static fromNames(names: readonly string[], shape: readonly number[]): AxisSet {
    if (names.length !== shape.length) {
      throw new ShapeMismatchError(
        `Got ${names.length} axis names for a buffer of rank ${shape.length}`,
        { axes: names, shape },
      );
    }
    return new AxisSet(names.map((name, i): AxisEntry => [name, shape[i] ?? 0]));
  }

  get rank(): number {
    return this.names.length;
  }

  get size(): number {
    return computeSize(this.extents);
  }

  get isScalar(): boolean {
    return this.names.length === 0;
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  /**
   * Position of an axis, throwing AxisNotFoundError when absent
   */
  indexOf(name: string, operation = 'axis lookup'): number {
    const position = this.positions.get(name);
    if (position === undefined) {
      throw new AxisNotFoundError(name, this.names, operation);
    }
    return position;
  }

  /**
   * Extent of an axis, throwing AxisNotFoundError when absent
   */
  get(name: string, operation = 'axis lookup'): number {
    return this.extents[this.indexOf(name, operation)] ?? 0;
  }

  entries(): AxisEntry[] {
    return this.names.map((name, i): AxisEntry => [name, this.extents[i] ?? 0]);
  }

  /**
   * Drop the given axes; every name must be present
   */
  without(names: string | readonly string[], operation = 'axis removal'): AxisSet {
    const dropped = typeof names === 'string' ? [names] : names;
    for (const name of dropped) {
      this.indexOf(name, operation);
    }
    return new AxisSet(this.entries().filter(([name]) => !dropped.includes(name)));
  }

  /**
   * Replace the extent of an existing axis, or append a new one
   */
  with(name: string, extent: number): AxisSet {
    if (this.has(name)) {
      return new AxisSet(
        this.entries().map(([n, e]): AxisEntry => (n === name ? [n, extent] : [n, e])),
      );
    }
    return new AxisSet([...this.entries(), [name, extent]]);
  }

  /**
   * Subset in the given order
   */
  pick(names: readonly string[], operation = 'axis selection'): AxisSet {
    return new AxisSet(names.map((name): AxisEntry => [name, this.get(name, operation)]));
  }

  /**
   * Mapping equality: same names with same extents, in any order
   */
  equals(other: AxisSet): boolean {
    if (this.rank !== other.rank) {
      return false;
    }
    return this.names.every((name, i) => other.has(name) && other.get(name) === this.extents[i]);
  }

  /**
   * Positional equality: same names with same extents in the same order
   */
  orderedEquals(other: AxisSet): boolean {
    return (
      this.rank === other.rank &&
      this.names.every((name, i) => other.names[i] === name && other.extents[i] === this.extents[i])
    );
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.entries());
  }

  toString(): string {
    return `{${this.entries()
      .map(([name, extent]) => `${name}: ${extent}`)
      .join(', ')}}`;
  }
}
