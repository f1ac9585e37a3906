/**
 * Alignment engine for named-axis operations
 *
 * Given several operands, computes the unified axis order and, for each
 * operand, the positional transpose/reshape plan that makes it broadcast
 * compatible with the others. Pure functions, no shared state.
 *
 * ## Unified order
 * Names appear in the order they are first seen, scanning operands left to
 * right and each operand in its own axis order:
 * ```typescript
 * // (x, y) with (y, z) => (x, y, z)
 * // (y, z) with (x, y) => (y, z, x)
 * ```
 *
 * ## Broadcasting rules
 * For a name shared by several operands, extents must be equal or 1; the
 * result takes the non-1 extent. Anything else is an AxisMismatchError.
 */

import type { NumericBuffer } from '../buffer/types';
import { AxisMismatchError } from '../errors';
import { AxisSet } from './axis-set';

/**
 * How one operand is laid out against the unified axis order
 */
export interface AlignmentPlan {
  /** Output dimension i takes the operand's dimension `permutation[i]` */
  readonly permutation: readonly number[];
  /** Unified order with the operand's extents, 1 where it lacks the axis */
  readonly shape: readonly number[];
}

export interface Alignment {
  readonly axes: AxisSet;
  readonly plans: readonly AlignmentPlan[];
}

/**
 * Anything carrying a named shape
 */
export interface HasAxes {
  readonly axisSet: AxisSet;
}

/**
 * Broadcast several AxisSets into one, in first-seen order
 *
 * @throws {AxisMismatchError} If a shared axis has two different extents greater than 1
 */
export function broadcastAxes(...sets: readonly AxisSet[]): AxisSet {
  const extents = new Map<string, number>();

  for (const set of sets) {
    for (const [name, extent] of set.entries()) {
      const current = extents.get(name);
      if (current === undefined || current === 1) {
        extents.set(name, extent);
      } else if (extent !== current && extent !== 1) {
        throw new AxisMismatchError(name, [current, extent], {
          operands: sets.map((s) => s.toString()),
        });
      }
    }
  }

  return new AxisSet(extents);
}

/**
 * Plan the transpose/reshape that lays `own` out along `unified`
 *
 * `unified` must contain every axis of `own` with a compatible extent.
 */
export function planAlignment(own: AxisSet, unified: AxisSet): AlignmentPlan {
  const permutation = own.names
    .map((name, position) => ({ position, target: unified.indexOf(name, 'alignment') }))
    .sort((a, b) => a.target - b.target)
    .map(({ position }) => position);

  const shape = unified.names.map((name) => (own.has(name) ? own.get(name) : 1));

  return { permutation, shape };
}

/**
 * Align AxisSets against each other
 */
export function alignAxes(sets: readonly AxisSet[]): Alignment {
  const axes = broadcastAxes(...sets);
  return {
    axes,
    plans: sets.map((set) => planAlignment(set, axes)),
  };
}

/**
 * Align operands against each other
 *
 * @example
 * const { axes, plans } = align([a, b]); // a: (x: 3), b: (y: 2)
 * axes.names;        // ['x', 'y']
 * plans[0].shape;    // [3, 1]
 * plans[1].shape;    // [1, 2]
 */
export function align(operands: readonly HasAxes[]): Alignment {
  return alignAxes(operands.map((operand) => operand.axisSet));
}

export function isIdentityPermutation(permutation: readonly number[]): boolean {
  return permutation.every((source, i) => source === i);
}

/**
 * Apply a plan to a buffer: transpose to unified order, then insert 1s
 */
export function applyAlignmentPlan(buffer: NumericBuffer, plan: AlignmentPlan): NumericBuffer {
  const ordered = isIdentityPermutation(plan.permutation)
    ? buffer
    : buffer.transpose(plan.permutation);
  if (ordered.rank === plan.shape.length) {
    return ordered;
  }
  return ordered.reshape(plan.shape);
}
