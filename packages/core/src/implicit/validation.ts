/**
 * Eager parameter checks shared by the implicit arrays
 */

import type { Backend } from '../buffer/types';
import type { AxisSet } from '../axes/axis-set';
import { InvalidParameterError } from '../errors';
import { isNonNegativeInteger } from '../utils';

/** A scalar parameter, or an array parameter seen through its axes and backend */
export type ParameterLike = number | { readonly axisSet: AxisSet; readonly backend: Backend };

export function validateAxisName(axis: string): void {
  if (typeof axis !== 'string' || axis.length === 0) {
    throw new InvalidParameterError('axis', 'axis must be a non-empty string', { axis });
  }
}

export function validateNum(num: number): void {
  if (!isNonNegativeInteger(num)) {
    throw new InvalidParameterError('num', `num must be a non-negative integer, got ${num}`, {
      num,
    });
  }
}

export function validateFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, `must be a finite number, got ${value}`);
  }
}

/**
 * Finite when scalar; on the given backend when an array
 */
export function validateParameter(name: string, value: ParameterLike, backend: Backend): void {
  if (typeof value === 'number') {
    validateFinite(name, value);
  } else if (value.backend.id !== backend.id) {
    throw new InvalidParameterError(
      name,
      `lives on backend '${value.backend.id}' but the array was built for '${backend.id}'`,
      { backends: [value.backend.id, backend.id] },
      'BACKEND_MISMATCH',
    );
  }
}
