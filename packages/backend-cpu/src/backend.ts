/**
 * CPU backend implementation
 *
 * This module provides the backend that creates CPUBuffers; every operation
 * runs synchronously on the calling thread.
 */

import type { Backend, DType, NestedArray, Scalar } from '@named-arrays/core';
import { computeSize } from '@named-arrays/core';
import { CPUBuffer } from './data';
import { flattenNested, inferShape, toTypedArray } from './utils';

/**
 * CPU computation backend
 *
 * Buffers from two backends never mix; instances are told apart by `id`.
 */
export class CPUBackend implements Backend {
  readonly type = 'cpu';

  constructor(readonly id: string = 'cpu:0') {}

  /**
   * Build a buffer from nested lists
   *
   * Without a dtype, all-boolean data is `bool` and anything else `float64`.
   *
   * @throws {ShapeMismatchError} If the lists are ragged
   */
  fromNested(data: NestedArray, dtype?: DType): CPUBuffer {
    const shape = inferShape(data);
    const leaves = flattenNested(data);
    const resolved =
      dtype ?? (leaves.length > 0 && leaves.every((v) => typeof v === 'boolean') ? 'bool' : 'float64');
    return new CPUBuffer(this, toTypedArray(leaves.map(Number), resolved), shape, resolved);
  }

  fromFlat(values: ArrayLike<number>, shape: readonly number[], dtype: DType = 'float64'): CPUBuffer {
    return new CPUBuffer(this, toTypedArray(values, dtype), [...shape], dtype);
  }

  full(shape: readonly number[], value: Scalar, dtype?: DType): CPUBuffer {
    const resolved = dtype ?? (typeof value === 'boolean' ? 'bool' : 'float64');
    const values = new Array<number>(computeSize(shape)).fill(Number(value));
    return new CPUBuffer(this, toTypedArray(values, resolved), [...shape], resolved);
  }
}
