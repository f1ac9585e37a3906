/**
 * CPU buffer
 *
 * This module provides the CPUBuffer implementation that stores array
 * elements contiguously in a TypedArray in host memory.
 */

import {
  InvalidParameterError,
  ShapeMismatchError,
  computeSize,
  computeStrides,
  formatShape,
} from '@named-arrays/core';
import type {
  BinaryOp,
  DType,
  NestedArray,
  NumericBuffer,
  PositionalSelector,
  ReductionOp,
  TypedArray,
  UnaryOp,
} from '@named-arrays/core';
import type { CPUBackend } from './backend';
import {
  executeBinaryOp,
  executeBroadcastToOp,
  executePercentileOp,
  executeReductionOp,
  executeReshapeOp,
  executeSelectOp,
  executeTransposeOp,
  executeUnaryOp,
} from './operations';
import type { DenseArray } from './operations';
import { computeFlatIndex, nestValues, toTypedArray } from './utils';

/**
 * Dense row-major n-d array on the CPU
 *
 * The elements are private: reshapes share them between buffers, and nothing
 * writes them after construction. Reads go through `get`, `values` and `toArray`,
 * which copy.
 */
export class CPUBuffer implements NumericBuffer {
  readonly rank: number;
  readonly size: number;

  constructor(
    public readonly backend: CPUBackend,
    private readonly data: TypedArray,
    public readonly shape: readonly number[],
    public readonly dtype: DType,
  ) {
    this.rank = shape.length;
    this.size = computeSize(shape);
    if (data.length !== this.size) {
      throw new ShapeMismatchError(
        `Buffer size mismatch: shape ${formatShape(shape)} needs ${this.size} elements, got ${data.length}`,
        { shape, length: data.length },
      );
    }
  }

  private dense(): DenseArray {
    return { data: this.data, shape: this.shape, dtype: this.dtype };
  }

  private wrap(result: DenseArray): CPUBuffer {
    return new CPUBuffer(this.backend, result.data, result.shape, result.dtype);
  }

  private own(other: NumericBuffer): CPUBuffer {
    if (!(other instanceof CPUBuffer) || other.backend.id !== this.backend.id) {
      throw new InvalidParameterError(
        'backend',
        `operand lives on backend '${other.backend.id}', expected '${this.backend.id}'`,
        { backends: [other.backend.id, this.backend.id] },
        'BACKEND_MISMATCH',
      );
    }
    return other;
  }

  reshape(shape: readonly number[]): CPUBuffer {
    return this.wrap(executeReshapeOp(this.dense(), shape));
  }

  broadcastTo(shape: readonly number[]): CPUBuffer {
    return this.wrap(executeBroadcastToOp(this.dense(), shape));
  }

  transpose(permutation: readonly number[]): CPUBuffer {
    return this.wrap(executeTransposeOp(this.dense(), permutation));
  }

  unary(op: UnaryOp): CPUBuffer {
    return this.wrap(executeUnaryOp(op, this.dense()));
  }

  binary(op: BinaryOp, other: NumericBuffer): CPUBuffer {
    return this.wrap(executeBinaryOp(op, this.dense(), this.own(other).dense()));
  }

  reduce(op: ReductionOp, position: number): CPUBuffer {
    return this.wrap(executeReductionOp(op, this.dense(), position));
  }

  percentile(q: number, position: number): CPUBuffer {
    return this.wrap(executePercentileOp(q, this.dense(), position));
  }

  select(selectors: readonly PositionalSelector[]): CPUBuffer {
    return this.wrap(executeSelectOp(this.dense(), selectors));
  }

  astype(dtype: DType): CPUBuffer {
    if (dtype === this.dtype) {
      return this;
    }
    return new CPUBuffer(this.backend, toTypedArray(this.data, dtype), this.shape, dtype);
  }

  /**
   * @throws {InvalidParameterError} If the index has the wrong length or is out of range
   */
  get(indices: readonly number[]): number {
    if (
      indices.length !== this.rank ||
      indices.some((index, i) => !Number.isInteger(index) || index < 0 || index >= (this.shape[i] ?? 0))
    ) {
      throw new InvalidParameterError(
        'indices',
        `${formatShape(indices)} is not a position in shape ${formatShape(this.shape)}`,
      );
    }
    return this.data[computeFlatIndex(indices, computeStrides(this.shape))] ?? 0;
  }

  values(): number[] {
    return Array.from(this.data);
  }

  toArray(): NestedArray {
    return nestValues(this.data, this.shape, this.dtype === 'bool');
  }

  equals(other: NumericBuffer): boolean {
    if (this.rank !== other.rank || this.shape.some((dim, i) => dim !== other.shape[i])) {
      return false;
    }
    const theirs = other.values();
    for (let i = 0; i < this.size; i++) {
      if (this.data[i] !== theirs[i]) {
        return false;
      }
    }
    return true;
  }
}
