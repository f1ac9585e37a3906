import type { DType, TypedArray } from '@named-arrays/core';

/**
 * Contiguous row-major elements with their positional shape
 *
 * Kernels read inputs of this form and return a freshly allocated one.
 */
export interface DenseArray {
  readonly data: TypedArray;
  readonly shape: readonly number[];
  readonly dtype: DType;
}
