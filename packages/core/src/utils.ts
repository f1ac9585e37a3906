/**
 * Internal helpers shared across core modules
 */

/**
 * Compile-time exhaustiveness check for switch statements
 *
 * @example
 * switch (value.kind) {
 *   case 'materialized': return value;
 *   case 'linear-space': return value.materialize();
 *   default: return assertExhaustiveSwitch(value); // TypeScript error if cases missing
 * }
 */
export function assertExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}

/**
 * Compute strides for a shape in C-order (row-major)
 */
export function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i] ?? 1;
  }
  return strides;
}

/**
 * Compute the product of a shape (total number of elements)
 */
export function computeSize(shape: readonly number[]): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Format a positional shape for error messages
 */
export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(', ')}]`;
}

export function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
