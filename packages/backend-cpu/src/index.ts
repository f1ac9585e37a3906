/**
 * CPU backend for named arrays
 *
 * @module @named-arrays/backend-cpu
 *
 * This module provides a TypedArray-based backend for named array operations.
 */

import { CPUBackend } from './backend';

// Export the backend class
export { CPUBackend } from './backend';
export { CPUBuffer } from './data';

// Export the singleton CPU backend instance
export const cpu = new CPUBackend();

// Export kernels and utils for testing or advanced usage
export * from './operations';
export * from './utils';
