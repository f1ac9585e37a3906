/**
 * @named-arrays/test-utils
 *
 * Backend-agnostic test suites. A backend package runs every generator
 * against its own backend through a small adapter over its test runner.
 */

export { expectAllClose, flatNumbers, thrownCode, thrownError } from './framework';
export type { Expectation, TestFramework } from './framework';

export { generateArrayCreationTests } from './generators/array-creation';
export { generateBinaryOperationTests } from './generators/binary-operations';
export { generateUnaryOperationTests } from './generators/unary-operations';
export { generateReductionOperationTests } from './generators/reduction-operations';
export { generateIndexingOperationTests } from './generators/indexing-operations';
export { generateAxisOperationTests } from './generators/axis-operations';
export { generateImplicitArrayTests } from './generators/implicit-arrays';
export { generateDisplayTests } from './generators/display';
export { generateWorkflowTests } from './generators/workflows';
