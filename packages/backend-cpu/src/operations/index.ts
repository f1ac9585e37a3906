/**
 * Positional kernels of the CPU backend
 *
 * Every kernel reads dense inputs and returns a newly allocated result;
 * only reshape shares its input's elements.
 */

export { executeUnaryOp, roundHalfEven } from './unary';
export { executeBinaryOp, broadcastShapes, floorMod } from './binary';
export { executePercentileOp, executeReductionOp, percentileOf } from './reduction';
export {
  executeBroadcastToOp,
  executeReshapeOp,
  executeSelectOp,
  executeTransposeOp,
} from './view';
export type { DenseArray } from './types';
