export { ImplicitArrayBase } from './base';
export type { ImplicitKind } from './base';
export { LinearSpace } from './linear-space';
export type { SpaceOptions } from './linear-space';
export { LogarithmicSpace } from './logarithmic-space';
export { GeometricSpace } from './geometric-space';
export { ArrayRange, indices } from './array-range';
export type { RangeOptions } from './array-range';
export { NormalRandomSample, RandomSampleBase, UniformRandomSample } from './random-sample';
export type { RandomOptions, RandomShape } from './random-sample';
export { linearSamples, parameterAxes } from './sampling';
export type { SpaceParameter } from './sampling';
