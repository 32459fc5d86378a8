/**
 * Core module exports
 */

// Error handling system
export {
  DistributionError,
  ErrorCode,
  ShapeError,
  UnsupportedStatisticError,
  ValidationDeferredError,
  isDistributionError,
  wrapError,
} from './errors';
export type { ErrorContext } from './errors';

export * from './shape';
export * from './tensor';
export {
  normalizeAxes,
  reduceLeading,
  reduceLogDensity,
  reduceSum,
  reduceTrailing,
} from './reduction/ReductionEngine';
export type { ReduceOptions } from './reduction/ReductionEngine';
export * from './bijectors';
export * from './distributions';
