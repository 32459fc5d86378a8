export {
  DistributionError,
  ErrorCode,
  ShapeError,
  ValidationDeferredError,
  UnsupportedStatisticError,
  isDistributionError,
  wrapError,
} from './DistributionError';
export type { ErrorContext } from './DistributionError';
