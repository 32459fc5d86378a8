/**
 * Tensor module exports
 */

export { Tensor, allocate, promoteTypes, roundingFor } from './Tensor';
export type { DType, TensorData, NestedArray, TensorLike } from './Tensor';
export { Variable, readValue, staticShapeOf } from './Variable';
export type { VariableOptions } from './Variable';
export {
  broadcastShapes,
  broadcastAll,
  broadcastStrides,
  canBroadcastTo,
  assertBroadcastableTo,
} from './broadcast';
