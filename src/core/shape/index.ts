/**
 * Shape module exports
 */

export {
  formatShape,
  isFullyDefined,
  shapeSize,
  shapesEqual,
  stridesOf,
} from './types';
export type { PartialShape, Shape } from './types';
export {
  SAMPLE_SHAPE_RANK_MESSAGE,
  SampleShapeProvider,
  normalizeSampleShape,
  resolveSampleShape,
  staticSampleShape,
} from './ShapeValidator';
export type { SampleShapeInput, ShapeProvider } from './ShapeValidator';
export {
  BASE_LAYOUT,
  DRAW_LAYOUT,
  USER_LAYOUT,
  baseLayout,
  broadcastPartialShapes,
  broadcastToEventShape,
  composeBatchShape,
  composeEventShape,
  concatPartialShapes,
  invertPermutation,
  isCompatibleWith,
  padLeft,
  permutationBetween,
  replicateCount,
  samplingPermutation,
} from './ShapeAlgebra';
export type { AxisGroup, BaseLayout, GroupSizes } from './ShapeAlgebra';
