/**
 * Shape algebra for the Sample combinator
 *
 * Pure functions over shapes. Tensor layouts are described as sequences of
 * named axis groups; permutations between two layouts are computed rather
 * than left to broadcasting, because broadcasting hides transposition bugs.
 *
 * Layouts used by the combinator (K = sample shape, B = batch, E = base event):
 *
 *   base draw      prefix ++ K ++ B ++ E
 *   user facing    prefix ++ B ++ K ++ E
 *   base facing    K ++ prefix ++ B ++ E
 */

import { ErrorCode, ShapeError } from '../errors';
import { broadcastShapes, canBroadcastTo } from '../tensor/broadcast';
import { formatShape, shapeSize, type PartialShape, type Shape } from './types';

export type AxisGroup = 'prefix' | 'batch' | 'sample' | 'event';
export type GroupSizes = Record<AxisGroup, number>;

export const DRAW_LAYOUT: readonly AxisGroup[] = ['prefix', 'sample', 'batch', 'event'];
export const USER_LAYOUT: readonly AxisGroup[] = ['prefix', 'batch', 'sample', 'event'];
export const BASE_LAYOUT: readonly AxisGroup[] = ['sample', 'prefix', 'batch', 'event'];

/**
 * event_shape(K, E) = K ++ E
 */
export function composeEventShape(sampleShape: Shape, baseEventShape: Shape): Shape {
  return [...sampleShape, ...baseEventShape];
}

/**
 * Sampling happens within each batch member, so the batch shape passes through
 */
export function composeBatchShape(baseBatchShape: Shape): Shape {
  return baseBatchShape;
}

export function concatPartialShapes(a: PartialShape, b: PartialShape): PartialShape {
  if (a === null || b === null) return null;
  return [...a, ...b];
}

/**
 * Broadcast two partially known shapes; unknowns stay unknown unless the
 * other side pins the dimension to a size other than 1.
 */
export function broadcastPartialShapes(a: PartialShape, b: PartialShape): PartialShape {
  if (a === null || b === null) return null;
  const ndim = Math.max(a.length, b.length);
  const padA = ndim - a.length;
  const padB = ndim - b.length;
  const result: (number | null)[] = [];

  for (let i = 0; i < ndim; i++) {
    const da = i < padA ? 1 : a[i - padA];
    const db = i < padB ? 1 : b[i - padB];
    if (da === null || db === null) {
      const known = da ?? db;
      result.push(known !== null && known !== 1 ? known : null);
    } else {
      result.push(broadcastShapes([da], [db])[0]);
    }
  }
  return result;
}

/**
 * Offsets of each group in a layout
 */
function groupStarts(layout: readonly AxisGroup[], sizes: GroupSizes): Record<AxisGroup, number> {
  const starts: GroupSizes = { prefix: 0, batch: 0, sample: 0, event: 0 };
  let offset = 0;
  for (const group of layout) {
    starts[group] = offset;
    offset += sizes[group];
  }
  return starts;
}

/**
 * Permutation taking a tensor laid out as `from` to one laid out as `to`.
 * Result axis i is source axis perm[i].
 */
export function permutationBetween(
  sizes: GroupSizes,
  from: readonly AxisGroup[],
  to: readonly AxisGroup[]
): number[] {
  const starts = groupStarts(from, sizes);
  const perm: number[] = [];
  for (const group of to) {
    for (let i = 0; i < sizes[group]; i++) {
      perm.push(starts[group] + i);
    }
  }
  return perm;
}

export function invertPermutation(perm: readonly number[]): number[] {
  const inverse = new Array<number>(perm.length);
  perm.forEach((p, i) => {
    inverse[p] = i;
  });
  return inverse;
}

/**
 * Permutation for sampling: base draw `S0 ++ K ++ B ++ E` to `S0 ++ B ++ K ++ E`
 */
export function samplingPermutation(
  prefixNdims: number,
  sampleNdims: number,
  batchNdims: number,
  eventNdims: number
): number[] {
  return permutationBetween(
    { prefix: prefixNdims, sample: sampleNdims, batch: batchNdims, event: eventNdims },
    DRAW_LAYOUT,
    USER_LAYOUT
  );
}

/**
 * How to present a user-facing tensor to the base distribution or bijector
 */
export interface BaseLayout {
  /** Leading size-1 axes added so the batch part is complete */
  padding: number;
  prefixNdims: number;
  /** User layout (after padding) to base layout */
  toBase: number[];
  /** Base layout back to user layout */
  fromBase: number[];
  /** Sample axes in base layout */
  sampleAxes: number[];
}

/**
 * Layout for a tensor of the given rank whose trailing axes are
 * `B ++ K ++ event`. Tensors too short to hold the batch part are left-padded.
 */
export function baseLayout(
  rank: number,
  batchNdims: number,
  sampleNdims: number,
  eventNdims: number
): BaseLayout {
  const surplus = rank - batchNdims - sampleNdims - eventNdims;
  const padding = Math.max(0, -surplus);
  const prefixNdims = Math.max(0, surplus);
  const sizes: GroupSizes = {
    prefix: prefixNdims,
    batch: batchNdims,
    sample: sampleNdims,
    event: eventNdims,
  };
  const toBase = permutationBetween(sizes, USER_LAYOUT, BASE_LAYOUT);
  return {
    padding,
    prefixNdims,
    toBase,
    fromBase: invertPermutation(toBase),
    sampleAxes: Array.from({ length: sampleNdims }, (_, i) => i),
  };
}

export function padLeft(shape: Shape, count: number): Shape {
  return [...new Array<number>(count).fill(1), ...shape];
}

/**
 * Shape an observation must be expanded to before density evaluation:
 * its leading axes followed by the full event shape. The trailing event part
 * of the observation must broadcast to the event shape.
 */
export function broadcastToEventShape(observationShape: Shape, eventShape: Shape): Shape {
  const padded =
    observationShape.length < eventShape.length
      ? padLeft(observationShape, eventShape.length - observationShape.length)
      : observationShape;
  const split = padded.length - eventShape.length;
  const trailing = padded.slice(split);
  if (!canBroadcastTo(trailing, eventShape)) {
    throw new ShapeError(
      `Incompatible shapes for broadcasting: ${formatShape(observationShape)} vs. event shape ${formatShape(eventShape)}`,
      { observationShape, eventShape },
      ErrorCode.INCOMPATIBLE_SHAPES
    );
  }
  return [...padded.slice(0, split), ...eventShape];
}

/**
 * Number of i.i.d. replicates a sample shape describes
 */
export function replicateCount(sampleShape: Shape): number {
  return shapeSize(sampleShape);
}

/**
 * Static and dynamic views must agree wherever the static one is known
 */
export function isCompatibleWith(partial: PartialShape, shape: Shape): boolean {
  if (partial === null) return true;
  return (
    partial.length === shape.length && partial.every((d, i) => d === null || d === shape[i])
  );
}
