/**
 * Broadcast helpers shared by tensor arithmetic and shape algebra.
 *
 * NumPy-style broadcasting: shapes are right-aligned, dimensions of size 1
 * are stretched to match the other operand.
 */

import { ErrorCode, ShapeError } from '../errors';
import { formatShape, type Shape } from '../shape/types';

function incompatible(a: Shape, b: Shape): ShapeError {
  return new ShapeError(
    `Incompatible shapes for broadcasting: ${formatShape(a)} vs. ${formatShape(b)}`,
    { shapes: [a, b] },
    ErrorCode.INCOMPATIBLE_SHAPES
  );
}

/**
 * Broadcast two shapes to their common shape
 */
export function broadcastShapes(sa: Shape, sb: Shape): number[] {
  const ndim = Math.max(sa.length, sb.length);
  const result = new Array<number>(ndim);
  const padA = ndim - sa.length;
  const padB = ndim - sb.length;

  for (let i = 0; i < ndim; i++) {
    const da = i < padA ? 1 : sa[i - padA];
    const db = i < padB ? 1 : sb[i - padB];
    if (da !== db && da !== 1 && db !== 1) {
      throw incompatible(sa, sb);
    }
    result[i] = da === 1 ? db : da;
  }

  return result;
}

/**
 * Broadcast any number of shapes
 */
export function broadcastAll(shapes: readonly Shape[]): number[] {
  return shapes.reduce<number[]>((acc, shape) => broadcastShapes(acc, shape), []);
}

/**
 * Check whether `src` broadcasts *to* `target` without changing `target`
 */
export function canBroadcastTo(src: Shape, target: Shape): boolean {
  if (src.length > target.length) return false;
  const pad = target.length - src.length;
  return src.every((d, i) => d === 1 || d === target[i + pad]);
}

/**
 * Throw unless `src` broadcasts to exactly `target`
 */
export function assertBroadcastableTo(src: Shape, target: Shape): void {
  if (!canBroadcastTo(src, target)) {
    throw incompatible(src, target);
  }
}

/**
 * Strides for reading a source shape as if expanded to `targetShape`.
 * Dimensions of size 1 in `srcShape` get stride 0.
 * Assumes target is a valid broadcast of src (caller must verify).
 */
export function broadcastStrides(srcShape: Shape, targetShape: Shape): number[] {
  const ndim = targetShape.length;
  const pad = ndim - srcShape.length;
  const strides = new Array<number>(ndim);
  let stride = 1;
  for (let i = ndim - 1; i >= 0; i--) {
    const srcDim = i < pad ? 1 : srcShape[i - pad];
    strides[i] = srcDim === 1 && targetShape[i] !== 1 ? 0 : stride;
    stride *= srcDim;
  }
  return strides;
}
