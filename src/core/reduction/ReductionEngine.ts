/**
 * Axis reductions for log-densities
 *
 * Two accumulation modes:
 * - plain: a running sum
 * - compensated: Neumaier's variant of Kahan summation, which keeps a running
 *   compensation term for the low-order bits lost by each addition and adds it
 *   back once the reduction is complete
 *
 * Traversal order is fixed: each output cell visits its input cells in
 * row-major order of the reduced axes (last reduced axis fastest), which is
 * the order they occupy in memory and the order replicates are drawn in.
 * All arithmetic is rounded to the tensor's dtype after every operation.
 */

import { ShapeError } from '../errors';
import { allocate, roundingFor, Tensor } from '../tensor/Tensor';
import { stridesOf, type Shape } from '../shape/types';

export interface ReduceOptions {
  /** Use compensated summation (default false) */
  useCompensatedSum?: boolean;
}

type Round = (x: number) => number;

function plainSum(
  values: ArrayLike<number>,
  base: number,
  offsets: readonly number[],
  round: Round
): number {
  let sum = 0;
  for (const offset of offsets) {
    sum = round(sum + values[base + offset]);
  }
  return sum;
}

function compensatedSum(
  values: ArrayLike<number>,
  base: number,
  offsets: readonly number[],
  round: Round
): number {
  let sum = 0;
  let compensation = 0;
  for (const offset of offsets) {
    const addend = values[base + offset];
    const t = round(sum + addend);
    const error =
      Math.abs(sum) >= Math.abs(addend)
        ? round(round(sum - t) + addend)
        : round(round(addend - t) + sum);
    compensation = round(compensation + error);
    sum = t;
  }
  return round(sum + compensation);
}

/**
 * Normalize possibly negative axes to sorted unique non-negative axes
 */
export function normalizeAxes(axes: number | readonly number[], rank: number): number[] {
  const list = typeof axes === 'number' ? [axes] : axes;
  const normalized = list.map((axis) => {
    const a = axis < 0 ? rank + axis : axis;
    if (!Number.isInteger(a) || a < 0 || a >= rank) {
      throw new ShapeError(`Reduction axis ${axis} out of range for rank ${rank}`, {
        axis,
        rank,
      });
    }
    return a;
  });
  return [...new Set(normalized)].sort((a, b) => a - b);
}

/**
 * Memory offsets of every cell of the reduced sub-block, in traversal order
 */
function reducedOffsets(shape: Shape, strides: readonly number[], axes: readonly number[]): number[] {
  let offsets = [0];
  for (const axis of axes) {
    const next: number[] = [];
    for (const offset of offsets) {
      for (let i = 0; i < shape[axis]; i++) {
        next.push(offset + i * strides[axis]);
      }
    }
    offsets = next;
  }
  return offsets;
}

/**
 * Sum `tensor` over `axes` (all axes when omitted)
 */
export function reduceSum(
  tensor: Tensor,
  axes?: number | readonly number[],
  options: ReduceOptions = {}
): Tensor {
  const rank = tensor.rank;
  const reduced = axes === undefined ? [...Array(rank).keys()] : normalizeAxes(axes, rank);
  if (reduced.length === 0) return tensor;

  const strides = stridesOf(tensor.shape);
  const kept = [...Array(rank).keys()].filter((a) => !reduced.includes(a));
  const outShape = kept.map((a) => tensor.shape[a]);
  const offsets = reducedOffsets(tensor.shape, strides, reduced);
  const round = roundingFor(tensor.dtype);
  const accumulate = options.useCompensatedSum ? compensatedSum : plainSum;

  const out = allocate(tensor.dtype, outShape.reduce((acc, d) => acc * d, 1));
  const values = tensor.values;
  const coord = new Array<number>(kept.length).fill(0);

  for (let i = 0; i < out.length; i++) {
    let base = 0;
    for (let k = 0; k < kept.length; k++) {
      base += coord[k] * strides[kept[k]];
    }
    out[i] = accumulate(values, base, offsets, round);
    for (let k = kept.length - 1; k >= 0; k--) {
      coord[k]++;
      if (coord[k] < outShape[k]) break;
      coord[k] = 0;
    }
  }

  return Tensor.fromData(outShape, out, tensor.dtype);
}

/**
 * Reduce per-element log-densities over the replicate axes
 */
export function reduceLogDensity(
  elementwiseLogDensity: Tensor,
  axes: readonly number[],
  useCompensatedSum: boolean = false
): Tensor {
  return reduceSum(elementwiseLogDensity, axes, { useCompensatedSum });
}

/**
 * Sum of the trailing `ndims` axes
 */
export function reduceTrailing(tensor: Tensor, ndims: number, options: ReduceOptions = {}): Tensor {
  if (ndims <= 0) return tensor;
  if (ndims > tensor.rank) {
    throw new ShapeError(
      `Cannot reduce ${ndims} trailing axes of a rank-${tensor.rank} tensor`,
      { ndims, shape: tensor.shape }
    );
  }
  const axes = Array.from({ length: ndims }, (_, i) => tensor.rank - ndims + i);
  return reduceSum(tensor, axes, options);
}

/**
 * Sum of the leading `ndims` axes
 */
export function reduceLeading(tensor: Tensor, ndims: number, options: ReduceOptions = {}): Tensor {
  if (ndims <= 0) return tensor;
  return reduceSum(tensor, Array.from({ length: ndims }, (_, i) => i), options);
}
