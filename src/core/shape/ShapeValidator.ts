/**
 * Sample-shape validation
 *
 * A sample shape is a scalar n (one replicate axis of size n) or a vector of
 * non-negative integers. Constant shapes are checked once at construction;
 * shapes held in a Variable are checked every time they are read.
 */

import { ShapeError, ValidationDeferredError } from '../errors';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { Variable } from '../tensor/Variable';
import type { PartialShape, Shape } from './types';

export type SampleShapeInput = TensorLike | Variable;

export const SAMPLE_SHAPE_RANK_MESSAGE =
  'Argument `sampleShape` must be either a scalar or a vector.';

/**
 * Source of a shape that may only be known when queried
 */
export interface ShapeProvider {
  readonly isDynamic: boolean;
  /** Best static knowledge of the shape */
  staticShape(): PartialShape;
  /** Read and validate the current shape */
  resolve(): Shape;
}

function fail(message: string, deferred: boolean, context: Record<string, unknown>): never {
  throw deferred ? new ValidationDeferredError(message, context) : new ShapeError(message, context);
}

/**
 * Normalize a sample-shape value to a Shape
 *
 * @param deferred - report failures as ValidationDeferredError
 */
export function normalizeSampleShape(value: TensorLike, deferred: boolean = false): Shape {
  const tensor = Tensor.from(value);
  if (tensor.rank >= 2) {
    fail(SAMPLE_SHAPE_RANK_MESSAGE, deferred, { rank: tensor.rank, shape: tensor.shape });
  }
  const dims = tensor.toFlatArray();
  for (const d of dims) {
    if (!Number.isInteger(d) || d < 0) {
      fail(
        `Argument \`sampleShape\` must contain non-negative integers, got ${d}.`,
        deferred,
        { sampleShape: dims }
      );
    }
  }
  return dims;
}

/**
 * Static view of a sample shape: fully known for constants, partially known
 * (or unknown rank) for variables.
 */
export function staticSampleShape(input: SampleShapeInput): PartialShape {
  if (!(input instanceof Variable)) {
    return normalizeSampleShape(input);
  }
  const declared = input.staticShape;
  if (declared === null) return null;
  if (declared.length >= 2) {
    throw new ShapeError(SAMPLE_SHAPE_RANK_MESSAGE, {
      variable: input.name,
      rank: declared.length,
    });
  }
  if (declared.length === 0) return [null];
  const [length] = declared;
  return length === null ? null : new Array<null>(length).fill(null);
}

/**
 * Current value of a sample shape, validated
 */
export function resolveSampleShape(input: SampleShapeInput): Shape {
  if (input instanceof Variable) {
    return normalizeSampleShape(input.read(), true);
  }
  return normalizeSampleShape(input);
}

/**
 * ShapeProvider over a sample-shape argument
 */
export class SampleShapeProvider implements ShapeProvider {
  readonly isDynamic: boolean;
  private readonly constant: Shape | null;
  private readonly declared: PartialShape;

  constructor(private readonly input: SampleShapeInput) {
    this.isDynamic = input instanceof Variable;
    this.declared = staticSampleShape(input);
    this.constant = this.isDynamic ? null : resolveSampleShape(input);
  }

  staticShape(): PartialShape {
    return this.declared;
  }

  resolve(): Shape {
    return this.constant ?? resolveSampleShape(this.input);
  }
}
