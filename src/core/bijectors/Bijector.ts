/**
 * Base interface for invertible transforms between an unconstrained space and
 * a distribution's support
 */

import { ShapeError } from '../errors';
import { reduceTrailing } from '../reduction/ReductionEngine';
import type { Shape } from '../shape/types';
import { broadcastShapes } from '../tensor/broadcast';
import { Tensor, type TensorLike } from '../tensor/Tensor';

export interface Bijector {
  readonly name: string;

  /** Smallest event rank the forward map acts on */
  readonly forwardMinEventNdims: number;

  /** Smallest event rank the inverse map acts on */
  readonly inverseMinEventNdims: number;

  forward(x: TensorLike): Tensor;
  inverse(y: TensorLike): Tensor;

  /**
   * Output shape of `forward` for an input of the given shape.
   * Leading (batch-like) dimensions pass through.
   */
  forwardEventShape(shape: Shape): Shape;

  /**
   * Output shape of `inverse` for an input of the given shape
   */
  inverseEventShape(shape: Shape): Shape;

  /**
   * log|det J| of `forward` at `x`, summed over the trailing `eventNdims` axes
   */
  forwardLogDetJacobian(x: TensorLike, eventNdims: number): Tensor;

  /**
   * log|det J| of `inverse` at `y`, summed over the trailing `eventNdims` axes
   */
  inverseLogDetJacobian(y: TensorLike, eventNdims: number): Tensor;
}

export function assertEventNdims(
  bijector: string,
  eventNdims: number,
  minEventNdims: number,
  rank: number
): void {
  if (!Number.isInteger(eventNdims) || eventNdims < minEventNdims) {
    throw new ShapeError(
      `${bijector}: eventNdims=${eventNdims} is smaller than the minimum event rank ${minEventNdims}`,
      { bijector, eventNdims, minEventNdims }
    );
  }
  if (eventNdims > rank) {
    throw new ShapeError(
      `${bijector}: eventNdims=${eventNdims} exceeds input rank ${rank}`,
      { bijector, eventNdims, rank }
    );
  }
}

/**
 * Shared plumbing: subclasses supply the maps and the log-det-Jacobian over
 * their minimum event rank; the base class broadcasts that term to the input's
 * batch shape and sums any extra event axes.
 */
export abstract class BaseBijector implements Bijector {
  constructor(
    readonly name: string,
    readonly forwardMinEventNdims: number,
    readonly inverseMinEventNdims: number = forwardMinEventNdims
  ) {}

  protected abstract computeForward(x: Tensor): Tensor;
  protected abstract computeInverse(y: Tensor): Tensor;

  /**
   * log|det J| over the minimum event rank; any shape broadcastable to
   * `x.shape` without its trailing `forwardMinEventNdims` axes
   */
  protected abstract computeForwardLogDetJacobian(x: Tensor): Tensor;

  /**
   * Defaults to the negated forward term at `inverse(y)`
   */
  protected computeInverseLogDetJacobian(y: Tensor): Tensor {
    return this.computeForwardLogDetJacobian(this.computeInverse(y)).neg();
  }

  forward(x: TensorLike): Tensor {
    return this.computeForward(Tensor.from(x));
  }

  inverse(y: TensorLike): Tensor {
    return this.computeInverse(Tensor.from(y));
  }

  forwardEventShape(shape: Shape): Shape {
    return shape;
  }

  inverseEventShape(shape: Shape): Shape {
    return shape;
  }

  forwardLogDetJacobian(x: TensorLike, eventNdims: number): Tensor {
    const input = Tensor.from(x);
    assertEventNdims(this.name, eventNdims, this.forwardMinEventNdims, input.rank);
    return this.reduceJacobian(
      this.computeForwardLogDetJacobian(input),
      input.shape.slice(0, input.rank - this.forwardMinEventNdims),
      eventNdims - this.forwardMinEventNdims
    );
  }

  inverseLogDetJacobian(y: TensorLike, eventNdims: number): Tensor {
    const input = Tensor.from(y);
    assertEventNdims(this.name, eventNdims, this.inverseMinEventNdims, input.rank);
    return this.reduceJacobian(
      this.computeInverseLogDetJacobian(input),
      input.shape.slice(0, input.rank - this.inverseMinEventNdims),
      eventNdims - this.inverseMinEventNdims
    );
  }

  private reduceJacobian(ldj: Tensor, batchShape: Shape, extraNdims: number): Tensor {
    const full = ldj.broadcastTo(broadcastShapes(ldj.shape, batchShape));
    return reduceTrailing(full, extraNdims);
  }
}
