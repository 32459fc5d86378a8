/**
 * Composition of bijectors. Like function composition, the last bijector in
 * the list is applied first: Chain([f, g]).forward(x) = f(g(x)).
 */

import type { Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { assertEventNdims, type Bijector } from './Bijector';

export class Chain implements Bijector {
  readonly name: string;
  readonly forwardMinEventNdims: number;
  readonly inverseMinEventNdims: number;

  constructor(readonly bijectors: readonly Bijector[]) {
    this.name = `Chain(${bijectors.map((b) => b.name).join(', ')})`;

    // Track the rank change so every member sees at least its own minimum
    let minInput = 0;
    let rankChange = 0;
    for (const b of this.applicationOrder()) {
      minInput = Math.max(minInput, b.forwardMinEventNdims - rankChange);
      rankChange += b.inverseMinEventNdims - b.forwardMinEventNdims;
    }
    this.forwardMinEventNdims = minInput;
    this.inverseMinEventNdims = minInput + rankChange;
  }

  private applicationOrder(): Bijector[] {
    return [...this.bijectors].reverse();
  }

  forward(x: TensorLike): Tensor {
    return this.applicationOrder().reduce((value, b) => b.forward(value), Tensor.from(x));
  }

  inverse(y: TensorLike): Tensor {
    return this.bijectors.reduce((value, b) => b.inverse(value), Tensor.from(y));
  }

  forwardEventShape(shape: Shape): Shape {
    return this.applicationOrder().reduce((s, b) => b.forwardEventShape(s), shape);
  }

  inverseEventShape(shape: Shape): Shape {
    return this.bijectors.reduce((s, b) => b.inverseEventShape(s), shape);
  }

  forwardLogDetJacobian(x: TensorLike, eventNdims: number): Tensor {
    let value = Tensor.from(x);
    assertEventNdims(this.name, eventNdims, this.forwardMinEventNdims, value.rank);
    let ndims = eventNdims;
    let total = Tensor.scalar(0, value.dtype);
    for (const b of this.applicationOrder()) {
      total = total.add(b.forwardLogDetJacobian(value, ndims));
      const next = b.forward(value);
      ndims += next.rank - value.rank;
      value = next;
    }
    return total;
  }

  inverseLogDetJacobian(y: TensorLike, eventNdims: number): Tensor {
    let value = Tensor.from(y);
    assertEventNdims(this.name, eventNdims, this.inverseMinEventNdims, value.rank);
    let ndims = eventNdims;
    let total = Tensor.scalar(0, value.dtype);
    for (const b of this.bijectors) {
      total = total.add(b.inverseLogDetJacobian(value, ndims));
      const next = b.inverse(value);
      ndims += next.rank - value.rank;
      value = next;
    }
    return total;
  }
}
