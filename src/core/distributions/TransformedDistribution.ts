/**
 * Distribution of Y = f(X) for a bijector f and base distribution X
 *
 * log p_Y(y) = log p_X(f⁻¹(y)) + log|det J_{f⁻¹}(y)|, with the Jacobian taken
 * over the full event rank of Y.
 */

import type { Bijector } from '../bijectors/Bijector';
import { Chain } from '../bijectors/Chain';
import type { PartialShape, Shape } from '../shape/types';
import { isFullyDefined } from '../shape/types';
import type { Tensor, TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type Distribution, type DistributionOptions } from './Distribution';

export class TransformedDistribution extends BaseDistribution {
  constructor(
    readonly distribution: Distribution,
    readonly bijector: Bijector,
    options: Pick<DistributionOptions, 'name' | 'rng'> = {}
  ) {
    super(`${bijector.name}${distribution.name}`, { ...options, dtype: distribution.dtype });
  }

  batchShape(): PartialShape {
    return this.distribution.batchShape();
  }

  batchShapeTensor(): Shape {
    return this.distribution.batchShapeTensor();
  }

  eventShape(): PartialShape {
    const event = this.distribution.eventShape();
    if (event === null) return null;
    if (isFullyDefined(event)) return this.bijector.forwardEventShape(event);
    return this.bijector.forwardMinEventNdims === this.bijector.inverseMinEventNdims
      ? event
      : null;
  }

  eventShapeTensor(): Shape {
    return this.bijector.forwardEventShape(this.distribution.eventShapeTensor());
  }

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    return this.bijector.forward(this.distribution.sample(sampleShape, rng));
  }

  logProb(x: TensorLike): Tensor {
    const eventNdims = this.eventShapeTensor().length;
    const inverse = this.bijector.inverse(x);
    return this.distribution
      .logProb(inverse)
      .add(this.bijector.inverseLogDetJacobian(x, eventNdims));
  }

  /**
   * Base default bijector followed by this distribution's bijector
   */
  override defaultEventSpaceBijector(): Bijector | undefined {
    const inner = this.distribution.defaultEventSpaceBijector();
    return inner === undefined ? undefined : new Chain([this.bijector, inner]);
  }
}
