/**
 * Batched Logistic distribution with location `loc` and scale `scale`
 */

import type { Bijector } from '../bijectors/Bijector';
import { Identity } from '../bijectors/Identity';
import type { PartialShape, Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { softplus } from '../utils/math/special';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type DistributionOptions } from './Distribution';
import { batchShapeOf, drawElementwise, Param, staticBatchShape, type ParamInput } from './params';

export class LogisticDistribution extends BaseDistribution {
  readonly loc: Param;
  readonly scale: Param;

  constructor(loc: ParamInput, scale: ParamInput, options: DistributionOptions = {}) {
    super('Logistic', options);
    this.loc = new Param('loc', loc, this.dtype, 'real', this.validateArgs);
    this.scale = new Param('scale', scale, this.dtype, 'positive', this.validateArgs);
  }

  batchShape(): PartialShape {
    return staticBatchShape([this.loc, this.scale]);
  }

  batchShapeTensor(): Shape {
    return batchShapeOf([this.loc.read(), this.scale.read()]);
  }

  eventShape(): PartialShape {
    return [];
  }

  eventShapeTensor(): Shape {
    return [];
  }

  // Inverse CDF at a uniform draw: loc + scale * logit(u)
  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    return drawElementwise(
      sampleShape,
      [this.loc.read(), this.scale.read()],
      (mu, s) => {
        const u = rng.openUniform();
        return mu + s * (Math.log(u) - Math.log1p(-u));
      },
      this.dtype
    );
  }

  logProb(x: TensorLike): Tensor {
    return Tensor.mapN(
      [Tensor.from(x, this.dtype), this.loc.read(), this.scale.read()],
      (v, mu, s) => {
        const z = (v - mu) / s;
        return -z - 2 * softplus(-z) - Math.log(s);
      },
      this.dtype
    );
  }

  override mean(): Tensor {
    return this.loc.read().broadcastTo(this.batchShapeTensor());
  }

  override mode(): Tensor {
    return this.mean();
  }

  override variance(): Tensor {
    return this.scale
      .read()
      .broadcastTo(this.batchShapeTensor())
      .map((s) => (s * s * Math.PI * Math.PI) / 3);
  }

  override entropy(): Tensor {
    return this.scale
      .read()
      .broadcastTo(this.batchShapeTensor())
      .map((s) => Math.log(s) + 2);
  }

  override defaultEventSpaceBijector(): Bijector {
    return new Identity();
  }
}
