/**
 * Batched Normal distribution
 */

import type { Bijector } from '../bijectors/Bijector';
import { Identity } from '../bijectors/Identity';
import type { PartialShape, Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type DistributionOptions } from './Distribution';
import { batchShapeOf, drawElementwise, Param, staticBatchShape, type ParamInput } from './params';

const LOG_TWO_PI = Math.log(2 * Math.PI);

export class NormalDistribution extends BaseDistribution {
  readonly loc: Param;
  readonly scale: Param;

  constructor(loc: ParamInput, scale: ParamInput, options: DistributionOptions = {}) {
    super('Normal', options);
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

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    return drawElementwise(
      sampleShape,
      [this.loc.read(), this.scale.read()],
      (mu, sigma) => mu + sigma * rng.normal(),
      this.dtype
    );
  }

  // log φ(x) = -0.5 log(2π) - log σ - 0.5 ((x - μ) / σ)²
  logProb(x: TensorLike): Tensor {
    return Tensor.mapN(
      [Tensor.from(x, this.dtype), this.loc.read(), this.scale.read()],
      (v, mu, sigma) => {
        const z = (v - mu) / sigma;
        return -0.5 * LOG_TWO_PI - Math.log(sigma) - 0.5 * z * z;
      },
      this.dtype
    );
  }

  private broadcastToBatch(value: Tensor): Tensor {
    return value.broadcastTo(this.batchShapeTensor());
  }

  override mean(): Tensor {
    return this.broadcastToBatch(this.loc.read());
  }

  override mode(): Tensor {
    return this.mean();
  }

  override stddev(): Tensor {
    return this.broadcastToBatch(this.scale.read());
  }

  override variance(): Tensor {
    return this.stddev().map((s) => s * s);
  }

  // 0.5 log(2πe σ²)
  override entropy(): Tensor {
    return this.stddev().map((s) => 0.5 * (LOG_TWO_PI + 1) + Math.log(s));
  }

  override defaultEventSpaceBijector(): Bijector {
    return new Identity();
  }
}
