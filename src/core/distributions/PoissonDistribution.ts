/**
 * Batched Poisson distribution, parameterized by `rate` or `logRate`
 */

import { DistributionError, ErrorCode } from '../errors';
import type { PartialShape, Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { logGamma } from '../utils/math/special';
import { BaseDistribution, type DistributionOptions } from './Distribution';
import { batchShapeOf, drawElementwise, Param, staticBatchShape, type ParamInput } from './params';

export type PoissonParams = { rate: ParamInput } | { logRate: ParamInput };

export class PoissonDistribution extends BaseDistribution {
  private readonly param: Param;
  private readonly isLogRate: boolean;

  constructor(params: PoissonParams, options: DistributionOptions = {}) {
    super('Poisson', options);
    if ('rate' in params && 'logRate' in params) {
      throw new DistributionError(
        ErrorCode.INVALID_PARAMETER,
        'Pass exactly one of `rate` or `logRate`'
      );
    }
    if ('logRate' in params) {
      this.isLogRate = true;
      this.param = new Param('logRate', params.logRate, this.dtype, 'real', this.validateArgs);
    } else {
      this.isLogRate = false;
      this.param = new Param('rate', params.rate, this.dtype, 'positive', this.validateArgs);
    }
  }

  logRate(): Tensor {
    const value = this.param.read();
    return this.isLogRate ? value : value.log();
  }

  rate(): Tensor {
    const value = this.param.read();
    return this.isLogRate ? value.exp() : value;
  }

  batchShape(): PartialShape {
    return staticBatchShape([this.param]);
  }

  batchShapeTensor(): Shape {
    return batchShapeOf([this.param.read()]);
  }

  eventShape(): PartialShape {
    return [];
  }

  eventShapeTensor(): Shape {
    return [];
  }

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    return drawElementwise(sampleShape, [this.rate()], (lambda) => rng.poisson(lambda), this.dtype);
  }

  // x log λ - λ - log Γ(x + 1)
  logProb(x: TensorLike): Tensor {
    return Tensor.mapN(
      [Tensor.from(x, this.dtype), this.logRate()],
      (k, logLambda) => {
        if (k < 0 || !Number.isInteger(k)) return -Infinity;
        return k * logLambda - Math.exp(logLambda) - logGamma(k + 1);
      },
      this.dtype
    );
  }

  override mean(): Tensor {
    return this.rate();
  }

  override variance(): Tensor {
    return this.rate();
  }

  override mode(): Tensor {
    return this.rate().map(Math.floor);
  }
}
