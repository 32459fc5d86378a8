/**
 * Batched continuous Uniform distribution on [low, high)
 */

import type { Bijector } from '../bijectors/Bijector';
import { Sigmoid } from '../bijectors/Sigmoid';
import { DistributionError, ErrorCode } from '../errors';
import type { PartialShape, Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type DistributionOptions } from './Distribution';
import { batchShapeOf, drawElementwise, Param, staticBatchShape, type ParamInput } from './params';

export class UniformDistribution extends BaseDistribution {
  readonly low: Param;
  readonly high: Param;

  constructor(low: ParamInput = 0, high: ParamInput = 1, options: DistributionOptions = {}) {
    super('Uniform', options);
    this.low = new Param('low', low, this.dtype, 'real', this.validateArgs);
    this.high = new Param('high', high, this.dtype, 'real', this.validateArgs);
    if (!this.low.isVariable && !this.high.isVariable) {
      this.bounds();
    }
  }

  /**
   * Current bounds, checked for low < high
   */
  private bounds(): [Tensor, Tensor] {
    const low = this.low.read();
    const high = this.high.read();
    const ordered = Tensor.mapN([low, high], (l, h) => (l < h ? 1 : 0));
    if (ordered.toFlatArray().some((v) => v === 0)) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Uniform requires low < high', {
        low: low.toFlatArray(),
        high: high.toFlatArray(),
      });
    }
    return [low, high];
  }

  batchShape(): PartialShape {
    return staticBatchShape([this.low, this.high]);
  }

  batchShapeTensor(): Shape {
    return batchShapeOf([this.low.read(), this.high.read()]);
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
      this.bounds(),
      (l, h) => l + (h - l) * rng.uniform(),
      this.dtype
    );
  }

  logProb(x: TensorLike): Tensor {
    const [low, high] = this.bounds();
    return Tensor.mapN(
      [Tensor.from(x, this.dtype), low, high],
      (v, l, h) => (v >= l && v < h ? -Math.log(h - l) : -Infinity),
      this.dtype
    );
  }

  override mean(): Tensor {
    const [low, high] = this.bounds();
    return Tensor.mapN([low, high], (l, h) => (l + h) / 2, this.dtype);
  }

  override variance(): Tensor {
    const [low, high] = this.bounds();
    return Tensor.mapN([low, high], (l, h) => ((h - l) * (h - l)) / 12, this.dtype);
  }

  override entropy(): Tensor {
    const [low, high] = this.bounds();
    return Tensor.mapN([low, high], (l, h) => Math.log(h - l), this.dtype);
  }

  override defaultEventSpaceBijector(): Bijector {
    const [low, high] = this.bounds();
    return new Sigmoid(low, high);
  }
}
