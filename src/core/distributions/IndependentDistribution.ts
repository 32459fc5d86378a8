/**
 * Reinterprets the trailing `reinterpretedBatchNdims` batch dimensions of a
 * base distribution as event dimensions
 */

import type { Bijector } from '../bijectors/Bijector';
import { DistributionError, ErrorCode, ShapeError } from '../errors';
import { reduceTrailing } from '../reduction/ReductionEngine';
import { concatPartialShapes } from '../shape/ShapeAlgebra';
import type { PartialShape, Shape } from '../shape/types';
import type { Tensor, TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type Distribution, type DistributionOptions } from './Distribution';

export class IndependentDistribution extends BaseDistribution {
  constructor(
    readonly distribution: Distribution,
    readonly reinterpretedBatchNdims: number,
    options: Pick<DistributionOptions, 'name' | 'rng'> = {}
  ) {
    super(`Independent${distribution.name}`, { ...options, dtype: distribution.dtype });
    if (!Number.isInteger(reinterpretedBatchNdims) || reinterpretedBatchNdims < 0) {
      throw new DistributionError(
        ErrorCode.INVALID_PARAMETER,
        `reinterpretedBatchNdims must be a non-negative integer, got ${reinterpretedBatchNdims}`
      );
    }
    const staticBatch = distribution.batchShape();
    if (staticBatch !== null && staticBatch.length < reinterpretedBatchNdims) {
      throw new ShapeError(
        `Cannot reinterpret ${reinterpretedBatchNdims} dimensions of batch shape [${staticBatch.join(', ')}]`,
        { reinterpretedBatchNdims, batchShape: staticBatch }
      );
    }
  }

  /**
   * Position in the base batch shape where the reinterpreted part starts
   */
  private split(batch: Shape): number {
    if (batch.length < this.reinterpretedBatchNdims) {
      throw new ShapeError(
        `Cannot reinterpret ${this.reinterpretedBatchNdims} dimensions of batch shape [${batch.join(', ')}]`,
        { reinterpretedBatchNdims: this.reinterpretedBatchNdims, batchShape: batch }
      );
    }
    return batch.length - this.reinterpretedBatchNdims;
  }

  batchShape(): PartialShape {
    const batch = this.distribution.batchShape();
    if (batch === null) return null;
    return batch.slice(0, batch.length - this.reinterpretedBatchNdims);
  }

  batchShapeTensor(): Shape {
    const batch = this.distribution.batchShapeTensor();
    return batch.slice(0, this.split(batch));
  }

  eventShape(): PartialShape {
    const batch = this.distribution.batchShape();
    if (batch === null) return null;
    return concatPartialShapes(
      batch.slice(batch.length - this.reinterpretedBatchNdims),
      this.distribution.eventShape()
    );
  }

  eventShapeTensor(): Shape {
    const batch = this.distribution.batchShapeTensor();
    return [...batch.slice(this.split(batch)), ...this.distribution.eventShapeTensor()];
  }

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    return this.distribution.sample(sampleShape, rng);
  }

  logProb(x: TensorLike): Tensor {
    return reduceTrailing(this.distribution.logProb(x), this.reinterpretedBatchNdims);
  }

  override unnormalizedLogProb(x: TensorLike): Tensor {
    return reduceTrailing(this.distribution.unnormalizedLogProb(x), this.reinterpretedBatchNdims);
  }

  override mean(): Tensor {
    return this.distribution.mean();
  }

  override variance(): Tensor {
    return this.distribution.variance();
  }

  override stddev(): Tensor {
    return this.distribution.stddev();
  }

  override mode(): Tensor {
    return this.distribution.mode();
  }

  override entropy(): Tensor {
    return reduceTrailing(this.distribution.entropy(), this.reinterpretedBatchNdims);
  }

  /**
   * The base bijector, unchanged. Its log-det-Jacobian is not broadcast across
   * the reinterpreted dimensions.
   */
  override defaultEventSpaceBijector(): Bijector | undefined {
    return this.distribution.defaultEventSpaceBijector();
  }
}
