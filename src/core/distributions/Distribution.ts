/**
 * Base interface for all batched probability distributions
 *
 * A distribution has a batch shape B (independent, non-identical members) and
 * an event shape E (the shape of one draw). `sample(S)` returns `S ++ B ++ E`;
 * `logProb(x)` returns one value per batch member and leading sample index.
 */

import type { Bijector } from '../bijectors/Bijector';
import { DistributionError, ErrorCode, UnsupportedStatisticError } from '../errors';
import { formatShape, type PartialShape, type Shape } from '../shape/types';
import { Tensor, type DType, type TensorLike } from '../tensor/Tensor';
import { RNG } from '../utils/math/random';

export interface Distribution {
  readonly name: string;
  readonly dtype: DType;

  /**
   * Static batch shape; unknown dimensions are null, unknown rank is null
   */
  batchShape(): PartialShape;

  /**
   * Batch shape as of now
   */
  batchShapeTensor(): Shape;

  eventShape(): PartialShape;
  eventShapeTensor(): Shape;

  /**
   * Draw samples of shape `sampleShape ++ B ++ E`
   */
  sample(sampleShape?: number | Shape, rng?: RNG): Tensor;

  /**
   * Log probability density/mass at `x`
   */
  logProb(x: TensorLike): Tensor;

  /**
   * Log density up to a constant
   */
  unnormalizedLogProb(x: TensorLike): Tensor;

  prob(x: TensorLike): Tensor;

  mean(): Tensor;
  variance(): Tensor;
  stddev(): Tensor;
  mode(): Tensor;
  entropy(): Tensor;

  /**
   * Bijector from unconstrained space onto the support, if the family has one
   */
  defaultEventSpaceBijector(): Bijector | undefined;
}

export interface DistributionOptions {
  /** Floating-point type of parameters, samples and densities */
  dtype?: DType;
  /** Check variable parameters whenever they are read */
  validateArgs?: boolean;
  name?: string;
  /** Generator used when `sample` is called without one */
  rng?: RNG;
}

export const DEFAULT_DISTRIBUTION_OPTIONS = {
  dtype: 'float64',
  validateArgs: false,
} as const satisfies DistributionOptions;

/**
 * `n` means `[n]`
 */
export function toSampleShape(sampleShape: number | Shape): Shape {
  const shape = typeof sampleShape === 'number' ? [sampleShape] : sampleShape;
  if (shape.some((d) => !Number.isInteger(d) || d < 0)) {
    throw new DistributionError(
      ErrorCode.INVALID_PARAMETER,
      `Sample shape must contain non-negative integers, got [${shape.join(', ')}]`,
      { sampleShape: shape }
    );
  }
  return shape;
}

/**
 * Common plumbing. Optional statistics throw UnsupportedStatisticError unless
 * a family overrides them.
 */
export abstract class BaseDistribution implements Distribution {
  readonly name: string;
  readonly dtype: DType;
  readonly validateArgs: boolean;
  protected readonly rng: RNG;

  constructor(defaultName: string, options: DistributionOptions = {}) {
    this.name = options.name ?? defaultName;
    this.dtype = options.dtype ?? DEFAULT_DISTRIBUTION_OPTIONS.dtype;
    this.validateArgs = options.validateArgs ?? DEFAULT_DISTRIBUTION_OPTIONS.validateArgs;
    this.rng = options.rng ?? new RNG();
  }

  abstract batchShape(): PartialShape;
  abstract batchShapeTensor(): Shape;
  abstract eventShape(): PartialShape;
  abstract eventShapeTensor(): Shape;
  abstract logProb(x: TensorLike): Tensor;

  protected abstract drawSamples(sampleShape: Shape, rng: RNG): Tensor;

  sample(sampleShape: number | Shape = [], rng?: RNG): Tensor {
    return this.drawSamples(toSampleShape(sampleShape), rng ?? this.rng);
  }

  unnormalizedLogProb(x: TensorLike): Tensor {
    return this.logProb(x);
  }

  prob(x: TensorLike): Tensor {
    return this.logProb(x).exp();
  }

  mean(): Tensor {
    throw new UnsupportedStatisticError('mean', this.name);
  }

  variance(): Tensor {
    throw new UnsupportedStatisticError('variance', this.name);
  }

  stddev(): Tensor {
    return this.variance().map(Math.sqrt);
  }

  mode(): Tensor {
    throw new UnsupportedStatisticError('mode', this.name);
  }

  entropy(): Tensor {
    throw new UnsupportedStatisticError('entropy', this.name);
  }

  defaultEventSpaceBijector(): Bijector | undefined {
    return undefined;
  }

  toString(): string {
    return `${this.name}(batchShape=${formatShape(this.batchShape())}, eventShape=${formatShape(this.eventShape())})`;
  }
}
