/**
 * Distribution over i.i.d. replicates of a base distribution
 *
 * `new SampleDistribution(base, K)` draws prod(K) independent copies of
 * every batch member of `base` and arranges them in a block of shape K placed
 * in front of the base event:
 *
 *   batch shape  B          (unchanged)
 *   event shape  K ++ E
 *   sample(S)    S ++ B ++ K ++ E
 *
 * The sample shape may be held in a Variable, in which case it is read and
 * validated afresh by every operation.
 */

import type { Bijector } from '../bijectors/Bijector';
import { SampleBijector } from '../bijectors/SampleBijector';
import { DistributionError, ErrorCode } from '../errors';
import { reduceLogDensity } from '../reduction/ReductionEngine';
import {
  baseLayout,
  broadcastToEventShape,
  composeBatchShape,
  composeEventShape,
  concatPartialShapes,
  padLeft,
  replicateCount,
  samplingPermutation,
} from '../shape/ShapeAlgebra';
import {
  SampleShapeProvider,
  type SampleShapeInput,
  type ShapeProvider,
} from '../shape/ShapeValidator';
import type { PartialShape, Shape } from '../shape/types';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { BaseDistribution, type Distribution } from './Distribution';

export interface SampleDistributionOptions {
  /** Reduce log-densities with compensated summation (default false) */
  useKahanSum?: boolean;
  name?: string;
  rng?: RNG;
}

/**
 * Shapes of the base distribution and the replicate block, read together
 */
interface ResolvedShapes {
  sample: Shape;
  batch: Shape;
  baseEvent: Shape;
}

export class SampleDistribution extends BaseDistribution {
  readonly useKahanSum: boolean;
  private readonly sampleShapeProvider: ShapeProvider;

  constructor(
    readonly distribution: Distribution,
    sampleShape: SampleShapeInput = [],
    options: SampleDistributionOptions = {}
  ) {
    super(`Sample${distribution.name}`, {
      name: options.name,
      rng: options.rng,
      dtype: distribution.dtype,
    });
    this.useKahanSum = options.useKahanSum ?? false;
    this.sampleShapeProvider = new SampleShapeProvider(sampleShape);
  }

  /**
   * Current sample shape K
   */
  sampleShape(): Shape {
    return this.sampleShapeProvider.resolve();
  }

  private resolveShapes(): ResolvedShapes {
    return {
      sample: this.sampleShape(),
      batch: this.distribution.batchShapeTensor(),
      baseEvent: this.distribution.eventShapeTensor(),
    };
  }

  batchShape(): PartialShape {
    return this.distribution.batchShape();
  }

  batchShapeTensor(): Shape {
    return composeBatchShape(this.distribution.batchShapeTensor());
  }

  eventShape(): PartialShape {
    return concatPartialShapes(
      this.sampleShapeProvider.staticShape(),
      this.distribution.eventShape()
    );
  }

  eventShapeTensor(): Shape {
    return composeEventShape(this.sampleShape(), this.distribution.eventShapeTensor());
  }

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    const { sample, batch, baseEvent } = this.resolveShapes();
    const draws = this.distribution.sample([...sampleShape, ...sample], rng);
    return draws.transpose(
      samplingPermutation(sampleShape.length, sample.length, batch.length, baseEvent.length)
    );
  }

  /**
   * Per-replicate log-densities from the base, laid out as `K ++ prefix ++ B`
   */
  private replicateLogDensities(x: TensorLike, density: (value: Tensor) => Tensor): Tensor {
    const { sample, batch, baseEvent } = this.resolveShapes();
    const value = Tensor.from(x, this.dtype);
    const expanded = broadcastToEventShape(value.shape, composeEventShape(sample, baseEvent));
    const layout = baseLayout(expanded.length, batch.length, sample.length, baseEvent.length);
    const full = value
      .broadcastTo(expanded)
      .reshape(padLeft(expanded, layout.padding))
      .transpose(layout.toBase);
    return reduceLogDensity(density(full), layout.sampleAxes, this.useKahanSum);
  }

  logProb(x: TensorLike): Tensor {
    return this.replicateLogDensities(x, (v) => this.distribution.logProb(v));
  }

  override unnormalizedLogProb(x: TensorLike): Tensor {
    return this.replicateLogDensities(x, (v) => this.distribution.unnormalizedLogProb(v));
  }

  /**
   * Base statistic of shape `B ++ E` repeated over K: `B ++ K ++ E`
   */
  private replicate(statistic: Tensor): Tensor {
    const { sample, batch, baseEvent } = this.resolveShapes();
    const withBatch = statistic.broadcastTo([...batch, ...baseEvent]);
    const ones = new Array<number>(sample.length).fill(1);
    return withBatch
      .reshape([...batch, ...ones, ...baseEvent])
      .broadcastTo([...batch, ...sample, ...baseEvent]);
  }

  override mean(): Tensor {
    return this.replicate(this.distribution.mean());
  }

  override variance(): Tensor {
    return this.replicate(this.distribution.variance());
  }

  override stddev(): Tensor {
    return this.replicate(this.distribution.stddev());
  }

  override mode(): Tensor {
    return this.replicate(this.distribution.mode());
  }

  override entropy(): Tensor {
    const count = replicateCount(this.sampleShape());
    return this.distribution
      .entropy()
      .broadcastTo(this.batchShapeTensor())
      .map((h) => h * count);
  }

  override defaultEventSpaceBijector(): Bijector | undefined {
    if (this.distribution.defaultEventSpaceBijector() === undefined) return undefined;
    return new SampleBijector({
      innerBijector: () => {
        const inner = this.distribution.defaultEventSpaceBijector();
        if (inner === undefined) {
          throw new DistributionError(
            ErrorCode.INTERNAL_ERROR,
            `${this.distribution.name} no longer has an event-space bijector`
          );
        }
        return inner;
      },
      sampleShape: () => this.sampleShape(),
      batchShape: () => this.distribution.batchShapeTensor(),
      baseEventShape: () => this.distribution.eventShapeTensor(),
    });
  }
}
