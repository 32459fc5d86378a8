/**
 * LKJ distribution over Cholesky factors of correlation matrices
 *
 * Density of L (lower triangular, unit-norm rows) with concentration c:
 *   p(L) ∝ ∏_i L_ii^(m - i - 1 + 2c - 2)   (i counted from 0)
 * Sampling uses the onion method.
 */

import type { Bijector } from '../bijectors/Bijector';
import { CorrelationCholesky } from '../bijectors/CorrelationCholesky';
import { DistributionError, ErrorCode, ShapeError } from '../errors';
import { shapeSize, type PartialShape, type Shape } from '../shape/types';
import { broadcastShapes } from '../tensor/broadcast';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { RNG } from '../utils/math/random';
import { logGamma } from '../utils/math/special';
import { BaseDistribution, type DistributionOptions } from './Distribution';
import { Param, type ParamInput } from './params';

/**
 * Log normalizing constant of the LKJ density over Cholesky factors
 */
export function lkjLogNormalizer(dimension: number, concentration: number): number {
  let result = 0;
  for (let k = 1; k < dimension; k++) {
    const effective = concentration + (dimension - 1 - k) / 2;
    result += (Math.log(Math.PI) * k) / 2;
    result += logGamma(effective) - logGamma(effective + k / 2);
  }
  return result;
}

export class CholeskyLKJDistribution extends BaseDistribution {
  readonly concentration: Param;

  constructor(
    readonly dimension: number,
    concentration: ParamInput,
    options: DistributionOptions = {}
  ) {
    super('CholeskyLKJ', options);
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new DistributionError(
        ErrorCode.INVALID_PARAMETER,
        `Dimension must be a positive integer, got ${dimension}`,
        { dimension }
      );
    }
    this.concentration = new Param(
      'concentration',
      concentration,
      this.dtype,
      'positive',
      this.validateArgs
    );
  }

  batchShape(): PartialShape {
    return this.concentration.staticShape();
  }

  batchShapeTensor(): Shape {
    return this.concentration.read().shape;
  }

  eventShape(): PartialShape {
    return [this.dimension, this.dimension];
  }

  eventShapeTensor(): Shape {
    return [this.dimension, this.dimension];
  }

  protected drawSamples(sampleShape: Shape, rng: RNG): Tensor {
    const m = this.dimension;
    const conc = this.concentration.read();
    const cells = shapeSize(sampleShape) * conc.size;
    const values = conc.values;
    const out: number[] = [];

    for (let cell = 0; cell < cells; cell++) {
      const c = values[cell % conc.size];
      out.push(...this.onion(c, rng));
    }
    return Tensor.fromData([...sampleShape, ...conc.shape, m, m], out, this.dtype);
  }

  /**
   * One m×m factor, row-major. Row n is [sqrt(y) u, sqrt(1 - y), 0...] with
   * y ~ Beta(n/2, c + (m - 2 - n)/2) and u uniform on the unit sphere.
   */
  private onion(concentration: number, rng: RNG): number[] {
    const m = this.dimension;
    const rows: number[][] = [];
    let betaConcentration = concentration + (m - 2) / 2;

    for (let n = 0; n < m; n++) {
      const row = new Array<number>(m).fill(0);
      if (n === 0) {
        row[0] = 1;
      } else {
        betaConcentration -= 0.5;
        const y = rng.beta(n / 2, betaConcentration);
        const direction = Array.from({ length: n }, () => rng.normal());
        const norm = Math.sqrt(direction.reduce((acc, v) => acc + v * v, 0));
        for (let j = 0; j < n; j++) {
          row[j] = (Math.sqrt(y) * direction[j]) / norm;
        }
        row[n] = Math.sqrt(1 - y);
      }
      rows.push(row);
    }
    return rows.flat();
  }

  private logDensity(x: TensorLike, normalized: boolean): Tensor {
    const m = this.dimension;
    const value = Tensor.from(x, this.dtype);
    const n = value.rank;
    if (n < 2 || value.shape[n - 1] !== m || value.shape[n - 2] !== m) {
      throw new ShapeError(
        `Expected trailing dimensions [${m}, ${m}], got [${value.shape.join(', ')}]`,
        { shape: value.shape, dimension: m }
      );
    }
    const conc = this.concentration.read();
    const batch = broadcastShapes(value.shape.slice(0, -2), conc.shape);
    const factors = value.broadcastTo([...batch, m, m]);
    const concentrations = conc.broadcastTo(batch);

    return Tensor.fromFunction(
      batch,
      (index) => {
        const c = concentrations.at(index);
        let result = 0;
        for (let i = 0; i < m; i++) {
          const exponent = m - (i + 1) + 2 * c - 2;
          const diag = factors.at([...index, i, i]);
          if (exponent !== 0) result += exponent * Math.log(diag);
        }
        return normalized ? result - lkjLogNormalizer(m, c) : result;
      },
      this.dtype
    );
  }

  logProb(x: TensorLike): Tensor {
    return this.logDensity(x, true);
  }

  override unnormalizedLogProb(x: TensorLike): Tensor {
    return this.logDensity(x, false);
  }

  override defaultEventSpaceBijector(): Bijector {
    return new CorrelationCholesky();
  }
}
