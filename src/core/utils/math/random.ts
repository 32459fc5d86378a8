// src/core/utils/math/random.ts
/**
 * Seeded random number generation for sampling
 */

import { Random, MersenneTwister19937 } from 'random-js';
import { DistributionError, ErrorCode } from '../../errors';

/**
 * Seeded random number generator using Mersenne Twister
 */
export class RNG {
  private random: Random;
  private engine: MersenneTwister19937;
  private normalCache: number | null = null;

  constructor(seed?: number) {
    this.engine =
      seed !== undefined ? MersenneTwister19937.seed(seed) : MersenneTwister19937.autoSeed();
    this.random = new Random(this.engine);
  }

  /**
   * Reset the RNG with a new seed
   */
  setSeed(seed: number): void {
    this.engine = MersenneTwister19937.seed(seed);
    this.random = new Random(this.engine);
    this.normalCache = null;
  }

  /**
   * Uniform random in [0, 1)
   */
  uniform(): number {
    return this.random.real(0, 1, false);
  }

  /**
   * Uniform random in (0, 1), safe to pass to log()
   */
  openUniform(): number {
    let u = this.uniform();
    while (u === 0) {
      u = this.uniform();
    }
    return u;
  }

  /**
   * Standard normal using Box-Muller transform
   * Caches the second value
   */
  normal(): number {
    if (this.normalCache !== null) {
      const value = this.normalCache;
      this.normalCache = null;
      return value;
    }

    const u1 = this.openUniform();
    const u2 = this.uniform();

    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.normalCache = r * Math.sin(theta);
    return r * Math.cos(theta);
  }

  /**
   * Gamma distribution using Marsaglia and Tsang's method
   */
  gamma(shape: number, scale: number = 1): number {
    if (shape <= 0 || scale <= 0) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Gamma parameters must be positive', {
        shape,
        scale,
      });
    }

    if (shape < 1) {
      // Boost: Gamma(a) = Gamma(a + 1) * U^(1/a)
      const u = this.openUniform();
      return this.gamma(shape + 1, scale) * Math.pow(u, 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
      let x: number;
      let v: number;

      do {
        x = this.normal();
        v = 1 + c * x;
      } while (v <= 0);

      v = v * v * v;
      const u = this.openUniform();

      if (u < 1 - 0.0331 * x * x * x * x) {
        return d * v * scale;
      }

      if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) {
        return d * v * scale;
      }
    }
  }

  /**
   * Beta distribution using gamma ratio
   */
  beta(alpha: number, beta: number): number {
    if (alpha <= 0 || beta <= 0) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Beta parameters must be positive', {
        alpha,
        beta,
      });
    }

    const x = this.gamma(alpha);
    const y = this.gamma(beta);
    return x / (x + y);
  }

  /**
   * Poisson distribution
   */
  poisson(lambda: number): number {
    if (lambda <= 0) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Lambda must be positive', {
        lambda,
      });
    }

    if (lambda < 30) {
      // Knuth's multiplication method
      const L = Math.exp(-lambda);
      let k = 0;
      let p = 1;

      do {
        k++;
        p *= this.uniform();
      } while (p > L);

      return k - 1;
    }

    // Normal approximation for large lambda
    return Math.max(0, Math.round(lambda + Math.sqrt(lambda) * this.normal()));
  }
}

// Default RNG instance (unseeded)
export const defaultRNG = new RNG();
