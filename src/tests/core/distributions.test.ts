/**
 * Tests for the batched families and the Independent / Transformed combinators
 */

import { describe, it, expect } from 'vitest';
import { Exp } from '../../core/bijectors/Exp';
import { Identity } from '../../core/bijectors/Identity';
import { Sigmoid } from '../../core/bijectors/Sigmoid';
import { CorrelationCholesky } from '../../core/bijectors/CorrelationCholesky';
import { CholeskyLKJDistribution, lkjLogNormalizer } from '../../core/distributions/CholeskyLKJDistribution';
import { IndependentDistribution } from '../../core/distributions/IndependentDistribution';
import { LogisticDistribution } from '../../core/distributions/LogisticDistribution';
import { NormalDistribution } from '../../core/distributions/NormalDistribution';
import { PoissonDistribution } from '../../core/distributions/PoissonDistribution';
import { TransformedDistribution } from '../../core/distributions/TransformedDistribution';
import { UniformDistribution } from '../../core/distributions/UniformDistribution';
import { klDivergence } from '../../core/distributions/kl';
import {
  DistributionError,
  ErrorCode,
  ShapeError,
  UnsupportedStatisticError,
} from '../../core/errors';
import { Tensor } from '../../core/tensor/Tensor';
import { Variable } from '../../core/tensor/Variable';
import { RNG } from '../../core/utils/math/random';
import { expectAllClose } from '../utilities/tensor-assertions';

const HALF_LOG_TWO_PI = 0.5 * Math.log(2 * Math.PI);

describe('NormalDistribution', () => {
  it('should broadcast parameters into a batch', () => {
    const normal = new NormalDistribution([1, 2], [[1], [2]]);
    expect(normal.batchShape()).toEqual([2, 2]);
    expect(normal.batchShapeTensor()).toEqual([2, 2]);
    expect(normal.eventShape()).toEqual([]);
    expectAllClose(normal.mean(), [
      [1, 2],
      [1, 2],
    ]);
    expectAllClose(normal.variance(), [
      [1, 1],
      [4, 4],
    ]);
  });

  it('should compute log densities', () => {
    const normal = new NormalDistribution(0, 1);
    expect(normal.logProb(0).item()).toBeCloseTo(-HALF_LOG_TWO_PI, 12);
    expect(normal.logProb(2).item()).toBeCloseTo(-HALF_LOG_TWO_PI - 2, 12);
    expect(normal.prob(0).item()).toBeCloseTo(0.3989422804, 9);
    expect(normal.entropy().item()).toBeCloseTo(HALF_LOG_TWO_PI + 0.5, 12);
  });

  it('should draw samples of shape S ++ B reproducibly', () => {
    const normal = new NormalDistribution(Tensor.zeros([3, 2]), 1);
    const a = normal.sample([4], new RNG(7));
    const b = normal.sample([4], new RNG(7));
    expect(a.shape).toEqual([4, 3, 2]);
    expect(a.toFlatArray()).toEqual(b.toFlatArray());
    expect(normal.sample().shape).toEqual([3, 2]);
    expect(normal.sample(5).shape).toEqual([5, 3, 2]);
  });

  it('should validate constant parameters at construction', () => {
    expect(() => new NormalDistribution(0, -1)).toThrow('Argument `scale` must be positive');
    expect(() => new NormalDistribution(0, 0)).toThrow(DistributionError);
  });

  it('should validate variable parameters on read when asked', () => {
    const scale = new Variable(1, { shape: null });
    const checked = new NormalDistribution(0, scale, { validateArgs: true });
    const unchecked = new NormalDistribution(0, scale);
    scale.assign(-1);
    expect(() => checked.logProb(0)).toThrow('Argument `scale` must be positive, got -1');
    expect(Number.isNaN(unchecked.logProb(0).item())).toBe(true);
  });

  it('should follow variable parameters', () => {
    const loc = new Variable(Tensor.zeros([4]), { shape: null });
    const normal = new NormalDistribution(loc, 1);
    expect(normal.batchShape()).toBeNull();
    expect(normal.batchShapeTensor()).toEqual([4]);
    loc.assign([[1], [2]]);
    expect(normal.batchShapeTensor()).toEqual([2, 1]);
  });

  it('should use the identity as its event-space bijector', () => {
    expect(new NormalDistribution(0, 1).defaultEventSpaceBijector()).toBeInstanceOf(Identity);
  });
});

describe('LogisticDistribution', () => {
  const logistic = new LogisticDistribution(0, 1);

  it('should compute log densities', () => {
    expect(logistic.logProb(0).item()).toBeCloseTo(-2 * Math.log(2), 12);
    const z = 1.5;
    expect(logistic.logProb(z).item()).toBeCloseTo(-z - 2 * Math.log1p(Math.exp(-z)), 12);
  });

  it('should report summary statistics', () => {
    const scaled = new LogisticDistribution([1, 2], 2);
    expectAllClose(scaled.mean(), [1, 2]);
    expectAllClose(scaled.mode(), [1, 2]);
    expectAllClose(scaled.variance(), [(4 * Math.PI ** 2) / 3, (4 * Math.PI ** 2) / 3]);
    expectAllClose(scaled.entropy(), [Math.log(2) + 2, Math.log(2) + 2]);
  });
});

describe('UniformDistribution', () => {
  const uniform = new UniformDistribution(0, 2);

  it('should be flat on [low, high)', () => {
    expectAllClose(uniform.logProb([0, 1, 2, 3]), [
      -Math.log(2),
      -Math.log(2),
      -Infinity,
      -Infinity,
    ]);
  });

  it('should report summary statistics', () => {
    expect(uniform.mean().item()).toBe(1);
    expect(uniform.variance().item()).toBeCloseTo(1 / 3, 12);
    expect(uniform.entropy().item()).toBeCloseTo(Math.log(2), 12);
  });

  it('should not implement mode', () => {
    expect(() => uniform.mode()).toThrow(UnsupportedStatisticError);
    expect(() => uniform.mode()).toThrow('Uniform does not implement mode()');
  });

  it('should sample inside its support', () => {
    const draws = new UniformDistribution([0, 10], [1, 11]).sample([50], new RNG(3));
    expect(draws.shape).toEqual([50, 2]);
    for (let i = 0; i < 50; i++) {
      expect(draws.at([i, 0])).toBeGreaterThanOrEqual(0);
      expect(draws.at([i, 0])).toBeLessThan(1);
      expect(draws.at([i, 1])).toBeGreaterThanOrEqual(10);
      expect(draws.at([i, 1])).toBeLessThan(11);
    }
  });

  it('should require low < high', () => {
    expect(() => new UniformDistribution(1, 1)).toThrow('Uniform requires low < high');
  });

  it('should map the real line onto its support', () => {
    expect(uniform.defaultEventSpaceBijector()).toBeInstanceOf(Sigmoid);
  });
});

describe('PoissonDistribution', () => {
  // 3 log 2 - 2 - log 3!
  const expected = 3 * Math.log(2) - 2 - Math.log(6);

  it('should accept either parameterization', () => {
    expect(new PoissonDistribution({ rate: 2 }).logProb(3).item()).toBeCloseTo(expected, 10);
    expect(new PoissonDistribution({ logRate: Math.log(2) }).logProb(3).item()).toBeCloseTo(
      expected,
      10
    );
  });

  it('should give zero mass off the non-negative integers', () => {
    const poisson = new PoissonDistribution({ rate: 2 });
    expectAllClose(poisson.logProb([-1, 1.5]), [-Infinity, -Infinity]);
  });

  it('should compute in float32 when asked', () => {
    const poisson = new PoissonDistribution({ rate: 2 }, { dtype: 'float32' });
    const lp = poisson.logProb(3);
    expect(lp.dtype).toBe('float32');
    expect(lp.item()).toBe(Math.fround(lp.item()));
    expect(poisson.sample([10], new RNG(1)).dtype).toBe('float32');
  });

  it('should report rate-based statistics', () => {
    const poisson = new PoissonDistribution({ rate: [0.5, 3.5] });
    expectAllClose(poisson.mean(), [0.5, 3.5]);
    expectAllClose(poisson.variance(), [0.5, 3.5]);
    expectAllClose(poisson.mode(), [0, 3]);
  });

  it('should draw non-negative integers', () => {
    const draws = new PoissonDistribution({ rate: 4 }).sample([200], new RNG(11)).toFlatArray();
    expect(draws.every((k) => Number.isInteger(k) && k >= 0)).toBe(true);
  });
});

describe('CholeskyLKJDistribution', () => {
  it('should be uniform over 2x2 correlations at concentration 1', () => {
    const lkj = new CholeskyLKJDistribution(2, 1);
    expect(lkj.eventShape()).toEqual([2, 2]);
    const identity = [
      [1, 0],
      [0, 1],
    ];
    const tilted = [
      [1, 0],
      [0.6, 0.8],
    ];
    expect(lkj.logProb(identity).item()).toBeCloseTo(-Math.log(2), 10);
    expect(lkj.logProb(tilted).item()).toBeCloseTo(-Math.log(2), 10);
  });

  it('should normalize by the volume of the correlation matrices', () => {
    expect(lkjLogNormalizer(2, 1)).toBeCloseTo(Math.log(2), 10);
    expect(lkjLogNormalizer(3, 1)).toBeCloseTo(2 * Math.log(Math.PI) - Math.log(2), 10);
  });

  it('should weight the diagonal by concentration', () => {
    const lkj = new CholeskyLKJDistribution(2, 3);
    const factor = [
      [1, 0],
      [0.6, 0.8],
    ];
    // exponents: row 0 -> 2 - 1 + 6 - 2 = 5, row 1 -> 4
    expect(lkj.unnormalizedLogProb(factor).item()).toBeCloseTo(4 * Math.log(0.8), 12);
  });

  it('should draw Cholesky factors of correlation matrices', () => {
    const lkj = new CholeskyLKJDistribution(4, [1, 2]);
    const draws = lkj.sample([3], new RNG(5));
    expect(draws.shape).toEqual([3, 2, 4, 4]);
    for (let s = 0; s < 3; s++) {
      for (let b = 0; b < 2; b++) {
        for (let row = 0; row < 4; row++) {
          let sq = 0;
          for (let col = 0; col < 4; col++) {
            const v = draws.at([s, b, row, col]);
            if (col > row) expect(v).toBe(0);
            sq += v * v;
          }
          expect(sq).toBeCloseTo(1, 10);
          expect(draws.at([s, b, row, row])).toBeGreaterThan(0);
        }
      }
    }
  });

  it('should use the correlation Cholesky bijector', () => {
    expect(new CholeskyLKJDistribution(3, 1).defaultEventSpaceBijector()).toBeInstanceOf(
      CorrelationCholesky
    );
  });
});

describe('IndependentDistribution', () => {
  const base = new NormalDistribution(Tensor.zeros([3, 2]), 1);
  const independent = new IndependentDistribution(base, 1);

  it('should move trailing batch dimensions into the event', () => {
    expect(independent.batchShape()).toEqual([3]);
    expect(independent.eventShape()).toEqual([2]);
    expect(independent.batchShapeTensor()).toEqual([3]);
    expect(independent.eventShapeTensor()).toEqual([2]);
  });

  it('should sum log densities over the reinterpreted dimensions', () => {
    const lp = independent.logProb(Tensor.zeros([3, 2]));
    expectAllClose(lp, [-2 * HALF_LOG_TWO_PI, -2 * HALF_LOG_TWO_PI, -2 * HALF_LOG_TWO_PI], {
      rtol: 1e-12,
    });
  });

  it('should pass statistics through and sum entropy', () => {
    expect(independent.mean().shape).toEqual([3, 2]);
    expectAllClose(independent.entropy(), new Array<number>(3).fill(2 * (HALF_LOG_TWO_PI + 0.5)), {
      rtol: 1e-12,
    });
  });

  it('should refuse to reinterpret more dimensions than the batch has', () => {
    expect(() => new IndependentDistribution(base, 3)).toThrow(ShapeError);
  });
});

describe('TransformedDistribution', () => {
  const logNormal = new TransformedDistribution(new NormalDistribution(0, 1), new Exp());

  it('should add the inverse Jacobian to the base density', () => {
    expect(logNormal.logProb(1).item()).toBeCloseTo(-HALF_LOG_TWO_PI, 12);
    expect(logNormal.logProb(Math.E).item()).toBeCloseTo(-HALF_LOG_TWO_PI - 0.5 - 1, 12);
  });

  it('should push samples through the bijector', () => {
    const draws = logNormal.sample([20], new RNG(9)).toFlatArray();
    expect(draws.every((v) => v > 0)).toBe(true);
  });

  it('should not claim summary statistics', () => {
    expect(() => logNormal.mean()).toThrow(UnsupportedStatisticError);
  });

  it('should chain its bijector after the base bijector', () => {
    const bijector = logNormal.defaultEventSpaceBijector();
    expect(bijector?.name).toBe('Chain(Exp, Identity)');
  });
});

describe('klDivergence', () => {
  it('should compute Normal-Normal KL', () => {
    const kl = klDivergence(new NormalDistribution(0, 1), new NormalDistribution(0, 2));
    expect(kl.item()).toBeCloseTo(Math.log(2) + 0.125 - 0.5, 12);
  });

  it('should sum over Independent event dimensions', () => {
    const p = new IndependentDistribution(new NormalDistribution(Tensor.zeros([3, 2]), 1), 1);
    const q = new IndependentDistribution(new NormalDistribution(Tensor.zeros([3, 2]), 2), 1);
    const single = Math.log(2) + 0.125 - 0.5;
    expectAllClose(klDivergence(p, q), [2 * single, 2 * single, 2 * single], { rtol: 1e-12 });
  });

  it('should serve subclasses from a parent registration', () => {
    class StandardNormal extends NormalDistribution {
      constructor() {
        super(0, 1);
      }
    }
    expect(klDivergence(new StandardNormal(), new StandardNormal()).item()).toBe(0);
  });

  it('should report unregistered pairs', () => {
    try {
      klDivergence(new NormalDistribution(0, 1), new LogisticDistribution(0, 1));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DistributionError);
      expect(e instanceof DistributionError && e.code).toBe(ErrorCode.NOT_IMPLEMENTED);
    }
  });
});
