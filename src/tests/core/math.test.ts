import { describe, it, expect } from 'vitest';
import { DistributionError } from '../../core/errors';
import { RNG } from '../../core/utils/math/random';
import { logFactorial, logGamma, logit, sigmoid, softplus } from '../../core/utils/math/special';

describe('RNG', () => {
  it('should repeat a seeded sequence', () => {
    const a = new RNG(42);
    const b = new RNG(42);
    const first = [a.uniform(), a.normal(), a.gamma(2), a.poisson(3)];
    const second = [b.uniform(), b.normal(), b.gamma(2), b.poisson(3)];
    expect(first).toEqual(second);
  });

  it('should restart on setSeed', () => {
    const rng = new RNG(1);
    rng.setSeed(5);
    const value = rng.uniform();
    rng.normal();
    rng.setSeed(5);
    expect(rng.uniform()).toBe(value);
  });

  it('should keep draws in their supports', () => {
    const rng = new RNG(9);
    for (let i = 0; i < 100; i++) {
      expect(rng.gamma(0.5)).toBeGreaterThan(0);
      const b = rng.beta(0.5, 1.5);
      expect(b).toBeGreaterThan(0);
      expect(b).toBeLessThan(1);
      expect(rng.openUniform()).toBeGreaterThan(0);
    }
    expect(rng.poisson(100)).toBeGreaterThanOrEqual(0);
  });

  it('should reject invalid parameters', () => {
    const rng = new RNG(3);
    expect(() => rng.poisson(0)).toThrow('Lambda must be positive');
    expect(() => rng.gamma(-1)).toThrow(DistributionError);
    expect(() => rng.beta(1, 0)).toThrow('Beta parameters must be positive');
  });
});

describe('special functions', () => {
  it('should compute log-gamma and log-factorial', () => {
    expect(logGamma(0.5)).toBeCloseTo(0.5 * Math.log(Math.PI), 10);
    expect(Number.isNaN(logGamma(0))).toBe(true);
    expect(logFactorial(0)).toBe(0);
    expect(logFactorial(5)).toBeCloseTo(Math.log(120), 10);
    expect(logFactorial(-1)).toBe(-Infinity);
  });

  it('should evaluate softplus without overflow', () => {
    expect(softplus(0)).toBeCloseTo(Math.log(2), 15);
    expect(softplus(800)).toBe(800);
    expect(softplus(-800)).toBe(0);
  });

  it('should invert the sigmoid with logit', () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(logit(0.5)).toBe(0);
    expect(logit(sigmoid(3))).toBeCloseTo(3, 12);
    expect(sigmoid(-800)).toBe(0);
  });
});
