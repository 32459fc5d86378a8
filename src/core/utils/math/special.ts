// src/core/utils/math/special.ts
/**
 * Special mathematical functions
 */

import jStat from 'jstat';

/**
 * Natural log of the gamma function
 */
export function logGamma(x: number): number {
  if (x <= 0) return NaN;
  return jStat.gammaln(x);
}

/**
 * Log factorial: log(n!) = log(Γ(n + 1))
 */
export function logFactorial(n: number): number {
  if (n < 0) return -Infinity;
  if (n <= 1) return 0;
  return jStat.gammaln(n + 1);
}

/**
 * log(1 + exp(x)) without overflow
 */
export function softplus(x: number): number {
  if (x > 0) {
    return x + Math.log1p(Math.exp(-x));
  }
  return Math.log1p(Math.exp(x));
}

/**
 * Logistic sigmoid 1 / (1 + exp(-x))
 */
export function sigmoid(x: number): number {
  if (x >= 0) {
    return 1 / (1 + Math.exp(-x));
  }
  const e = Math.exp(x);
  return e / (1 + e);
}

/**
 * Inverse of the logistic sigmoid: log(p / (1 - p))
 */
export function logit(p: number): number {
  return Math.log(p) - Math.log1p(-p);
}
