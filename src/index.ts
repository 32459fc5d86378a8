/**
 * iidkit - batched distributions with an i.i.d. Sample combinator
 *
 * Shape algebra, compensated log-density reduction and bijector lifting for
 * repeating a base distribution over a block of independent replicates.
 */

export * from './core';

// Special functions and random number generation
export { logGamma, logFactorial, softplus, sigmoid, logit } from './core/utils/math/special';

// Version
export const VERSION = '0.1.0';
