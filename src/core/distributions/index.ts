/**
 * Distribution module exports
 */

// Re-export the RNG for convenience
export { RNG, defaultRNG } from '../utils/math/random';

export { BaseDistribution, DEFAULT_DISTRIBUTION_OPTIONS, toSampleShape } from './Distribution';
export type { Distribution, DistributionOptions } from './Distribution';
export { Param, batchShapeOf, drawElementwise, staticBatchShape } from './params';
export type { Constraint, ParamInput } from './params';

// Families
export { CholeskyLKJDistribution, lkjLogNormalizer } from './CholeskyLKJDistribution';
export { LogisticDistribution } from './LogisticDistribution';
export { NormalDistribution } from './NormalDistribution';
export { PoissonDistribution } from './PoissonDistribution';
export type { PoissonParams } from './PoissonDistribution';
export { UniformDistribution } from './UniformDistribution';

// Combinators
export { IndependentDistribution } from './IndependentDistribution';
export { SampleDistribution } from './SampleDistribution';
export type { SampleDistributionOptions } from './SampleDistribution';
export { TransformedDistribution } from './TransformedDistribution';

export { klDivergence, registerKL } from './kl';
