/**
 * Bijector module exports
 */

export { BaseBijector, assertEventNdims } from './Bijector';
export type { Bijector } from './Bijector';
export { Chain } from './Chain';
export { CorrelationCholesky, matrixSizeFor } from './CorrelationCholesky';
export { Exp } from './Exp';
export { Identity } from './Identity';
export { SampleBijector } from './SampleBijector';
export type { ReplicaSource } from './SampleBijector';
export { Scale } from './Scale';
export { ScaleMatvecTriL } from './ScaleMatvecTriL';
export { Sigmoid } from './Sigmoid';
