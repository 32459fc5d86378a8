/**
 * KL divergence registry
 *
 * Pairwise implementations are registered by class. Lookup walks both
 * prototype chains, so an implementation registered for a parent class also
 * serves its subclasses.
 */

import { DistributionError, ErrorCode, ShapeError } from '../errors';
import { reduceTrailing } from '../reduction/ReductionEngine';
import { replicateCount } from '../shape/ShapeAlgebra';
import { formatShape, shapesEqual } from '../shape/types';
import { Tensor } from '../tensor/Tensor';
import type { Distribution } from './Distribution';
import { IndependentDistribution } from './IndependentDistribution';
import { NormalDistribution } from './NormalDistribution';
import { SampleDistribution } from './SampleDistribution';

type DistributionClass<D extends Distribution> = new (...args: never[]) => D;

type KLFunction<P extends Distribution, Q extends Distribution> = (p: P, q: Q) => Tensor;

type ErasedKL = (p: Distribution, q: Distribution) => Tensor;

const registry = new Map<object, Map<object, ErasedKL>>();

export function registerKL<P extends Distribution, Q extends Distribution>(
  pClass: DistributionClass<P>,
  qClass: DistributionClass<Q>,
  fn: KLFunction<P, Q>
): void {
  const erased: ErasedKL = (p, q) => {
    if (!(p instanceof pClass) || !(q instanceof qClass)) {
      throw new DistributionError(
        ErrorCode.INTERNAL_ERROR,
        `KL registered for (${pClass.name}, ${qClass.name}) called with (${p.name}, ${q.name})`
      );
    }
    return fn(p, q);
  };
  const row = registry.get(pClass) ?? new Map<object, ErasedKL>();
  row.set(qClass, erased);
  registry.set(pClass, row);
}

function prototypeChain(value: object): object[] {
  const chain: object[] = [];
  let proto: unknown = Object.getPrototypeOf(value);
  while (typeof proto === 'object' && proto !== null) {
    const ctor: unknown = Reflect.get(proto, 'constructor');
    if (typeof ctor === 'function') chain.push(ctor);
    proto = Object.getPrototypeOf(proto);
  }
  return chain;
}

function lookup(p: Distribution, q: Distribution): ErasedKL | undefined {
  for (const pClass of prototypeChain(p)) {
    const row = registry.get(pClass);
    if (row === undefined) continue;
    for (const qClass of prototypeChain(q)) {
      const fn = row.get(qClass);
      if (fn !== undefined) return fn;
    }
  }
  return undefined;
}

/**
 * KL(p || q), one value per batch member
 */
export function klDivergence(p: Distribution, q: Distribution): Tensor {
  const fn = lookup(p, q);
  if (fn === undefined) {
    throw new DistributionError(
      ErrorCode.NOT_IMPLEMENTED,
      `No KL(p || q) registered for p=${p.name} and q=${q.name}`,
      { p: p.name, q: q.name }
    );
  }
  return fn(p, q);
}

// log(σq/σp) + (σp² + (μp - μq)²) / (2σq²) - 1/2
registerKL(NormalDistribution, NormalDistribution, (p, q) =>
  Tensor.mapN(
    [p.loc.read(), p.scale.read(), q.loc.read(), q.scale.read()],
    (mp, sp, mq, sq) => {
      const diff = mp - mq;
      return Math.log(sq / sp) + (sp * sp + diff * diff) / (2 * sq * sq) - 0.5;
    },
    p.dtype
  )
);

registerKL(IndependentDistribution, IndependentDistribution, (p, q) => {
  if (p.reinterpretedBatchNdims !== q.reinterpretedBatchNdims) {
    throw new ShapeError(
      `Independent KL requires equal reinterpretedBatchNdims, got ${p.reinterpretedBatchNdims} and ${q.reinterpretedBatchNdims}`
    );
  }
  const pEvent = p.eventShapeTensor();
  const qEvent = q.eventShapeTensor();
  if (!shapesEqual(pEvent, qEvent)) {
    throw new ShapeError(
      `Independent KL requires equal event shapes, got ${formatShape(pEvent)} and ${formatShape(qEvent)}`
    );
  }
  const perMember = klDivergence(p.distribution, q.distribution);
  const batch = p.distribution.batchShapeTensor();
  return reduceTrailing(perMember.broadcastTo(batch), p.reinterpretedBatchNdims);
});

// Replicates are independent, so KL scales with their count
registerKL(SampleDistribution, SampleDistribution, (p, q) => {
  const pSample = p.sampleShape();
  const qSample = q.sampleShape();
  if (!shapesEqual(pSample, qSample)) {
    throw new ShapeError(
      `KL between Sample distributions requires equal sample shapes, got ${formatShape(pSample)} and ${formatShape(qSample)}`,
      { p: pSample, q: qSample }
    );
  }
  const count = replicateCount(pSample);
  return klDivergence(p.distribution, q.distribution).map((v) => v * count);
});
