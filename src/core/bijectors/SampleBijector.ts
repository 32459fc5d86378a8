/**
 * Lifts a base distribution's event-space bijector to the event space of its
 * i.i.d. replicates.
 *
 * Inputs arrive in the user-facing layout `prefix ++ B ++ K ++ e`. They are
 * moved to `K ++ prefix ++ B ++ e` so that every replicate looks like an extra
 * leading batch dimension to the inner bijector, transformed, and moved back.
 */

import { ShapeError } from '../errors';
import { reduceLeading, reduceTrailing } from '../reduction/ReductionEngine';
import {
  BASE_LAYOUT,
  baseLayout,
  permutationBetween,
  USER_LAYOUT,
} from '../shape/ShapeAlgebra';
import type { Shape } from '../shape/types';
import { broadcastShapes } from '../tensor/broadcast';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import type { Bijector } from './Bijector';

/**
 * The replicated distribution, read afresh by every call
 */
export interface ReplicaSource {
  /** Event-space bijector of one replicate, built from current parameters */
  innerBijector(): Bijector;
  sampleShape(): Shape;
  batchShape(): Shape;
  /** Event shape of one replicate, on the constrained side */
  baseEventShape(): Shape;
}

type Direction = 'forward' | 'inverse';

/**
 * Everything one call needs, read once at its start
 */
interface Snapshot {
  inner: Bijector;
  sample: Shape;
  batch: Shape;
  baseEvent: Shape;
}

export class SampleBijector implements Bijector {
  readonly name: string;

  constructor(private readonly source: ReplicaSource) {
    this.name = `Sample(${source.innerBijector().name})`;
  }

  private snapshot(): Snapshot {
    return {
      inner: this.source.innerBijector(),
      sample: this.source.sampleShape(),
      batch: this.source.batchShape(),
      baseEvent: this.source.baseEventShape(),
    };
  }

  get forwardMinEventNdims(): number {
    const s = this.snapshot();
    return s.sample.length + innerEventRank(s, 'forward');
  }

  get inverseMinEventNdims(): number {
    const s = this.snapshot();
    return s.sample.length + innerEventRank(s, 'inverse');
  }

  forward(x: TensorLike): Tensor {
    return transform(this.name, this.snapshot(), Tensor.from(x), 'forward');
  }

  inverse(y: TensorLike): Tensor {
    return transform(this.name, this.snapshot(), Tensor.from(y), 'inverse');
  }

  forwardEventShape(shape: Shape): Shape {
    return mapEventShape(this.name, this.snapshot(), shape, 'forward');
  }

  inverseEventShape(shape: Shape): Shape {
    return mapEventShape(this.name, this.snapshot(), shape, 'inverse');
  }

  forwardLogDetJacobian(x: TensorLike, eventNdims: number): Tensor {
    return logDetJacobian(this.name, this.snapshot(), Tensor.from(x), eventNdims, 'forward');
  }

  inverseLogDetJacobian(y: TensorLike, eventNdims: number): Tensor {
    return logDetJacobian(this.name, this.snapshot(), Tensor.from(y), eventNdims, 'inverse');
  }
}

/**
 * Rank of one replicate's event on the input side of `direction`
 */
function innerEventRank(s: Snapshot, direction: Direction): number {
  if (direction === 'inverse') return s.baseEvent.length;
  return s.inner.inverseEventShape(s.baseEvent).length;
}

function toBaseLayout(s: Snapshot, input: Tensor, direction: Direction) {
  const eventRank = innerEventRank(s, direction);
  const layout = baseLayout(input.rank, s.batch.length, s.sample.length, eventRank);
  const padded = input
    .reshape([...new Array<number>(layout.padding).fill(1), ...input.shape])
    .transpose(layout.toBase);
  return { padded, layout, eventRank };
}

function transform(name: string, s: Snapshot, input: Tensor, direction: Direction): Tensor {
  const nK = s.sample.length;
  const nB = s.batch.length;
  const { padded, layout } = toBaseLayout(s, input, direction);
  const out = direction === 'forward' ? s.inner.forward(padded) : s.inner.inverse(padded);

  const outEventRank = innerEventRank(s, direction === 'forward' ? 'inverse' : 'forward');
  const prefix = out.rank - nK - nB - outEventRank;
  if (prefix !== layout.prefixNdims) {
    throw new ShapeError(`${name}: inner bijector changed the batch rank`, {
      inputShape: input.shape,
      outputShape: out.shape,
    });
  }
  const sizes = { prefix, sample: nK, batch: nB, event: outEventRank };
  return out.transpose(permutationBetween(sizes, BASE_LAYOUT, USER_LAYOUT));
}

function mapEventShape(name: string, s: Snapshot, shape: Shape, direction: Direction): Shape {
  const eventRank = innerEventRank(s, direction);
  if (shape.length < eventRank) {
    throw new ShapeError(
      `${name}: shape [${shape.join(', ')}] has fewer than ${eventRank} event dimensions`,
      { shape, eventRank }
    );
  }
  const split = shape.length - eventRank;
  const event = shape.slice(split);
  const mapped =
    direction === 'forward' ? s.inner.forwardEventShape(event) : s.inner.inverseEventShape(event);
  return [...shape.slice(0, split), ...mapped];
}

/**
 * The inner term is evaluated per replicate, broadcast over every replicate
 * (an input may hold a single replicate standing in for all of them), and
 * summed over the sample axes and then over any event axes beyond
 * `K ++ e`.
 */
function logDetJacobian(
  name: string,
  s: Snapshot,
  input: Tensor,
  eventNdims: number,
  direction: Direction
): Tensor {
  const nK = s.sample.length;
  const { padded, eventRank } = toBaseLayout(s, input, direction);
  const minimum = nK + eventRank;

  if (!Number.isInteger(eventNdims) || eventNdims < minimum) {
    throw new ShapeError(
      `${name}: eventNdims=${eventNdims} is smaller than the minimum event rank ${minimum}`,
      { eventNdims, minimum }
    );
  }

  const ldj =
    direction === 'forward'
      ? s.inner.forwardLogDetJacobian(padded, eventRank)
      : s.inner.inverseLogDetJacobian(padded, eventRank);

  const leading = broadcastShapes(padded.shape.slice(nK, padded.rank - eventRank), s.batch);
  const target = broadcastShapes(ldj.shape, [...s.sample, ...leading]);
  const perReplicate = ldj.broadcastTo(target);
  const summed = reduceLeading(perReplicate, nK);
  return reduceTrailing(summed, eventNdims - minimum);
}
