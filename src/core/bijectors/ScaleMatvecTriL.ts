/**
 * y = L x for a lower-triangular scale matrix L, acting on vectors
 */

import { DistributionError, ErrorCode, ShapeError } from '../errors';
import type { Shape } from '../shape/types';
import { broadcastShapes } from '../tensor/broadcast';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { BaseBijector } from './Bijector';

export class ScaleMatvecTriL extends BaseBijector {
  readonly scaleTril: Tensor;
  private readonly dimension: number;

  constructor(scaleTril: TensorLike) {
    super('ScaleMatvecTriL', 1);
    const tril = Tensor.from(scaleTril);
    if (tril.rank < 2 || tril.shape[tril.rank - 1] !== tril.shape[tril.rank - 2]) {
      throw new ShapeError('scaleTril must be a (batch of) square matrices', {
        shape: tril.shape,
      });
    }
    this.dimension = tril.shape[tril.rank - 1];
    // Only the lower triangle is used
    this.scaleTril = Tensor.fromFunction(
      tril.shape,
      (index) => (index[index.length - 1] <= index[index.length - 2] ? tril.at(index) : 0),
      tril.dtype
    );
    const diag = this.logAbsDiagSum();
    if (diag.toFlatArray().some((v) => !Number.isFinite(v))) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'scaleTril must be non-singular');
    }
  }

  /**
   * Batch shape shared by the input vectors and the scale matrices
   */
  private broadcastOperands(v: Tensor): { vectors: Tensor; matrices: Tensor; batch: Shape } {
    const m = this.dimension;
    if (v.rank < 1 || v.shape[v.rank - 1] !== m) {
      throw new ShapeError(`Expected trailing dimension ${m}, got shape [${v.shape.join(', ')}]`);
    }
    const batch = broadcastShapes(v.shape.slice(0, -1), this.scaleTril.shape.slice(0, -2));
    return {
      vectors: v.broadcastTo([...batch, m]),
      matrices: this.scaleTril.broadcastTo([...batch, m, m]),
      batch,
    };
  }

  protected computeForward(x: Tensor): Tensor {
    const m = this.dimension;
    const { vectors, matrices, batch } = this.broadcastOperands(x);
    const xs = vectors.values;
    const ls = matrices.values;
    const out: number[] = [];
    const cells = vectors.size / Math.max(m, 1);
    for (let c = 0; c < cells; c++) {
      for (let i = 0; i < m; i++) {
        let acc = 0;
        for (let j = 0; j <= i; j++) {
          acc += ls[c * m * m + i * m + j] * xs[c * m + j];
        }
        out.push(acc);
      }
    }
    return Tensor.fromData([...batch, m], out, x.dtype);
  }

  // Forward substitution
  protected computeInverse(y: Tensor): Tensor {
    const m = this.dimension;
    const { vectors, matrices, batch } = this.broadcastOperands(y);
    const ys = vectors.values;
    const ls = matrices.values;
    const out: number[] = [];
    const cells = vectors.size / Math.max(m, 1);
    for (let c = 0; c < cells; c++) {
      const solved: number[] = [];
      for (let i = 0; i < m; i++) {
        let acc = ys[c * m + i];
        for (let j = 0; j < i; j++) {
          acc -= ls[c * m * m + i * m + j] * solved[j];
        }
        solved.push(acc / ls[c * m * m + i * m + i]);
      }
      out.push(...solved);
    }
    return Tensor.fromData([...batch, m], out, y.dtype);
  }

  private logAbsDiagSum(): Tensor {
    const m = this.dimension;
    const batch = this.scaleTril.shape.slice(0, -2);
    return Tensor.fromFunction(batch, (index) => {
      let sum = 0;
      for (let i = 0; i < m; i++) {
        sum += Math.log(Math.abs(this.scaleTril.at([...index, i, i])));
      }
      return sum;
    }, this.scaleTril.dtype);
  }

  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    return this.logAbsDiagSum().cast(x.dtype);
  }

  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    return this.logAbsDiagSum().cast(y.dtype).neg();
  }
}
