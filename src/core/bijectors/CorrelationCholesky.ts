/**
 * Maps unconstrained vectors of length m(m-1)/2 onto Cholesky factors of
 * m×m correlation matrices: lower-triangular, positive diagonal, unit-norm rows.
 *
 * The strictly lower triangle is filled row by row from the input vector,
 * the diagonal set to 1, and every row normalized.
 */

import { ShapeError } from '../errors';
import { shapeSize, type Shape } from '../shape/types';
import { Tensor } from '../tensor/Tensor';
import { BaseBijector } from './Bijector';

/**
 * Matrix size for a vector of `k` free entries, or null if k is not triangular
 */
export function matrixSizeFor(k: number): number | null {
  const m = (1 + Math.sqrt(1 + 8 * k)) / 2;
  return Number.isInteger(m) ? m : null;
}

export class CorrelationCholesky extends BaseBijector {
  constructor() {
    super('CorrelationCholesky', 1, 2);
  }

  override forwardEventShape(shape: Shape): Shape {
    if (shape.length < 1) {
      throw new ShapeError('CorrelationCholesky forward input must have rank >= 1', { shape });
    }
    const k = shape[shape.length - 1];
    const m = matrixSizeFor(k);
    if (m === null) {
      throw new ShapeError(`Trailing dimension ${k} is not a triangular number`, { shape });
    }
    return [...shape.slice(0, -1), m, m];
  }

  override inverseEventShape(shape: Shape): Shape {
    const n = shape.length;
    if (n < 2 || shape[n - 1] !== shape[n - 2]) {
      throw new ShapeError('CorrelationCholesky inverse input must end in a square matrix', {
        shape,
      });
    }
    const m = shape[n - 1];
    return [...shape.slice(0, -2), (m * (m - 1)) / 2];
  }

  protected computeForward(x: Tensor): Tensor {
    const outShape = this.forwardEventShape(x.shape);
    const m = outShape[outShape.length - 1];
    const k = x.shape[x.rank - 1];
    const xs = x.values;
    const out: number[] = [];
    const cells = shapeSize(x.shape.slice(0, -1));

    for (let c = 0; c < cells; c++) {
      for (let i = 0; i < m; i++) {
        const start = c * k + (i * (i - 1)) / 2;
        let sq = 1;
        for (let j = 0; j < i; j++) {
          sq += xs[start + j] * xs[start + j];
        }
        const norm = Math.sqrt(sq);
        for (let j = 0; j < m; j++) {
          if (j < i) out.push(xs[start + j] / norm);
          else if (j === i) out.push(1 / norm);
          else out.push(0);
        }
      }
    }
    return Tensor.fromData(outShape, out, x.dtype);
  }

  protected computeInverse(y: Tensor): Tensor {
    const outShape = this.inverseEventShape(y.shape);
    const m = y.shape[y.rank - 1];
    const ys = y.values;
    const out: number[] = [];
    const cells = m === 0 ? 0 : y.size / (m * m);

    for (let c = 0; c < cells; c++) {
      for (let i = 1; i < m; i++) {
        const diag = ys[c * m * m + i * m + i];
        for (let j = 0; j < i; j++) {
          out.push(ys[c * m * m + i * m + j] / diag);
        }
      }
    }
    return Tensor.fromData(outShape, out, y.dtype);
  }

  // Row i has i free entries z; its Jacobian determinant is (1 + |z|^2)^(-(i+2)/2)
  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    const k = x.shape[x.rank - 1];
    const m = this.forwardEventShape(x.shape)[x.rank];
    const xs = x.values;
    return Tensor.fromFunction(
      x.shape.slice(0, -1),
      (index) => {
        let flat = 0;
        for (let d = 0; d < index.length; d++) {
          flat = flat * x.shape[d] + index[d];
        }
        let ldj = 0;
        for (let i = 1; i < m; i++) {
          const start = flat * k + (i * (i - 1)) / 2;
          let sq = 1;
          for (let j = 0; j < i; j++) {
            sq += xs[start + j] * xs[start + j];
          }
          ldj -= ((i + 2) / 2) * Math.log(sq);
        }
        return ldj;
      },
      x.dtype
    );
  }

  // -sum_i (i + 2) log y_ii
  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    const m = y.shape[y.rank - 1];
    return Tensor.fromFunction(
      y.shape.slice(0, -2),
      (index) => {
        let ldj = 0;
        for (let i = 0; i < m; i++) {
          ldj -= (i + 2) * Math.log(y.at([...index, i, i]));
        }
        return ldj;
      },
      y.dtype
    );
  }
}
