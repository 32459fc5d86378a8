/**
 * Scaled sigmoid: maps the real line onto the open interval (low, high)
 */

import { DistributionError, ErrorCode } from '../errors';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { logit, sigmoid, softplus } from '../utils/math/special';
import { BaseBijector } from './Bijector';

export class Sigmoid extends BaseBijector {
  readonly low: Tensor;
  readonly high: Tensor;

  constructor(low: TensorLike = 0, high: TensorLike = 1) {
    super('Sigmoid', 0);
    this.low = Tensor.from(low);
    this.high = Tensor.from(high);
    const invalid = Tensor.mapN([this.low, this.high], (l, h) => (l < h ? 0 : 1));
    if (invalid.toFlatArray().some((v) => v !== 0)) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Sigmoid requires low < high', {
        low: this.low.toFlatArray(),
        high: this.high.toFlatArray(),
      });
    }
  }

  // y = low + (high - low) * sigmoid(x)
  protected computeForward(x: Tensor): Tensor {
    return Tensor.mapN([x, this.low, this.high], (v, l, h) => l + (h - l) * sigmoid(v), x.dtype);
  }

  protected computeInverse(y: Tensor): Tensor {
    return Tensor.mapN([y, this.low, this.high], (v, l, h) => logit((v - l) / (h - l)), y.dtype);
  }

  // log(high - low) + log sigmoid(x) + log(1 - sigmoid(x))
  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    return Tensor.mapN(
      [x, this.low, this.high],
      (v, l, h) => Math.log(h - l) - softplus(-v) - softplus(v),
      x.dtype
    );
  }

  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    return Tensor.mapN(
      [y, this.low, this.high],
      (v, l, h) => {
        const p = (v - l) / (h - l);
        return -Math.log(h - l) - Math.log(p) - Math.log1p(-p);
      },
      y.dtype
    );
  }
}
