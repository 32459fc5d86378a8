import { DistributionError, ErrorCode } from '../errors';
import { Tensor, type TensorLike } from '../tensor/Tensor';
import { BaseBijector } from './Bijector';

/**
 * y = scale * x, elementwise; `scale` may carry batch dimensions
 */
export class Scale extends BaseBijector {
  readonly scale: Tensor;

  constructor(scale: TensorLike) {
    super('Scale', 0);
    this.scale = Tensor.from(scale);
    if (this.scale.toFlatArray().some((s) => s === 0)) {
      throw new DistributionError(ErrorCode.INVALID_PARAMETER, 'Scale must be non-zero', {
        scale: this.scale.toFlatArray(),
      });
    }
  }

  protected computeForward(x: Tensor): Tensor {
    return x.mul(this.scale);
  }

  protected computeInverse(y: Tensor): Tensor {
    return y.div(this.scale);
  }

  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    return this.scale.cast(x.dtype).map((s) => Math.log(Math.abs(s)));
  }

  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    return this.scale.cast(y.dtype).map((s) => -Math.log(Math.abs(s)));
  }
}
