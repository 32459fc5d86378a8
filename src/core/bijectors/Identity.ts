import { Tensor } from '../tensor/Tensor';
import { BaseBijector } from './Bijector';

/**
 * y = x
 */
export class Identity extends BaseBijector {
  constructor() {
    super('Identity', 0);
  }

  protected computeForward(x: Tensor): Tensor {
    return x;
  }

  protected computeInverse(y: Tensor): Tensor {
    return y;
  }

  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    return Tensor.scalar(0, x.dtype);
  }

  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    return Tensor.scalar(0, y.dtype);
  }
}
