import { Tensor } from '../tensor/Tensor';
import { BaseBijector } from './Bijector';

/**
 * y = exp(x), mapping the real line onto the positive reals
 */
export class Exp extends BaseBijector {
  constructor() {
    super('Exp', 0);
  }

  protected computeForward(x: Tensor): Tensor {
    return x.exp();
  }

  protected computeInverse(y: Tensor): Tensor {
    return y.log();
  }

  // log|dy/dx| = x
  protected computeForwardLogDetJacobian(x: Tensor): Tensor {
    return x;
  }

  protected override computeInverseLogDetJacobian(y: Tensor): Tensor {
    return y.log().neg();
  }
}
