/**
 * Distribution parameters that may be constant or held in a Variable
 */

import { DistributionError, ErrorCode } from '../errors';
import { broadcastPartialShapes } from '../shape/ShapeAlgebra';
import { shapeSize, type PartialShape, type Shape } from '../shape/types';
import { broadcastAll } from '../tensor/broadcast';
import { Tensor, type DType, type TensorLike } from '../tensor/Tensor';
import { staticShapeOf, Variable } from '../tensor/Variable';

export type ParamInput = TensorLike | Variable;

export type Constraint = 'real' | 'positive';

function violates(constraint: Constraint, value: number): boolean {
  switch (constraint) {
    case 'positive':
      return !(value > 0);
    case 'real':
      return Number.isNaN(value);
  }
}

export class Param {
  private readonly constant: Tensor | null;

  /**
   * @param validate - check variable values on every read; constants are
   *   always checked once, here
   */
  constructor(
    readonly name: string,
    private readonly input: ParamInput,
    private readonly dtype: DType,
    private readonly constraint: Constraint = 'real',
    private readonly validate: boolean = false
  ) {
    if (input instanceof Variable) {
      this.constant = null;
    } else {
      this.constant = Tensor.from(input, dtype);
      this.check(this.constant);
    }
  }

  get isVariable(): boolean {
    return this.constant === null;
  }

  staticShape(): PartialShape {
    return this.constant !== null ? this.constant.shape : staticShapeOf(this.input);
  }

  /**
   * Current value in the distribution's dtype
   */
  read(): Tensor {
    if (this.constant !== null) return this.constant;
    const value = this.input instanceof Variable ? this.input.read() : Tensor.from(this.input);
    const cast = value.cast(this.dtype);
    if (this.validate) this.check(cast);
    return cast;
  }

  private check(value: Tensor): void {
    const bad = value.toFlatArray().find((v) => violates(this.constraint, v));
    if (bad !== undefined) {
      throw new DistributionError(
        ErrorCode.INVALID_PARAMETER,
        `Argument \`${this.name}\` must be ${this.constraint}, got ${bad}`,
        { parameter: this.name, value: bad }
      );
    }
  }
}

/**
 * Static batch shape implied by a set of parameters
 */
export function staticBatchShape(params: readonly Param[]): PartialShape {
  return params.reduce<PartialShape>(
    (shape, p) => broadcastPartialShapes(shape, p.staticShape()),
    []
  );
}

/**
 * Batch shape of the current parameter values
 */
export function batchShapeOf(values: readonly Tensor[]): Shape {
  return broadcastAll(values.map((v) => v.shape));
}

/**
 * Draw one value per element of `sampleShape ++ B`, where B is the broadcast
 * shape of `params`. Sample indices vary slowest.
 */
export function drawElementwise(
  sampleShape: Shape,
  params: readonly Tensor[],
  draw: (...values: number[]) => number,
  dtype: DType
): Tensor {
  const batch = batchShapeOf(params);
  const columns = params.map((p) => p.broadcastTo(batch).values);
  const batchSize = shapeSize(batch);
  const total = shapeSize(sampleShape) * batchSize;
  const out = new Array<number>(total);
  const args = new Array<number>(params.length);

  for (let i = 0; i < total; i++) {
    const b = i % batchSize;
    for (let k = 0; k < columns.length; k++) {
      args[k] = columns[k][b];
    }
    out[i] = draw(...args);
  }
  return Tensor.fromData([...sampleShape, ...batch], out, dtype);
}
