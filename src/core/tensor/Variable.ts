/**
 * Externally mutable value cell
 *
 * Distributions and the Sample combinator accept a Variable wherever a
 * parameter or sample shape is expected and read it afresh on each evaluation.
 */

import { ShapeError } from '../errors';
import { formatShape, type PartialShape } from '../shape/types';
import { Tensor, type DType, type TensorLike } from './Tensor';

export interface VariableOptions {
  /**
   * Static shape constraint. Defaults to the initial value's shape;
   * `null` leaves the shape (and rank) unknown so any value may be assigned.
   */
  shape?: PartialShape;
  dtype?: DType;
  name?: string;
}

function matchesConstraint(shape: readonly number[], constraint: PartialShape): boolean {
  if (constraint === null) return true;
  return (
    shape.length === constraint.length &&
    constraint.every((d, i) => d === null || d === shape[i])
  );
}

export class Variable {
  readonly name: string;
  readonly staticShape: PartialShape;
  private current: Tensor;

  constructor(initial: TensorLike, options: VariableOptions = {}) {
    this.current = Tensor.from(initial, options.dtype);
    this.name = options.name ?? 'Variable';
    this.staticShape = options.shape === undefined ? [...this.current.shape] : options.shape;

    if (!matchesConstraint(this.current.shape, this.staticShape)) {
      throw new ShapeError(
        `Initial value of shape ${formatShape(this.current.shape)} does not match declared shape ${formatShape(this.staticShape)}`,
        { variable: this.name }
      );
    }
  }

  /**
   * Snapshot of the current value
   */
  read(): Tensor {
    return this.current;
  }

  get dtype(): DType {
    return this.current.dtype;
  }

  assign(value: TensorLike): this {
    const next = Tensor.from(value, this.current.dtype);
    if (!matchesConstraint(next.shape, this.staticShape)) {
      throw new ShapeError(
        `Cannot assign value of shape ${formatShape(next.shape)} to variable '${this.name}' with shape ${formatShape(this.staticShape)}`,
        { variable: this.name, shape: next.shape }
      );
    }
    if (value instanceof Tensor && value.dtype !== this.current.dtype) {
      console.warn(
        `Variable '${this.name}': assigned ${value.dtype} value cast to ${this.current.dtype}`
      );
    }
    this.current = next;
    return this;
  }
}

/**
 * Read a possibly-variable value as a tensor
 */
export function readValue(value: TensorLike | Variable, dtype?: DType): Tensor {
  if (value instanceof Variable) {
    return Tensor.from(value.read(), dtype);
  }
  return Tensor.from(value, dtype);
}

/**
 * Static shape of a possibly-variable value
 */
export function staticShapeOf(value: TensorLike | Variable): PartialShape {
  if (value instanceof Variable) {
    return value.staticShape;
  }
  return Tensor.from(value).shape;
}
