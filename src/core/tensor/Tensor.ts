/**
 * Dense row-major tensor
 *
 * Just enough array machinery for distributions and bijectors: construction,
 * views that copy (reshape, transpose, broadcast), and broadcasting elementwise
 * maps. Every result is stored in its dtype's typed array, so float32 results
 * are rounded at each step.
 */

import { ErrorCode, ShapeError } from '../errors';
import { formatShape, shapeSize, shapesEqual, stridesOf, type Shape } from '../shape/types';
import {
  assertBroadcastableTo,
  broadcastAll,
  broadcastStrides,
} from './broadcast';

export type DType = 'float32' | 'float64';
export type TensorData = Float32Array | Float64Array;
export type NestedArray = number | readonly NestedArray[];
export type TensorLike = Tensor | NestedArray;

export function allocate(dtype: DType, size: number): TensorData {
  return dtype === 'float32' ? new Float32Array(size) : new Float64Array(size);
}

/**
 * Rounding applied to a JS number so that it matches storage in `dtype`
 */
export function roundingFor(dtype: DType): (x: number) => number {
  return dtype === 'float32' ? Math.fround : (x: number) => x;
}

/**
 * float64 wins over float32
 */
export function promoteTypes(...dtypes: DType[]): DType {
  return dtypes.includes('float64') ? 'float64' : 'float32';
}

function inferShape(value: NestedArray): number[] {
  const shape: number[] = [];
  let current: NestedArray = value;
  while (typeof current !== 'number') {
    shape.push(current.length);
    if (current.length === 0) break;
    current = current[0];
  }
  return shape;
}

function flatten(value: NestedArray, shape: Shape, depth: number, out: number[]): void {
  if (typeof value === 'number') {
    if (depth !== shape.length) {
      throw new ShapeError('Ragged nested array: inconsistent depth', { expected: shape });
    }
    out.push(value);
    return;
  }
  if (depth >= shape.length || value.length !== shape[depth]) {
    throw new ShapeError('Ragged nested array: inconsistent dimension sizes', {
      expected: shape,
      depth,
    });
  }
  for (const item of value) {
    flatten(item, shape, depth + 1, out);
  }
}

/**
 * Visit every multi-index of `shape` in row-major order, tracking one flat
 * offset per stride set.
 */
function forEachOffset(
  shape: Shape,
  stridesList: readonly (readonly number[])[],
  visit: (outIndex: number, offsets: readonly number[]) => void
): void {
  const size = shapeSize(shape);
  if (size === 0) return;
  const ndim = shape.length;
  const coord = new Array<number>(ndim).fill(0);
  const offsets = new Array<number>(stridesList.length).fill(0);

  for (let i = 0; i < size; i++) {
    visit(i, offsets);
    for (let d = ndim - 1; d >= 0; d--) {
      coord[d]++;
      for (let k = 0; k < stridesList.length; k++) {
        offsets[k] += stridesList[k][d];
      }
      if (coord[d] < shape[d]) break;
      for (let k = 0; k < stridesList.length; k++) {
        offsets[k] -= stridesList[k][d] * shape[d];
      }
      coord[d] = 0;
    }
  }
}

export class Tensor {
  readonly shape: Shape;

  private constructor(
    shape: Shape,
    readonly dtype: DType,
    private readonly buffer: TensorData
  ) {
    this.shape = Object.freeze([...shape]);
  }

  /**
   * Build from flat row-major values
   */
  static fromData(shape: Shape, data: ArrayLike<number>, dtype: DType = 'float64'): Tensor {
    if (shape.some((d) => !Number.isInteger(d) || d < 0)) {
      throw new ShapeError(`Invalid shape ${formatShape(shape)}`, { shape });
    }
    if (shapeSize(shape) !== data.length) {
      throw new ShapeError(
        `Cannot build tensor of shape ${formatShape(shape)} from ${data.length} values`,
        { shape, length: data.length }
      );
    }
    const buffer = allocate(dtype, data.length);
    buffer.set(Array.from(data));
    return new Tensor(shape, dtype, buffer);
  }

  /**
   * Build from a number, nested array or tensor. A tensor is cast when
   * `dtype` is given and differs.
   */
  static from(value: TensorLike, dtype?: DType): Tensor {
    if (value instanceof Tensor) {
      return dtype === undefined || dtype === value.dtype ? value : value.cast(dtype);
    }
    const shape = inferShape(value);
    const flat: number[] = [];
    flatten(value, shape, 0, flat);
    return Tensor.fromData(shape, flat, dtype ?? 'float64');
  }

  static scalar(value: number, dtype: DType = 'float64'): Tensor {
    return Tensor.fromData([], [value], dtype);
  }

  static fill(shape: Shape, value: number, dtype: DType = 'float64'): Tensor {
    const buffer = allocate(dtype, shapeSize(shape));
    buffer.fill(value);
    return new Tensor(shape, dtype, buffer);
  }

  static zeros(shape: Shape, dtype: DType = 'float64'): Tensor {
    return Tensor.fill(shape, 0, dtype);
  }

  static ones(shape: Shape, dtype: DType = 'float64'): Tensor {
    return Tensor.fill(shape, 1, dtype);
  }

  /**
   * Build by evaluating `fn` at every multi-index, in row-major order
   */
  static fromFunction(
    shape: Shape,
    fn: (index: readonly number[]) => number,
    dtype: DType = 'float64'
  ): Tensor {
    const buffer = allocate(dtype, shapeSize(shape));
    const coord = new Array<number>(shape.length).fill(0);
    for (let i = 0; i < buffer.length; i++) {
      buffer[i] = fn(coord);
      for (let d = shape.length - 1; d >= 0; d--) {
        coord[d]++;
        if (coord[d] < shape[d]) break;
        coord[d] = 0;
      }
    }
    return new Tensor(shape, dtype, buffer);
  }

  /**
   * Apply `fn` elementwise across broadcast inputs
   */
  static mapN(
    inputs: readonly TensorLike[],
    fn: (...values: number[]) => number,
    dtype?: DType
  ): Tensor {
    const tensors = Tensor.coerceAll(inputs, dtype);
    const outDtype = dtype ?? promoteTypes(...tensors.map((t) => t.dtype));
    const outShape = broadcastAll(tensors.map((t) => t.shape));
    const out = allocate(outDtype, shapeSize(outShape));
    const stridesList = tensors.map((t) => broadcastStrides(t.shape, outShape));
    const values = new Array<number>(tensors.length);

    forEachOffset(outShape, stridesList, (i, offsets) => {
      for (let k = 0; k < tensors.length; k++) {
        values[k] = tensors[k].buffer[offsets[k]];
      }
      out[i] = fn(...values);
    });

    return new Tensor(outShape, outDtype, out);
  }

  /**
   * Numbers and nested arrays adopt the dtype of the tensors they meet
   */
  private static coerceAll(inputs: readonly TensorLike[], dtype?: DType): Tensor[] {
    const tensorDtypes = inputs.flatMap((v) => (v instanceof Tensor ? [v.dtype] : []));
    const literalDtype =
      dtype ?? (tensorDtypes.length > 0 ? promoteTypes(...tensorDtypes) : 'float64');
    return inputs.map((v) => (v instanceof Tensor ? v : Tensor.from(v, literalDtype)));
  }

  get rank(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.buffer.length;
  }

  /**
   * Read-only view of the row-major values
   */
  get values(): ArrayLike<number> {
    return this.buffer;
  }

  at(index: readonly number[]): number {
    if (index.length !== this.rank) {
      throw new ShapeError(
        `Index of rank ${index.length} does not match tensor of rank ${this.rank}`,
        { index, shape: this.shape }
      );
    }
    const strides = stridesOf(this.shape);
    let offset = 0;
    for (let d = 0; d < index.length; d++) {
      if (index[d] < 0 || index[d] >= this.shape[d]) {
        throw new ShapeError(`Index ${index[d]} out of range for axis ${d}`, {
          index,
          shape: this.shape,
        });
      }
      offset += index[d] * strides[d];
    }
    return this.buffer[offset];
  }

  /**
   * The single value of a size-1 tensor
   */
  item(): number {
    if (this.size !== 1) {
      throw new ShapeError(`item() requires a single element, got ${formatShape(this.shape)}`);
    }
    return this.buffer[0];
  }

  toFlatArray(): number[] {
    return Array.from(this.buffer);
  }

  toArray(): NestedArray {
    const build = (depth: number, offset: number, stride: number): NestedArray => {
      if (depth === this.rank) return this.buffer[offset];
      const inner = stride / this.shape[depth];
      return Array.from({ length: this.shape[depth] }, (_, i) =>
        build(depth + 1, offset + i * inner, inner)
      );
    };
    return build(0, 0, this.size);
  }

  cast(dtype: DType): Tensor {
    if (dtype === this.dtype) return this;
    const buffer = allocate(dtype, this.size);
    buffer.set(this.buffer);
    return new Tensor(this.shape, dtype, buffer);
  }

  reshape(shape: Shape): Tensor {
    if (shapeSize(shape) !== this.size) {
      throw new ShapeError(
        `Cannot reshape ${formatShape(this.shape)} to ${formatShape(shape)}`,
        { from: this.shape, to: shape },
        ErrorCode.INCOMPATIBLE_SHAPES
      );
    }
    return new Tensor(shape, this.dtype, this.buffer);
  }

  /**
   * Insert a size-1 axis at `axis` (negative counts from the end of the result)
   */
  expandDims(axis: number): Tensor {
    const normalized = axis < 0 ? this.rank + 1 + axis : axis;
    if (normalized < 0 || normalized > this.rank) {
      throw new ShapeError(`expandDims axis ${axis} out of range for rank ${this.rank}`);
    }
    const shape = [...this.shape];
    shape.splice(normalized, 0, 1);
    return this.reshape(shape);
  }

  /**
   * Permute axes: result axis i is input axis perm[i]
   */
  transpose(perm: readonly number[]): Tensor {
    const sorted = [...perm].sort((a, b) => a - b);
    if (perm.length !== this.rank || sorted.some((p, i) => p !== i)) {
      throw new ShapeError(`Invalid permutation [${perm.join(', ')}] for rank ${this.rank}`, {
        perm,
        shape: this.shape,
      });
    }
    if (perm.every((p, i) => p === i)) return this;

    const inStrides = stridesOf(this.shape);
    const outShape = perm.map((p) => this.shape[p]);
    const gatherStrides = perm.map((p) => inStrides[p]);
    const out = allocate(this.dtype, this.size);
    forEachOffset(outShape, [gatherStrides], (i, offsets) => {
      out[i] = this.buffer[offsets[0]];
    });
    return new Tensor(outShape, this.dtype, out);
  }

  /**
   * Materialize this tensor expanded to `shape`
   */
  broadcastTo(shape: Shape): Tensor {
    if (shapesEqual(shape, this.shape)) return this;
    assertBroadcastableTo(this.shape, shape);
    const strides = broadcastStrides(this.shape, shape);
    const out = allocate(this.dtype, shapeSize(shape));
    forEachOffset(shape, [strides], (i, offsets) => {
      out[i] = this.buffer[offsets[0]];
    });
    return new Tensor(shape, this.dtype, out);
  }

  map(fn: (value: number) => number): Tensor {
    const out = allocate(this.dtype, this.size);
    for (let i = 0; i < out.length; i++) {
      out[i] = fn(this.buffer[i]);
    }
    return new Tensor(this.shape, this.dtype, out);
  }

  add(other: TensorLike): Tensor {
    return Tensor.mapN([this, other], (a, b) => a + b);
  }

  sub(other: TensorLike): Tensor {
    return Tensor.mapN([this, other], (a, b) => a - b);
  }

  mul(other: TensorLike): Tensor {
    return Tensor.mapN([this, other], (a, b) => a * b);
  }

  div(other: TensorLike): Tensor {
    return Tensor.mapN([this, other], (a, b) => a / b);
  }

  neg(): Tensor {
    return this.map((v) => -v);
  }

  log(): Tensor {
    return this.map(Math.log);
  }

  exp(): Tensor {
    return this.map(Math.exp);
  }

  toString(): string {
    return `Tensor(${formatShape(this.shape)}, ${this.dtype})`;
  }
}
