/**
 * Shape types shared by tensors, distributions and bijectors
 */

/**
 * A fully resolved shape: ordered non-negative dimension sizes
 */
export type Shape = readonly number[];

/**
 * A shape known only in part before evaluation.
 * `null` means the rank itself is unknown; a `null` entry is an unknown dimension.
 */
export type PartialShape = readonly (number | null)[] | null;

/**
 * Type guard for partial shapes whose rank and dimensions are all known
 */
export function isFullyDefined(shape: PartialShape): shape is Shape {
  return shape !== null && shape.every((d) => d !== null);
}

/**
 * Number of elements of a shape (1 for a scalar)
 */
export function shapeSize(shape: Shape): number {
  return shape.reduce((acc, d) => acc * d, 1);
}

export function shapesEqual(a: Shape, b: Shape): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

/**
 * Row-major strides for a contiguous shape
 */
export function stridesOf(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function formatShape(shape: PartialShape): string {
  if (shape === null) return '<unknown>';
  return `[${shape.map((d) => (d === null ? '?' : String(d))).join(', ')}]`;
}
