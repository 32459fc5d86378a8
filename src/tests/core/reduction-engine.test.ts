import { describe, it, expect } from 'vitest';
import { ShapeError } from '../../core/errors';
import {
  normalizeAxes,
  reduceLeading,
  reduceLogDensity,
  reduceSum,
  reduceTrailing,
} from '../../core/reduction/ReductionEngine';
import { Tensor } from '../../core/tensor/Tensor';

const grid = Tensor.fromData([2, 3, 4], Array.from({ length: 24 }, (_, i) => i));

describe('reduceSum', () => {
  it('should sum every axis by default', () => {
    const total = reduceSum(grid);
    expect(total.shape).toEqual([]);
    expect(total.item()).toBe(276);
  });

  it('should keep the axes it does not reduce', () => {
    const sums = reduceSum(grid, [0, 2]);
    expect(sums.shape).toEqual([3]);
    // axis 1 = j contributes sum over i,k of 12i + 4j + k
    expect(sums.toFlatArray()).toEqual([60, 92, 124]);
  });

  it('should accept negative axes', () => {
    expect(reduceSum(grid, -1).toFlatArray()).toEqual(reduceSum(grid, 2).toFlatArray());
    expect(normalizeAxes([-1, 0, 2], 3)).toEqual([0, 2]);
  });

  it('should reject axes out of range', () => {
    expect(() => reduceSum(grid, 3)).toThrow(ShapeError);
    expect(() => normalizeAxes([-4], 3)).toThrow('Reduction axis -4 out of range for rank 3');
  });

  it('should return the input when nothing is reduced', () => {
    expect(reduceSum(grid, [])).toBe(grid);
  });

  it('should give zero for empty reductions', () => {
    const empty = Tensor.zeros([0, 2]);
    expect(reduceSum(empty, 0).toFlatArray()).toEqual([0, 0]);
  });
});

describe('reduceLeading / reduceTrailing', () => {
  it('should sum the requested number of axes', () => {
    expect(reduceLeading(grid, 2).shape).toEqual([4]);
    expect(reduceLeading(grid, 2).toFlatArray()).toEqual([60, 66, 72, 78]);
    expect(reduceTrailing(grid, 1).shape).toEqual([2, 3]);
    expect(reduceTrailing(grid, 0)).toBe(grid);
  });

  it('should reject more trailing axes than the rank', () => {
    expect(() => reduceTrailing(grid, 4)).toThrow(
      'Cannot reduce 4 trailing axes of a rank-3 tensor'
    );
  });
});

describe('compensated summation', () => {
  const n = 20_000;
  const tenth = Math.fround(0.1);
  const terms = Tensor.fill([n], tenth, 'float32');
  const exact = n * tenth;

  it('should drift with plain float32 accumulation', () => {
    const plain = reduceLogDensity(terms, [0], false).item();
    expect(Math.abs(plain - exact)).toBeGreaterThan(0.1);
  });

  it('should stay within float32 resolution of the exact sum', () => {
    const compensated = reduceLogDensity(terms, [0], true).item();
    expect(Math.abs(compensated - exact)).toBeLessThan(1e-3);
  });

  it('should recover low-order bits lost to a large addend', () => {
    const values = Tensor.fromData([4], [1, 1e100, 1, -1e100]);
    expect(reduceSum(values).item()).toBe(0);
    expect(reduceSum(values, undefined, { useCompensatedSum: true }).item()).toBe(2);
  });

  it('should agree with the plain sum on exactly representable data', () => {
    expect(reduceSum(grid, [1, 2], { useCompensatedSum: true }).toFlatArray()).toEqual(
      reduceSum(grid, [1, 2]).toFlatArray()
    );
  });
});
