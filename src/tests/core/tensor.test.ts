import { describe, it, expect, vi, afterEach } from 'vitest';
import { ErrorCode, ShapeError } from '../../core/errors';
import { broadcastShapes, canBroadcastTo } from '../../core/tensor/broadcast';
import { Tensor } from '../../core/tensor/Tensor';
import { Variable, readValue, staticShapeOf } from '../../core/tensor/Variable';

describe('broadcastShapes', () => {
  it('should right-align and stretch size-1 dimensions', () => {
    expect(broadcastShapes([3, 1], [4])).toEqual([3, 4]);
    expect(broadcastShapes([], [2, 5])).toEqual([2, 5]);
    expect(broadcastShapes([5, 1, 3], [4, 1])).toEqual([5, 4, 3]);
  });

  it('should reject mismatched dimensions', () => {
    expect(() => broadcastShapes([3], [4])).toThrow(
      'Incompatible shapes for broadcasting: [3] vs. [4]'
    );
    try {
      broadcastShapes([2, 3], [3, 2]);
    } catch (e) {
      expect(e).toBeInstanceOf(ShapeError);
      expect(e instanceof ShapeError && e.code).toBe(ErrorCode.INCOMPATIBLE_SHAPES);
    }
  });

  it('canBroadcastTo should not let the target grow', () => {
    expect(canBroadcastTo([1], [4])).toBe(true);
    expect(canBroadcastTo([4], [1])).toBe(false);
    expect(canBroadcastTo([2, 4], [4])).toBe(false);
  });
});

describe('Tensor', () => {
  it('should build from nested arrays', () => {
    const t = Tensor.from([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(t.shape).toEqual([2, 3]);
    expect(t.dtype).toBe('float64');
    expect(t.at([1, 0])).toBe(4);
    expect(t.toArray()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should reject ragged arrays', () => {
    expect(() => Tensor.from([[1, 2], [3]])).toThrow('Ragged nested array');
  });

  it('should round float32 storage', () => {
    const t = Tensor.scalar(0.1, 'float32');
    expect(t.item()).toBe(Math.fround(0.1));
    expect(t.item()).not.toBe(0.1);
  });

  it('should transpose by permutation', () => {
    const t = Tensor.fromData([2, 3], [1, 2, 3, 4, 5, 6]);
    const tt = t.transpose([1, 0]);
    expect(tt.shape).toEqual([3, 2]);
    expect(tt.toFlatArray()).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it('should broadcast elementwise arithmetic', () => {
    const a = Tensor.from([[1], [2]]);
    const b = Tensor.from([10, 20, 30]);
    const sum = a.add(b);
    expect(sum.shape).toEqual([2, 3]);
    expect(sum.toFlatArray()).toEqual([11, 21, 31, 12, 22, 32]);
  });

  it('should materialize broadcastTo', () => {
    const t = Tensor.from([1, 2]).broadcastTo([3, 2]);
    expect(t.toFlatArray()).toEqual([1, 2, 1, 2, 1, 2]);
    expect(() => Tensor.from([1, 2]).broadcastTo([3])).toThrow(ShapeError);
  });

  it('should let literals adopt the tensor dtype', () => {
    const t = Tensor.scalar(1, 'float32').add(0.1);
    expect(t.dtype).toBe('float32');
    expect(t.item()).toBe(Math.fround(1 + Math.fround(0.1)));
  });

  it('should promote mixed dtypes to float64', () => {
    const t = Tensor.scalar(1, 'float32').add(Tensor.scalar(2));
    expect(t.dtype).toBe('float64');
  });

  it('should reshape and expand dims', () => {
    const t = Tensor.fromData([6], [0, 1, 2, 3, 4, 5]);
    expect(t.reshape([2, 3]).at([1, 2])).toBe(5);
    expect(t.expandDims(0).shape).toEqual([1, 6]);
    expect(t.expandDims(-1).shape).toEqual([6, 1]);
    expect(() => t.reshape([4])).toThrow('Cannot reshape [6] to [4]');
  });

  it('should handle empty dimensions', () => {
    const t = Tensor.zeros([0, 3]);
    expect(t.size).toBe(0);
    expect(t.transpose([1, 0]).shape).toEqual([3, 0]);
  });
});

describe('Variable', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep its declared shape by default', () => {
    const v = new Variable([1, 2]);
    expect(v.staticShape).toEqual([2]);
    v.assign([3, 4]);
    expect(v.read().toFlatArray()).toEqual([3, 4]);
    expect(() => v.assign([1, 2, 3])).toThrow(ShapeError);
  });

  it('should accept any shape when declared unknown', () => {
    const v = new Variable([1, 2], { shape: null, name: 'k' });
    expect(staticShapeOf(v)).toBeNull();
    v.assign(6);
    expect(readValue(v).shape).toEqual([]);
  });

  it('should warn when an assignment changes dtype', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const v = new Variable(Tensor.scalar(1), { name: 'loc' });
    v.assign(Tensor.scalar(2, 'float32'));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Variable 'loc': assigned float32 value cast to float64");
    expect(v.dtype).toBe('float64');
  });
});
