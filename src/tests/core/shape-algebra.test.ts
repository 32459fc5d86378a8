import { describe, it, expect } from 'vitest';
import { ErrorCode, ShapeError } from '../../core/errors';
import {
  BASE_LAYOUT,
  USER_LAYOUT,
  baseLayout,
  broadcastPartialShapes,
  broadcastToEventShape,
  composeBatchShape,
  composeEventShape,
  concatPartialShapes,
  invertPermutation,
  isCompatibleWith,
  padLeft,
  permutationBetween,
  replicateCount,
  samplingPermutation,
} from '../../core/shape/ShapeAlgebra';
import { formatShape, isFullyDefined } from '../../core/shape/types';
import { Tensor } from '../../core/tensor/Tensor';

describe('shape composition', () => {
  it('should prepend the sample shape to the event shape', () => {
    expect(composeEventShape([5, 4], [2])).toEqual([5, 4, 2]);
    expect(composeEventShape([], [])).toEqual([]);
    expect(composeBatchShape([3])).toEqual([3]);
  });

  it('should propagate unknowns in partial shapes', () => {
    expect(concatPartialShapes([null, null], [3])).toEqual([null, null, 3]);
    expect(concatPartialShapes(null, [3])).toBeNull();
    expect(broadcastPartialShapes([null, 3], [4, 1])).toEqual([4, 3]);
    expect(broadcastPartialShapes([null], [1])).toEqual([null]);
    expect(broadcastPartialShapes(null, [2])).toBeNull();
  });

  it('should count replicates', () => {
    expect(replicateCount([5, 4])).toBe(20);
    expect(replicateCount([])).toBe(1);
    expect(replicateCount([3, 0])).toBe(0);
  });

  it('should compare static and resolved shapes', () => {
    expect(isCompatibleWith([null, 3], [7, 3])).toBe(true);
    expect(isCompatibleWith([null, 3], [7, 4])).toBe(false);
    expect(isCompatibleWith(null, [1, 2, 3])).toBe(true);
    expect(isFullyDefined([1, null])).toBe(false);
    expect(formatShape([1, null])).toBe('[1, ?]');
    expect(formatShape(null)).toBe('<unknown>');
  });
});

describe('layout permutations', () => {
  it('should move K behind the batch when sampling', () => {
    // S0 = [6, 1], K = [5, 4], B = [3], E = [2]
    expect(samplingPermutation(2, 2, 1, 1)).toEqual([0, 1, 4, 2, 3, 5]);
  });

  it('should agree with an explicit transpose', () => {
    const perm = samplingPermutation(1, 1, 1, 0);
    const draw = Tensor.fromFunction([2, 3, 4], ([s, k, b]) => 100 * s + 10 * k + b);
    const user = draw.transpose(perm);
    expect(user.shape).toEqual([2, 4, 3]);
    expect(user.at([1, 2, 0])).toBe(102);
  });

  it('should invert permutations', () => {
    const perm = permutationBetween(
      { prefix: 2, batch: 1, sample: 2, event: 1 },
      USER_LAYOUT,
      BASE_LAYOUT
    );
    expect(perm).toEqual([3, 4, 0, 1, 2, 5]);
    expect(invertPermutation(perm)).toEqual([2, 3, 4, 0, 1, 5]);
  });

  it('should describe the base-facing layout', () => {
    const layout = baseLayout(6, 1, 2, 1);
    expect(layout.padding).toBe(0);
    expect(layout.prefixNdims).toBe(2);
    expect(layout.toBase).toEqual([3, 4, 0, 1, 2, 5]);
    expect(layout.fromBase).toEqual([2, 3, 4, 0, 1, 5]);
    expect(layout.sampleAxes).toEqual([0, 1]);
  });

  it('should pad tensors too short to hold the batch part', () => {
    const layout = baseLayout(1, 1, 1, 0);
    expect(layout.padding).toBe(1);
    expect(layout.prefixNdims).toBe(0);
    expect(layout.toBase).toEqual([1, 0]);
    expect(padLeft([2], 1)).toEqual([1, 2]);
  });
});

describe('broadcastToEventShape', () => {
  it('should expand the trailing event part', () => {
    expect(broadcastToEventShape([2, 1], [4])).toEqual([2, 4]);
    expect(broadcastToEventShape([], [1, 2, 3])).toEqual([1, 2, 3]);
    expect(broadcastToEventShape([7, 5, 4], [5, 4])).toEqual([7, 5, 4]);
  });

  it('should reject observations that do not broadcast to the event', () => {
    expect(() => broadcastToEventShape([3], [4])).toThrow(
      'Incompatible shapes for broadcasting: [3] vs. event shape [4]'
    );
    try {
      broadcastToEventShape([3], [4]);
    } catch (e) {
      expect(e).toBeInstanceOf(ShapeError);
      expect(e instanceof ShapeError && e.code).toBe(ErrorCode.INCOMPATIBLE_SHAPES);
    }
  });
});
