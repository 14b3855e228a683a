import { describe, it, expect } from '@jest/globals';
import { iqrBounds, mean, pearson, percentOf, presentValues, quantile, sampleStd } from '@/lib/statistics';

describe('statistics', () => {
  it('presentValues keeps row indices of non-missing values', () => {
    expect(presentValues([4, null, 6])).toEqual([
      { row: 0, value: 4 },
      { row: 2, value: 6 },
    ]);
  });

  it('mean and sample standard deviation', () => {
    expect(mean([25, 30, 35])).toBe(30);
    expect(sampleStd([25, 30, 35])).toBe(5);
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138, 3);
  });

  it('sample standard deviation is undefined for a single value', () => {
    expect(Number.isNaN(sampleStd([42]))).toBe(true);
  });

  it('quantile interpolates between closest ranks', () => {
    const sorted = [1, 2, 3, 4];
    expect(quantile(sorted, 0.25)).toBe(1.75);
    expect(quantile(sorted, 0.5)).toBe(2.5);
    expect(quantile(sorted, 0.75)).toBe(3.25);
  });

  it('iqrBounds collapses onto a constant majority', () => {
    const bounds = iqrBounds([1, 1, 1, 1, 1, 100]);
    expect(bounds).toEqual({ q1: 1, q3: 1, lower: 1, upper: 1 });
  });

  it('pearson detects perfect positive and negative relationships', () => {
    const x = [1, 2, 3, 4, 5];
    expect(pearson(x, x.map((v) => v * 2))).toBeCloseTo(1, 10);
    expect(pearson(x, x.map((v) => -v))).toBeCloseTo(-1, 10);
  });

  it('pearson skips rows where either side is missing', () => {
    expect(pearson([1, 2, null, 4], [2, 4, 100, 8])).toBeCloseTo(1, 10);
  });

  it('pearson is undefined for a constant column', () => {
    expect(Number.isNaN(pearson([1, 2, 3], [5, 5, 5]))).toBe(true);
  });

  it('percentOf', () => {
    expect(percentOf(15, 100)).toBe(15);
  });
});
