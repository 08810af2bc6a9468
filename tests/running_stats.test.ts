import { describe, expect, it } from 'vitest';
import { RunningStats } from '../src/stats/runningStats.js';

function statsOf(values: number[]) {
  const stats = new RunningStats();
  for (const value of values) {
    stats.addValue(value);
  }
  return stats;
}

describe('RunningStats', () => {
  it('starts empty with zeroed aggregates', () => {
    const stats = new RunningStats();
    expect(stats.n).toBe(0);
    expect(stats.avg).toBe(0);
    expect(stats.sum).toBe(0);
    expect(stats.variance).toBe(0);
    expect(stats.stdev).toBe(0);
  });

  it('accepts a first value in the constructor', () => {
    const stats = new RunningStats(0.75);
    expect(stats.n).toBe(1);
    expect(stats.avg).toBe(0.75);
    expect(stats.min).toBe(0.75);
    expect(stats.max).toBe(0.75);
    expect(stats.lastValue).toBe(0.75);
    expect(stats.variance).toBe(0);
  });

  it('tracks mean, sample variance and extremes', () => {
    const stats = statsOf([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(stats.n).toBe(8);
    expect(stats.sum).toBe(40);
    expect(stats.avg).toBeCloseTo(5, 10);
    expect(stats.variance).toBeCloseTo(32 / 7, 10);
    expect(stats.stdev).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(stats.min).toBe(2);
    expect(stats.max).toBe(9);
    expect(stats.lastValue).toBe(9);
  });

  it('keeps min and max for negative values', () => {
    const stats = statsOf([-3, -1, -7]);
    expect(stats.min).toBe(-7);
    expect(stats.max).toBe(-1);
  });

  it('copy is independent of the original', () => {
    const original = statsOf([1, 2, 3]);
    const clone = original.copy();
    original.addValue(100);

    expect(clone.n).toBe(3);
    expect(clone.avg).toBeCloseTo(2, 10);
    expect(clone.max).toBe(3);
    expect(original.n).toBe(4);
  });

  it('combine matches a single pass over both series', () => {
    const a = statsOf([2, 4, 4, 4]);
    const b = statsOf([5, 5, 7, 9]);
    const merged = RunningStats.combine(a, b);

    expect(merged.n).toBe(8);
    expect(merged.avg).toBeCloseTo(5, 10);
    expect(merged.variance).toBeCloseTo(32 / 7, 10);
    expect(merged.sum).toBe(40);
    expect(merged.min).toBe(2);
    expect(merged.max).toBe(9);
    expect(merged.lastValue).toBe(9);
    expect(a.n).toBe(4);
    expect(b.n).toBe(4);
  });

  it('combine with an empty side returns a copy of the other', () => {
    const filled = statsOf([1, 3]);
    const merged = RunningStats.combine(new RunningStats(), filled);
    expect(merged).not.toBe(filled);
    expect(merged.toJSON()).toEqual(filled.toJSON());
    expect(RunningStats.combine(filled, new RunningStats()).toJSON()).toEqual(filled.toJSON());
  });

  it('serializes a snapshot', () => {
    expect(statsOf([1, 3]).toJSON()).toEqual({
      n: 2,
      avg: 2,
      stdev: Math.sqrt(2),
      min: 1,
      max: 3,
      last: 3
    });
  });
});
