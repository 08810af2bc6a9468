export type RunningStatsSnapshot = {
  n: number;
  avg: number;
  stdev: number;
  min: number;
  max: number;
  last: number;
};

/**
 * Streaming mean/variance/min/max over a series of numbers using Welford's update, so
 * no history is kept.
 */
export class RunningStats {
  private count = 0;
  private mean = 0;
  private sumSqDev = 0;
  private total = 0;
  private minValue = 0;
  private maxValue = 0;
  private last = 0;

  constructor(value?: number) {
    if (typeof value === 'number') {
      this.addValue(value);
    }
  }

  addValue(value: number) {
    this.last = value;
    this.count += 1;

    if (this.count === 1) {
      this.minValue = value;
      this.maxValue = value;
    }

    const previousMean = this.mean;
    this.total += value;
    this.mean += (value - previousMean) / this.count;
    this.sumSqDev += (value - previousMean) * (value - this.mean);

    if (value < this.minValue) {
      this.minValue = value;
    }
    if (value > this.maxValue) {
      this.maxValue = value;
    }
  }

  copy(): RunningStats {
    const clone = new RunningStats();
    clone.count = this.count;
    clone.mean = this.mean;
    clone.sumSqDev = this.sumSqDev;
    clone.total = this.total;
    clone.minValue = this.minValue;
    clone.maxValue = this.maxValue;
    clone.last = this.last;
    return clone;
  }

  /**
   * Merges two independent accumulators into a new one. Neither input is modified.
   * `lastValue` of the result is taken from `b` when it has values.
   */
  static combine(a: RunningStats, b: RunningStats): RunningStats {
    if (b.count === 0) {
      return a.copy();
    }
    if (a.count === 0) {
      return b.copy();
    }

    const merged = new RunningStats();
    const count = a.count + b.count;
    const delta = b.mean - a.mean;
    merged.count = count;
    merged.mean = a.mean + (delta * b.count) / count;
    merged.sumSqDev = a.sumSqDev + b.sumSqDev + (delta * delta * a.count * b.count) / count;
    merged.total = a.total + b.total;
    merged.minValue = Math.min(a.minValue, b.minValue);
    merged.maxValue = Math.max(a.maxValue, b.maxValue);
    merged.last = b.last;
    return merged;
  }

  get n(): number {
    return this.count;
  }

  get avg(): number {
    return this.mean;
  }

  get sum(): number {
    return this.total;
  }

  get min(): number {
    return this.minValue;
  }

  get max(): number {
    return this.maxValue;
  }

  get lastValue(): number {
    return this.last;
  }

  get variance(): number {
    return this.count > 1 ? this.sumSqDev / (this.count - 1) : 0;
  }

  get stdev(): number {
    return Math.sqrt(this.variance);
  }

  toJSON(): RunningStatsSnapshot {
    return {
      n: this.count,
      avg: this.mean,
      stdev: this.stdev,
      min: this.minValue,
      max: this.maxValue,
      last: this.last
    };
  }
}

export default RunningStats;
