export interface StatsSummary {
  count: number;
  average: number;
  min: number;
  max: number;
  /** Population standard deviation. */
  stdev: number;
}

/**
 * Running noise-floor statistics (Welford). With no samples every derived
 * field is NaN.
 */
export class StatsAggregator {
  private count = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;

  reset(): void {
    this.count = 0;
    this.mean = 0;
    this.m2 = 0;
    this.min = Infinity;
    this.max = -Infinity;
  }

  observe(sample: number): void {
    if (!Number.isFinite(sample)) {
      throw new RangeError(`Sample must be a finite number, got ${sample}`);
    }
    this.count++;
    const delta = sample - this.mean;
    this.mean += delta / this.count;
    this.m2 += delta * (sample - this.mean);
    if (sample < this.min) this.min = sample;
    if (sample > this.max) this.max = sample;
  }

  get size(): number {
    return this.count;
  }

  finalize(): StatsSummary {
    if (this.count === 0) {
      return { count: 0, average: NaN, min: NaN, max: NaN, stdev: NaN };
    }
    return {
      count: this.count,
      average: this.mean,
      min: this.min,
      max: this.max,
      stdev: Math.sqrt(Math.max(0, this.m2 / this.count)),
    };
  }
}
