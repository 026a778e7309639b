import { describe, it, expect } from 'vitest';
import { StatsAggregator } from './stats';

describe('StatsAggregator', () => {
  it('summarises a dwell', () => {
    const stats = new StatsAggregator();
    for (const sample of [-110, -108, -112]) stats.observe(sample);

    const summary = stats.finalize();
    expect(summary.count).toBe(3);
    expect(summary.average).toBe(-110);
    expect(summary.min).toBe(-112);
    expect(summary.max).toBe(-108);
    expect(summary.stdev).toBeCloseTo(Math.sqrt(8 / 3), 10);
  });

  it('reports zero spread for identical samples', () => {
    const stats = new StatsAggregator();
    for (const sample of [10, 10, 10]) stats.observe(sample);
    expect(stats.finalize()).toEqual({ count: 3, average: 10, min: 10, max: 10, stdev: 0 });
  });

  it('reports zero spread for a single sample', () => {
    const stats = new StatsAggregator();
    stats.observe(-95);
    expect(stats.finalize()).toEqual({ count: 1, average: -95, min: -95, max: -95, stdev: 0 });
  });

  it('marks every derived field NaN without samples', () => {
    const summary = new StatsAggregator().finalize();
    expect(summary.count).toBe(0);
    expect(summary.average).toBeNaN();
    expect(summary.min).toBeNaN();
    expect(summary.max).toBeNaN();
    expect(summary.stdev).toBeNaN();
  });

  it('starts over after reset', () => {
    const stats = new StatsAggregator();
    stats.observe(-80);
    stats.observe(-120);
    stats.reset();
    stats.observe(-100);

    expect(stats.size).toBe(1);
    expect(stats.finalize()).toMatchObject({ average: -100, min: -100, max: -100 });
  });

  it('stays accurate over long dwells', () => {
    const stats = new StatsAggregator();
    for (let i = 0; i < 10_000; i++) stats.observe(i % 2 === 0 ? -109 : -111);

    const summary = stats.finalize();
    expect(summary.average).toBeCloseTo(-110, 9);
    expect(summary.stdev).toBeCloseTo(1, 9);
  });

  it('rejects non-finite samples', () => {
    const stats = new StatsAggregator();
    expect(() => stats.observe(NaN)).toThrow(RangeError);
    expect(() => stats.observe(Infinity)).toThrow(RangeError);
    expect(stats.size).toBe(0);
  });
});
