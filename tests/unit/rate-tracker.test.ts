import { describe, it, expect } from 'vitest';
import { computeRates, RateTracker, ZERO_RATES } from '../../src/core/rate-tracker.js';

describe('computeRates', () => {
  it('should return zero rates without a previous reading', () => {
    expect(computeRates(null, { rxBytes: 5000, txBytes: 5000, timestampMs: 1000 })).toEqual(ZERO_RATES);
  });

  it('should return zero rates when the clock did not advance', () => {
    const reading = { rxBytes: 1000, txBytes: 500, timestampMs: 1000 };
    expect(computeRates(reading, { rxBytes: 9000, txBytes: 9000, timestampMs: 1000 })).toEqual(ZERO_RATES);
    expect(computeRates(reading, { rxBytes: 9000, txBytes: 9000, timestampMs: 500 })).toEqual(ZERO_RATES);
  });

  it('should clamp a counter that went backwards to zero', () => {
    const rates = computeRates(
      { rxBytes: 1000, txBytes: 500, timestampMs: 0 },
      { rxBytes: 1500, txBytes: 400, timestampMs: 1000 }
    );

    expect(rates.downloadMbps).toBeCloseTo((500 * 8) / 1048576, 12);
    expect(rates.uploadMbps).toBe(0);
    expect(rates.totalMbps).toBeCloseTo((500 * 8) / 1048576, 12);
  });

  it('should convert bytes to megabits per second', () => {
    const rates = computeRates(
      { rxBytes: 0, txBytes: 0, timestampMs: 0 },
      { rxBytes: 1310720, txBytes: 655360, timestampMs: 2000 }
    );

    expect(rates).toEqual({ downloadMbps: 5, uploadMbps: 2.5, totalMbps: 7.5 });
  });

  it('should round each direction before summing', () => {
    const rates = computeRates(
      { rxBytes: 0, txBytes: 0, timestampMs: 0 },
      { rxBytes: 1953, txBytes: 1953, timestampMs: 1000 },
      2
    );

    expect(rates).toEqual({ downloadMbps: 0.01, uploadMbps: 0.01, totalMbps: 0.02 });
  });

  it('should round to the requested precision', () => {
    const rates = computeRates(
      { rxBytes: 0, txBytes: 0, timestampMs: 0 },
      { rxBytes: 1000000, txBytes: 250000, timestampMs: 1000 },
      2
    );

    expect(rates).toEqual({ downloadMbps: 7.63, uploadMbps: 1.91, totalMbps: 9.54 });
  });
});

describe('RateTracker', () => {
  it('should report zero on the first reading', async () => {
    const tracker = new RateTracker();
    expect(await tracker.record(1000, 500, 0)).toEqual(ZERO_RATES);
    expect(tracker.getSnapshot()).toEqual({ rxBytes: 1000, txBytes: 500, timestampMs: 0 });
  });

  it('should compute against the previous reading', async () => {
    const tracker = new RateTracker(2);
    await tracker.record(0, 0, 0);
    const rates = await tracker.record(1310720, 131072, 1000);

    expect(rates).toEqual({ downloadMbps: 10, uploadMbps: 1, totalMbps: 11 });
  });

  it('should treat a counter reset as no traffic and rebase on it', async () => {
    const tracker = new RateTracker(2);
    await tracker.record(5000000, 5000000, 0);

    expect(await tracker.record(100, 100, 1000)).toEqual(ZERO_RATES);
    expect(await tracker.record(131172, 100, 2000)).toEqual({ downloadMbps: 1, uploadMbps: 0, totalMbps: 1 });
  });

  it('should serialise concurrent readings', async () => {
    const tracker = new RateTracker(2);
    const [first, second] = await Promise.all([
      tracker.record(0, 0, 0),
      tracker.record(131072, 0, 1000),
    ]);

    expect(first).toEqual(ZERO_RATES);
    expect(second).toEqual({ downloadMbps: 1, uploadMbps: 0, totalMbps: 1 });
  });

  it('should start over after reset', async () => {
    const tracker = new RateTracker();
    await tracker.record(1000, 1000, 0);
    tracker.reset();

    expect(tracker.getSnapshot()).toBeNull();
    expect(await tracker.record(2000, 2000, 1000)).toEqual(ZERO_RATES);
  });
});
