import { createChildLogger } from '../utils/logger.js';
import { Semaphore } from '../utils/async-helpers.js';
import type { CounterSnapshot, ThroughputRates } from '../types/network.js';

const logger = createChildLogger('rate-tracker');

const BITS_PER_BYTE = 8;
const BITS_PER_MEGABIT = 1024 * 1024;

export const ZERO_RATES: Readonly<ThroughputRates> = Object.freeze({
  downloadMbps: 0,
  uploadMbps: 0,
  totalMbps: 0,
});

function roundTo(value: number, decimals: number | undefined): number {
  if (decimals === undefined) return value;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Throughput between two counter readings, in megabits per second.
 *
 * Without a previous reading, or when the clock did not advance, every rate is
 * zero. Counters that went backwards (interface reset, 32-bit wrap) count as
 * no traffic. When `decimals` is given each direction is rounded on its own
 * and the total is the sum of the rounded figures.
 */
export function computeRates(
  previous: CounterSnapshot | null,
  current: CounterSnapshot,
  decimals?: number
): ThroughputRates {
  if (previous === null) {
    return { ...ZERO_RATES };
  }

  const elapsedSec = (current.timestampMs - previous.timestampMs) / 1000;
  if (elapsedSec <= 0) {
    return { ...ZERO_RATES };
  }

  const rxDelta = Math.max(0, current.rxBytes - previous.rxBytes);
  const txDelta = Math.max(0, current.txBytes - previous.txBytes);

  const downloadMbps = roundTo((rxDelta * BITS_PER_BYTE) / BITS_PER_MEGABIT / elapsedSec, decimals);
  const uploadMbps = roundTo((txDelta * BITS_PER_BYTE) / BITS_PER_MEGABIT / elapsedSec, decimals);

  return {
    downloadMbps,
    uploadMbps,
    // re-rounded only to strip floating-point noise from the addition
    totalMbps: roundTo(downloadMbps + uploadMbps, decimals),
  };
}

/**
 * Holds the last counter reading for one interface. Each `record` call reads
 * the previous snapshot, computes rates and overwrites it under an exclusive
 * lock, so concurrent polls never compute against the same baseline twice.
 */
export class RateTracker {
  private previous: CounterSnapshot | null = null;
  private readonly lock = new Semaphore(1);
  private readonly decimals: number | undefined;

  constructor(decimals?: number) {
    this.decimals = decimals;
  }

  async record(rxBytes: number, txBytes: number, timestampMs: number = Date.now()): Promise<ThroughputRates> {
    return this.lock.withLock(() => {
      const current: CounterSnapshot = { rxBytes, txBytes, timestampMs };
      const rates = computeRates(this.previous, current, this.decimals);

      if (this.previous !== null) {
        if (rxBytes < this.previous.rxBytes || txBytes < this.previous.txBytes) {
          logger.info({
            previousRx: this.previous.rxBytes,
            previousTx: this.previous.txBytes,
            rxBytes,
            txBytes,
          }, 'Interface counters went backwards, treating as reset');
        }
      }

      this.previous = current;
      return rates;
    });
  }

  getSnapshot(): CounterSnapshot | null {
    return this.previous === null ? null : { ...this.previous };
  }

  reset(): void {
    this.previous = null;
  }
}
