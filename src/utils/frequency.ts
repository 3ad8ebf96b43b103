import type { WifiBand } from '../types/network.js';

/**
 * Frequency above which a radio is reported as 5GHz.
 *
 * This is a heuristic, not a protocol constant: everything in the 2.4GHz ISM
 * band sits below 2500 MHz and every 5GHz channel above 5150 MHz, so any
 * value in between separates the two. 6GHz radios are reported as 5GHz.
 * Hardware whose channel table disagrees can override it through
 * `BAND_5G_THRESHOLD_MHZ`.
 */
export const DEFAULT_BAND_5G_THRESHOLD_MHZ = 4000;

export function classifyBand(
  frequencyMhz: number,
  thresholdMhz: number = DEFAULT_BAND_5G_THRESHOLD_MHZ
): Exclude<WifiBand, 'none'> {
  return frequencyMhz > thresholdMhz ? '5GHz' : '2.4GHz';
}

export function parseFrequencyMhz(token: string | undefined): number | null {
  if (token === undefined || !/^\d+(\.\d+)?$/.test(token)) return null;
  const value = parseFloat(token);
  return value > 0 ? value : null;
}
