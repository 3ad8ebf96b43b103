import { createChildLogger } from '../utils/logger.js';
import { SegmentParser, linesOf, type SectionMarker, type SegmentedText } from './segment-parser.js';
import type { SystemReadings } from '../types/network.js';

const logger = createChildLogger('system-readings');

export type MetricsSection = 'default' | 'load' | 'ping' | 'counters' | 'temperature' | 'memory';

export const METRICS_SECTION_MARKERS: ReadonlyArray<SectionMarker<MetricsSection>> = [
  { marker: '---LOAD---', section: 'load' },
  { marker: '---PING---', section: 'ping' },
  { marker: '---NETDEV---', section: 'counters' },
  { marker: '---TEMP---', section: 'temperature' },
  { marker: '---MEM---', section: 'memory' },
];

export const metricsSegmentParser = new SegmentParser<MetricsSection>(METRICS_SECTION_MARKERS, 'default');

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
}

const DIGITS = /^\d+$/;

/**
 * Cumulative byte counters, from either a pre-cut `rx tx` pair or a raw
 * `/proc/net/dev` row (`iface: rx_bytes packets errs drop fifo frame
 * compressed multicast tx_bytes ...`). Raw rows for any interface other than
 * `interfaceName` are ignored.
 */
export function parseInterfaceCounters(lines: readonly string[], interfaceName: string): InterfaceCounters | null {
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon >= 0 && line.slice(0, colon).trim() !== interfaceName) continue;
    const fields = (colon >= 0 ? line.slice(colon + 1) : line).trim().split(/\s+/);

    const rx = fields[0];
    const tx = colon >= 0 ? fields[8] : fields[1];
    if (rx !== undefined && tx !== undefined && DIGITS.test(rx) && DIGITS.test(tx)) {
      return { rxBytes: Number(rx), txBytes: Number(tx) };
    }
  }
  return null;
}

function firstNumber(lines: readonly string[]): number | null {
  for (const line of lines) {
    const token = line.trim().split(/\s+/)[0];
    if (token !== undefined && /^-?\d+(\.\d+)?$/.test(token)) {
      return parseFloat(token);
    }
  }
  return null;
}

/** Thermal zones report millidegrees; some hwmon sensors report whole degrees. */
export function parseTemperature(lines: readonly string[]): number | null {
  const raw = firstNumber(lines);
  if (raw === null || raw <= 0) return null;
  const celsius = raw < 200 ? raw : raw / 1000;
  return Math.round(celsius * 10) / 10;
}

export function parsePing(lines: readonly string[]): number | null {
  for (const raw of lines) {
    const line = raw.trim();
    const match = /time[=<]\s*([\d.]+)/.exec(line) ?? /^([\d.]+)(\s*ms)?$/.exec(line);
    const value = match?.[1];
    if (value !== undefined) {
      const ms = parseFloat(value);
      if (!Number.isNaN(ms) && ms > 0) return ms;
    }
  }
  return null;
}

export function parseSystemReadings(segmented: SegmentedText<MetricsSection>): SystemReadings {
  const memory = firstNumber(linesOf(segmented, 'memory'));

  const readings: SystemReadings = {
    loadAverage: firstNumber(linesOf(segmented, 'load')),
    pingMs: parsePing(linesOf(segmented, 'ping')),
    temperatureC: parseTemperature(linesOf(segmented, 'temperature')),
    memoryPercent: memory === null ? null : Math.round(memory),
  };

  logger.trace(readings, 'Parsed system readings');
  return readings;
}
