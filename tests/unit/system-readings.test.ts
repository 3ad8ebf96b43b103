import { describe, it, expect } from 'vitest';
import {
  metricsSegmentParser,
  parseInterfaceCounters,
  parsePing,
  parseSystemReadings,
  parseTemperature,
} from '../../src/core/system-readings.js';

describe('parseInterfaceCounters', () => {
  it('should read rx and tx bytes from a kernel interface row', () => {
    expect(parseInterfaceCounters(['  eth0: 1000 10 0 0 0 0 0 0 500 8 0 0 0 0 0 0'], 'eth0'))
      .toEqual({ rxBytes: 1000, txBytes: 500 });
  });

  it('should ignore rows for interfaces whose name merely ends with the WAN name', () => {
    const lines = [
      ' veth0: 111 1 0 0 0 0 0 0 222 2 0 0 0 0 0 0',
      'myeth0: 333 3 0 0 0 0 0 0 444 4 0 0 0 0 0 0',
      '  eth0: 999999 10 0 0 0 0 0 0 888888 8 0 0 0 0 0 0',
    ];

    expect(parseInterfaceCounters(lines, 'eth0')).toEqual({ rxBytes: 999999, txBytes: 888888 });
    expect(parseInterfaceCounters(lines.slice(0, 2), 'eth0')).toBeNull();
  });

  it('should read a pre-cut pair', () => {
    expect(parseInterfaceCounters(['1500 400'], 'eth0')).toEqual({ rxBytes: 1500, txBytes: 400 });
  });

  it('should skip unreadable lines and return null when nothing matches', () => {
    expect(parseInterfaceCounters(['garbage', '1500 400'], 'eth0')).toEqual({ rxBytes: 1500, txBytes: 400 });
    expect(parseInterfaceCounters(['eth0: 1000 10'], 'eth0')).toBeNull();
    expect(parseInterfaceCounters([], 'eth0')).toBeNull();
  });
});

describe('parseTemperature', () => {
  it('should convert millidegrees', () => {
    expect(parseTemperature(['48500'])).toBe(48.5);
    expect(parseTemperature(['47123'])).toBe(47.1);
  });

  it('should keep whole degrees', () => {
    expect(parseTemperature(['52'])).toBe(52);
  });

  it('should return null for missing or non-positive readings', () => {
    expect(parseTemperature([])).toBeNull();
    expect(parseTemperature(['0'])).toBeNull();
    expect(parseTemperature(['n/a'])).toBeNull();
  });
});

describe('parsePing', () => {
  it('should read the round trip from ping output', () => {
    expect(parsePing(['64 bytes from 8.8.8.8: seq=0 ttl=117 time=12.345 ms'])).toBe(12.345);
  });

  it('should accept a bare figure', () => {
    expect(parsePing(['18.2'])).toBe(18.2);
  });

  it('should return null when there is no reply', () => {
    expect(parsePing(['timeout'])).toBeNull();
    expect(parsePing([])).toBeNull();
  });
});

describe('parseSystemReadings', () => {
  it('should read every section of the metrics output', () => {
    const segmented = metricsSegmentParser.parse([
      '---LOAD---',
      '0.42',
      '---PING---',
      '64 bytes from 8.8.8.8: seq=0 ttl=117 time=12.3 ms',
      '---NETDEV---',
      'eth0: 1000 10 0 0 0 0 0 0 500 8 0 0 0 0 0 0',
      '---TEMP---',
      '48500',
      '---MEM---',
      '37.6',
    ].join('\n'));

    expect(parseSystemReadings(segmented)).toEqual({
      loadAverage: 0.42,
      pingMs: 12.3,
      temperatureC: 48.5,
      memoryPercent: 38,
    });
  });

  it('should read indented section lines', () => {
    const segmented = metricsSegmentParser.parse('---LOAD---\n  0.42 0.30 0.25\n---PING---\n  18.2 ms\n---MEM---\n\t37.6\n');

    expect(parseSystemReadings(segmented)).toEqual({
      loadAverage: 0.42,
      pingMs: 18.2,
      temperatureC: null,
      memoryPercent: 38,
    });
  });

  it('should leave absent readings null', () => {
    const segmented = metricsSegmentParser.parse('---LOAD---\n1.5\n---PING---\n---TEMP---\n---MEM---');

    expect(parseSystemReadings(segmented)).toEqual({
      loadAverage: 1.5,
      pingMs: null,
      temperatureC: null,
      memoryPercent: null,
    });
  });
});
