import { describe, it, expect } from 'vitest';
import { parseFlowPair, parseFlows } from '../../src/core/flow-parser.js';
import { TrafficClassifier, parseClassificationRules } from '../../src/core/traffic-classifier.js';

const classifier = new TrafficClassifier(parseClassificationRules({
  services: [{ prefix: '142.250.', service: 'Google' }],
  ports: [{ port: 443, protocol: 'HTTPS' }, { port: 8080, protocol: 'HTTP Alt' }],
}));

describe('parseFlowPair', () => {
  it('should read the compact format with the destination on the outbound line', () => {
    const flow = parseFlowPair(
      { outbound: '192.168.1.20 => 142.250.10.5:443 1.2Kb', inbound: '<= 8.0Kb' },
      classifier
    );

    expect(flow).toEqual({
      source: { address: '192.168.1.20' },
      destination: { address: '142.250.10.5', port: 443 },
      bandwidth: '8.0Kb',
      classification: { label: 'GOOGLE', tag: 'google' },
    });
  });

  it('should read sampler rows with the destination on the inbound line', () => {
    const flow = parseFlowPair(
      {
        outbound: '1 192.168.1.20:51000 => 1.20Kb 1.10Kb 1.05Kb 300B',
        inbound: '142.250.10.5:443 <= 8.0Kb 7.5Kb 7.0Kb 2.1KB',
      },
      classifier
    );

    expect(flow).toEqual({
      source: { address: '192.168.1.20', port: 51000 },
      destination: { address: '142.250.10.5', port: 443 },
      bandwidth: '2.1KB',
      classification: { label: 'GOOGLE', tag: 'google' },
    });
  });

  it('should accept a destination written as address and port fields', () => {
    const flow = parseFlowPair(
      { outbound: '192.168.1.20 => 10.20.30.40 8080 1Kb', inbound: '<= 2Kb' },
      classifier
    );

    expect(flow?.destination).toEqual({ address: '10.20.30.40', port: 8080 });
    expect(flow?.classification).toEqual({ label: 'HTTP Alt', tag: 'http-alt' });
  });

  it('should default the port when none can be recovered', () => {
    const flow = parseFlowPair({ outbound: '192.168.1.20 => 10.20.30.40', inbound: '<= 500b' }, classifier);

    expect(flow?.destination).toEqual({ address: '10.20.30.40', port: 443 });
    expect(flow?.classification).toEqual({ label: 'HTTPS', tag: 'https' });
  });

  it('should use a configured default port', () => {
    const flow = parseFlowPair(
      { outbound: '192.168.1.20 => 10.20.30.40', inbound: '<= 500b' },
      classifier,
      { defaultPort: 80 }
    );
    expect(flow?.classification).toEqual({ label: 'PORT 80', tag: 'other' });
  });

  it('should reject a pair without a source before the marker', () => {
    expect(parseFlowPair({ outbound: '=> 142.250.10.5:443', inbound: '<= 1Kb' }, classifier)).toBeNull();
  });

  it('should reject a pair with no bandwidth after the inbound marker', () => {
    expect(parseFlowPair({ outbound: '192.168.1.20 => 142.250.10.5:443', inbound: '<=' }, classifier)).toBeNull();
  });

  it('should reject markers glued to other text', () => {
    expect(parseFlowPair({ outbound: '192.168.1.20=>142.250.10.5:443', inbound: '<= 1Kb' }, classifier)).toBeNull();
  });

  it('should reject a pair with no destination anywhere', () => {
    expect(parseFlowPair({ outbound: '192.168.1.20 => 1Kb', inbound: '<= 1Kb' }, classifier)).toBeNull();
  });
});

describe('parseFlows', () => {
  it('should drop a corrupted pair and keep parsing', () => {
    const result = parseFlows([
      '192.168.1.20 => 142.250.10.5:443 1Kb',
      '<= 4Kb',
      '=> garbage',
      '<= 1Kb',
      'Total send rate: 12Kb',
      '192.168.1.21 => 10.20.30.40:8080 1Kb',
      '<= 9Kb',
    ], classifier);

    expect(result.flows.map(f => [f.destination.address, f.bandwidth])).toEqual([
      ['142.250.10.5', '4Kb'],
      ['10.20.30.40', '9Kb'],
    ]);
    expect(result.skipped).toBe(2);
  });

  it('should not pair an outbound line with a later flow when its inbound line is garbled', () => {
    const result = parseFlows([
      '1 192.168.1.20:51000 => 1.20Kb 1.10Kb 1.05Kb 300B',
      '142.250.10.5:443 garbled-no-marker 2Kb',
      '2 192.168.1.30:40000 garbled-no-marker 1Kb',
      '1.1.1.1:853 <= 3Kb 3Kb 3Kb 900B',
      '3 192.168.1.40:41000 => 1Kb 1Kb 1Kb 200B',
      '142.250.10.6:443 <= 5Kb 5Kb 5Kb 1.5KB',
    ], classifier);

    expect(result.flows).toEqual([{
      source: { address: '192.168.1.40', port: 41000 },
      destination: { address: '142.250.10.6', port: 443 },
      bandwidth: '1.5KB',
      classification: { label: 'GOOGLE', tag: 'google' },
    }]);
    expect(result.skipped).toBe(4);
  });

  it('should return nothing for empty input', () => {
    expect(parseFlows([], classifier)).toEqual({ flows: [], skipped: 0 });
  });
});
