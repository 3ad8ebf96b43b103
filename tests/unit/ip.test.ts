import { describe, it, expect } from 'vitest';
import { dottedQuad, compareIpv4, lastOctet, splitHostPort, isPortToken } from '../../src/utils/ip.js';

describe('dottedQuad', () => {
  it('should parse dotted quads', () => {
    expect(dottedQuad('192.168.1.20')).toEqual([192, 168, 1, 20]);
  });

  it('should not range-check octets', () => {
    expect(dottedQuad('10.0.0.300')).toEqual([10, 0, 0, 300]);
  });

  it('should reject anything that is not four dotted integers', () => {
    expect(dottedQuad('192.168.1')).toBeNull();
    expect(dottedQuad('192.168.1.2.3')).toBeNull();
    expect(dottedQuad('fe80::1')).toBeNull();
    expect(dottedQuad('')).toBeNull();
  });
});

describe('compareIpv4', () => {
  it('should order numerically rather than lexically', () => {
    const sorted = ['192.168.1.100', '192.168.1.9', '10.0.0.1'].sort(compareIpv4);
    expect(sorted).toEqual(['10.0.0.1', '192.168.1.9', '192.168.1.100']);
  });

  it('should sort an out-of-range octet numerically among valid addresses', () => {
    const sorted = ['bogus', '10.0.0.300', '10.0.1.1', '10.0.0.20'].sort(compareIpv4);
    expect(sorted).toEqual(['10.0.0.20', '10.0.0.300', '10.0.1.1', 'bogus']);
  });

  it('should put invalid addresses last in their input order', () => {
    const sorted = ['bogus-b', '192.168.1.2', 'bogus-a', '192.168.1.1'].sort(compareIpv4);
    expect(sorted).toEqual(['192.168.1.1', '192.168.1.2', 'bogus-b', 'bogus-a']);
  });
});

describe('lastOctet', () => {
  it('should return the final dotted part', () => {
    expect(lastOctet('192.168.1.42')).toBe('42');
    expect(lastOctet('router')).toBe('router');
  });
});

describe('splitHostPort', () => {
  it('should split host and port', () => {
    expect(splitHostPort('142.250.10.5:443')).toEqual({ address: '142.250.10.5', port: 443 });
  });

  it('should split a bracketed IPv6 address', () => {
    expect(splitHostPort('[2001:db8::1]:8443')).toEqual({ address: '2001:db8::1', port: 8443 });
  });

  it('should leave a bare address without a port', () => {
    expect(splitHostPort('192.168.1.5')).toEqual({ address: '192.168.1.5' });
    expect(splitHostPort('2001:db8::1')).toEqual({ address: '2001:db8::1' });
  });
});

describe('isPortToken', () => {
  it('should accept ports in range only', () => {
    expect(isPortToken('0')).toBe(true);
    expect(isPortToken('65535')).toBe(true);
    expect(isPortToken('65536')).toBe(false);
    expect(isPortToken('1.5Kb')).toBe(false);
    expect(isPortToken(undefined)).toBe(false);
  });
});
