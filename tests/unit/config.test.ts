import { describe, it, expect } from 'vitest';
import { createConfig, loadConfigFromEnv, parseConfig } from '../../src/config/index.js';
import { ConfigurationError, ErrorCode } from '../../src/utils/errors.js';

describe('loadConfigFromEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfigFromEnv({});

    expect(config.router).toEqual({
      host: '10.0.0.1',
      sshPort: 22,
      sshUser: 'root',
      connectTimeoutSec: 3,
    });
    expect(config.monitor).toEqual({
      wanInterface: 'eth0',
      lanInterface: 'br-lan',
      leaseFile: '/tmp/dhcp.leases',
      pingTarget: '8.8.8.8',
      flowSampleLimit: 12,
      commandTimeoutMs: 10000,
      discoveryMode: 'split',
      pollIntervalMs: 2500,
    });
    expect(config.heuristics).toEqual({
      band5gThresholdMhz: 4000,
      defaultFlowPort: 443,
      rateDecimals: 2,
    });
    expect(config.logging.level).toBe('info');
  });

  it('should read values from the environment', () => {
    const config = loadConfigFromEnv({
      ROUTER_HOST: '192.168.8.1',
      ROUTER_SSH_PORT: '2222',
      ROUTER_SSH_PASSWORD: 'test-secret',
      DISCOVERY_MODE: 'combined',
      BAND_5G_THRESHOLD_MHZ: '5000',
      COMMAND_TIMEOUT_MS: '4000',
      LOG_LEVEL: 'debug',
    });

    expect(config.router.host).toBe('192.168.8.1');
    expect(config.router.sshPort).toBe(2222);
    expect(config.router.sshPassword).toBe('test-secret');
    expect(config.monitor.discoveryMode).toBe('combined');
    expect(config.monitor.commandTimeoutMs).toBe(4000);
    expect(config.heuristics.band5gThresholdMhz).toBe(5000);
    expect(config.logging.level).toBe('debug');
  });

  it('should treat blank numeric variables as unset', () => {
    expect(loadConfigFromEnv({ FLOW_SAMPLE_LIMIT: '  ' }).monitor.flowSampleLimit).toBe(12);
  });

  it('should reject non-numeric numbers', () => {
    expect(() => loadConfigFromEnv({ ROUTER_SSH_PORT: 'twenty-two' })).toThrow(ConfigurationError);
  });

  it('should reject a WAN interface name that is not a plain identifier', () => {
    expect(() => loadConfigFromEnv({ ROUTER_WAN_INTERFACE: "eth0' /etc/passwd '" })).toThrow(/monitor\.wanInterface/);
  });

  it('should reject an unknown discovery mode', () => {
    expect(() => loadConfigFromEnv({ DISCOVERY_MODE: 'parallel' })).toThrow(/monitor\.discoveryMode/);
  });
});

describe('parseConfig', () => {
  it('should raise CONFIG_INVALID with the failing path', () => {
    const error = (() => {
      try {
        parseConfig({ router: { sshPort: -1 }, monitor: {}, heuristics: {}, classification: {}, logging: {} });
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_INVALID });
    expect(String(error)).toContain('router.sshPort');
  });
});

describe('createConfig', () => {
  it('should merge overrides into each section', () => {
    const config = createConfig({
      monitor: { discoveryMode: 'combined' },
      heuristics: { rateDecimals: 3 },
    });

    expect(config.monitor.discoveryMode).toBe('combined');
    expect(config.monitor.wanInterface).toBe('eth0');
    expect(config.heuristics.rateDecimals).toBe(3);
    expect(config.router.host).toBe('10.0.0.1');
  });
});
