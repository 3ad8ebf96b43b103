import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const ConfigSchema = z.object({
  router: z.object({
    host: z.string().min(1).default('10.0.0.1'),
    sshPort: z.number().int().positive().default(22),
    sshUser: z.string().min(1).default('root'),
    sshPassword: z.string().optional(),
    sshKeyPath: z.string().optional(),
    connectTimeoutSec: z.number().int().positive().default(3),
  }),
  monitor: z.object({
    wanInterface: z.string().regex(/^[\w.@-]+$/, 'Interface name may only hold letters, digits, _ . @ -').default('eth0'),
    lanInterface: z.string().min(1).default('br-lan'),
    leaseFile: z.string().min(1).default('/tmp/dhcp.leases'),
    pingTarget: z.string().min(1).default('8.8.8.8'),
    flowSampleLimit: z.number().int().positive().default(12),
    commandTimeoutMs: z.number().int().positive().default(10000),
    discoveryMode: z.enum(['split', 'combined']).default('split'),
    pollIntervalMs: z.number().int().positive().default(2500),
  }),
  heuristics: z.object({
    band5gThresholdMhz: z.number().positive().default(4000),
    defaultFlowPort: z.number().int().min(0).max(65535).default(443),
    rateDecimals: z.number().int().min(0).max(10).default(2),
  }),
  classification: z.object({
    rulesPath: z.string().optional(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

export function parseConfig(input: unknown): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')}`, { cause: result.error });
  }
  return result.data;
}

export function loadConfigFromEnv(env: Env = process.env): Config {
  return parseConfig({
    router: {
      host: env['ROUTER_HOST'],
      sshPort: envNumber(env, 'ROUTER_SSH_PORT'),
      sshUser: env['ROUTER_SSH_USER'],
      sshPassword: env['ROUTER_SSH_PASSWORD'],
      sshKeyPath: env['ROUTER_SSH_KEY_PATH'],
      connectTimeoutSec: envNumber(env, 'ROUTER_SSH_CONNECT_TIMEOUT'),
    },
    monitor: {
      wanInterface: env['ROUTER_WAN_INTERFACE'],
      lanInterface: env['ROUTER_LAN_INTERFACE'],
      leaseFile: env['ROUTER_LEASE_FILE'],
      pingTarget: env['ROUTER_PING_TARGET'],
      flowSampleLimit: envNumber(env, 'FLOW_SAMPLE_LIMIT'),
      commandTimeoutMs: envNumber(env, 'COMMAND_TIMEOUT_MS'),
      discoveryMode: env['DISCOVERY_MODE'],
      pollIntervalMs: envNumber(env, 'POLL_INTERVAL_MS'),
    },
    heuristics: {
      band5gThresholdMhz: envNumber(env, 'BAND_5G_THRESHOLD_MHZ'),
      defaultFlowPort: envNumber(env, 'DEFAULT_FLOW_PORT'),
      rateDecimals: envNumber(env, 'RATE_DECIMALS'),
    },
    classification: {
      rulesPath: env['CLASSIFICATION_RULES_PATH'],
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  });
}

/** Defaults merged with overrides, for tests and embedding. */
export function createConfig(overrides: {
  [K in keyof ConfigInput]?: Partial<ConfigInput[K]>;
} = {}): Config {
  return parseConfig({
    router: { ...overrides.router },
    monitor: { ...overrides.monitor },
    heuristics: { ...overrides.heuristics },
    classification: { ...overrides.classification },
    logging: { ...overrides.logging },
  });
}
