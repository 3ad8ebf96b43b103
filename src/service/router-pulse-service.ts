import { createChildLogger, logAction, setLogLevel } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { metrics } from '../utils/metrics.js';
import { loadConfigFromEnv, type Config } from '../config/index.js';
import { SshCommandExecutor } from '../infra/ssh-executor.js';
import { RouterMonitor } from '../core/router-monitor.js';
import { TrafficClassifier } from '../core/traffic-classifier.js';
import type { CommandExecutor } from '../infra/command-executor.js';
import type { MonitorAction, MonitorResponse } from './actions.js';
import type { DeviceRecord, NetworkSnapshot } from '../types/network.js';

const logger = createChildLogger('router-pulse-service');

export interface RouterPulseServiceDeps {
  executor?: CommandExecutor;
  classifier?: TrafficClassifier;
  now?: () => number;
}

type DeviceFilter = 'all' | 'online' | 'offline' | 'wifi' | 'lan';

function filterDevices(devices: DeviceRecord[], filter: DeviceFilter): DeviceRecord[] {
  switch (filter) {
    case 'all': return devices;
    case 'online': return devices.filter(d => d.status === 'online');
    case 'offline': return devices.filter(d => d.status === 'offline');
    case 'wifi': return devices.filter(d => d.connection === 'wifi');
    case 'lan': return devices.filter(d => d.connection === 'lan');
  }
}

/**
 * Entry point for callers: validates nothing itself (actions arrive parsed),
 * wires the executor, classifier and monitor, and wraps each action result in
 * a response envelope.
 */
export class RouterPulseService {
  private readonly config: Config;
  private readonly deps: RouterPulseServiceDeps;
  private executor: CommandExecutor | null = null;
  private monitor: RouterMonitor | null = null;
  private classifier: TrafficClassifier | null = null;
  private initialized = false;

  constructor(config: Config = loadConfigFromEnv(), deps: RouterPulseServiceDeps = {}) {
    this.config = config;
    this.deps = deps;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    setLogLevel(this.config.logging.level);
    logger.info({ host: this.config.router.host, mode: this.config.monitor.discoveryMode }, 'Initializing router-pulse');

    this.classifier = this.deps.classifier ?? TrafficClassifier.fromFile(this.config.classification.rulesPath);
    this.executor = this.deps.executor ?? new SshCommandExecutor(this.config.router);
    this.monitor = new RouterMonitor({
      config: this.config,
      executor: this.executor,
      classifier: this.classifier,
      ...(this.deps.now ? { now: this.deps.now } : {}),
    });

    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    logger.info('Shutting down router-pulse');
    this.monitor?.removeAllListeners();
    if (this.executor instanceof SshCommandExecutor) {
      this.executor.removeAllListeners();
    }
    metrics.logSummary();
    this.initialized = false;
  }

  registerShutdownHandlers(): void {
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Received shutdown signal');
      await this.shutdown();
      process.exit(0);
    };

    const onSignal = (signal: string) => () => {
      shutdown(signal).catch(err => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal('SIGINT'));
    process.on('SIGTERM', onSignal('SIGTERM'));
    process.on('unhandledRejection', (reason) => {
      logger.error({ reason }, 'Unhandled rejection');
    });
  }

  getMonitor(): RouterMonitor | null {
    return this.monitor;
  }

  async execute(action: MonitorAction): Promise<MonitorResponse> {
    if (!this.initialized) {
      return this.errorResponse(action.action, 'Service not initialized. Call initialize() first.');
    }

    const startTime = Date.now();
    const params = 'params' in action && action.params ? { ...action.params } : undefined;
    logAction(action.action, params, 'started');

    try {
      const result = await this.executeAction(action);
      metrics.recordAction(action.action, result.success);
      logAction(action.action, params, result.success ? 'success' : 'error', {
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (err) {
      metrics.recordAction(action.action, false);
      logAction(action.action, params, 'error', {
        durationMs: Date.now() - startTime,
        error: describeError(err),
      });
      return this.errorResponse(action.action, describeError(err));
    }
  }

  private async executeAction(action: MonitorAction): Promise<MonitorResponse> {
    switch (action.action) {
      case 'poll': {
        const snapshot = await this.poll();
        return this.snapshotResponse(action.action, snapshot, snapshot);
      }

      case 'get_devices': {
        const snapshot = await this.poll();
        const devices = filterDevices(snapshot.devices, action.params?.filter ?? 'all');
        return this.snapshotResponse(action.action, snapshot, { devices, count: devices.length });
      }

      case 'get_flows': {
        const snapshot = await this.poll();
        const tag = action.params?.tag;
        const flows = tag ? snapshot.flows.filter(f => f.classification.tag === tag) : snapshot.flows;
        return this.snapshotResponse(action.action, snapshot, { flows, count: flows.length });
      }

      case 'get_rates': {
        const snapshot = await this.poll();
        return this.snapshotResponse(action.action, snapshot, {
          rates: snapshot.rates,
          counters: this.monitor?.getRateTracker().getSnapshot() ?? null,
        });
      }

      case 'classify': {
        const classifier = this.requireClassifier();
        return this.successResponse(action.action, {
          address: action.params.address,
          port: action.params.port,
          ...classifier.classify(action.params.address, action.params.port),
        });
      }

      case 'get_metrics':
        return this.successResponse(action.action, {
          summary: metrics.getSummary(),
          all: metrics.getAll(),
        });

      case 'reset_circuit_breaker': {
        if (!(this.executor instanceof SshCommandExecutor)) {
          return this.errorResponse(action.action, 'Executor has no circuit breaker');
        }
        this.executor.resetCircuit();
        return this.successResponse(action.action, { state: this.executor.getCircuitState() });
      }
    }
  }

  private async poll(): Promise<NetworkSnapshot> {
    if (!this.monitor) {
      throw new Error('Monitor not initialized');
    }
    return this.monitor.poll();
  }

  private requireClassifier(): TrafficClassifier {
    if (!this.classifier) {
      throw new Error('Classifier not initialized');
    }
    return this.classifier;
  }

  private snapshotResponse(action: string, snapshot: NetworkSnapshot, data: unknown): MonitorResponse {
    if (snapshot.status === 'unavailable') {
      return {
        ...this.errorResponse(action, 'Router unavailable: metrics command failed'),
        data,
        warnings: snapshot.issues.map(issue => `${issue.section}: ${issue.message}`),
      };
    }
    const warnings = snapshot.issues.map(issue => `${issue.section}: ${issue.message}`);
    return this.successResponse(action, data, warnings);
  }

  private successResponse(action: string, data: unknown, warnings: string[] = []): MonitorResponse {
    return {
      success: true,
      action,
      data,
      ...(warnings.length > 0 ? { warnings } : {}),
      timestamp: new Date().toISOString(),
    };
  }

  private errorResponse(action: string, error: string): MonitorResponse {
    logger.error({ action, error }, 'Action failed');
    return {
      success: false,
      action,
      error,
      timestamp: new Date().toISOString(),
    };
  }
}
