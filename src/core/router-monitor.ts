import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, describeError, getErrorCode } from '../utils/errors.js';
import { metrics } from '../utils/metrics.js';
import {
  addressTableCommand,
  combinedDeviceCommand,
  flowSampleCommand,
  leaseTableCommand,
  metricsCommand,
  wirelessScanCommand,
} from '../infra/router-commands.js';
import { linesOf, missingSections } from './segment-parser.js';
import {
  deviceSegmentParser,
  parseAddressTable,
  parseLeases,
  parseWirelessStations,
  reconcileDevices,
  type DeviceSection,
} from './device-reconciler.js';
import { metricsSegmentParser, parseInterfaceCounters, parseSystemReadings } from './system-readings.js';
import { parseFlows } from './flow-parser.js';
import { RateTracker } from './rate-tracker.js';
import type { TrafficClassifier } from './traffic-classifier.js';
import type { CommandExecutor } from '../infra/command-executor.js';
import type { Config } from '../config/index.js';
import type {
  DeviceRecord,
  FlowRecord,
  NetworkSnapshot,
  PollStatus,
  SectionIssue,
  SnapshotSection,
  SystemReadings,
  ThroughputRates,
} from '../types/network.js';

const logger = createChildLogger('router-monitor');

export interface RouterMonitorEvents {
  snapshot: (snapshot: NetworkSnapshot) => void;
  degraded: (issues: SectionIssue[]) => void;
}

export interface RouterMonitorDeps {
  config: Config;
  executor: CommandExecutor;
  classifier: TrafficClassifier;
  rateTracker?: RateTracker;
  now?: () => number;
}

type SourceSection = Exclude<DeviceSection, 'default'>;

const DEVICE_SOURCES: readonly SourceSection[] = ['addresses', 'wireless', 'leases'];

interface MetricsOutcome {
  available: boolean;
  rates: ThroughputRates | null;
  system: SystemReadings | null;
  issues: SectionIssue[];
}

interface SectionOutcome<T> {
  value: T;
  issues: SectionIssue[];
}

function issueFromError(section: SnapshotSection, err: unknown): SectionIssue {
  return { section, code: getErrorCode(err), message: describeError(err) };
}

function missingIssue(section: SnapshotSection): SectionIssue {
  return { section, code: ErrorCode.SECTION_MISSING, message: `Section '${section}' missing from command output` };
}

function outputLines(output: string): string[] {
  return output.split(/\r?\n/).map(line => line.trim()).filter(line => line !== '');
}

/**
 * Runs one poll against the gateway: metrics, flow sample and device sources
 * are fetched concurrently, and a failed source only empties its own part of
 * the snapshot. Only a failed metrics call marks the poll unavailable.
 */
export class RouterMonitor extends EventEmitter<RouterMonitorEvents> {
  private readonly config: Config;
  private readonly executor: CommandExecutor;
  private readonly classifier: TrafficClassifier;
  private readonly rateTracker: RateTracker;
  private readonly now: () => number;

  constructor(deps: RouterMonitorDeps) {
    super();
    this.config = deps.config;
    this.executor = deps.executor;
    this.classifier = deps.classifier;
    this.rateTracker = deps.rateTracker ?? new RateTracker(deps.config.heuristics.rateDecimals);
    this.now = deps.now ?? Date.now;
  }

  getRateTracker(): RateTracker {
    return this.rateTracker;
  }

  async poll(): Promise<NetworkSnapshot> {
    const started = this.now();

    const [metricsOutcome, flowOutcome, deviceOutcome] = await Promise.all([
      this.collectMetrics(),
      this.collectFlows(),
      this.collectDevices(),
    ]);

    const issues = [...metricsOutcome.issues, ...flowOutcome.issues, ...deviceOutcome.issues];
    const status: PollStatus = !metricsOutcome.available
      ? 'unavailable'
      : issues.length > 0 ? 'degraded' : 'online';

    const snapshot: NetworkSnapshot = {
      status,
      timestamp: new Date(this.now()).toISOString(),
      rates: metricsOutcome.rates,
      system: metricsOutcome.system,
      devices: deviceOutcome.value,
      flows: flowOutcome.value,
      issues,
    };

    for (const issue of issues) {
      logger.warn({ section: issue.section, code: issue.code, reason: issue.message }, 'Section degraded');
    }

    const durationMs = this.now() - started;
    metrics.recordPoll(durationMs, status);
    metrics.deviceCount.set(snapshot.devices.length);
    metrics.flowCount.set(snapshot.flows.length);

    logger.info({
      status,
      durationMs,
      devices: snapshot.devices.length,
      flows: snapshot.flows.length,
      issues: issues.length,
    }, 'Poll complete');

    if (issues.length > 0) {
      this.emit('degraded', issues);
    }
    this.emit('snapshot', snapshot);
    return snapshot;
  }

  private run(command: string): Promise<string> {
    return this.executor.execute(command, this.config.monitor.commandTimeoutMs);
  }

  private async collectMetrics(): Promise<MetricsOutcome> {
    let output: string;
    try {
      output = await this.run(metricsCommand(this.config.monitor));
    } catch (err) {
      return { available: false, rates: null, system: null, issues: [issueFromError('metrics', err)] };
    }

    const segmented = metricsSegmentParser.parse(output);
    const system = parseSystemReadings(segmented);
    const counters = parseInterfaceCounters(linesOf(segmented, 'counters'), this.config.monitor.wanInterface);

    if (counters === null) {
      const issue = missingSections(segmented, ['counters']).length > 0
        ? missingIssue('counters')
        : {
            section: 'counters' as const,
            code: ErrorCode.PARSE_SKIPPED,
            message: `No byte counters for ${this.config.monitor.wanInterface}`,
          };
      return { available: true, rates: null, system, issues: [issue] };
    }

    const rates = await this.rateTracker.record(counters.rxBytes, counters.txBytes, this.now());
    return { available: true, rates, system, issues: [] };
  }

  private async collectFlows(): Promise<SectionOutcome<FlowRecord[]>> {
    let output: string;
    try {
      output = await this.run(flowSampleCommand(this.config.monitor));
    } catch (err) {
      return { value: [], issues: [issueFromError('flows', err)] };
    }

    const { flows, skipped } = parseFlows(outputLines(output), this.classifier, {
      defaultPort: this.config.heuristics.defaultFlowPort,
    });
    logger.debug({ flows: flows.length, skipped }, 'Flow sample parsed');
    return { value: flows, issues: [] };
  }

  private async collectDevices(): Promise<SectionOutcome<DeviceRecord[]>> {
    const sourceLines = this.config.monitor.discoveryMode === 'combined'
      ? await this.fetchCombinedSources()
      : await this.fetchSplitSources();

    const threshold = this.config.heuristics.band5gThresholdMhz;
    const devices = reconcileDevices({
      leases: parseLeases(sourceLines.value.leases).entries,
      addresses: parseAddressTable(sourceLines.value.addresses).entries,
      stations: parseWirelessStations(sourceLines.value.wireless, threshold).entries,
    });

    return { value: devices, issues: sourceLines.issues };
  }

  private async fetchSplitSources(): Promise<SectionOutcome<Record<SourceSection, string[]>>> {
    const commands: Record<SourceSection, string> = {
      addresses: addressTableCommand(),
      wireless: wirelessScanCommand(),
      leases: leaseTableCommand(this.config.monitor),
    };

    const settled = await Promise.allSettled(DEVICE_SOURCES.map(section => this.run(commands[section])));

    const lines: Record<SourceSection, string[]> = { addresses: [], wireless: [], leases: [] };
    const issues: SectionIssue[] = [];

    DEVICE_SOURCES.forEach((section, index) => {
      const result = settled[index];
      if (result === undefined) return;
      if (result.status === 'rejected') {
        issues.push(issueFromError(section, result.reason));
        return;
      }
      const segmented = deviceSegmentParser.withInitial(section).parse(result.value);
      lines[section] = linesOf(segmented, section);
    });

    return { value: lines, issues };
  }

  private async fetchCombinedSources(): Promise<SectionOutcome<Record<SourceSection, string[]>>> {
    const lines: Record<SourceSection, string[]> = { addresses: [], wireless: [], leases: [] };

    let output: string;
    try {
      output = await this.run(combinedDeviceCommand(this.config.monitor));
    } catch (err) {
      return { value: lines, issues: DEVICE_SOURCES.map(section => issueFromError(section, err)) };
    }

    const segmented = deviceSegmentParser.parse(output);
    for (const section of DEVICE_SOURCES) {
      lines[section] = linesOf(segmented, section);
    }

    const preamble = linesOf(segmented, 'default');
    if (preamble.length > 0) {
      logger.debug({ lines: preamble.length }, 'Ignoring output before first device marker');
    }

    const missing = DEVICE_SOURCES.filter(section => !segmented.entered.has(section));
    return { value: lines, issues: missing.map(section => missingIssue(section)) };
  }
}
