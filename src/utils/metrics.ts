import { createChildLogger } from './logger.js';

const logger = createChildLogger('metrics');

export interface MetricStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

type Labels = Record<string, string>;

class Counter {
  private value = 0;

  constructor(private readonly name: string, private readonly labels: Labels = {}) {}

  inc(delta = 1): void {
    this.value += delta;
  }

  get(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }

  toJSON(): { name: string; type: 'counter'; value: number; labels: Labels } {
    return { name: this.name, type: 'counter', value: this.value, labels: this.labels };
  }
}

class Gauge {
  private value = 0;

  constructor(private readonly name: string, private readonly labels: Labels = {}) {}

  set(value: number): void {
    this.value = value;
  }

  get(): number {
    return this.value;
  }

  toJSON(): { name: string; type: 'gauge'; value: number; labels: Labels } {
    return { name: this.name, type: 'gauge', value: this.value, labels: this.labels };
  }
}

class Histogram {
  private values: number[] = [];

  constructor(
    private readonly name: string,
    private readonly labels: Labels = {},
    private readonly maxSamples = 1000
  ) {}

  observe(value: number): void {
    this.values.push(value);
    if (this.values.length > this.maxSamples) {
      this.values.shift();
    }
  }

  getStats(): MetricStats {
    const sorted = [...this.values].sort((a, b) => a - b);
    const count = sorted.length;
    if (count === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
    }

    const sum = sorted.reduce((a, b) => a + b, 0);
    const at = (ratio: number): number => sorted[Math.min(count - 1, Math.floor(count * ratio))] ?? 0;

    return {
      count,
      sum,
      min: sorted[0] ?? 0,
      max: sorted[count - 1] ?? 0,
      avg: sum / count,
      p50: at(0.5),
      p95: at(0.95),
      p99: at(0.99),
    };
  }

  reset(): void {
    this.values = [];
  }

  toJSON(): { name: string; type: 'histogram'; stats: MetricStats; labels: Labels } {
    return { name: this.name, type: 'histogram', stats: this.getStats(), labels: this.labels };
  }
}

function registryGet<T>(registry: Map<string, T>, name: string, labels: Labels, create: () => T): T {
  const key = `${name}:${JSON.stringify(labels)}`;
  const existing = registry.get(key);
  if (existing) return existing;
  const created = create();
  registry.set(key, created);
  return created;
}

export class MonitorMetrics {
  private counters = new Map<string, Counter>();
  private gauges = new Map<string, Gauge>();
  private histograms = new Map<string, Histogram>();
  private readonly startTime = Date.now();

  readonly pollTotal = this.counter('router_pulse_polls_total');
  readonly pollUnavailable = this.counter('router_pulse_polls_unavailable_total');
  readonly pollDegraded = this.counter('router_pulse_polls_degraded_total');
  readonly pollDuration = this.histogram('router_pulse_poll_duration_ms');
  readonly commandTotal = this.counter('router_pulse_commands_total');
  readonly commandErrors = this.counter('router_pulse_command_errors_total');
  readonly commandDuration = this.histogram('router_pulse_command_duration_ms');
  readonly actionTotal = this.counter('router_pulse_actions_total');
  readonly actionErrors = this.counter('router_pulse_action_errors_total');
  readonly deviceCount = this.gauge('router_pulse_devices');
  readonly flowCount = this.gauge('router_pulse_flows');
  readonly circuitBreakerOpen = this.gauge('router_pulse_circuit_breaker_open');

  private counter(name: string, labels: Labels = {}): Counter {
    return registryGet(this.counters, name, labels, () => new Counter(name, labels));
  }

  private gauge(name: string, labels: Labels = {}): Gauge {
    return registryGet(this.gauges, name, labels, () => new Gauge(name, labels));
  }

  private histogram(name: string, labels: Labels = {}): Histogram {
    return registryGet(this.histograms, name, labels, () => new Histogram(name, labels));
  }

  labeledCounter(name: string, labels: Labels): Counter {
    return this.counter(name, labels);
  }

  recordPoll(durationMs: number, status: 'online' | 'degraded' | 'unavailable'): void {
    this.pollTotal.inc();
    this.pollDuration.observe(durationMs);
    if (status === 'degraded') this.pollDegraded.inc();
    if (status === 'unavailable') this.pollUnavailable.inc();
  }

  recordCommand(durationMs: number, outcome: 'ok' | 'timeout' | 'non_zero_exit' | 'transport' | 'circuit_open'): void {
    this.commandTotal.inc();
    this.commandDuration.observe(durationMs);
    if (outcome !== 'ok') {
      this.commandErrors.inc();
      this.labeledCounter('router_pulse_command_errors_by_kind', { kind: outcome }).inc();
    }
  }

  recordAction(action: string, success: boolean): void {
    this.actionTotal.inc();
    this.labeledCounter('router_pulse_actions_by_type', { action }).inc();
    if (!success) {
      this.actionErrors.inc();
    }
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }

  getSummary(): {
    uptime: number;
    polls: { total: number; degraded: number; unavailable: number; avgDuration: number };
    commands: { total: number; errors: number; errorRate: number; avgDuration: number };
    network: { devices: number; flows: number };
  } {
    const commandTotal = this.commandTotal.get();

    return {
      uptime: this.getUptime(),
      polls: {
        total: this.pollTotal.get(),
        degraded: this.pollDegraded.get(),
        unavailable: this.pollUnavailable.get(),
        avgDuration: this.pollDuration.getStats().avg,
      },
      commands: {
        total: commandTotal,
        errors: this.commandErrors.get(),
        errorRate: commandTotal > 0 ? (this.commandErrors.get() / commandTotal) * 100 : 0,
        avgDuration: this.commandDuration.getStats().avg,
      },
      network: {
        devices: this.deviceCount.get(),
        flows: this.flowCount.get(),
      },
    };
  }

  getAll(): {
    uptime: number;
    counters: Array<ReturnType<Counter['toJSON']>>;
    gauges: Array<ReturnType<Gauge['toJSON']>>;
    histograms: Array<ReturnType<Histogram['toJSON']>>;
  } {
    return {
      uptime: this.getUptime(),
      counters: Array.from(this.counters.values()).map(c => c.toJSON()),
      gauges: Array.from(this.gauges.values()).map(g => g.toJSON()),
      histograms: Array.from(this.histograms.values()).map(h => h.toJSON()),
    };
  }

  logSummary(): void {
    logger.info(this.getSummary(), 'Monitor metrics summary');
  }

  reset(): void {
    this.counters.forEach(c => c.reset());
    this.histograms.forEach(h => h.reset());
  }
}

export const metrics = new MonitorMetrics();
