#!/usr/bin/env node
import { RouterPulseService } from './service/router-pulse-service.js';
import { MonitorActionSchema, type MonitorAction } from './service/actions.js';
import { loadConfigFromEnv, type Config } from './config/index.js';
import { sleep } from './utils/async-helpers.js';
import { describeError } from './utils/errors.js';

function printUsage(): void {
  console.log(`
Usage: router-pulse <action> [params-json]

Actions:
  poll                      One full poll (rates, system readings, devices, flows)
  get_devices [filter]      List devices (filter: all|online|offline|wifi|lan)
  get_flows [tag]           Sampled flows, optionally only one service tag
  get_rates                 Current throughput in Mbit/s
  classify <json>           Label an endpoint (needs address, port)
  get_metrics               Poll and command metrics for this process
  reset_circuit_breaker     Close the SSH circuit breaker
  watch [json]              Repeat poll (count, intervalMs)

Examples:
  router-pulse poll
  router-pulse get_devices '{"filter":"online"}'
  router-pulse classify '{"address":"142.250.10.5","port":443}'
  router-pulse watch '{"count":5,"intervalMs":2000}'

Environment:
  ROUTER_HOST              Router address (default 10.0.0.1)
  ROUTER_SSH_USER          SSH user (default root)
  ROUTER_SSH_PASSWORD      SSH password, sent through sshpass (optional)
  ROUTER_SSH_KEY_PATH      SSH private key (optional)
  DISCOVERY_MODE           split | combined
  LOG_LEVEL                trace | debug | info | warn | error | fatal | silent
`);
}

function fail(payload: Record<string, unknown>): never {
  console.error(JSON.stringify({ success: false, ...payload }, null, 2));
  process.exit(1);
}

interface WatchParams {
  count: number;
  intervalMs: number;
}

function parseWatchParams(params: Record<string, unknown>, config: Config): WatchParams {
  const count = params['count'] ?? 0;
  const intervalMs = params['intervalMs'] ?? config.monitor.pollIntervalMs;
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
    fail({ error: 'watch: count must be a non-negative integer (0 = until interrupted)' });
  }
  if (typeof intervalMs !== 'number' || intervalMs <= 0) {
    fail({ error: 'watch: intervalMs must be a positive number' });
  }
  return { count, intervalMs };
}

async function watch(service: RouterPulseService, params: WatchParams): Promise<boolean> {
  let allOk = true;
  for (let iteration = 1; params.count === 0 || iteration <= params.count; iteration++) {
    const result = await service.execute({ action: 'poll' });
    console.log(JSON.stringify({ iteration, ...result }));
    allOk = allOk && result.success;
    if (params.count !== 0 && iteration === params.count) break;
    await sleep(params.intervalMs);
  }
  return allOk;
}

async function main(): Promise<void> {
  const action = process.argv[2];
  const paramsRaw = process.argv[3];

  if (!action || action === '--help' || action === '-h') {
    printUsage();
    process.exit(action ? 0 : 1);
  }

  let params: Record<string, unknown> = {};
  if (paramsRaw) {
    let raw: unknown;
    try {
      raw = JSON.parse(paramsRaw);
    } catch {
      fail({ error: `Invalid JSON params: ${paramsRaw}` });
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      fail({ error: `Params must be a JSON object: ${paramsRaw}` });
    }
    params = { ...raw };
  }

  let config: Config;
  try {
    config = loadConfigFromEnv();
  } catch (err) {
    fail({ error: describeError(err) });
  }

  let parsed: MonitorAction | null = null;
  let watchParams: WatchParams | null = null;
  if (action === 'watch') {
    watchParams = parseWatchParams(params, config);
  } else {
    const result = MonitorActionSchema.safeParse({ action, params });
    if (!result.success) {
      fail({ error: `Invalid action or params: ${result.error.message}`, action, params });
    }
    parsed = result.data;
  }

  const service = new RouterPulseService(config);
  service.registerShutdownHandlers();

  try {
    await service.initialize();

    let ok: boolean;
    if (watchParams) {
      ok = await watch(service, watchParams);
    } else if (parsed) {
      const result = await service.execute(parsed);
      console.log(JSON.stringify(result, null, 2));
      ok = result.success;
    } else {
      ok = false;
    }

    await service.shutdown();
    process.exit(ok ? 0 : 1);
  } catch (err) {
    console.error(JSON.stringify({
      success: false,
      error: describeError(err),
      action,
    }, null, 2));

    await service.shutdown().catch((shutdownErr: unknown) => {
      console.error(`Shutdown failed: ${describeError(shutdownErr)}`);
    });
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({
    success: false,
    error: `Unexpected error: ${describeError(err)}`,
  }, null, 2));
  process.exit(1);
});
