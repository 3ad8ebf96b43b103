import { pino, multistream, Logger, destination, type DestinationStream } from 'pino';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export type UtilLogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly UtilLogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLogLevel(raw: string | undefined): UtilLogLevel {
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

const logLevel = resolveLogLevel(process.env['LOG_LEVEL']);

const defaultLogDir = path.join(os.homedir(), '.router-pulse', 'logs');
const logDir = process.env['ROUTER_PULSE_LOG_DIR'] ?? defaultLogDir;
const logToFile = process.env['ROUTER_PULSE_LOG_FILE'] === 'true';

let fileLoggingActive = false;
let resolvedLogPath = '';

if (logToFile) {
  try {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    fileLoggingActive = true;
  } catch (err) {
    fileLoggingActive = false;
    process.stderr.write(`router-pulse: file logging disabled (${err instanceof Error ? err.message : String(err)})\n`);
  }
}

function getLogFilePath(): string {
  const date = new Date().toISOString().split('T')[0];
  return path.join(logDir, `router-pulse-${date}.log`);
}

const streams: Array<{ stream: DestinationStream }> = [
  { stream: process.stdout },
];

if (fileLoggingActive) {
  resolvedLogPath = getLogFilePath();
  streams.push({
    stream: destination({
      dest: resolvedLogPath,
      sync: false,
      mkdir: true,
    }),
  });
}

export const logger = pino(
  {
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  multistream(streams)
);

logger.debug({
  event: 'logger_ready',
  logFile: fileLoggingActive ? resolvedLogPath : 'stdout only',
  nodeVersion: process.version,
  pid: process.pid,
}, 'router-pulse logging active');

// pino children copy the parent's level when created, so a later level
// change has to reach each of them explicitly.
const childLoggers = new Set<Logger>();

export function createChildLogger(module: string): Logger {
  const child = logger.child({ module });
  childLoggers.add(child);
  return child;
}

/** Apply `level` to the root logger and every module logger created so far. */
export function setLogLevel(level: UtilLogLevel): void {
  logger.level = level;
  for (const child of childLoggers) {
    child.level = level;
  }
}

const actionLogger = createChildLogger('action');

/**
 * Log one service action with its parameters and outcome, so that a run of
 * the CLI leaves a trace per action in the log file.
 */
export function logAction(
  action: string,
  params: Record<string, unknown> | undefined,
  result: 'started' | 'success' | 'error',
  details?: Record<string, unknown>
): void {
  const logEntry = {
    action,
    params: params ?? {},
    result,
    ...details,
  };

  if (result === 'error') {
    actionLogger.error(logEntry, `[ACTION] ${action} - ERROR`);
  } else if (result === 'started') {
    actionLogger.debug(logEntry, `[ACTION] ${action} - STARTED`);
  } else {
    actionLogger.info(logEntry, `[ACTION] ${action} - SUCCESS`);
  }
}
