export enum ErrorCode {
  // Command / transport errors (1xxx)
  SSH_CONNECTION_FAILED = 1001,
  COMMAND_TIMEOUT = 1002,
  COMMAND_FAILED = 1004,
  CIRCUIT_OPEN = 1005,

  // Configuration errors (2xxx)
  CONFIG_INVALID = 2002,
  RULES_INVALID = 2003,

  // Telemetry errors (3xxx)
  SECTION_MISSING = 3001,
  PARSE_SKIPPED = 3002,

  UNKNOWN_ERROR = 9000,
}

export interface MonitorErrorOptions {
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

/** Base error; `code` and `context` end up in the pino `err` serializer output. */
export class MonitorError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, options?: MonitorErrorOptions) {
    super(message);
    this.name = 'MonitorError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;

    Error.captureStackTrace?.(this, MonitorError);
  }
}

export class ConnectionError extends MonitorError {
  constructor(code: ErrorCode, message: string, options?: MonitorErrorOptions) {
    super(code, message, options);
    this.name = 'ConnectionError';
  }
}

export class ConfigurationError extends MonitorError {
  constructor(message: string, options?: MonitorErrorOptions) {
    super(ErrorCode.CONFIG_INVALID, message, options);
    this.name = 'ConfigurationError';
  }
}

export class CommandTimeoutError extends MonitorError {
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number, options?: MonitorErrorOptions) {
    super(ErrorCode.COMMAND_TIMEOUT, `Command '${command}' timed out after ${timeoutMs}ms`, options);
    this.name = 'CommandTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export type CommandFailureKind = 'non_zero_exit' | 'transport';

export class CommandExecutionError extends MonitorError {
  readonly kind: CommandFailureKind;
  readonly exitCode: number | null;

  constructor(
    kind: CommandFailureKind,
    message: string,
    options?: MonitorErrorOptions & { exitCode?: number | null | undefined }
  ) {
    super(
      kind === 'transport' ? ErrorCode.SSH_CONNECTION_FAILED : ErrorCode.COMMAND_FAILED,
      message,
      { cause: options?.cause, context: options?.context }
    );
    this.name = 'CommandExecutionError';
    this.kind = kind;
    this.exitCode = options?.exitCode ?? null;
  }
}

/** Issue code for a poll section; anything that is not ours is UNKNOWN_ERROR. */
export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof MonitorError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
