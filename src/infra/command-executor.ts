/**
 * Runs one shell command on the gateway and returns its standard output.
 *
 * Implementations reject with `CommandTimeoutError` when `timeoutMs` elapses
 * and with `CommandExecutionError` for a non-zero exit or a transport failure.
 */
export interface CommandExecutor {
  execute(command: string, timeoutMs: number): Promise<string>;
}
