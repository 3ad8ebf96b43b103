import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { withTimeout, Semaphore, TimeoutError } from '../utils/async-helpers.js';
import { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from '../utils/circuit-breaker.js';
import {
  CommandExecutionError,
  CommandTimeoutError,
  ConnectionError,
  ErrorCode,
  describeError,
} from '../utils/errors.js';
import { metrics } from '../utils/metrics.js';
import type { Config } from '../config/index.js';
import type { CommandExecutor } from './command-executor.js';

const logger = createChildLogger('ssh-executor');

export interface SshExecutorEvents {
  commandFailed: (error: Error, command: string) => void;
  circuitOpen: () => void;
}

export interface SshExecutorOptions {
  maxConcurrentCommands?: number;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
}

const MAX_CONCURRENT_COMMANDS = 4;
const EXIT_SSH_ERROR = 255;
const EXIT_COMMAND_NOT_FOUND = 127;

const preview = (command: string): string => command.substring(0, 60);

export class SshCommandExecutor extends EventEmitter<SshExecutorEvents> implements CommandExecutor {
  private readonly config: Config['router'];
  private readonly commandSemaphore: Semaphore;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly effectiveKeyPath: string | undefined;

  constructor(config: Config['router'], options: SshExecutorOptions = {}) {
    super();
    this.config = config;
    this.commandSemaphore = new Semaphore(options.maxConcurrentCommands ?? MAX_CONCURRENT_COMMANDS);
    this.circuitBreaker = new CircuitBreaker('ssh-executor', options.circuitBreaker);

    this.effectiveKeyPath = this.detectSshKey();
    if (this.effectiveKeyPath) {
      logger.debug({ keyPath: this.effectiveKeyPath }, 'SSH key detected');
    }
  }

  private detectSshKey(): string | undefined {
    if (this.config.sshKeyPath && existsSync(this.config.sshKeyPath)) {
      return this.config.sshKeyPath;
    }
    if (this.config.sshPassword) {
      return undefined;
    }

    const home = homedir();
    const keyPaths = [
      join(home, '.ssh', 'id_ed25519'),
      join(home, '.ssh', 'id_rsa'),
      join(home, '.ssh', 'id_ecdsa'),
    ];
    return keyPaths.find(keyPath => existsSync(keyPath));
  }

  private usesPassword(): boolean {
    return Boolean(this.config.sshPassword) && !this.config.sshKeyPath;
  }

  buildSshArgs(): string[] {
    const args: string[] = [
      '-o', 'StrictHostKeyChecking=no',
      '-o', 'UserKnownHostsFile=/dev/null',
      '-o', `ConnectTimeout=${this.config.connectTimeoutSec}`,
      '-o', 'LogLevel=ERROR',
      '-p', String(this.config.sshPort),
    ];

    // BatchMode refuses interactive prompts, which password auth needs
    if (!this.usesPassword()) {
      args.unshift('-o', 'BatchMode=yes');
    }

    if (this.effectiveKeyPath) {
      args.push('-i', this.effectiveKeyPath);
    }

    args.push(`${this.config.sshUser}@${this.config.host}`);
    return args;
  }

  getCircuitState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  resetCircuit(): void {
    this.circuitBreaker.reset();
  }

  async execute(command: string, timeoutMs: number): Promise<string> {
    if (!this.circuitBreaker.canExecute()) {
      metrics.recordCommand(0, 'circuit_open');
      throw new ConnectionError(
        ErrorCode.CIRCUIT_OPEN,
        `SSH circuit breaker is open, retry after ${Math.ceil(this.circuitBreaker.retryAfterMs() / 1000)}s`,
        { context: { host: this.config.host } }
      );
    }

    return this.commandSemaphore.withLock(async () => {
      const started = Date.now();
      try {
        const output = await this.runWithTimeout(command, timeoutMs);
        this.circuitBreaker.recordSuccess();
        metrics.recordCommand(Date.now() - started, 'ok');
        return output;
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const outcome = err instanceof CommandTimeoutError
          ? 'timeout'
          : err instanceof CommandExecutionError ? err.kind : 'transport';
        metrics.recordCommand(Date.now() - started, outcome);

        // a command that ran and failed says nothing about the link
        if (outcome === 'non_zero_exit') {
          this.circuitBreaker.recordSuccess();
        } else {
          this.circuitBreaker.recordFailure();
          if (this.circuitBreaker.getState() === 'open') {
            metrics.circuitBreakerOpen.set(1);
            this.emit('circuitOpen');
          }
        }

        this.emit('commandFailed', error, command);
        throw error;
      } finally {
        if (this.circuitBreaker.getState() !== 'open') {
          metrics.circuitBreakerOpen.set(0);
        }
      }
    });
  }

  private async runWithTimeout(command: string, timeoutMs: number): Promise<string> {
    let kill: () => void = () => undefined;
    const running = this.executeRaw(command, (killFn) => {
      kill = killFn;
    });

    try {
      return await withTimeout(running, timeoutMs, `Command timed out: ${preview(command)}`, () => kill());
    } catch (err) {
      if (err instanceof TimeoutError) {
        logger.warn({ command: preview(command), timeoutMs }, 'SSH command timed out');
        throw new CommandTimeoutError(preview(command), timeoutMs, { cause: err });
      }
      throw err;
    }
  }

  private executeRaw(command: string, registerKill: (kill: () => void) => void): Promise<string> {
    return new Promise((resolve, reject) => {
      const sshArgs = [...this.buildSshArgs(), command];
      const password = this.usesPassword() ? this.config.sshPassword : undefined;

      const executable = password ? 'sshpass' : 'ssh';
      const args = password ? ['-e', 'ssh', ...sshArgs] : sshArgs;

      logger.debug({ host: this.config.host, command: preview(command), usePassword: Boolean(password) }, 'Executing SSH command');

      const child = spawn(executable, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        env: password ? { ...process.env, SSHPASS: password } : process.env,
      });
      registerKill(() => child.kill('SIGKILL'));

      // Decoded once on close so a multi-byte character split across chunks survives.
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout?.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const stdout = Buffer.concat(stdoutChunks).toString('utf8');
        const stderr = Buffer.concat(stderrChunks).toString('utf8');

        if (code === 0) {
          resolve(stdout);
          return;
        }

        if (code === EXIT_SSH_ERROR || code === null) {
          const reason = stderr.trim() || (signal ? `terminated by ${signal}` : 'SSH connection failed');
          logger.error({ code, signal, stderr: reason, host: this.config.host }, 'SSH transport error');
          reject(new CommandExecutionError('transport', `SSH connection failed: ${reason}`, {
            exitCode: code,
            context: { host: this.config.host },
          }));
          return;
        }

        if (code === EXIT_COMMAND_NOT_FOUND) {
          logger.warn({ code, command: preview(command) }, 'Command not found on router');
        } else {
          logger.warn({ code, stderr: stderr.trim(), command: preview(command) }, 'SSH command exited non-zero');
        }
        reject(new CommandExecutionError('non_zero_exit', `Command failed (exit ${code}): ${stderr.trim() || preview(command)}`, {
          exitCode: code,
          context: { host: this.config.host },
        }));
      });

      child.on('error', (err: Error) => {
        logger.error({ err }, 'Failed to spawn SSH process');
        reject(new CommandExecutionError('transport', `Failed to spawn ${executable}: ${describeError(err)}`, {
          cause: err,
        }));
      });
    });
  }
}
