import { createChildLogger } from './logger.js';

const logger = createChildLogger('circuit-breaker');

export interface CircuitBreakerOptions {
  /** Number of failures before opening circuit */
  failureThreshold: number;
  /** Time in ms before attempting to close circuit */
  resetTimeoutMs: number;
  /** Successful probes needed in half-open state before closing */
  halfOpenSuccesses: number;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
  halfOpenSuccesses: 2,
};

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime = 0;
  private successCount = 0;
  private readonly options: CircuitBreakerOptions;
  private readonly name: string;
  private readonly now: () => number;

  constructor(name: string, options: Partial<CircuitBreakerOptions> = {}, now: () => number = Date.now) {
    this.name = name;
    this.options = { ...DEFAULT_CIRCUIT_OPTIONS, ...options };
    this.now = now;
  }

  getState(): CircuitState {
    this.updateState();
    return this.state;
  }

  private updateState(): void {
    if (this.state === 'open') {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure >= this.options.resetTimeoutMs) {
        this.state = 'half-open';
        this.successCount = 0;
        logger.info({ name: this.name }, 'Circuit breaker transitioning to half-open');
      }
    }
  }

  canExecute(): boolean {
    this.updateState();
    return this.state !== 'open';
  }

  /** Milliseconds until an open circuit lets a probe through; 0 when not open. */
  retryAfterMs(): number {
    if (this.getState() !== 'open') return 0;
    return Math.max(0, this.lastFailureTime + this.options.resetTimeoutMs - this.now());
  }

  recordSuccess(): void {
    if (this.state === 'half-open') {
      this.successCount++;
      if (this.successCount >= this.options.halfOpenSuccesses) {
        this.state = 'closed';
        this.failureCount = 0;
        logger.info({ name: this.name }, 'Circuit breaker closed after successful recovery');
      }
    } else {
      this.failureCount = Math.max(0, this.failureCount - 1);
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      logger.warn({ name: this.name }, 'Circuit breaker re-opened after half-open failure');
    } else if (this.failureCount >= this.options.failureThreshold) {
      this.state = 'open';
      logger.warn({
        name: this.name,
        failureCount: this.failureCount,
        resetTimeoutMs: this.options.resetTimeoutMs,
      }, 'Circuit breaker opened');
    }
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    logger.info({ name: this.name }, 'Circuit breaker manually reset');
  }

  getStats(): { state: CircuitState; failureCount: number; lastFailureTime: number } {
    return {
      state: this.getState(),
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
