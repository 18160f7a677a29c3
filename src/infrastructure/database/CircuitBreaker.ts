import { ILogger } from '../../core/repositories/ILogger.js';

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit */
  threshold?: number;
  /** How long the circuit stays open before a trial call is let through */
  resetTimeoutMs?: number;
  /** Consecutive trial successes needed to close again */
  halfOpenSuccesses?: number;
  logger?: ILogger;
}

/**
 * Circuit Breaker Pattern Implementation
 * Fails fast while the counter store is down instead of queueing
 * ticket creations behind connection timeouts.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successCount = 0;
  private nextAttempt = Date.now();

  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenSuccesses: number;
  private readonly logger?: ILogger;

  constructor(options: CircuitBreakerOptions = {}) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60000;
    this.halfOpenSuccesses = options.halfOpenSuccesses ?? 2;
    this.logger = options.logger;
  }

  /**
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() < this.nextAttempt) {
        throw new CircuitBreakerOpenError(
          `Circuit breaker is OPEN. Next attempt at ${new Date(this.nextAttempt).toISOString()}`
        );
      }
      this.transition(CircuitState.HALF_OPEN);
      this.successCount = 0;
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  private onSuccess(): void {
    this.failures = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.halfOpenSuccesses) {
        this.transition(CircuitState.CLOSED);
        this.successCount = 0;
      }
    }
  }

  private onFailure(): void {
    this.failures++;

    // A failed trial call reopens immediately
    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.threshold) {
      this.open();
    }
  }

  private open(): void {
    this.transition(CircuitState.OPEN);
    this.nextAttempt = Date.now() + this.resetTimeoutMs;
  }

  private transition(next: CircuitState): void {
    if (this.state !== next) {
      this.logger?.warn(`Circuit ${this.state} -> ${next}`, { failures: this.failures });
    }
    this.state = next;
  }
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export class CircuitBreakerOpenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}
