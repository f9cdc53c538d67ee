/**
 * =============================================================================
 * CIRCUIT BREAKER - Graceful Failure Handling
 * =============================================================================
 *
 * Stops hammering the public map services once they start failing.
 *
 * STATES:
 * - CLOSED: calls pass through, consecutive failures are counted
 * - OPEN: calls are rejected with CircuitOpenError until resetTimeout passes
 * - HALF_OPEN: trial calls; successThreshold successes close the circuit,
 *   a single failure opens it again
 *
 * Every call gets an AbortSignal. When the request timeout fires the signal
 * is aborted, so the underlying fetch is cancelled rather than left running.
 *
 * USAGE:
 * ```typescript
 * const breaker = new CircuitBreaker({
 *   name: 'nominatim',
 *   failureThreshold: 5,
 *   requestTimeout: 10000
 * });
 *
 * const body = await breaker.execute((signal) => fetch(url, { signal }));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { errorMessage } from '../../core/errors/AppError';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  /** Name for logging and the health report */
  name: string;
  /** Consecutive failures before the circuit opens */
  failureThreshold?: number;
  /** Successes in HALF_OPEN before the circuit closes */
  successThreshold?: number;
  /** How long the circuit stays OPEN (ms) */
  resetTimeout?: number;
  /** Budget for a single call (ms) */
  requestTimeout?: number;
  /** Errors for which this returns false do not count against the service */
  isFailure?: (error: unknown) => boolean;
}

type ResolvedOptions = Required<Omit<CircuitBreakerOptions, 'isFailure'>> & Pick<CircuitBreakerOptions, 'isFailure'>;

export interface CircuitStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  nextAttemptTime: number | null;
}

export class CircuitOpenError extends Error {
  constructor(public readonly circuitName: string) {
    super(`Circuit breaker '${circuitName}' is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitTimeoutError extends Error {
  constructor(public readonly circuitName: string, public readonly timeout: number) {
    super(`Circuit breaker '${circuitName}' request timed out after ${timeout}ms`);
    this.name = 'CircuitTimeoutError';
  }
}

export class CircuitBreaker {
  private readonly options: ResolvedOptions;
  private state = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private openUntil = 0;

  constructor(options: CircuitBreakerOptions) {
    this.options = {
      failureThreshold: 5,
      successThreshold: 2,
      resetTimeout: 30000,
      requestTimeout: 10000,
      ...options
    };
  }

  get name(): string {
    return this.options.name;
  }

  async execute<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    if (!this.admit(Date.now())) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await this.withTimeout(fn);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      name: this.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      nextAttemptTime: this.state === CircuitState.OPEN ? this.openUntil : null
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /** An OPEN circuit lets a trial call through once its reset timeout is over */
  private admit(now: number): boolean {
    if (this.state !== CircuitState.OPEN) return true;
    if (now < this.openUntil) return false;
    this.moveTo(CircuitState.HALF_OPEN);
    return true;
  }

  private withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const { requestTimeout } = this.options;

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new CircuitTimeoutError(this.name, requestTimeout));
        controller.abort();
      }, requestTimeout);
      timer.unref();

      fn(controller.signal).then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private onSuccess(): void {
    this.failures = 0;
    this.successes++;

    if (this.state === CircuitState.HALF_OPEN && this.successes >= this.options.successThreshold) {
      this.moveTo(CircuitState.CLOSED);
    }
  }

  private onFailure(error: unknown): void {
    if (this.options.isFailure && !this.options.isFailure(error)) return;

    this.successes = 0;
    this.failures++;
    this.lastFailureTime = Date.now();

    logger.warn(`Circuit '${this.name}' failure ${this.failures}/${this.options.failureThreshold}: ${errorMessage(error)}`);

    const tripped = this.state === CircuitState.HALF_OPEN
      || (this.state === CircuitState.CLOSED && this.failures >= this.options.failureThreshold);
    if (tripped) {
      this.moveTo(CircuitState.OPEN);
    }
  }

  private moveTo(next: CircuitState): void {
    this.state = next;
    this.successes = 0;

    switch (next) {
      case CircuitState.OPEN:
        this.openUntil = Date.now() + this.options.resetTimeout;
        logger.warn(`Circuit '${this.name}' OPEN until ${new Date(this.openUntil).toISOString()}`);
        break;
      case CircuitState.HALF_OPEN:
        logger.info(`Circuit '${this.name}' HALF_OPEN, testing recovery`);
        break;
      case CircuitState.CLOSED:
        this.failures = 0;
        logger.info(`Circuit '${this.name}' recovered and CLOSED`);
        break;
    }
  }
}

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Collects the breakers of one application instance for the health report
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  register(breaker: CircuitBreaker): CircuitBreaker {
    this.breakers.set(breaker.name, breaker);
    return breaker;
  }

  getAllStats(): CircuitStats[] {
    return [...this.breakers.values()].map(b => b.getStats());
  }

  anyOpen(): boolean {
    return this.getAllStats().some(s => s.state === CircuitState.OPEN);
  }
}
