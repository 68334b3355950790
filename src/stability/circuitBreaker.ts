// Circuit breaker + deadline for calls to external capabilities (embedding API, reranking LLM).
// Each call gets its own AbortSignal that fires on timeout or when the caller aborts.
import { logger } from '@/services/logger';

export enum CircuitState {
  CLOSED = 'CLOSED',       // Normal operation
  OPEN = 'OPEN',           // Failing, reject calls
  HALF_OPEN = 'HALF_OPEN', // Testing if the service recovered
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // Open circuit after N consecutive failures
  successThreshold: number; // Close circuit after N successes (half-open)
  timeout: number;          // Per-call deadline (ms)
  resetTimeout: number;     // Time before attempting half-open (ms)
}

export class CircuitOpenError extends Error {
  constructor(readonly breaker: string) {
    super(`Circuit breaker "${breaker}" is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

export class OperationTimeoutError extends Error {
  constructor(readonly breaker: string, readonly timeoutMs: number) {
    super(`Operation "${breaker}" timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  timeout: 10000,
  resetTimeout: 30000,
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    readonly name: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Runs `fn` under the breaker. `fn` receives a signal that aborts on the
   * deadline or when `options.signal` aborts. A caller abort rejects with the
   * caller's reason and does not count as a failure of the service.
   */
  async execute<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    options: { signal?: AbortSignal; timeoutMs?: number } = {},
  ): Promise<T> {
    const callerSignal = options.signal;
    callerSignal?.throwIfAborted();

    if (this.state === CircuitState.OPEN) {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure > this.config.resetTimeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        logger.info('circuit:half_open', { breaker: this.name });
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    const timeoutMs = options.timeoutMs ?? this.config.timeout;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new OperationTimeoutError(this.name, timeoutMs);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
      if (callerSignal) {
        onCallerAbort = () => {
          controller.abort(callerSignal.reason);
          reject(callerSignal.reason);
        };
        callerSignal.addEventListener('abort', onCallerAbort, { once: true });
      }
    });

    try {
      const result = await Promise.race([fn(controller.signal), deadline]);
      this.onSuccess();
      return result;
    } catch (error) {
      if (!callerSignal?.aborted) this.onFailure();
      throw error;
    } finally {
      clearTimeout(timer);
      if (callerSignal && onCallerAbort) callerSignal.removeEventListener('abort', onCallerAbort);
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        logger.info('circuit:closed', { breaker: this.name });
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      logger.warn('circuit:open', { breaker: this.name, failures: this.failureCount });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
  }
}
