// Circuit breaker for calls to the vector index and the answer generator
import { logger } from '@/services/logger';
import { CircuitOpenError, TimeoutError } from '@/utils/errors';

const log = logger.getSubLogger({ name: 'circuit' });

export enum CircuitState {
  CLOSED = 'CLOSED', // Normal operation
  OPEN = 'OPEN', // Failing, reject calls
  HALF_OPEN = 'HALF_OPEN', // Testing if the service recovered
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // Open after N consecutive failures
  successThreshold: number; // Close after N successes while half-open
  timeout: number; // Per-call timeout (ms)
  resetTimeout: number; // Time before attempting half-open (ms)
}

export interface CircuitBreakerSnapshot {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
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
   * Execute function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure >= this.config.resetTimeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        log.info('circuit:half_open', { name: this.name });
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    const deadline = this.deadline();
    try {
      const result = await Promise.race([fn(), deadline.promise]);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      deadline.cancel();
    }
  }

  private deadline(): { promise: Promise<never>; cancel: () => void } {
    let handle: NodeJS.Timeout | null = null;
    const promise = new Promise<never>((_, reject) => {
      handle = setTimeout(() => reject(new TimeoutError(this.name, this.config.timeout)), this.config.timeout);
    });
    return {
      promise,
      cancel: () => {
        if (handle !== null) clearTimeout(handle);
      },
    };
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.state = CircuitState.CLOSED;
        log.info('circuit:closed', { name: this.name });
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      if (this.state !== CircuitState.OPEN) {
        log.error('circuit:open', { name: this.name, failures: this.failureCount });
      }
      this.state = CircuitState.OPEN;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime || null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
    log.info('circuit:reset', { name: this.name });
  }
}
