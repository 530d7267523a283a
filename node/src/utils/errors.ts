// node/src/utils/errors.ts: typed failures surfaced by the query pipeline

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message, 'bad_request', 400);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 'service_unavailable', 503);
  }
}

/** The answer generator failed; there is no fallback for this. */
export class AnswerGenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'answer_generation_failed', 502, options);
  }
}

/** Raised by key-value stores when the backing server is unreachable. */
export class StoreUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'cache_store_unavailable', 503, options);
  }
}

export class VectorIndexError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'vector_index_unavailable', 503, options);
  }
}

export class CircuitOpenError extends AppError {
  constructor(name: string) {
    super(`Circuit breaker ${name} is OPEN - service unavailable`, 'circuit_open', 503);
  }
}

export class TimeoutError extends AppError {
  constructor(name: string, timeoutMs: number) {
    super(`${name} timed out after ${timeoutMs}ms`, 'timeout', 504);
  }
}
