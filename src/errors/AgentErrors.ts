/**
 * Errors raised by the agent's own pipeline. `statusCode` is what the HTTP layer answers
 * with when the error reaches a route.
 */
export class AgentError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AgentError';
    this.code = code;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, AgentError.prototype);
  }
}

/**
 * The cluster API is unreachable, denied access, timed out or returned unusable data.
 * Callers recover from it locally.
 */
export class MetricsUnavailableError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'METRICS_UNAVAILABLE', 503, cause);
    this.name = 'MetricsUnavailableError';
    Object.setPrototypeOf(this, MetricsUnavailableError.prototype);
  }
}

/**
 * Embedding the query or searching the vector store failed.
 */
export class RetrievalFailureError extends AgentError {
  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, 'RETRIEVAL_FAILURE', options.timedOut ? 504 : 502, options.cause);
    this.name = 'RetrievalFailureError';
    Object.setPrototypeOf(this, RetrievalFailureError.prototype);
  }
}

/**
 * The LLM was unreachable, timed out or answered with an unusable payload.
 */
export class GenerationFailureError extends AgentError {
  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, 'GENERATION_FAILURE', options.timedOut ? 504 : 502, options.cause);
    this.name = 'GenerationFailureError';
    Object.setPrototypeOf(this, GenerationFailureError.prototype);
  }
}

/**
 * Embedding or storing a document failed.
 */
export class IngestionFailureError extends AgentError {
  constructor(message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, 'INGESTION_FAILURE', options.timedOut ? 504 : 502, options.cause);
    this.name = 'IngestionFailureError';
    Object.setPrototypeOf(this, IngestionFailureError.prototype);
  }
}

export class RequestValidationError extends AgentError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'RequestValidationError';
    Object.setPrototypeOf(this, RequestValidationError.prototype);
  }
}

/**
 * True for the errors `fetch` raises when an `AbortSignal.timeout` fires.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}
