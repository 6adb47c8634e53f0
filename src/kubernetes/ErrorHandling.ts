/**
 * Kubernetes Client Error Handling Module
 *
 * Typed errors for Kubernetes API calls and the conversion from the raw errors thrown by
 * `@kubernetes/client-node` (HttpError with `statusCode`/`body`) or the network layer.
 */

/**
 * Base error class for all Kubernetes-related errors
 */
export class KubernetesError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    retryable: boolean = false,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'KubernetesError';
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KubernetesError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', 401, false, details || {});
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when the service account or user lacks permissions
 */
export class AuthorizationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHORIZATION_ERROR', 403, false, details || {});
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when a resource (or an aggregated API such as metrics.k8s.io) is not found
 */
export class ResourceNotFoundError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESOURCE_NOT_FOUND', 404, false, details || {});
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Error thrown when the server is unavailable
 */
export class ServerUnavailableError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERVER_UNAVAILABLE', 503, true, details || {});
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

/**
 * Error thrown when a timeout occurs
 */
export class TimeoutError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 408, true, details || {});
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown for network-related issues
 */
export class NetworkError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, true, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Convert Kubernetes API errors to typed errors
 */
export function convertApiError(error: unknown): KubernetesError {
  if (error instanceof KubernetesError) {
    return error;
  }

  if (!isRecord(error)) {
    return new KubernetesError(String(error), 'UNKNOWN_ERROR');
  }

  const response = isRecord(error.response) ? error.response : undefined;
  const body = isRecord(error.body)
    ? error.body
    : response && isRecord(response.body)
      ? response.body
      : undefined;
  const statusCode =
    readNumber(error, 'statusCode') ?? (response ? readNumber(response, 'statusCode') : undefined);

  // Handle Kubernetes API response errors
  if (statusCode !== undefined) {
    const message =
      (body && (readString(body, 'message') || readString(body, 'reason'))) ||
      readString(error, 'message') ||
      `HTTP ${statusCode}`;
    const details = body
      ? { kind: body.kind, apiVersion: body.apiVersion, reason: body.reason, code: body.code }
      : {};

    switch (statusCode) {
      case 401:
        return new AuthenticationError(message, details);
      case 403:
        return new AuthorizationError(message, details);
      case 404:
        return new ResourceNotFoundError(message, details);
      case 408:
        return new TimeoutError(message, details);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ServerUnavailableError(message, details);
      default:
        return new KubernetesError(message, 'API_ERROR', statusCode, statusCode >= 500, details);
    }
  }

  const code = readString(error, 'code');
  const message = readString(error, 'message') || 'Unknown error';

  // Handle network errors
  if (
    code === 'ECONNREFUSED' ||
    code === 'ENOTFOUND' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNRESET'
  ) {
    return new NetworkError(message, { code });
  }

  // Handle timeout errors
  if (message.toLowerCase().includes('timeout') || message.toLowerCase().includes('timed out')) {
    return new TimeoutError(message);
  }

  return new KubernetesError(message, 'UNKNOWN_ERROR', undefined, false, {
    originalError: String(error),
  });
}
