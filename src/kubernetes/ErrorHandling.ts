/**
 * Kubernetes Client Error Handling Module
 *
 * Typed errors for credential resolution and API calls, plus the conversion
 * from whatever the client library throws into one of them.
 */

/**
 * Base error class for all Kubernetes-related errors
 */
export class KubernetesError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    statusCode?: number,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'KubernetesError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details || {};
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KubernetesError.prototype);
  }
}

/**
 * No credential source could be loaded. Keeps both the primary and the
 * fallback failure so callers can diagnose each path.
 */
export class ConfigError extends KubernetesError {
  public readonly primaryReason: string;
  public readonly fallbackReason: string;

  constructor(primaryReason: string, fallbackReason: string) {
    super(
      `Failed to load any Kubernetes config: ${primaryReason}, ${fallbackReason}`,
      'CONFIG_ERROR',
      undefined,
      { primaryReason, fallbackReason },
    );
    this.name = 'ConfigError';
    this.primaryReason = primaryReason;
    this.fallbackReason = fallbackReason;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * The API server rejected or failed a call
 */
export class RemoteError extends KubernetesError {
  public readonly statusCode: number;
  public readonly reason: string;
  public readonly body: unknown;

  constructor(message: string, statusCode: number, reason: string, body?: unknown) {
    super(message, 'API_ERROR', statusCode, { reason });
    this.name = 'RemoteError';
    this.statusCode = statusCode;
    this.reason = reason;
    this.body = body;
    Object.setPrototypeOf(this, RemoteError.prototype);
  }

  /**
   * Response body flattened to text, for substring matching
   */
  get bodyText(): string {
    if (typeof this.body === 'string') return this.body;
    if (this.body === undefined || this.body === null) return '';
    return JSON.stringify(this.body);
  }
}

export class ValidationError extends RemoteError {
  constructor(message: string, reason: string, body?: unknown) {
    super(message, 400, reason, body);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class AuthenticationError extends RemoteError {
  constructor(message: string, reason: string, body?: unknown) {
    super(message, 401, reason, body);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class AuthorizationError extends RemoteError {
  constructor(message: string, reason: string, body?: unknown) {
    super(message, 403, reason, body);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

export class ResourceNotFoundError extends RemoteError {
  constructor(message: string, reason: string, body?: unknown) {
    super(message, 404, reason, body);
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

export class ServerUnavailableError extends RemoteError {
  constructor(message: string, statusCode: number, reason: string, body?: unknown) {
    super(message, statusCode, reason, body);
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

/**
 * Error thrown for network-related issues
 */
export class NetworkError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Error thrown when a call exceeds its timeout
 */
export class TimeoutError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 408, details || {});
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

interface HttpFailure {
  statusCode: number;
  body: unknown;
  statusMessage?: string;
}

/**
 * Pull status and body out of an HTTP failure raised by the client library.
 * Covers `HttpError` (`statusCode`, `body`, `response`) and the newer
 * `ApiException` (`code`, `body`).
 */
function extractHttpFailure(error: unknown): HttpFailure | undefined {
  if (!isRecord(error)) return undefined;
  const response = isRecord(error.response) ? error.response : undefined;

  let statusCode: number | undefined;
  if (typeof error.statusCode === 'number') {
    statusCode = error.statusCode;
  } else if (typeof response?.statusCode === 'number') {
    statusCode = response.statusCode;
  } else if (typeof error.code === 'number') {
    statusCode = error.code;
  }
  if (statusCode === undefined) return undefined;

  return {
    statusCode,
    body: error.body ?? response?.body,
    statusMessage: typeof response?.statusMessage === 'string' ? response.statusMessage : undefined,
  };
}

function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === 'string') return error.message;
  return String(error);
}

/**
 * Convert anything thrown by a Kubernetes call into a typed error
 */
export function convertApiError(error: unknown): KubernetesError {
  if (error instanceof KubernetesError) {
    return error;
  }

  const failure = extractHttpFailure(error);
  if (failure) {
    const status = isRecord(failure.body) ? failure.body : {};
    const reason =
      failure.statusMessage ||
      (typeof status.reason === 'string' ? status.reason : undefined) ||
      errorMessageOf(error);
    const message = typeof status.message === 'string' ? status.message : reason;

    switch (failure.statusCode) {
      case 400:
        return new ValidationError(message, reason, failure.body);
      case 401:
        return new AuthenticationError(message, reason, failure.body);
      case 403:
        return new AuthorizationError(message, reason, failure.body);
      case 404:
        return new ResourceNotFoundError(message, reason, failure.body);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ServerUnavailableError(message, failure.statusCode, reason, failure.body);
      default:
        return new RemoteError(message, failure.statusCode, reason, failure.body);
    }
  }

  if (isRecord(error) && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) {
    return new NetworkError(errorMessageOf(error), { code: error.code });
  }

  return new KubernetesError(errorMessageOf(error) || 'Unknown error', 'UNKNOWN_ERROR', undefined, {
    originalError: String(error),
  });
}
