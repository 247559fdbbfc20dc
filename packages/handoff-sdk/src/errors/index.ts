import axios from 'axios';

/**
 * Base error class for all handoff SDK errors
 */
export class HandoffError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode?: number, code?: string, details?: unknown) {
    super(message);
    this.name = 'HandoffError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class AuthenticationError extends HandoffError {
  constructor(message: string = 'Authentication failed', details?: unknown) {
    super(message, 401, 'AUTHENTICATION_ERROR', details);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends HandoffError {
  constructor(message: string = 'Authorization failed', details?: unknown) {
    super(message, 403, 'AUTHORIZATION_ERROR', details);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends HandoffError {
  constructor(message: string = 'Resource not found', details?: unknown) {
    super(message, 404, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends HandoffError {
  constructor(message: string = 'Validation failed', details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Relay rejected the request because of the resource's current state
 * (already terminal, already listed, not the owner, ...). `code` carries the
 * relay's error code.
 */
export class ConflictError extends HandoffError {
  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message, statusCode, code, details);
    this.name = 'ConflictError';
  }
}

export class RateLimitError extends HandoffError {
  public readonly retryAfter?: number;

  constructor(message: string = 'Rate limit exceeded', retryAfter?: number, details?: unknown) {
    super(message, 429, 'RATE_LIMIT_ERROR', details);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class ServerError extends HandoffError {
  constructor(message: string = 'Server error occurred', statusCode: number = 500, details?: unknown) {
    super(message, statusCode, 'SERVER_ERROR', details);
    this.name = 'ServerError';
  }
}

export class NetworkError extends HandoffError {
  constructor(message: string = 'Network request failed', details?: unknown) {
    super(message, undefined, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends HandoffError {
  constructor(message: string = 'Request timeout', details?: unknown) {
    super(message, 408, 'TIMEOUT_ERROR', details);
    this.name = 'TimeoutError';
  }
}

export class ConfigurationError extends HandoffError {
  constructor(message: string = 'Invalid SDK configuration', details?: unknown) {
    super(message, undefined, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readErrorBody(data: unknown): { message?: string; code?: string; details?: unknown } {
  if (!isRecord(data)) {
    return {};
  }
  const error = data.error;
  if (isRecord(error)) {
    return {
      message: typeof error.message === 'string' ? error.message : undefined,
      code: typeof error.code === 'string' ? error.code : undefined,
      details: error.details,
    };
  }
  return {
    message: typeof data.message === 'string' ? data.message : typeof error === 'string' ? error : undefined,
    details: data.details,
  };
}

/**
 * Translate a failed request into the SDK error hierarchy
 */
export function handleAPIError(error: unknown): never {
  if (error instanceof HandoffError) {
    throw error;
  }

  if (!axios.isAxiosError(error)) {
    throw new NetworkError(error instanceof Error ? error.message : 'Request failed');
  }

  const response = error.response;
  if (response) {
    const status = response.status;
    const body = readErrorBody(response.data);
    const message = body.message || 'An error occurred';
    const details = body.details ?? response.data;

    switch (status) {
      case 400:
        throw new ValidationError(message, details);
      case 401:
        throw new AuthenticationError(message, details);
      case 403:
        throw new AuthorizationError(message, details);
      case 404:
        throw new NotFoundError(message, details);
      case 408:
        throw new TimeoutError(message, details);
      case 409:
      case 410:
        throw new ConflictError(message, status, body.code || 'CONFLICT', details);
      case 429: {
        const retryAfter = response.headers['retry-after'];
        throw new RateLimitError(
          message,
          typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : undefined,
          details
        );
      }
      default:
        if (status >= 500) {
          throw new ServerError(message, status, details);
        }
        throw new HandoffError(message, status, body.code || 'API_ERROR', details);
    }
  }

  if (error.request) {
    if (error.code === 'ECONNABORTED') {
      throw new TimeoutError('Request timeout');
    }
    throw new NetworkError('No response received from server', { code: error.code });
  }

  throw new NetworkError(error.message || 'Request failed');
}
