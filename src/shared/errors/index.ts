// Global error types. Lock conflicts are results, not errors; these cover failures.

export type ErrorStatusCode = 400 | 401 | 403 | 500 | 503;

export class LockServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ErrorStatusCode = 500
  ) {
    super(message);
    this.name = 'LockServiceError';
  }
}

export class ValidationError extends LockServiceError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends LockServiceError {
  constructor(message: string) {
    super(message, 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends LockServiceError {
  constructor(message: string) {
    super(message, 'FORBIDDEN', 403);
    this.name = 'ForbiddenError';
  }
}

export class StoreUnavailableError extends LockServiceError {
  constructor(operation: string, public readonly cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Lock store unavailable during ${operation}${reason}`, 'STORE_UNAVAILABLE', 503);
    this.name = 'StoreUnavailableError';
  }
}

export class ConfigError extends LockServiceError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}
