import type { FailureCategory } from './types.js';

export class ReelgrabError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'ReelgrabError';
    Object.setPrototypeOf(this, ReelgrabError.prototype);
  }
}

export class AuthenticationError extends ReelgrabError {
  constructor(message = 'Invalid or missing API key', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, undefined, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class InvalidRequestError extends ReelgrabError {
  constructor(message: string, code = 'INVALID_REQUEST', details?: Record<string, unknown>, raw?: unknown) {
    super(message, code, 400, details, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class NotFoundError extends ReelgrabError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND', raw?: unknown) {
    super(message, code, 404, undefined, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** The user has used up today's downloads. */
export class QuotaExceededError extends ReelgrabError {
  constructor(message: string, raw?: unknown) {
    super(message, 'QUOTA_EXCEEDED', 429, undefined, raw);
    this.name = 'QuotaExceededError';
    Object.setPrototypeOf(this, QuotaExceededError.prototype);
  }
}

export class DownloadFailedError extends ReelgrabError {
  constructor(
    message: string,
    code: string,
    public readonly category: FailureCategory,
    details?: Record<string, unknown>,
    raw?: unknown,
  ) {
    super(message, code, 502, details, raw);
    this.name = 'DownloadFailedError';
    Object.setPrototypeOf(this, DownloadFailedError.prototype);
  }
}
