export type FailureCategory =
  | 'auth-required'
  | 'format-unavailable'
  | 'unavailable-or-restricted'
  | 'private'
  | 'too-large'
  | 'unknown';

export type DownloadErrorCode =
  | 'QUOTA_EXCEEDED'
  | 'INVALID_URL'
  | 'ENGINE_FAILURE'
  | 'FILE_TOO_LARGE'
  | 'ALL_METHODS_EXHAUSTED'
  | 'FILE_MISSING'
  | 'DELIVERY_FAILED'
  | 'DOWNLOAD_CANCELLED';

/** Longest slice of raw engine text a user ever sees. */
export const USER_TEXT_LIMIT = 200;
/** Longest slice of raw engine text written to the log per attempt. */
export const LOG_TEXT_LIMIT = 100;

export function truncate(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

export class DownloadError extends Error {
  constructor(
    message: string,
    public readonly code: DownloadErrorCode,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

export class AdmissionDeniedError extends DownloadError {
  constructor(reason: string) {
    super(reason, 'QUOTA_EXCEEDED', 429);
    this.name = 'AdmissionDeniedError';
    Object.setPrototypeOf(this, AdmissionDeniedError.prototype);
  }
}

export class InvalidInputError extends DownloadError {
  constructor(message = 'Please send a valid URL starting with http:// or https://') {
    super(message, 'INVALID_URL', 400);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/** One attempt failed; the fallback chain moves on. */
export class EngineFailure extends DownloadError {
  constructor(message: string) {
    super(message, 'ENGINE_FAILURE', 502);
    this.name = 'EngineFailure';
    Object.setPrototypeOf(this, EngineFailure.prototype);
  }
}

export class FileTooLargeError extends DownloadError {
  constructor(sizeBytes: number, limitMb: number) {
    super(
      `File too large (${Math.floor(sizeBytes / 1024 / 1024)}MB). Limit is ${limitMb}MB. Try lower quality.`,
      'FILE_TOO_LARGE',
      413,
      { size_bytes: sizeBytes, limit_mb: limitMb },
    );
    this.name = 'FileTooLargeError';
    Object.setPrototypeOf(this, FileTooLargeError.prototype);
  }
}

export class FileIntegrityError extends DownloadError {
  constructor() {
    super('Downloaded file not found', 'FILE_MISSING', 502);
    this.name = 'FileIntegrityError';
    Object.setPrototypeOf(this, FileIntegrityError.prototype);
  }
}

export class DeliveryError extends DownloadError {
  constructor(recordId: number, cause: string) {
    super('The file was downloaded but could not be delivered', 'DELIVERY_FAILED', 500, {
      record_id: recordId,
      cause: truncate(cause, USER_TEXT_LIMIT),
    });
    this.name = 'DeliveryError';
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

/** The requester went away; no further attempts are made. */
export class DownloadCancelledError extends DownloadError {
  constructor() {
    super('Download cancelled', 'DOWNLOAD_CANCELLED', 499);
    this.name = 'DownloadCancelledError';
    Object.setPrototypeOf(this, DownloadCancelledError.prototype);
  }
}

export class AllMethodsExhaustedError extends DownloadError {
  constructor(
    public readonly category: FailureCategory,
    userMessage: string,
    attempts: number,
    lastError: string,
  ) {
    super(userMessage, 'ALL_METHODS_EXHAUSTED', 502, {
      category,
      attempts,
      last_error: truncate(lastError, USER_TEXT_LIMIT),
    });
    this.name = 'AllMethodsExhaustedError';
    Object.setPrototypeOf(this, AllMethodsExhaustedError.prototype);
  }
}

export function categorizeFailure(error: unknown): FailureCategory {
  if (error instanceof FileTooLargeError) return 'too-large';
  const text = error instanceof Error ? error.message : String(error);
  const lower = text.toLowerCase();

  if (lower.includes('sign in')) return 'auth-required';
  if (lower.includes('requested format is not available')) return 'format-unavailable';
  if (lower.includes('unavailable')) return 'unavailable-or-restricted';
  if (lower.includes('private')) return 'private';
  if (lower.includes('too large')) return 'too-large';
  return 'unknown';
}

export function describeFailure(category: FailureCategory, rawText: string, maxFileSizeMb: number): string {
  switch (category) {
    case 'auth-required':
      return 'The platform requires authentication for this content. Try Medium or Small quality.';
    case 'format-unavailable':
      return 'Format not available. Try a different quality.';
    case 'unavailable-or-restricted':
      return 'Content is not available or is restricted.';
    case 'private':
      return 'Content is private.';
    case 'too-large':
      return `File too large (${maxFileSizeMb}MB limit). Try lower quality.`;
    default:
      return truncate(rawText, USER_TEXT_LIMIT);
  }
}

/**
 * Wraps the final attempt's failure into the request-level error, noting that
 * every method was tried.
 */
export function exhausted(lastError: unknown, attempts: number, maxFileSizeMb: number): AllMethodsExhaustedError {
  const raw = lastError instanceof Error ? lastError.message : String(lastError);
  const category = categorizeFailure(lastError);
  const prefix = attempts > 1 ? 'All download methods failed. ' : 'Download failed. ';
  return new AllMethodsExhaustedError(
    category,
    `${prefix}${describeFailure(category, raw, maxFileSizeMb)}`,
    attempts,
    raw,
  );
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function toErrorBody(error: DownloadError): ErrorBody {
  return {
    error: {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    },
  };
}
