import type { ContentKind } from './types.js';

export class VideoClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends VideoClientError {
  constructor(readonly issues: string[]) {
    super(`Invalid client configuration: ${issues.join(', ')}`);
  }
}

export type ValidationErrorCode = 'UnsupportedResolution' | 'InvalidDuration' | 'InvalidVariantCount';

export type ValidatedField = 'resolution' | 'durationSeconds' | 'variantCount';

export class ValidationError extends VideoClientError {
  constructor(
    readonly code: ValidationErrorCode,
    readonly field: ValidatedField,
    message: string
  ) {
    super(message);
  }
}

/**
 * A non-2xx answer from the service. `body` is the raw response text,
 * `details` the parsed JSON when the body was JSON.
 */
export class ApiError extends VideoClientError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

export class AuthenticationError extends ApiError {}

export class NotFoundError extends ApiError {}

export class RateLimitedError extends ApiError {
  constructor(
    message: string,
    status: number,
    body: string,
    details?: unknown,
    readonly retryAfterSeconds?: number
  ) {
    super(message, status, body, details);
  }
}

export class ServiceError extends ApiError {}

// Network failure, aborted request or per-request timeout
export class TransportError extends VideoClientError {}

export class ClientClosedError extends VideoClientError {
  constructor() {
    super('Video generation client is closed');
  }
}

export class PollTimeoutError extends VideoClientError {
  constructor(
    readonly jobId: string,
    readonly elapsedMs: number,
    readonly polls: number
  ) {
    super(`Job ${jobId} did not reach a terminal state after ${polls} polls (${elapsedMs}ms)`);
  }
}

export class PollCancelledError extends VideoClientError {
  constructor(readonly jobId: string) {
    super(`Polling of job ${jobId} was cancelled`);
  }
}

export class ContentNotReadyError extends VideoClientError {
  constructor(
    readonly generationId: string,
    readonly kind: ContentKind,
    options?: ErrorOptions
  ) {
    super(`The ${kind} content of generation ${generationId} is not available`, options);
  }
}

// Local persistence failure
export class ContentWriteError extends VideoClientError {
  constructor(
    readonly destination: string,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Could not write content to ${destination}: ${reason}`, options);
  }
}

function extractErrorMessage(details: unknown, status: number): string {
  if (details && typeof details === 'object') {
    const record: Record<string, unknown> = { ...details };
    const nested = record.error;
    if (nested && typeof nested === 'object' && 'message' in nested && typeof nested.message === 'string') {
      return nested.message;
    }
    if (typeof record.message === 'string' && record.message.length > 0) {
      return record.message;
    }
    if (typeof nested === 'string' && nested.length > 0) {
      return nested;
    }
  }
  return `HTTP ${status}`;
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export function parseJsonBody(body: string): unknown {
  if (!body.length) return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

export function errorFromResponse(status: number, body: string, retryAfter: string | null = null): ApiError {
  const details = parseJsonBody(body);
  const message = extractErrorMessage(details, status);

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, status, body, details);
  }
  if (status === 404) {
    return new NotFoundError(message, status, body, details);
  }
  if (status === 429) {
    return new RateLimitedError(message, status, body, details, parseRetryAfter(retryAfter));
  }
  return new ServiceError(message, status, body, details);
}
