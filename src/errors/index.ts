/**
 * Custom Error Classes
 *
 * Standardized error types for the upstream client, normalizer and cache.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures (bad scope, unknown dataset kind)
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Base class for failures talking to the data provider
 */
export class UpstreamError extends AppError {
  constructor(message: string, code: string, public url: string, cause?: Error) {
    super(message, code, 502, cause);
  }
}

/**
 * Request exceeded the configured timeout
 */
export class UpstreamTimeoutError extends UpstreamError {
  constructor(url: string, public timeoutMs: number, cause?: Error) {
    super(`Upstream request timed out after ${timeoutMs}ms`, 'UPSTREAM_TIMEOUT', url, cause);
  }
}

/**
 * Provider could not be reached (DNS, refused, reset)
 */
export class UpstreamUnreachableError extends UpstreamError {
  constructor(message: string, url: string, cause?: Error) {
    super(message, 'UPSTREAM_UNREACHABLE', url, cause);
  }
}

/**
 * Provider answered with a non-2xx status
 */
export class UpstreamBadStatusError extends UpstreamError {
  constructor(url: string, public status: number) {
    super(`Upstream responded with status ${status}`, 'UPSTREAM_BAD_STATUS', url);
  }
}

/**
 * Provider answered 2xx but the body is not a JSON object
 */
export class MalformedResponseError extends UpstreamError {
  constructor(message: string, url: string) {
    super(message, 'MALFORMED_RESPONSE', url);
  }
}

/**
 * Payload parsed but required fields are absent or of the wrong shape
 */
export class SchemaMismatchError extends AppError {
  constructor(message: string, public path: string) {
    super(`${message} at ${path}`, 'SCHEMA_MISMATCH', 502);
  }
}

/**
 * First-ever load for a cache key failed and there is nothing to fall back to
 */
export class NoDataAvailableError extends AppError {
  constructor(public key: string, cause?: Error) {
    super(`No data available for ${key}${cause ? `: ${cause.message}` : ''}`, 'NO_DATA_AVAILABLE', 503, cause);
  }
}

/**
 * Whether a loader failure is worth another attempt
 *
 * Timeouts, connection failures and 5xx responses are transient;
 * 4xx, malformed bodies and schema mismatches are not.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof UpstreamTimeoutError || err instanceof UpstreamUnreachableError) return true;
  if (err instanceof UpstreamBadStatusError) return err.status >= 500;
  return false;
}

/**
 * Coerces a thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
