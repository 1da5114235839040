/**
 * @fileoverview API Error Taxonomy
 *
 * Every failure surfaced by the resilient API client is one of five
 * {@link ApiError} subclasses. The `kind` discriminator lets callers switch
 * exhaustively; `retryable` tells the client's retry loop (and the sync
 * coordinator's queue fallback) whether blind replay can ever succeed.
 *
 * | Class              | Source                         | Retried | Queued |
 * |--------------------|--------------------------------|---------|--------|
 * | `NetworkError`     | fetch failure, attempt timeout | yes     | yes    |
 * | `ServerError`      | 5xx                            | yes     | yes    |
 * | `RateLimitedError` | 429                            | yes     | yes    |
 * | `AuthError`        | 401 after refresh-and-retry    | no      | no     |
 * | `ValidationError`  | other 4xx, malformed body      | no      | no     |
 */

export type ApiErrorKind = 'network' | 'auth' | 'validation' | 'server' | 'rate_limited';

export abstract class ApiError extends Error {
  abstract readonly kind: ApiErrorKind;
  /** HTTP status, or `null` when no response was received. */
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }

  /** Whether replaying the same request later could succeed. */
  get retryable(): boolean {
    return this.kind === 'network' || this.kind === 'server' || this.kind === 'rate_limited';
  }
}

export class NetworkError extends ApiError {
  readonly kind = 'network' as const;
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, null, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class AuthError extends ApiError {
  readonly kind = 'auth' as const;

  constructor(message = 'Session expired - please sign in again', status: number | null = 401) {
    super(message, status);
  }
}

export class ValidationError extends ApiError {
  readonly kind = 'validation' as const;
  /** Field-level details from the server body, when present. */
  readonly details: unknown;

  constructor(message: string, status: number | null, details?: unknown) {
    super(message, status);
    this.details = details ?? null;
  }
}

export class ServerError extends ApiError {
  readonly kind = 'server' as const;

  constructor(message: string, status: number) {
    super(message, status);
  }
}

export class RateLimitedError extends ApiError {
  readonly kind = 'rate_limited' as const;
  /** Server-provided wait before the next attempt, from `Retry-After`. */
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null) {
    super(message, 429);
    this.retryAfterMs = retryAfterMs;
  }
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Parse a `Retry-After` header value: either delta-seconds or an HTTP date.
 *
 * @returns Milliseconds to wait, or `null` when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, nowMs: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - nowMs);
}

/**
 * Pull a human-readable message out of a server error body.
 *
 * The backend answers with `{ "detail": "..." }`, or `{ "detail": [...] }`
 * for request validation failures; other services use `message` or `error`.
 */
function messageFromBody(body: unknown): string | null {
  if (typeof body === 'string' && body.trim()) return body.trim();
  if (!body || typeof body !== 'object') return null;
  if ('detail' in body && typeof body.detail === 'string') return body.detail;
  if ('message' in body && typeof body.message === 'string') return body.message;
  if ('error' in body && typeof body.error === 'string') return body.error;
  return null;
}

/**
 * Map a non-2xx HTTP response onto the error taxonomy.
 */
export function errorFromResponse(
  status: number,
  body: unknown,
  headers: Headers,
  nowMs: number = Date.now()
): ApiError {
  const message = messageFromBody(body);

  if (status === 401) {
    return new AuthError(message ?? 'Unauthorized', status);
  }
  if (status === 429) {
    return new RateLimitedError(
      message ?? 'Too many requests',
      parseRetryAfter(headers.get('retry-after'), nowMs)
    );
  }
  if (status >= 500) {
    return new ServerError(message ?? `Server error (${status})`, status);
  }

  const details =
    body && typeof body === 'object' && 'detail' in body && Array.isArray(body.detail)
      ? body.detail
      : null;
  return new ValidationError(message ?? `Request rejected (${status})`, status, details);
}

/**
 * Classify an error as transient (will likely succeed on retry) or
 * persistent (won't improve without user action).
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof ApiError && error.retryable;
}

// =============================================================================
// Messages
// =============================================================================

/**
 * Extract the raw error message from various error formats.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (error && typeof error === 'object') {
    const fromBody = messageFromBody(error);
    if (fromBody) return fromBody;

    // Last resort: stringify the object
    try {
      return JSON.stringify(error);
    } catch {
      return '[Unable to parse error]';
    }
  }

  return String(error);
}

/**
 * Parse an error into a user-friendly message for the sync status store.
 */
export function toFriendlyMessage(error: unknown): string {
  if (error instanceof ApiError) {
    switch (error.kind) {
      case 'network':
        return error instanceof NetworkError && error.timedOut
          ? 'Server took too long to respond. Will retry.'
          : 'Network connection lost. Changes saved locally.';
      case 'auth':
        return 'Session expired. Please sign in again.';
      case 'rate_limited':
        return 'Too many requests. Will retry shortly.';
      case 'server':
        return 'Server is temporarily unavailable.';
      case 'validation':
        return error.message.length > 100 ? error.message.substring(0, 100) + '...' : error.message;
    }
  }
  if (error instanceof Error) {
    return error.message.length > 100 ? error.message.substring(0, 100) + '...' : error.message;
  }
  return 'An unexpected error occurred';
}
