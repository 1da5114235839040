/**
 * @fileoverview Resilient API Client
 *
 * Thin `fetch` wrapper that every server call goes through. It owns three
 * policies so callers don't have to:
 *
 * - **Auth** - the bearer token is read from the credential provider at call
 *   time. A 401 triggers exactly one token refresh (shared by every request
 *   that hit the 401 concurrently) and one retry with the new token.
 * - **Transient retry** - network failures, timeouts, 5xx and 429 are retried
 *   with exponential backoff `min(base * 2^n, max)`. A 429's `Retry-After`
 *   can only lengthen the wait.
 * - **Error mapping** - every failure leaves as one of the {@link ApiError}
 *   subclasses from `errors.ts`.
 *
 * Response bodies are validated with zod when the caller passes a schema; a
 * mismatch is a terminal {@link ValidationError}.
 */

import type { z } from 'zod';
import { tokenResponseSchema } from './schemas';
import type { CredentialProvider } from '../auth/credentials';
import { debugLog, debugWarn } from '../debug';
import {
  ApiError,
  AuthError,
  NetworkError,
  RateLimitedError,
  ValidationError,
  errorFromResponse,
  isTransientError
} from '../errors';
import { sleep as defaultSleep } from '../utils';

// =============================================================================
// Types
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiRequest {
  method: HttpMethod;
  /** Path relative to the base URL, e.g. `/v1/jobs/feed`. */
  path: string;
  query?: Record<string, string | number | undefined>;
  /** JSON body. */
  body?: unknown;
  /** Form-encoded body. Takes precedence over `body`. */
  form?: Record<string, string>;
  /** Attach the bearer token and handle 401 by refreshing. Defaults to `true`. */
  auth?: boolean;
  /** Apply the transient retry policy. Defaults to `true`. */
  retry?: boolean;
  /** Per-attempt timeout override. */
  timeoutMs?: number;
}

export interface ApiResponse<T> {
  status: number;
  data: T;
  headers: Headers;
}

interface RawResponse {
  status: number;
  body: unknown;
  headers: Headers;
}

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface RetryPolicy {
  /** Retries after the first attempt. */
  retries: number;
  baseDelayMs: number;
  /** Ceiling for backoff and for a server's `Retry-After` hint. */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface ApiClientOptions {
  baseUrl: string;
  credentials: CredentialProvider;
  fetch?: typeof fetch;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  /** Backoff sleep. Injected by tests. */
  sleep?: (ms: number) => Promise<void>;
  /** Epoch-ms clock, used to resolve HTTP-date `Retry-After` values. */
  now?: () => number;
}

export interface ApiClient {
  send(request: ApiRequest): Promise<ApiResponse<unknown>>;
  send<T>(request: ApiRequest, schema: ResponseSchema<T>): Promise<ApiResponse<T>>;
  /**
   * Exchange the refresh token for a new pair. Concurrent callers share one
   * request; a caller whose `staleToken` was already replaced gets the
   * current token without another round trip.
   */
  refreshSession(staleToken: string | null): Promise<string>;
  readonly retryPolicy: RetryPolicy;
}

// =============================================================================
// Backoff
// =============================================================================

/** Delay before retry number `attempt` (0-based). */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

// =============================================================================
// Client
// =============================================================================

export function createApiClient(options: ApiClientOptions): ApiClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const credentials = options.credentials;
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const retryPolicy: RetryPolicy = {
    retries: options.retry?.retries ?? DEFAULT_RETRY_POLICY.retries,
    baseDelayMs: options.retry?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.retry?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs
  };
  const defaultTimeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const sleep = options.sleep ?? defaultSleep;
  const clock = options.now ?? Date.now;

  let refreshInFlight: Promise<string> | null = null;

  function buildUrl(request: ApiRequest): string {
    const url = new URL(`${baseUrl}${request.path}`);
    for (const [name, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) url.searchParams.set(name, String(value));
    }
    return url.toString();
  }

  function buildInit(request: ApiRequest, token: string | null): RequestInit {
    const headers = new Headers({ Accept: 'application/json' });
    if (token) headers.set('Authorization', `Bearer ${token}`);

    let body: string | undefined;
    if (request.form) {
      headers.set('Content-Type', 'application/x-www-form-urlencoded');
      body = new URLSearchParams(request.form).toString();
    } else if (request.body !== undefined) {
      headers.set('Content-Type', 'application/json');
      body = JSON.stringify(request.body);
    }
    return { method: request.method, headers, body };
  }

  function parseBody(text: string): unknown {
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      // Non-JSON bodies (proxies, plain-text errors) are kept as text
      return text;
    }
  }

  /**
   * One HTTP round trip. No retry and no refresh; every failure is mapped to
   * an {@link ApiError}.
   */
  async function attempt(request: ApiRequest, token: string | null): Promise<RawResponse> {
    const timeoutMs = request.timeoutMs ?? defaultTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(buildUrl(request), {
        ...buildInit(request, token),
        signal: controller.signal
      });
      text = await response.text();
    } catch (e) {
      if (timedOut) {
        throw new NetworkError(`${request.method} ${request.path} timed out after ${timeoutMs}ms`, {
          cause: e,
          timedOut: true
        });
      }
      throw new NetworkError(`${request.method} ${request.path} failed: ${String(e)}`, { cause: e });
    } finally {
      clearTimeout(timer);
    }

    const body = parseBody(text);
    debugLog(`[API] ${request.method} ${request.path} -> ${response.status}`);

    if (!response.ok) {
      throw errorFromResponse(response.status, body, response.headers, clock());
    }
    return { status: response.status, body, headers: response.headers };
  }

  function decode<T>(request: ApiRequest, raw: RawResponse, schema: ResponseSchema<T>): ApiResponse<T> {
    const parsed = schema.safeParse(raw.body);
    if (!parsed.success) {
      throw new ValidationError(
        `Unexpected response from ${request.method} ${request.path}`,
        raw.status,
        parsed.error.issues
      );
    }
    return { status: raw.status, data: parsed.data, headers: raw.headers };
  }

  async function performRefresh(): Promise<string> {
    const session = await credentials.getSession();
    if (!session?.refreshToken) {
      await credentials.clearSession();
      throw new AuthError();
    }

    const request: ApiRequest = {
      method: 'POST',
      path: '/v1/auth/refresh',
      body: { refresh_token: session.refreshToken },
      auth: false
    };
    try {
      const { data } = decode(request, await attempt(request, null), tokenResponseSchema);
      await credentials.setSession({
        accessToken: data.access_token,
        refreshToken: data.refresh_token ?? session.refreshToken
      });
      debugLog('[AUTH] Access token refreshed');
      return data.access_token;
    } catch (e) {
      if (e instanceof ApiError && !e.retryable) {
        // The server rejected the refresh token; nothing short of a new login helps
        debugWarn('[AUTH] Refresh rejected, clearing session:', e.message);
        await credentials.clearSession();
        throw new AuthError();
      }
      // Transient: keep the session so a later attempt can still refresh
      throw e;
    }
  }

  async function refreshSession(staleToken: string | null): Promise<string> {
    const session = await credentials.getSession();
    if (session && staleToken !== null && session.accessToken !== staleToken) {
      return session.accessToken;
    }
    if (!refreshInFlight) {
      refreshInFlight = performRefresh().finally(() => {
        refreshInFlight = null;
      });
    }
    return refreshInFlight;
  }

  /** One logical call: attempt, then refresh and retry once on 401. */
  async function sendAuthorized(request: ApiRequest): Promise<RawResponse> {
    if (request.auth === false) return attempt(request, null);

    const token = await credentials.getAccessToken();
    if (!token) throw new AuthError('Not signed in', null);

    try {
      return await attempt(request, token);
    } catch (e) {
      if (!(e instanceof AuthError)) throw e;
    }

    const freshToken = await refreshSession(token);
    try {
      return await attempt(request, freshToken);
    } catch (e) {
      if (e instanceof AuthError) {
        debugWarn('[AUTH] Still unauthorized after refresh, clearing session');
        await credentials.clearSession();
      }
      throw e;
    }
  }

  async function sendWithRetry(request: ApiRequest): Promise<RawResponse> {
    const maxRetries = request.retry === false ? 0 : retryPolicy.retries;

    for (let retry = 0; ; retry++) {
      try {
        return await sendAuthorized(request);
      } catch (e) {
        if (!isTransientError(e) || retry >= maxRetries) throw e;

        let delay = backoffDelay(retry, retryPolicy);
        if (e instanceof RateLimitedError && e.retryAfterMs !== null) {
          // Honour the hint, but never park the caller past the policy's ceiling
          delay = Math.min(Math.max(delay, e.retryAfterMs), retryPolicy.maxDelayMs);
        }
        debugWarn(
          `[API] ${request.method} ${request.path} failed (${e instanceof Error ? e.message : String(e)}), ` +
            `retry ${retry + 1}/${maxRetries} in ${delay}ms`
        );
        await sleep(delay);
      }
    }
  }

  function send(request: ApiRequest): Promise<ApiResponse<unknown>>;
  function send<T>(request: ApiRequest, schema: ResponseSchema<T>): Promise<ApiResponse<T>>;
  async function send<T>(
    request: ApiRequest,
    schema?: ResponseSchema<T>
  ): Promise<ApiResponse<unknown>> {
    const raw = await sendWithRetry(request);
    if (!schema) return { status: raw.status, data: raw.body, headers: raw.headers };
    return decode(request, raw, schema);
  }

  return { send, refreshSession, retryPolicy };
}
