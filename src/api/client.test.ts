import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { backoffDelay, createApiClient, type ApiClientOptions } from './client';
import { createCredentialProvider, type CredentialProvider } from '../auth/credentials';
import { createMemorySessionStore } from '../auth/session';
import { AuthError, NetworkError, RateLimitedError, ServerError, ValidationError } from '../errors';
import { createFakeFetch, hang, jsonResponse, type FakeRoute } from '../test-helpers';
import type { AuthSession } from '../types';

const BASE_URL = 'https://api.example.test';

function setup(
  route: FakeRoute,
  overrides: Partial<ApiClientOptions> = {},
  session: AuthSession | null = { accessToken: 'access-1', refreshToken: 'refresh-1' }
) {
  const fake = createFakeFetch(route);
  const credentials: CredentialProvider = createCredentialProvider(createMemorySessionStore(session));
  const delays: number[] = [];
  const client = createApiClient({
    baseUrl: BASE_URL,
    credentials,
    fetch: fake.fetch,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides
  });
  return { client, credentials, requests: fake.requests, delays };
}

describe('backoffDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const policy = { retries: 6, baseDelayMs: 1000, maxDelayMs: 5000 };
    expect([0, 1, 2, 3, 4].map((n) => backoffDelay(n, policy))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });
});

describe('createApiClient', () => {
  it('sends the bearer token and parses the body with the schema', async () => {
    const { client, requests } = setup(() => jsonResponse({ ok: true }));
    const response = await client.send(
      { method: 'GET', path: '/v1/applications', query: { page_size: 20, cursor: undefined } },
      z.object({ ok: z.boolean() })
    );

    expect(response.data).toEqual({ ok: true });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(`${BASE_URL}/v1/applications?page_size=20`);
    expect(requests[0].headers.get('authorization')).toBe('Bearer access-1');
  });

  it('refreshes once for five concurrent 401s and retries each with the new token', async () => {
    let refreshCalls = 0;
    const { client, credentials, requests } = setup(async (request) => {
      if (request.url.endsWith('/v1/auth/refresh')) {
        refreshCalls++;
        await new Promise((resolve) => setTimeout(resolve, 10));
        return jsonResponse({ access_token: 'access-2', refresh_token: 'refresh-2', token_type: 'bearer' });
      }
      if (request.headers.get('authorization') === 'Bearer access-2') {
        return jsonResponse({ ok: true });
      }
      return jsonResponse({ detail: 'Could not validate credentials' }, 401);
    });

    const results = await Promise.all(
      Array.from({ length: 5 }, (_, i) => client.send({ method: 'GET', path: `/v1/jobs/J${i}` }))
    );

    expect(refreshCalls).toBe(1);
    expect(results.map((r) => r.status)).toEqual([200, 200, 200, 200, 200]);
    expect(await credentials.getSession()).toEqual({ accessToken: 'access-2', refreshToken: 'refresh-2' });
    const refreshRequest = requests.find((r) => r.url.endsWith('/v1/auth/refresh'));
    expect(refreshRequest?.headers.get('authorization')).toBeNull();
    expect(refreshRequest?.body).toBe(JSON.stringify({ refresh_token: 'refresh-1' }));
  });

  it('keeps the old refresh token when the server does not rotate it', async () => {
    const { client, credentials } = setup((request) => {
      if (request.url.endsWith('/v1/auth/refresh')) return jsonResponse({ access_token: 'access-2' });
      if (request.headers.get('authorization') === 'Bearer access-2') return jsonResponse({});
      return jsonResponse({ detail: 'expired' }, 401);
    });

    await client.send({ method: 'GET', path: '/v1/applications' });
    expect(await credentials.getSession()).toEqual({ accessToken: 'access-2', refreshToken: 'refresh-1' });
  });

  it('clears the session when the refresh token is rejected', async () => {
    const { client, credentials, requests } = setup((request) =>
      request.url.endsWith('/v1/auth/refresh')
        ? jsonResponse({ detail: 'Invalid refresh token' }, 401)
        : jsonResponse({ detail: 'expired' }, 401)
    );

    await expect(client.send({ method: 'GET', path: '/v1/applications' })).rejects.toBeInstanceOf(AuthError);
    expect(await credentials.getSession()).toBeNull();
    expect(requests).toHaveLength(2);
  });

  it('ends the session without a round trip when there is no refresh token', async () => {
    const { client, credentials, requests } = setup(
      () => jsonResponse({ detail: 'expired' }, 401),
      {},
      { accessToken: 'access-1', refreshToken: null }
    );

    await expect(client.send({ method: 'GET', path: '/v1/applications' })).rejects.toBeInstanceOf(AuthError);
    expect(await credentials.getSession()).toBeNull();
    expect(requests).toHaveLength(1);
  });

  it('keeps the session when the refresh fails transiently', async () => {
    const { client, credentials } = setup((request) =>
      request.url.endsWith('/v1/auth/refresh')
        ? jsonResponse({ detail: 'upstream down' }, 503)
        : jsonResponse({ detail: 'expired' }, 401)
    );

    await expect(
      client.send({ method: 'GET', path: '/v1/applications', retry: false })
    ).rejects.toBeInstanceOf(ServerError);
    expect(await credentials.getSession()).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1' });
  });

  it('rejects without a request when signed out', async () => {
    const { client, requests } = setup(() => jsonResponse({}), {}, null);
    await expect(client.send({ method: 'GET', path: '/v1/applications' })).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(0);
  });

  it('makes retries + 1 attempts against a server that always answers 503', async () => {
    const { client, requests, delays } = setup(() => jsonResponse({ detail: 'maintenance' }, 503), {
      retry: { retries: 3, baseDelayMs: 1000, maxDelayMs: 30_000 }
    });

    const failure = client.send({ method: 'POST', path: '/v1/jobs/J1/swipe', body: { action: 'right' } });
    await expect(failure).rejects.toBeInstanceOf(ServerError);
    await expect(failure).rejects.toMatchObject({ status: 503, message: 'maintenance' });
    expect(requests).toHaveLength(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('waits at least Retry-After after a 429', async () => {
    let calls = 0;
    const { client, delays } = setup(() => {
      calls++;
      return calls === 1
        ? jsonResponse({ detail: 'slow down' }, 429, { 'Retry-After': '5' })
        : jsonResponse({ ok: true });
    });

    const response = await client.send({ method: 'GET', path: '/v1/jobs/feed' });
    expect(response.status).toBe(200);
    expect(delays).toEqual([5000]);
  });

  it('caps a Retry-After hint at the maximum delay', async () => {
    let calls = 0;
    const route: FakeRoute = () => {
      calls++;
      return calls % 2 === 1
        ? jsonResponse({ detail: 'slow down' }, 429, { 'Retry-After': '86400' })
        : jsonResponse({ ok: true });
    };
    const defaults = setup(route);
    await defaults.client.send({ method: 'GET', path: '/v1/jobs/feed' });
    expect(defaults.delays).toEqual([30_000]);

    const tight = setup(route, { retry: { maxDelayMs: 8000 } });
    await tight.client.send({ method: 'GET', path: '/v1/jobs/feed' });
    expect(tight.delays).toEqual([8000]);
  });

  it('surfaces the rate limit once retries run out', async () => {
    const { client, requests } = setup(() => jsonResponse({ detail: 'slow down' }, 429), {
      retry: { retries: 1 }
    });
    await expect(client.send({ method: 'GET', path: '/v1/jobs/feed' })).rejects.toBeInstanceOf(
      RateLimitedError
    );
    expect(requests).toHaveLength(2);
  });

  it('never retries a validation error and keeps field details', async () => {
    const detail = [{ loc: ['body', 'action'], msg: 'field required', type: 'value_error.missing' }];
    const { client, requests } = setup(() => jsonResponse({ detail }, 422));

    const failure = client.send({ method: 'POST', path: '/v1/jobs/J1/swipe', body: {} });
    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toMatchObject({ status: 422, details: detail });
    expect(requests).toHaveLength(1);
  });

  it('turns a connection failure into a retried NetworkError', async () => {
    const { client, requests, delays } = setup(
      () => {
        throw new TypeError('fetch failed');
      },
      { retry: { retries: 2, baseDelayMs: 10, maxDelayMs: 15 } }
    );

    await expect(client.send({ method: 'GET', path: '/health', auth: false })).rejects.toBeInstanceOf(
      NetworkError
    );
    expect(requests).toHaveLength(3);
    expect(delays).toEqual([10, 15]);
  });

  it('times out a hung attempt as a NetworkError', async () => {
    const { client } = setup(() => hang(), { timeoutMs: 20 });

    const failure = client.send({ method: 'GET', path: '/v1/jobs/feed', retry: false });
    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toMatchObject({ timedOut: true });
  });

  it('treats a body that does not match the schema as a validation error', async () => {
    const { client } = setup(() => jsonResponse({ unexpected: true }));
    await expect(
      client.send({ method: 'GET', path: '/v1/jobs/feed' }, z.array(z.string()))
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
