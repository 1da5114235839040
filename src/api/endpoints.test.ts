import { describe, it, expect } from 'vitest';
import { createApiClient } from './client';
import { createJobSwipeApi } from './endpoints';
import { createCredentialProvider } from '../auth/credentials';
import { createMemorySessionStore } from '../auth/session';
import { ValidationError } from '../errors';
import { createFakeFetch, jsonResponse, type FakeRoute } from '../test-helpers';
import type { AuthSession } from '../types';

const BASE_URL = 'https://api.example.test/';

function setup(
  route: FakeRoute,
  session: AuthSession | null = { accessToken: 'access-1', refreshToken: 'refresh-1' }
) {
  const fake = createFakeFetch(route);
  const credentials = createCredentialProvider(createMemorySessionStore(session));
  const client = createApiClient({
    baseUrl: BASE_URL,
    credentials,
    fetch: fake.fetch,
    retry: { retries: 0 }
  });
  return { api: createJobSwipeApi(client, credentials), credentials, requests: fake.requests };
}

function job(id: string) {
  return {
    id,
    title: 'Backend Engineer',
    company: 'Acme',
    location: null,
    snippet: 'Build APIs',
    score: 0.9,
    apply_url: null
  };
}

describe('createJobSwipeApi', () => {
  it('logs in with a form-encoded body and stores the token pair', async () => {
    const { api, credentials, requests } = setup(
      () =>
        jsonResponse({
          access_token: 'access-9',
          refresh_token: 'refresh-9',
          token_type: 'bearer',
          user: { id: 'u1', email: 'user@example.test' }
        }),
      null
    );

    await api.login({ username: 'user@example.test', password: 'test-password' });

    expect(requests[0].url).toBe('https://api.example.test/v1/auth/login');
    expect(requests[0].headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    expect(requests[0].body).toBe('username=user%40example.test&password=test-password');
    expect(requests[0].headers.get('authorization')).toBeNull();
    expect(await credentials.getSession()).toEqual({ accessToken: 'access-9', refreshToken: 'refresh-9' });
  });

  it('stores a null refresh token when login issues none', async () => {
    const { api, credentials } = setup(() => jsonResponse({ access_token: 'access-9' }), null);
    await api.login({ username: 'user', password: 'test-password' });
    expect(await credentials.getSession()).toEqual({ accessToken: 'access-9', refreshToken: null });
  });

  it('pages the feed by the last job id', async () => {
    const { api, requests } = setup(() => jsonResponse([job('J1'), job('J2')]));

    const full = await api.getJobFeed({ cursor: 'J0', pageSize: 2 });
    expect(requests[0].url).toBe('https://api.example.test/v1/jobs/feed?cursor=J0&page_size=2');
    expect(full.jobs.map((j) => j.id)).toEqual(['J1', 'J2']);
    expect(full.nextCursor).toBe('J2');

    const short = await api.getJobFeed({ pageSize: 5 });
    expect(requests[1].url).toBe('https://api.example.test/v1/jobs/feed?page_size=5');
    expect(short.nextCursor).toBeNull();
  });

  it('fills in missing optional job fields', async () => {
    const { api } = setup(() =>
      jsonResponse([{ id: 'J1', title: 'Engineer', company: 'Acme', score: 0.5 }])
    );
    const page = await api.getJobFeed();
    expect(page.jobs[0]).toEqual({
      id: 'J1',
      title: 'Engineer',
      company: 'Acme',
      location: null,
      snippet: null,
      score: 0.5,
      apply_url: null
    });
  });

  it('rejects a feed item missing required fields', async () => {
    const { api } = setup(() => jsonResponse([{ id: 'J1' }]));
    await expect(api.getJobFeed()).rejects.toBeInstanceOf(ValidationError);
  });

  it('posts swipes and bookmark changes to the job routes', async () => {
    const { api, requests } = setup(() => jsonResponse({ message: 'ok' }));

    await api.swipeJob('J1', 'right');
    await api.setJobSaved('J2', true);
    await api.setJobSaved('J2', false);

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      'POST https://api.example.test/v1/jobs/J1/swipe',
      'POST https://api.example.test/v1/jobs/J2/save',
      'POST https://api.example.test/v1/jobs/J2/unsave'
    ]);
    expect(requests[0].body).toBe('{"action":"right"}');
  });

  it('reads applications and their audit trail', async () => {
    const { api, requests } = setup((request) =>
      request.url.endsWith('/audit')
        ? jsonResponse([
            { id: 'e1', step: 'navigate', payload: { url: 'https://jobs.example.test' }, timestamp: '2024-01-01T00:00:00Z' }
          ])
        : jsonResponse([
            {
              id: 'app-1',
              job_id: 'J1',
              status: 'queued',
              attempt_count: 0,
              last_error: null,
              assigned_worker: null,
              created_at: '2024-01-01T00:00:00Z',
              updated_at: '2024-01-01T00:00:00Z'
            }
          ])
    );

    const applications = await api.getApplications();
    expect(applications[0].status).toBe('queued');

    const audit = await api.getApplicationAudit('J1');
    expect(requests[1].url).toBe('https://api.example.test/v1/applications/J1/audit');
    expect(audit).toEqual([
      {
        id: 'e1',
        step: 'navigate',
        payload: { url: 'https://jobs.example.test' },
        artifacts: {},
        timestamp: '2024-01-01T00:00:00Z'
      }
    ]);
  });

  it('reports health as reachable for any HTTP answer', async () => {
    expect(await setup(() => jsonResponse({ status: 'healthy' })).api.checkHealth()).toBe(true);
    expect(await setup(() => jsonResponse({ status: 'unhealthy' }, 503)).api.checkHealth()).toBe(true);
    expect(
      await setup(() => {
        throw new TypeError('fetch failed');
      }).api.checkHealth()
    ).toBe(false);
  });

  it('logout clears the stored session', async () => {
    const { api, credentials } = setup(() => jsonResponse({}));
    await api.logout();
    expect(await credentials.getSession()).toBeNull();
  });
});
