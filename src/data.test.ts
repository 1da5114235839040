import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Dexie from 'dexie';
import { DEFAULT_FEED_PAGE_SIZE, type JobFeedPage, type JobSwipeApi } from './api/endpoints';
import { createLocalCache, type LocalCache } from './cache';
import { createReadModels, createRecentlyModifiedTracker, feedKey, type RecentlyModifiedTracker } from './data';
import { NetworkError } from './errors';
import { createActionQueue, type PersistentActionQueue } from './queue';
import { openTestDatabase } from './test-helpers';
import type { Application, JobCard } from './types';

function job(id: string): JobCard {
  return { id, title: `Role ${id}`, company: 'Acme', location: null, snippet: null, score: 0.8, apply_url: null };
}

const application: Application = {
  id: 'app-1',
  job_id: 'J1',
  status: 'queued',
  attempt_count: 0,
  last_error: null,
  assigned_worker: null,
  created_at: '2024-01-01T00:00:00Z',
  updated_at: '2024-01-01T00:00:00Z'
};

function fakeApi(overrides: Partial<JobSwipeApi> = {}): JobSwipeApi {
  return {
    login: vi.fn(),
    logout: vi.fn(async () => undefined),
    getJobFeed: vi.fn(async (): Promise<JobFeedPage> => ({ jobs: [], nextCursor: null })),
    swipeJob: vi.fn(async () => undefined),
    setJobSaved: vi.fn(async () => undefined),
    getApplications: vi.fn(async () => [application]),
    getApplicationAudit: vi.fn(async () => []),
    checkHealth: vi.fn(async () => true),
    ...overrides
  };
}

describe('createRecentlyModifiedTracker', () => {
  it('forgets a job once the window has passed', () => {
    let t = 0;
    const tracker = createRecentlyModifiedTracker(2000, () => t);
    tracker.mark('J1');
    t = 2000;
    expect(tracker.has('J1')).toBe(true);
    t = 2001;
    expect(tracker.has('J1')).toBe(false);
    expect(tracker.size).toBe(0);
  });

  it('reports marks made while a fetch is open, past the window', () => {
    let t = 0;
    const tracker = createRecentlyModifiedTracker(2000, () => t);
    tracker.mark('J1');
    const guard = tracker.beginFetch();
    tracker.mark('J2');
    t = 60_000;

    expect(guard.touched('J1')).toBe(false);
    expect(guard.touched('J2')).toBe(true);
    expect(tracker.has('J2')).toBe(false);

    guard.end();
    tracker.mark('J3');
    expect(guard.touched('J3')).toBe(false);
  });

  it('drops expired entries on cleanup', () => {
    let t = 0;
    const tracker = createRecentlyModifiedTracker(100, () => t);
    tracker.mark('J1');
    t = 50;
    tracker.mark('J2');
    t = 120;
    tracker.cleanup();
    expect(tracker.size).toBe(1);
    expect(tracker.has('J2')).toBe(true);
  });
});

describe('createReadModels', () => {
  let db: Dexie;
  let cache: LocalCache;
  let queue: PersistentActionQueue;
  let recentlyModified: RecentlyModifiedTracker;

  beforeEach(async () => {
    ({ db } = await openTestDatabase());
    cache = createLocalCache(db);
    queue = createActionQueue(db);
    recentlyModified = createRecentlyModifiedTracker(2000);
  });

  afterEach(() => {
    db.close();
  });

  it('serves the feed from the cache after the first load', async () => {
    const getJobFeed = vi.fn(async (): Promise<JobFeedPage> => ({ jobs: [job('J1'), job('J2')], nextCursor: 'J2' }));
    const models = createReadModels({ api: fakeApi({ getJobFeed }), cache, queue, recentlyModified });

    const first = await models.loadFeed({ pageSize: 2 });
    const second = await models.loadFeed({ pageSize: 2 });

    expect(getJobFeed).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(await cache.get(feedKey(null, 2))).toEqual({ jobs: [job('J1'), job('J2')], nextCursor: 'J2' });
  });

  it('hides jobs that are queued or were just acted on', async () => {
    const getJobFeed = vi.fn(async (): Promise<JobFeedPage> => ({
      jobs: [job('J1'), job('J2'), job('J3')],
      nextCursor: null
    }));
    const models = createReadModels({ api: fakeApi({ getJobFeed }), cache, queue, recentlyModified });
    await queue.enqueue({ type: 'swipe', jobId: 'J1', direction: 'right' });
    recentlyModified.mark('J3');

    const page = await models.loadFeed();
    expect(page.jobs.map((j) => j.id)).toEqual(['J2']);
  });

  it('falls back to the cached feed when a forced refresh cannot reach the server', async () => {
    const getJobFeed = vi
      .fn(async (): Promise<JobFeedPage> => ({ jobs: [job('J1')], nextCursor: null }))
      .mockResolvedValueOnce({ jobs: [job('J1')], nextCursor: null })
      .mockRejectedValueOnce(new NetworkError('offline'));
    const models = createReadModels({ api: fakeApi({ getJobFeed }), cache, queue, recentlyModified });

    await models.loadFeed();
    const page = await models.loadFeed({ forceRefresh: true });
    expect(page.jobs.map((j) => j.id)).toEqual(['J1']);
  });

  it('propagates a network failure when nothing is cached', async () => {
    const getJobFeed = vi.fn(async (): Promise<JobFeedPage> => {
      throw new NetworkError('offline');
    });
    const models = createReadModels({ api: fakeApi({ getJobFeed }), cache, queue, recentlyModified });
    await expect(models.loadFeed()).rejects.toBeInstanceOf(NetworkError);
  });

  it('removes a card from the cached feed and restores it at the same position', async () => {
    const getJobFeed = vi.fn(async (): Promise<JobFeedPage> => ({
      jobs: [job('J1'), job('J2'), job('J3')],
      nextCursor: null
    }));
    const models = createReadModels({ api: fakeApi({ getJobFeed }), cache, queue, recentlyModified });
    await models.loadFeed();

    const removed = await models.removeJobFromFeed('J2');
    expect(removed).toEqual({ key: feedKey(null, DEFAULT_FEED_PAGE_SIZE), index: 1, card: job('J2') });
    expect((await models.loadFeed()).jobs.map((j) => j.id)).toEqual(['J1', 'J3']);

    if (!removed) throw new Error('expected J2 to be removed');
    expect(await models.restoreJobToFeed(removed)).toEqual(job('J2'));
    expect((await models.loadFeed()).jobs.map((j) => j.id)).toEqual(['J1', 'J2', 'J3']);
    expect(getJobFeed).toHaveBeenCalledTimes(1);
  });

  it('does not restore into a page that has expired', async () => {
    const models = createReadModels({ api: fakeApi(), cache, queue, recentlyModified });
    const stale = { key: feedKey(null, DEFAULT_FEED_PAGE_SIZE), index: 0, card: job('J1') };
    expect(await models.restoreJobToFeed(stale)).toBeNull();
    expect(await cache.get(stale.key)).toBeUndefined();
  });

  it('returns null when removing a job that is not cached', async () => {
    const models = createReadModels({ api: fakeApi(), cache, queue, recentlyModified });
    expect(await models.removeJobFromFeed('J404')).toBeNull();
  });

  it('keeps a job acted on during a slow fetch out of the cached page', async () => {
    let t = 0;
    const tracker = createRecentlyModifiedTracker(2000, () => t);
    let respond: (page: JobFeedPage) => void = () => undefined;
    const getJobFeed = vi.fn(
      () =>
        new Promise<JobFeedPage>((resolve) => {
          respond = resolve;
        })
    );
    const models = createReadModels({
      api: fakeApi({ getJobFeed }),
      cache,
      queue,
      recentlyModified: tracker
    });

    const loading = models.loadFeed();
    await vi.waitFor(() => expect(getJobFeed).toHaveBeenCalledTimes(1));
    tracker.mark('J1');
    t = 30_000;
    respond({ jobs: [job('J1'), job('J2')], nextCursor: null });

    expect((await loading).jobs.map((j) => j.id)).toEqual(['J2']);
    expect(await cache.get(feedKey(null, DEFAULT_FEED_PAGE_SIZE))).toEqual({
      jobs: [job('J2')],
      nextCursor: null
    });
  });

  it('caches applications until invalidated', async () => {
    const getApplications = vi.fn(async () => [application]);
    const models = createReadModels({ api: fakeApi({ getApplications }), cache, queue, recentlyModified });

    expect(await models.getApplications()).toEqual([application]);
    await models.getApplications();
    expect(getApplications).toHaveBeenCalledTimes(1);

    await models.invalidateApplications();
    await models.getApplications();
    expect(getApplications).toHaveBeenCalledTimes(2);
  });
});
