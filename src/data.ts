/**
 * @fileoverview Read Models for the Job Swipe Screens
 *
 * Read-through access to the server's read models (job feed pages,
 * applications, per-application audit trails) backed by {@link LocalCache}.
 *
 * Architecture:
 * - Every read checks the cache first; a miss (or `forceRefresh`) fetches
 *   from the API and writes the result back with the domain's TTL.
 * - Feed pages are filtered before they are cached: jobs with a pending
 *   queued action, jobs acted on after the fetch started, and jobs touched
 *   within the recently-modified window are dropped. The filter and the
 *   write run under the page's key lock, so an in-flight fetch that started
 *   before a swipe cannot put the swiped card back on screen.
 * - The swipe path removes the card from every cached feed page
 *   ({@link ReadModels.removeJobFromFeed}) and returns where it was; the
 *   caller holds that record for as long as undo is possible.
 * - All cache writes go through the per-key lock, so the feed-load path and
 *   the sync path never interleave a read-modify-write on the same page.
 *
 * Cache layout:
 *   - `feed:<cursor|first>:<pageSize>` - {@link JobFeedPage}, `feedTtlMs`
 *   - `applications:all`               - `Application[]`, `readModelTtlMs`
 *   - `audit:<jobId>`                  - `ApplicationAuditEntry[]`, `readModelTtlMs`
 *
 * @see {@link ./cache} for TTL and lock semantics
 * @see {@link ./engine} for the swipe and undo paths that call into this module
 */

import { z } from 'zod';
import { applicationAuditSchema, applicationListSchema, jobCardSchema } from './api/schemas';
import {
  DEFAULT_FEED_PAGE_SIZE,
  type JobFeedPage,
  type JobFeedParams,
  type JobSwipeApi
} from './api/endpoints';
import { cacheKey, type CacheSchema, type LocalCache } from './cache';
import { debugLog, debugWarn } from './debug';
import { NetworkError } from './errors';
import type { PersistentActionQueue } from './queue';
import type { Application, ApplicationAuditEntry, JobCard } from './types';

// =============================================================================
// Constants
// =============================================================================

export const CACHE_DOMAINS = {
  feed: 'feed',
  applications: 'applications',
  audit: 'audit'
} as const;

/** Matches the original client's maximum cache age. */
export const DEFAULT_FEED_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_READ_MODEL_TTL_MS = 5 * 60 * 1000;

const feedPageSchema: CacheSchema<JobFeedPage> = z.object({
  jobs: z.array(jobCardSchema),
  nextCursor: z.string().nullable()
});

// =============================================================================
// Recently Modified Tracking
// =============================================================================

/**
 * Short-lived memory of jobs the user just acted on. Complements the pending
 * queue check: an action sent immediately never enters the queue, but a feed
 * fetch already in flight may still return its card.
 */
export interface RecentlyModifiedTracker {
  mark(jobId: string): void;
  has(jobId: string): boolean;
  /**
   * Collect every job marked from now until `end()`, regardless of the TTL.
   * Open one before a fetch and close it after its result is written.
   */
  beginFetch(): FetchGuard;
  /** Drop expired entries. */
  cleanup(): void;
  clear(): void;
  readonly size: number;
}

export interface FetchGuard {
  /** Marked since the guard was opened. */
  touched(jobId: string): boolean;
  end(): void;
}

export function createRecentlyModifiedTracker(
  ttlMs: number,
  now: () => number = Date.now
): RecentlyModifiedTracker {
  const modifiedAt: Map<string, number> = new Map();
  const openGuards: Set<Set<string>> = new Set();

  return {
    mark(jobId) {
      modifiedAt.set(jobId, now());
      for (const marked of openGuards) marked.add(jobId);
    },
    has(jobId) {
      const at = modifiedAt.get(jobId);
      if (at === undefined) return false;
      if (now() - at > ttlMs) {
        // Expired, clean up
        modifiedAt.delete(jobId);
        return false;
      }
      return true;
    },
    beginFetch() {
      const marked: Set<string> = new Set();
      openGuards.add(marked);
      return {
        touched: (jobId) => marked.has(jobId),
        end: () => {
          openGuards.delete(marked);
        }
      };
    },
    cleanup() {
      const current = now();
      for (const [jobId, at] of modifiedAt) {
        if (current - at > ttlMs) modifiedAt.delete(jobId);
      }
    },
    clear() {
      modifiedAt.clear();
    },
    get size() {
      return modifiedAt.size;
    }
  };
}

// =============================================================================
// Read Models
// =============================================================================

export interface ReadOptions {
  /** Skip the cache and go to the network (falls back to the cache offline). */
  forceRefresh?: boolean;
}

export interface ReadModels {
  loadFeed(params?: JobFeedParams & ReadOptions): Promise<JobFeedPage>;
  /**
   * Optimistically drop a job from every cached feed page. Returns where the
   * card was, or `null` when no cached page held it.
   */
  removeJobFromFeed(jobId: string): Promise<RemovedCard | null>;
  /** Put a removed card back at its recorded position. */
  restoreJobToFeed(removed: RemovedCard): Promise<JobCard | null>;
  getApplications(options?: ReadOptions): Promise<Application[]>;
  getApplicationAudit(jobId: string, options?: ReadOptions): Promise<ApplicationAuditEntry[]>;
  /** Called after a drain: right swipes create applications server-side. */
  invalidateApplications(): Promise<void>;
  clear(): Promise<void>;
}

export interface ReadModelsConfig {
  api: JobSwipeApi;
  cache: LocalCache;
  queue: PersistentActionQueue;
  recentlyModified: RecentlyModifiedTracker;
  feedTtlMs?: number;
  readModelTtlMs?: number;
}

export interface RemovedCard {
  key: string;
  index: number;
  card: JobCard;
}

/**
 * Feed page cache key. The first page is keyed `first` so it can be found
 * without knowing a cursor.
 */
export function feedKey(cursor: string | null | undefined, pageSize: number): string {
  return cacheKey(CACHE_DOMAINS.feed, `${cursor ?? 'first'}:${pageSize}`);
}

export function createReadModels(config: ReadModelsConfig): ReadModels {
  const { api, cache, queue, recentlyModified } = config;
  const feedTtlMs = config.feedTtlMs ?? DEFAULT_FEED_TTL_MS;
  const readModelTtlMs = config.readModelTtlMs ?? DEFAULT_READ_MODEL_TTL_MS;

  /**
   * Cache-first read with a network fallback. With `forceRefresh`, a network
   * failure falls back to whatever the cache still holds. `store` writes the
   * fetched value and returns what the caller gets.
   */
  async function readThrough<T>(
    key: string,
    schema: CacheSchema<T>,
    ttlMs: number,
    options: ReadOptions,
    fetchFresh: () => Promise<T>,
    store: (fresh: T) => Promise<T> = async (fresh) => {
      await cache.set(key, fresh, ttlMs);
      return fresh;
    }
  ): Promise<T> {
    if (!options.forceRefresh) {
      const cached = await cache.get(key, schema);
      if (cached !== undefined) {
        debugLog(`[CACHE] Hit: ${key}`);
        return cached;
      }
    }

    let fresh: T;
    try {
      fresh = await fetchFresh();
    } catch (e) {
      if (options.forceRefresh && e instanceof NetworkError) {
        const cached = await cache.get(key, schema);
        if (cached !== undefined) {
          debugWarn(`[CACHE] Network unavailable, serving cached ${key}`);
          return cached;
        }
      }
      throw e;
    }

    return store(fresh);
  }

  async function loadFeed(params: JobFeedParams & ReadOptions = {}): Promise<JobFeedPage> {
    const pageSize = params.pageSize ?? DEFAULT_FEED_PAGE_SIZE;
    const key = feedKey(params.cursor, pageSize);

    // Open before the request so a swipe made while it is in flight is seen
    const guard = recentlyModified.beginFetch();
    try {
      return await readThrough(
        key,
        feedPageSchema,
        feedTtlMs,
        params,
        () => api.getJobFeed({ cursor: params.cursor, pageSize }),
        async (page) => {
          const pending = await queue.getPendingJobIds();
          let visible: JobFeedPage = page;
          await cache.update(
            key,
            feedPageSchema,
            () => {
              const jobs = page.jobs.filter(
                (job) =>
                  !pending.has(job.id) && !guard.touched(job.id) && !recentlyModified.has(job.id)
              );
              if (jobs.length !== page.jobs.length) {
                debugLog(`[CACHE] Feed: hid ${page.jobs.length - jobs.length} jobs with local actions`);
              }
              visible = { jobs, nextCursor: page.nextCursor };
              return visible;
            },
            feedTtlMs
          );
          return visible;
        }
      );
    } finally {
      guard.end();
    }
  }

  async function removeJobFromFeed(jobId: string): Promise<RemovedCard | null> {
    const entries = await cache.listAll();
    let removed: RemovedCard | null = null;

    for (const entry of entries) {
      if (entry.domain !== CACHE_DOMAINS.feed) continue;
      await cache.update(
        entry.key,
        feedPageSchema,
        (page) => {
          if (!page) return undefined;
          const index = page.jobs.findIndex((job) => job.id === jobId);
          if (index === -1) return page;
          if (!removed) removed = { key: entry.key, index, card: page.jobs[index] };
          return { ...page, jobs: page.jobs.filter((job) => job.id !== jobId) };
        },
        feedTtlMs
      );
    }
    return removed;
  }

  async function restoreJobToFeed(stash: RemovedCard): Promise<JobCard | null> {
    const jobId = stash.card.id;
    const restored = await cache.update(
      stash.key,
      feedPageSchema,
      (page) => {
        // The page expired meanwhile; the next fetch decides whether the card shows
        if (!page) return undefined;
        if (page.jobs.some((job) => job.id === jobId)) return page;
        const jobs = [...page.jobs];
        jobs.splice(Math.min(stash.index, jobs.length), 0, stash.card);
        return { ...page, jobs };
      },
      feedTtlMs
    );
    if (!restored) return null;
    debugLog(`[CACHE] Restored job ${jobId} to ${stash.key}`);
    return stash.card;
  }

  return {
    loadFeed,
    removeJobFromFeed,
    restoreJobToFeed,

    getApplications: (options = {}) =>
      readThrough(
        cacheKey(CACHE_DOMAINS.applications, 'all'),
        applicationListSchema,
        readModelTtlMs,
        options,
        () => api.getApplications()
      ),

    getApplicationAudit: (jobId, options = {}) =>
      readThrough(
        cacheKey(CACHE_DOMAINS.audit, jobId),
        applicationAuditSchema,
        readModelTtlMs,
        options,
        () => api.getApplicationAudit(jobId)
      ),

    async invalidateApplications() {
      await cache.invalidateDomain(CACHE_DOMAINS.applications);
      await cache.invalidateDomain(CACHE_DOMAINS.audit);
    },

    async clear() {
      await cache.clear();
    }
  };
}
