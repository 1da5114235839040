/**
 * Job Swipe Endpoints
 *
 * Typed helpers for the REST surface the engine talks to. Every call goes
 * through the resilient client, so auth refresh, retry and error mapping
 * apply uniformly; bodies are validated against the zod schemas.
 */

import type { ApiClient } from './client';
import {
  applicationAuditSchema,
  applicationListSchema,
  jobFeedSchema,
  tokenResponseSchema,
  type TokenResponse
} from './schemas';
import type { CredentialProvider } from '../auth/credentials';
import { debugLog } from '../debug';
import { ApiError, NetworkError } from '../errors';
import type { Application, ApplicationAuditEntry, JobCard, SwipeDirection } from '../types';

export const DEFAULT_FEED_PAGE_SIZE = 20;
const HEALTH_TIMEOUT_MS = 5000;

export interface LoginCredentials {
  username: string;
  password: string;
}

export interface JobFeedPage {
  jobs: JobCard[];
  /** Cursor for the next page, `null` once the feed is exhausted. */
  nextCursor: string | null;
}

export interface JobFeedParams {
  cursor?: string | null;
  pageSize?: number;
}

export interface JobSwipeApi {
  /** Exchange credentials for a token pair and store it. */
  login(credentials: LoginCredentials): Promise<TokenResponse>;
  logout(): Promise<void>;
  getJobFeed(params?: JobFeedParams): Promise<JobFeedPage>;
  swipeJob(jobId: string, direction: SwipeDirection): Promise<void>;
  setJobSaved(jobId: string, saved: boolean): Promise<void>;
  getApplications(): Promise<Application[]>;
  getApplicationAudit(jobId: string): Promise<ApplicationAuditEntry[]>;
  /** `true` when the server answered at all, healthy or not. */
  checkHealth(): Promise<boolean>;
}

export function createJobSwipeApi(client: ApiClient, credentials: CredentialProvider): JobSwipeApi {
  const jobPath = (jobId: string) => `/v1/jobs/${encodeURIComponent(jobId)}`;

  return {
    async login({ username, password }) {
      const { data } = await client.send(
        {
          method: 'POST',
          path: '/v1/auth/login',
          form: { username, password },
          auth: false
        },
        tokenResponseSchema
      );
      await credentials.setSession({
        accessToken: data.access_token,
        refreshToken: data.refresh_token
      });
      debugLog('[AUTH] Signed in');
      return data;
    },

    logout: () => credentials.clearSession(),

    async getJobFeed(params = {}) {
      const pageSize = params.pageSize ?? DEFAULT_FEED_PAGE_SIZE;
      const { data: jobs } = await client.send(
        {
          method: 'GET',
          path: '/v1/jobs/feed',
          query: { cursor: params.cursor ?? undefined, page_size: pageSize }
        },
        jobFeedSchema
      );
      // The backend pages by "jobs after this id"; a short page is the last one
      const last = jobs[jobs.length - 1];
      return { jobs, nextCursor: last && jobs.length >= pageSize ? last.id : null };
    },

    async swipeJob(jobId, direction) {
      await client.send({
        method: 'POST',
        path: `${jobPath(jobId)}/swipe`,
        body: { action: direction }
      });
    },

    async setJobSaved(jobId, saved) {
      await client.send({
        method: 'POST',
        path: `${jobPath(jobId)}/${saved ? 'save' : 'unsave'}`
      });
    },

    async getApplications() {
      const { data } = await client.send(
        { method: 'GET', path: '/v1/applications' },
        applicationListSchema
      );
      return data;
    },

    async getApplicationAudit(jobId) {
      const { data } = await client.send(
        { method: 'GET', path: `/v1/applications/${encodeURIComponent(jobId)}/audit` },
        applicationAuditSchema
      );
      return data;
    },

    async checkHealth() {
      try {
        await client.send({
          method: 'GET',
          path: '/health',
          auth: false,
          retry: false,
          timeoutMs: HEALTH_TIMEOUT_MS
        });
        return true;
      } catch (e) {
        if (e instanceof NetworkError) return false;
        // Any HTTP answer (even a 503) means the server is reachable
        if (e instanceof ApiError) return true;
        throw e;
      }
    }
  };
}
