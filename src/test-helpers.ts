/**
 * Shared fixtures for the Vitest suites: isolated in-memory IndexedDB
 * databases and a scriptable `fetch` stand-in.
 */

import { IDBFactory, IDBKeyRange } from 'fake-indexeddb';
import type Dexie from 'dexie';
import { createDatabase, type DatabaseConfig } from './database';

/** A config pointing at a brand-new in-memory IndexedDB. */
export function createTestDatabaseConfig(name = 'jobswipe-test'): DatabaseConfig {
  return { name, indexedDB: new IDBFactory(), IDBKeyRange };
}

export async function openTestDatabase(
  config: DatabaseConfig = createTestDatabaseConfig()
): Promise<{ db: Dexie; config: DatabaseConfig }> {
  const db = await createDatabase(config);
  return { db, config };
}

// =============================================================================
// Fake transport
// =============================================================================

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  body: string | null;
}

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

export interface FakeFetch {
  fetch: typeof fetch;
  requests: RecordedRequest[];
}

/**
 * A `fetch` that records every request and answers it with `route`.
 * A route that throws behaves like a connection failure.
 */
export function createFakeFetch(route: FakeRoute): FakeFetch {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const request = new Request(input, init);
    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      headers: request.headers,
      body: init?.body === undefined || init.body === null ? null : await request.text()
    };
    requests.push(recorded);

    const signal = init?.signal;
    if (!signal) return route(recorded);
    // Honor aborts like a real fetch so per-attempt timeouts can fire
    return new Promise<Response>((resolve, reject) => {
      const onAbort = () => reject(new DOMException('The operation was aborted.', 'AbortError'));
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      Promise.resolve(route(recorded)).then(
        (response) => {
          signal.removeEventListener('abort', onAbort);
          resolve(response);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  };

  return { fetch: fakeFetch, requests };
}

/** A route result that never settles, for timeout tests. */
export function hang(): Promise<Response> {
  return new Promise<Response>(() => undefined);
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}
