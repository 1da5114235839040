import { describe, it, expect, afterEach } from 'vitest';
import { initEngine, type EngineContext } from './config';
import { getDiagnostics } from './diagnostics';
import { createFakeFetch, createTestDatabaseConfig, jsonResponse } from './test-helpers';

const NOW = Date.parse('2024-03-01T12:00:00.000Z');

describe('getDiagnostics', () => {
  let engine: EngineContext | null = null;

  afterEach(async () => {
    await engine?.dispose();
    engine = null;
  });

  it('summarizes queue, cache and undo state', async () => {
    let clock = NOW;
    const transport = createFakeFetch(() => jsonResponse({}));
    engine = await initEngine({
      baseUrl: 'https://api.test',
      database: createTestDatabaseConfig('diag'),
      fetch: transport.fetch,
      initialConnectivity: 'offline',
      now: () => clock
    });
    await engine.credentials.setSession({ accessToken: 'test-token', refreshToken: null });

    const first = await engine.coordinator.performAction({ type: 'swipe', jobId: 'J1', direction: 'right' });
    await engine.coordinator.performAction({ type: 'save_job', jobId: 'J2', saved: true });
    await engine.cache.set('feed:first:20', { jobs: [], nextCursor: null }, 1000);
    await engine.cache.set('applications:list', []);
    clock = NOW + 1000;

    const snapshot = await getDiagnostics(engine);

    expect(snapshot.timestamp).toBe('2024-03-01T12:00:01.000Z');
    expect(snapshot.prefix).toBe('jobswipe');
    expect(snapshot.queue).toMatchObject({
      pendingActions: 2,
      pendingJobIds: ['J1', 'J2'],
      byActionType: { swipe: 1, save_job: 1 },
      headActionId: first.action.id
    });
    expect(snapshot.queue.oldestPendingTimestamp).not.toBeNull();
    expect(snapshot.cache).toEqual({ entries: 2, byDomain: { feed: 1, applications: 1 }, expired: 1 });
    expect(snapshot.network).toEqual({ status: 'offline' });
    expect(snapshot.engine).toEqual({
      signedIn: true,
      recentlyModifiedCount: 2,
      undoAvailable: true,
      undoExpiresAt: '2024-03-01T12:00:03.000Z'
    });
    expect(snapshot.sync).toMatchObject({ pendingCount: 2, lastSyncAt: null, drainRunning: false });
    expect(snapshot.config.databaseName).toBe('diag');
    expect(transport.requests).toHaveLength(0);
  });
});
