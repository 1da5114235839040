import { describe, it, expect, afterEach } from 'vitest';
import type Dexie from 'dexie';
import { createEncryptedSessionStore } from './session';
import { createCredentialProvider } from './credentials';
import { openTestDatabase } from '../test-helpers';
import type { AuthSession } from '../types';

describe('createEncryptedSessionStore', () => {
  let db: Dexie;

  afterEach(() => {
    db.close();
  });

  it('round-trips a session without storing tokens in plain text', async () => {
    ({ db } = await openTestDatabase());
    const store = createEncryptedSessionStore(db, 'test-secret');
    await store.save({ accessToken: 'access-1', refreshToken: 'refresh-1' });

    const raw = JSON.stringify(await db.table('authSession').toArray());
    expect(raw).not.toContain('access-1');
    expect(raw).not.toContain('refresh-1');
    expect(await store.load()).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1' });
  });

  it('drops a session sealed with a different secret', async () => {
    ({ db } = await openTestDatabase());
    await createEncryptedSessionStore(db, 'test-secret').save({
      accessToken: 'access-1',
      refreshToken: null
    });

    const rotated = createEncryptedSessionStore(db, 'other-secret');
    expect(await rotated.load()).toBeNull();
    expect(await db.table('authSession').count()).toBe(0);
  });

  it('returns null when nothing is stored and after clear', async () => {
    ({ db } = await openTestDatabase());
    const store = createEncryptedSessionStore(db, 'test-secret');
    expect(await store.load()).toBeNull();

    await store.save({ accessToken: 'a', refreshToken: 'r' });
    await store.clear();
    expect(await store.load()).toBeNull();
  });
});

describe('createCredentialProvider', () => {
  let db: Dexie;

  afterEach(() => {
    db.close();
  });

  it('loads the stored session once and notifies on changes', async () => {
    ({ db } = await openTestDatabase());
    const store = createEncryptedSessionStore(db, 'test-secret');
    await store.save({ accessToken: 'access-1', refreshToken: 'refresh-1' });

    const provider = createCredentialProvider(store);
    const seen: Array<AuthSession | null> = [];
    provider.onSessionChange((session) => seen.push(session));

    expect(await provider.getAccessToken()).toBe('access-1');

    await provider.setSession({ accessToken: 'access-2', refreshToken: 'refresh-2' });
    expect(await provider.getAccessToken()).toBe('access-2');
    expect(await store.load()).toEqual({ accessToken: 'access-2', refreshToken: 'refresh-2' });

    await provider.clearSession();
    expect(await provider.getSession()).toBeNull();
    expect(seen).toEqual([{ accessToken: 'access-2', refreshToken: 'refresh-2' }, null]);
  });
});
