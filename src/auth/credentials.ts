/**
 * Credential Provider
 *
 * In-memory view of the current session over a {@link SessionStore}. The API
 * client reads the bearer token from here at call time, so a refresh that
 * lands between two requests is picked up by the second one.
 */

import { debugLog } from '../debug';
import type { SessionStore } from './session';
import type { AuthSession } from '../types';

export interface CredentialProvider {
  getSession(): Promise<AuthSession | null>;
  getAccessToken(): Promise<string | null>;
  /** Replace both tokens at once. */
  setSession(session: AuthSession): Promise<void>;
  clearSession(): Promise<void>;
  onSessionChange(listener: (session: AuthSession | null) => void): () => void;
}

export function createCredentialProvider(store: SessionStore): CredentialProvider {
  const listeners: Set<(session: AuthSession | null) => void> = new Set();
  let loaded: Promise<AuthSession | null> | null = null;

  function getSession(): Promise<AuthSession | null> {
    if (!loaded) loaded = store.load();
    return loaded;
  }

  function notify(session: AuthSession | null) {
    for (const listener of listeners) listener(session);
  }

  return {
    getSession,

    async getAccessToken() {
      const session = await getSession();
      return session?.accessToken ?? null;
    },

    async setSession(session) {
      const next: AuthSession = { ...session };
      await store.save(next);
      loaded = Promise.resolve(next);
      notify(next);
    },

    async clearSession() {
      await store.clear();
      loaded = Promise.resolve(null);
      debugLog('[AUTH] Session cleared');
      notify(null);
    },

    onSessionChange(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    }
  };
}
