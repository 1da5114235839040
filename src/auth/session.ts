/**
 * Secure Session Storage
 *
 * Persists the token pair encrypted (AES-GCM) in the `authSession` table as a
 * singleton row. A row that cannot be decrypted or parsed (secret rotated,
 * storage tampered with) is deleted and treated as signed out.
 */

import type Dexie from 'dexie';
import { z } from 'zod';
import { authSessionSchema } from '../api/schemas';
import { debugLog, debugWarn } from '../debug';
import { deriveKey, openJson, sealJson } from './crypto';
import type { AuthSession } from '../types';

const SESSION_ID = 'current_session';

export interface SessionStore {
  load(): Promise<AuthSession | null>;
  save(session: AuthSession): Promise<void>;
  clear(): Promise<void>;
}

interface StoredSessionRow {
  id: string;
  iv: string;
  ciphertext: string;
  updatedAt: string;
}

const sealedRowSchema = z.object({
  iv: z.string(),
  ciphertext: z.string()
});

/**
 * Session store backed by the engine database.
 *
 * @param secret - Application secret the encryption key is derived from.
 */
export function createEncryptedSessionStore(db: Dexie, secret: string): SessionStore {
  const table = () => db.table<StoredSessionRow, string>('authSession');
  let keyPromise: Promise<CryptoKey> | null = null;

  function getKey(): Promise<CryptoKey> {
    if (!keyPromise) keyPromise = deriveKey(secret);
    return keyPromise;
  }

  async function clear(): Promise<void> {
    await table().delete(SESSION_ID);
  }

  return {
    async load() {
      const row = await table().get(SESSION_ID);
      if (!row) return null;

      const sealed = sealedRowSchema.safeParse(row);
      if (sealed.success) {
        try {
          const parsed = authSessionSchema.safeParse(await openJson(sealed.data, await getKey()));
          if (parsed.success) return parsed.data;
        } catch (e) {
          debugWarn('[AUTH] Stored session could not be decrypted:', e);
        }
      }

      debugWarn('[AUTH] Discarding unreadable stored session');
      await clear();
      return null;
    },

    async save(session) {
      const sealed = await sealJson(session, await getKey());
      const row: StoredSessionRow = { id: SESSION_ID, ...sealed, updatedAt: new Date().toISOString() };
      await table().put(row);

      // Verify the session was persisted by reading it back
      const verified = await table().get(SESSION_ID);
      if (!verified) {
        throw new Error('Failed to persist session');
      }
      debugLog('[AUTH] Session saved');
    },

    clear
  };
}

/** Non-persistent store for tests and hosts that keep tokens elsewhere. */
export function createMemorySessionStore(initial: AuthSession | null = null): SessionStore {
  let current = initial;
  return {
    load: async () => current,
    save: async (session) => {
      current = { ...session };
    },
    clear: async () => {
      current = null;
    }
  };
}
