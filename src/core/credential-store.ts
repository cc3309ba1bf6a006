import { Keyv } from 'keyv';
import type { CredentialStore, KeyvLike } from '../types.js';
import { DEFAULT_STORE_NAMESPACE } from './config.js';

/**
 * Create a credential store using a Keyv-compatible storage backend.
 *
 * `deleteAll()` clears the backend's namespace, so give the store a
 * namespace of its own when the backend is shared.
 *
 * @param store - The underlying key-value store
 * @returns CredentialStore implementation
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const credentials = createCredentialStore(
 *   new Keyv({ store: new KeyvRedis('redis://localhost:6379'), namespace: 'my-app-auth' })
 * );
 * ```
 */
export function createCredentialStore(store: KeyvLike): CredentialStore {
  return {
    async put(key: string, value: string): Promise<void> {
      await store.set(key, value);
    },

    async get(key: string): Promise<string | undefined> {
      const value = await store.get(key);
      return typeof value === 'string' ? value : undefined;
    },

    async deleteAll(): Promise<void> {
      await store.clear();
    },
  };
}

/**
 * Create a credential store kept in process memory.
 * Sessions do not survive a restart; use it for tests and short-lived tools.
 */
export function createMemoryCredentialStore(
  namespace: string = DEFAULT_STORE_NAMESPACE
): CredentialStore {
  return createCredentialStore(new Keyv({ namespace }));
}
