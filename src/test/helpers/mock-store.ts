import { vi } from 'vitest';
import type { CredentialStore, KeyvLike } from '../../types.js';

/**
 * Creates a mock Keyv-like store for testing.
 * Returns both the store and the underlying Map for direct data manipulation.
 */
export function createMockStore(): {
  store: KeyvLike;
  storedData: Map<string, unknown>;
} {
  const storedData = new Map<string, unknown>();

  const store = {
    get: vi.fn((key: string) => Promise.resolve(storedData.get(key))),
    set: vi.fn((key: string, value: string) => {
      storedData.set(key, value);
      return Promise.resolve(true);
    }),
    delete: vi.fn((key: string) => Promise.resolve(storedData.delete(key))),
    clear: vi.fn(() => {
      storedData.clear();
      return Promise.resolve();
    }),
  } satisfies KeyvLike;

  return { store, storedData };
}

/**
 * Creates a mock credential store backed by a Map.
 */
export function createMockCredentialStore(initial?: Record<string, string>): {
  credentials: CredentialStore;
  storedData: Map<string, string>;
} {
  const storedData = new Map<string, string>(Object.entries(initial ?? {}));

  const credentials = {
    put: vi.fn((key: string, value: string) => {
      storedData.set(key, value);
      return Promise.resolve();
    }),
    get: vi.fn((key: string) => Promise.resolve(storedData.get(key))),
    deleteAll: vi.fn(() => {
      storedData.clear();
      return Promise.resolve();
    }),
  } satisfies CredentialStore;

  return { credentials, storedData };
}
