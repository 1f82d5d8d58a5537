import { StorageAdapter } from './StorageAdapter';

export type AuthStorage = {
  getItem: (key: string) => Promise<string | null>;
  setItem: (key: string, value: string) => Promise<void>;
  removeItem: (key: string) => Promise<void>;
};

/**
 * Exposes a storage box in the shape the Supabase auth client persists
 * its session through.
 */
export const createAuthStorage = (adapter: StorageAdapter): AuthStorage => ({
  getItem: async (key) => {
    const value = await adapter.get(key);
    return typeof value === 'string' ? value : null;
  },
  setItem: (key, value) => adapter.put(key, value),
  removeItem: (key) => adapter.delete(key),
});
