/**
 * Storage module exports
 */

import type { StorageAdapter } from './StorageAdapter';
import { FileStorageAdapter } from './FileStorageAdapter';

export type { StorageAdapter } from './StorageAdapter';
export { FileStorageAdapter } from './FileStorageAdapter';
export { MemoryStorageAdapter } from './MemoryStorageAdapter';
export { createAuthStorage } from './authStorage';

/**
 * Opens the named box under the cache directory
 */
export const createStorageAdapter = (
  directory: string,
  name: string
): Promise<StorageAdapter> => {
  return FileStorageAdapter.open(directory, name);
};
