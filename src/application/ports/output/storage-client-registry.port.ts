import { StorageClientHandle } from './storage-client.port';

/**
 * Storage Client Registry Port (Driven Port)
 * Process-wide cache of storage clients keyed by container identifier
 */
export interface StorageClientRegistryPort {
  /**
   * Return the cached handle, constructing it on first use
   */
  get(containerId: string): StorageClientHandle;

  /**
   * Destroy and drop every cached handle
   */
  clear(): void;

  /**
   * Number of cached handles
   */
  readonly size: number;
}
