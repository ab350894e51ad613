/**
 * Downloaded Object
 */
export interface DownloadedObject {
  filePath: string;
  size: number;
  etag?: string;
}

/**
 * Storage Client Handle (Driven Port)
 * Authenticated, read-only client bound to one container
 */
export interface StorageClientHandle {
  readonly containerId: string;

  /**
   * Download an object of this container to a local path
   */
  download(relativePath: string, destinationPath: string): Promise<DownloadedObject>;

  /**
   * Release the underlying connections
   */
  destroy(): void;
}

/**
 * Builds a handle for a container identifier
 */
export type StorageClientFactory = (containerId: string) => StorageClientHandle;
