/**
 * Fetch File Port (Driving Port / Use Case Interface)
 * Materializes a remote object into a local directory
 */
export interface FetchFilePort {
  /**
   * Resolves with the local path; rejects with FetchError
   */
  fetch(locator: string, destinationDirectory: string, correlationId?: string): Promise<string>;
}
