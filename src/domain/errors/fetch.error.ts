import { WorkerError, WorkerErrorCode, errorMessageOf } from './worker-error';

/**
 * Fetch Error
 * Wraps whatever stopped a locator from reaching local scratch storage:
 * a malformed locator, client construction, or the transfer itself.
 */
export class FetchError extends WorkerError {
  readonly code = WorkerErrorCode.FETCH_FAILED;

  constructor(
    public readonly locator: string,
    cause: unknown,
  ) {
    super(`Failed to fetch ${locator}: ${errorMessageOf(cause)}`, { cause });
  }

  static wrap(locator: string, error: unknown): FetchError {
    return error instanceof FetchError ? error : new FetchError(locator, error);
  }
}
