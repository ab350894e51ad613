import { WorkerError, WorkerErrorCode } from './worker-error';

/**
 * Thrown when a locator lacks the `/paths/` marker
 */
export class MalformedLocatorError extends WorkerError {
  readonly code = WorkerErrorCode.MALFORMED_LOCATOR;

  constructor(
    public readonly locator: string,
    marker: string,
  ) {
    super(`URI missing '${marker}' segment: ${locator}`);
  }
}
