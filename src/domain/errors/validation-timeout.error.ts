import { WorkerError, WorkerErrorCode } from './worker-error';

export class ValidationTimeoutError extends WorkerError {
  readonly code = WorkerErrorCode.VALIDATION_TIMEOUT;

  constructor(
    public readonly command: string,
    public readonly timeoutSeconds: number,
  ) {
    super(`Command '${command}' timed out after ${timeoutSeconds} seconds`);
  }
}
