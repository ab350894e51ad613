import { WorkerError, WorkerErrorCode } from './worker-error';

export class InvalidDispatchRowError extends WorkerError {
  readonly code = WorkerErrorCode.INVALID_DISPATCH_ROW;

  constructor(public readonly issues: string[]) {
    super(`Invalid dispatch row: ${issues.join('; ')}`);
  }
}
