export enum WorkerErrorCode {
  MALFORMED_LOCATOR = 'MALFORMED_LOCATOR',
  FETCH_FAILED = 'FETCH_FAILED',
  VALIDATION_TIMEOUT = 'VALIDATION_TIMEOUT',
  VALIDATION_NON_ZERO_EXIT = 'VALIDATION_NON_ZERO_EXIT',
  INVALID_DISPATCH_ROW = 'INVALID_DISPATCH_ROW',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Base Worker Error
 * Every failure the worker raises on purpose carries a code for log filtering
 */
export abstract class WorkerError extends Error {
  abstract readonly code: WorkerErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function errorCodeOf(error: unknown): WorkerErrorCode {
  return error instanceof WorkerError ? error.code : WorkerErrorCode.UNKNOWN;
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
