import { ValidationOutcome } from '../value-objects/validation-outcome.vo';
import {
  WorkerErrorCode,
  errorCodeOf,
  errorMessageOf,
} from '../errors/worker-error';
import { ValidationTimeoutError } from '../errors/validation-timeout.error';

export type ResultStatus = 'pass' | 'fail';

/**
 * Output row handed back to the job runtime, keys in column order
 */
export interface ResultRow {
  sequence_path: string;
  status: ResultStatus;
  exit_code: number;
  message: string;
}

export const RESULT_COLUMNS = ['sequence_path', 'status', 'exit_code', 'message'] as const;

/**
 * Exit code reported for every failure that is not a validator exit
 */
export const NO_PROCESS_EXIT_CODE = -1;

/**
 * Result Record Entity
 * Outcome of one dispatch row. Status is derived from the exit code, so a
 * record is `pass` exactly when the validator exited with 0.
 */
export class ResultRecordEntity {
  private constructor(
    private readonly _locator: string,
    private readonly _exitCode: number,
    private readonly _message: string,
    private readonly _failureCode?: WorkerErrorCode,
  ) {}

  static fromOutcome(locator: string, outcome: ValidationOutcome): ResultRecordEntity {
    if (outcome.kind === 'timed-out') {
      const timeout = new ValidationTimeoutError(outcome.command, outcome.timeoutSeconds);
      return new ResultRecordEntity(
        locator,
        NO_PROCESS_EXIT_CODE,
        timeout.message,
        timeout.code,
      );
    }

    if (outcome.exitCode === 0) {
      return new ResultRecordEntity(locator, 0, outcome.stdout.trim());
    }

    return new ResultRecordEntity(
      locator,
      outcome.exitCode,
      outcome.stderr.trim(),
      WorkerErrorCode.VALIDATION_NON_ZERO_EXIT,
    );
  }

  static fromError(locator: string, error: unknown): ResultRecordEntity {
    return new ResultRecordEntity(
      locator,
      NO_PROCESS_EXIT_CODE,
      errorMessageOf(error),
      errorCodeOf(error),
    );
  }

  get locator(): string {
    return this._locator;
  }

  get exitCode(): number {
    return this._exitCode;
  }

  get message(): string {
    return this._message;
  }

  get status(): ResultStatus {
    return this._exitCode === 0 ? 'pass' : 'fail';
  }

  /**
   * Why the row failed; undefined for passing rows
   */
  get failureCode(): WorkerErrorCode | undefined {
    return this._failureCode;
  }

  isPassed(): boolean {
    return this.status === 'pass';
  }

  toRow(): ResultRow {
    return {
      sequence_path: this._locator,
      status: this.status,
      exit_code: this._exitCode,
      message: this._message,
    };
  }

  toJSON() {
    return {
      ...this.toRow(),
      failureCode: this._failureCode,
    };
  }
}
