import { Inject, Injectable } from '@nestjs/common';
import { FetchFilePort, ProcessRowPort } from '../ports/input';
import { ScratchSpacePort, ValidatorPort } from '../ports/output';
import { ResultRecordEntity } from '../../domain/entities/result-record.entity';
import { DispatchRow } from '../../domain/value-objects/dispatch-row.vo';
import { errorCodeOf, errorMessageOf } from '../../domain/errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import {
  FETCH_FILE_PORT,
  SCRATCH_SPACE_PORT,
  VALIDATOR_PORT,
} from '../../infrastructure/injection-tokens';

/**
 * Process Row Use Case
 *
 * Start → Fetching → Validating → Passed | Failed
 *
 * The three files are fetched in order (sequence, label, third data) into a
 * scratch directory that is removed before the record is returned. Every
 * error is turned into a failed record; this use case never rejects.
 */
@Injectable()
export class ProcessRowUseCase implements ProcessRowPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(FETCH_FILE_PORT) private readonly fetcher: FetchFilePort,
    @Inject(VALIDATOR_PORT) private readonly validator: ValidatorPort,
    @Inject(SCRATCH_SPACE_PORT) private readonly scratchSpace: ScratchSpacePort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(ProcessRowUseCase.name);
  }

  async execute(row: DispatchRow, correlationId?: string): Promise<ResultRecordEntity> {
    const logger = correlationId ? this.logger.withCorrelationId(correlationId) : this.logger;
    const startTime = Date.now();
    logger.info({ sequencePath: row.sequencePath }, 'Processing sequence');

    try {
      const record = await this.scratchSpace.withDirectory(async (directory) => {
        const sequencePath = await this.fetcher.fetch(row.sequencePath, directory, correlationId);
        const labelPath = await this.fetcher.fetch(row.labelPath, directory, correlationId);
        const thirdDataPath = await this.fetcher.fetch(row.thirdDataPath, directory, correlationId);

        const outcome = await this.validator.validate({
          sequencePath,
          labelPath,
          thirdDataPath,
        });

        return ResultRecordEntity.fromOutcome(row.sequencePath, outcome);
      });

      const durationMs = Date.now() - startTime;
      if (record.isPassed()) {
        logger.info({ sequencePath: row.sequencePath, durationMs }, 'Row passed');
      } else {
        logger.error(
          {
            sequencePath: row.sequencePath,
            code: record.failureCode,
            exitCode: record.exitCode,
            durationMs,
          },
          'Row failed',
        );
      }

      return record;
    } catch (error) {
      logger.error(
        {
          sequencePath: row.sequencePath,
          code: errorCodeOf(error),
          error: errorMessageOf(error),
          durationMs: Date.now() - startTime,
        },
        'Row failed',
      );

      return ResultRecordEntity.fromError(row.sequencePath, error);
    }
  }
}
