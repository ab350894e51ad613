import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ProcessRowPort, RunBatchPort } from '../ports/input';
import { sequencePathOf, validateDispatchRow } from '../dto/dispatch-row.dto';
import {
  ResultRecordEntity,
  ResultRow,
} from '../../domain/entities/result-record.entity';
import { errorCodeOf, errorMessageOf } from '../../domain/errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { PROCESS_ROW_PORT } from '../../infrastructure/injection-tokens';

/**
 * Run Batch Use Case
 * Processes the rows of one mini-batch strictly one after another, since
 * cached storage clients are shared between rows.
 */
@Injectable()
export class RunBatchUseCase implements RunBatchPort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(PROCESS_ROW_PORT) private readonly processRow: ProcessRowPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(RunBatchUseCase.name);
  }

  async execute(miniBatch: readonly unknown[]): Promise<ResultRow[]> {
    const correlationId = uuidv4();
    const batchLogger = this.logger.withCorrelationId(correlationId);
    batchLogger.debug({ rows: miniBatch.length }, 'Mini-batch received');

    const results: ResultRow[] = [];

    for (const [index, data] of miniBatch.entries()) {
      let record: ResultRecordEntity;

      try {
        const row = validateDispatchRow(data);
        record = await this.processRow.execute(row, correlationId);
      } catch (error) {
        batchLogger.error(
          { rowIndex: index, code: errorCodeOf(error), error: errorMessageOf(error) },
          'Rejected dispatch row',
        );
        record = ResultRecordEntity.fromError(sequencePathOf(data), error);
      }

      results.push(record.toRow());
    }

    return results;
  }
}
