import { ResultRecordEntity } from '../../../domain/entities/result-record.entity';
import { DispatchRow } from '../../../domain/value-objects/dispatch-row.vo';

/**
 * Process Row Port (Driving Port / Use Case Interface)
 * Fetches the three files of a row, validates them and reports the outcome.
 * Never rejects.
 */
export interface ProcessRowPort {
  /**
   * @param correlationId tags every log line of the row, e.g. with its mini-batch
   */
  execute(row: DispatchRow, correlationId?: string): Promise<ResultRecordEntity>;
}
