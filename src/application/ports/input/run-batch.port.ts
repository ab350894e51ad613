import { ResultRow } from '../../../domain/entities/result-record.entity';

/**
 * Run Batch Port (Driving Port / Use Case Interface)
 * One result row per input row, same order
 */
export interface RunBatchPort {
  execute(miniBatch: readonly unknown[]): Promise<ResultRow[]>;
}
