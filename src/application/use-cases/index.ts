/**
 * Use Cases Barrel Export
 */
export { FetchFileUseCase } from './fetch-file.use-case';
export { ProcessRowUseCase } from './process-row.use-case';
export { RunBatchUseCase } from './run-batch.use-case';
