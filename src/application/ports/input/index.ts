/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 */
export { type FetchFilePort } from './fetch-file.port';
export { type ProcessRowPort } from './process-row.port';
export { type RunBatchPort } from './run-batch.port';
