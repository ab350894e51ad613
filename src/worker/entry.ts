/**
 * Parallel job entry points.
 *
 * The job runtime calls `init()` once per worker process, `run()` once per
 * mini-batch of dispatch rows and `shutdown()` when the worker is done.
 * `run()` returns one row per input row with the columns
 * `sequence_path, status, exit_code, message`.
 */
import 'reflect-metadata';
import { ResultRow } from '../domain/entities/result-record.entity';
import { WorkerLifecycle } from './worker-lifecycle';

const lifecycle = new WorkerLifecycle();

export function init(): Promise<void> {
  return lifecycle.init();
}

export function run(miniBatch: readonly unknown[]): Promise<ResultRow[]> {
  return lifecycle.run(miniBatch);
}

export function shutdown(): Promise<void> {
  return lifecycle.shutdown();
}
