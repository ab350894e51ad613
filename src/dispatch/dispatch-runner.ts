import { WorkerLifecycle } from '../worker/worker-lifecycle';
import { readDispatchTable, splitMiniBatches } from './dispatch-table.reader';
import { appendResultRows } from './results.writer';

export interface DispatchRunnerOptions {
  tablePath: string;
  resultsPath: string;
  miniBatchSize: number;
}

export interface DispatchSummary {
  rows: number;
  passed: number;
  failed: number;
  miniBatches: number;
}

/**
 * Dispatch Runner
 *
 * Local stand-in for the parallel job runtime: reads the dispatch table,
 * feeds it to one worker in mini-batches and appends every returned row to
 * the results file. The worker is always shut down, also on failure.
 */
export class DispatchRunner {
  constructor(
    private readonly worker: WorkerLifecycle,
    private readonly options: DispatchRunnerOptions,
  ) {}

  async run(): Promise<DispatchSummary> {
    const records = await readDispatchTable(this.options.tablePath);
    const miniBatches = splitMiniBatches(records, this.options.miniBatchSize);
    const summary: DispatchSummary = { rows: 0, passed: 0, failed: 0, miniBatches: 0 };

    await this.worker.init();
    const logger = this.worker.logger?.forContext(DispatchRunner.name);
    logger?.info(
      { tablePath: this.options.tablePath, rows: records.length, miniBatches: miniBatches.length },
      'Dispatching table',
    );

    try {
      for (const miniBatch of miniBatches) {
        const results = await this.worker.run(miniBatch);
        await appendResultRows(this.options.resultsPath, results);

        summary.miniBatches++;
        summary.rows += results.length;
        summary.passed += results.filter((row) => row.status === 'pass').length;
        summary.failed += results.filter((row) => row.status === 'fail').length;
      }

      logger?.info({ ...summary, resultsPath: this.options.resultsPath }, 'Dispatch complete');
      return summary;
    } finally {
      await this.worker.shutdown();
    }
  }
}
