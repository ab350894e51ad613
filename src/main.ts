import 'reflect-metadata';
import { resolve } from 'path';
import configuration from './config/configuration';
import { DispatchRunner } from './dispatch/dispatch-runner';
import { WorkerLifecycle } from './worker/worker-lifecycle';

/**
 * Local driver: runs the dispatch table through one worker the way the
 * parallel job runtime would, writing results to RESULTS_PATH.
 */
async function bootstrap() {
  const { dispatch } = configuration();
  const worker = new WorkerLifecycle();
  const runner = new DispatchRunner(worker, {
    tablePath: resolve(dispatch.tablePath),
    resultsPath: resolve(dispatch.resultsPath),
    miniBatchSize: dispatch.miniBatchSize,
  });

  // Register shutdown handlers
  const shutdownHandler = async (signal: string) => {
    worker.logger?.info({ signal }, 'Received shutdown signal, stopping worker...');
    await worker.shutdown();
    process.exit(130);
  };

  process.on('SIGTERM', () => {
    shutdownHandler('SIGTERM').catch(() => process.exit(1));
  });
  process.on('SIGINT', () => {
    shutdownHandler('SIGINT').catch(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    worker.logger?.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await runner.run();
}

bootstrap().catch((error) => {
  console.error('Dispatch run failed:', error);
  process.exit(1);
});
