import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { RunBatchPort } from '../application/ports/input/run-batch.port';
import { RunBatchUseCase } from '../application/use-cases/run-batch.use-case';
import { ResultRow } from '../domain/entities/result-record.entity';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';

/**
 * What the lifecycle needs from a booted application
 */
export interface WorkerRuntime {
  batchRunner: RunBatchPort;
  logger: PinoLoggerService;
  close(): Promise<void>;
}

export type WorkerRuntimeFactory = () => Promise<WorkerRuntime>;

/**
 * Boot the NestJS application context (no HTTP server)
 */
export async function createNestWorkerRuntime(): Promise<WorkerRuntime> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const logger = app.get(PinoLoggerService);
  app.useLogger(logger);

  return {
    batchRunner: app.get(RunBatchUseCase),
    logger,
    close: () => app.close(),
  };
}

/**
 * Worker Lifecycle
 *
 * Owns the application context for the lifetime of one worker process:
 * - init(): boots the context once
 * - run(): processes one mini-batch, booting lazily if init() was skipped
 * - shutdown(): closes the context, which destroys every cached storage client
 */
export class WorkerLifecycle {
  private runtime?: WorkerRuntime;
  private booting?: Promise<WorkerRuntime>;

  constructor(private readonly createRuntime: WorkerRuntimeFactory = createNestWorkerRuntime) {}

  get isInitialized(): boolean {
    return this.runtime !== undefined;
  }

  /**
   * Logger of the running context; undefined before init()
   */
  get logger(): PinoLoggerService | undefined {
    return this.runtime?.logger;
  }

  async init(): Promise<void> {
    const runtime = await this.ensureRuntime();
    runtime.logger.info({ pid: process.pid }, 'Worker initialised.');
  }

  async run(miniBatch: readonly unknown[]): Promise<ResultRow[]> {
    const runtime = await this.ensureRuntime();
    return runtime.batchRunner.execute(miniBatch);
  }

  async shutdown(): Promise<void> {
    // A boot still in flight must finish so its context can be closed;
    // a failed boot is reported to the caller that started it
    if (this.booting) {
      await Promise.allSettled([this.booting]);
    }

    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    this.runtime = undefined;
    await runtime.close();
    runtime.logger.info('Worker shutdown complete.');
  }

  private async ensureRuntime(): Promise<WorkerRuntime> {
    if (this.runtime) {
      return this.runtime;
    }

    if (!this.booting) {
      this.booting = this.createRuntime()
        .then((runtime) => {
          this.runtime = runtime;
          return runtime;
        })
        .finally(() => {
          this.booting = undefined;
        });
    }

    return this.booting;
  }
}
