import { describe, it, expect, beforeEach, vi, Mock } from 'vitest';
import { WorkerLifecycle, WorkerRuntime } from '../../../src/worker/worker-lifecycle';
import { ResultRow } from '../../../src/domain/entities/result-record.entity';
import { createDispatchRecord, createTestLogger } from '../helpers/mock-factories';

describe('WorkerLifecycle', () => {
  let execute: ReturnType<typeof createExecute>;
  let close: Mock<[], Promise<void>>;
  let createRuntime: Mock<[], Promise<WorkerRuntime>>;
  let lifecycle: WorkerLifecycle;

  function createExecute() {
    return vi.fn(async (miniBatch: readonly unknown[]): Promise<ResultRow[]> =>
      miniBatch.map((): ResultRow => ({ sequence_path: 'x', status: 'pass', exit_code: 0, message: 'ok' })),
    );
  }

  beforeEach(() => {
    execute = createExecute();
    close = vi.fn<[], Promise<void>>(async () => undefined);
    createRuntime = vi.fn<[], Promise<WorkerRuntime>>(async () => ({
      batchRunner: { execute },
      logger: createTestLogger(),
      close,
    }));

    lifecycle = new WorkerLifecycle(createRuntime);
  });

  it('should boot the runtime once on init', async () => {
    await lifecycle.init();
    await lifecycle.init();

    expect(createRuntime).toHaveBeenCalledTimes(1);
    expect(lifecycle.isInitialized).toBe(true);
    expect(lifecycle.logger).toBeDefined();
  });

  it('should share a boot in progress between concurrent callers', async () => {
    await Promise.all([lifecycle.init(), lifecycle.run([])]);

    expect(createRuntime).toHaveBeenCalledTimes(1);
  });

  it('should run a mini-batch through the batch runner', async () => {
    await lifecycle.init();
    const batch = [createDispatchRecord('001'), createDispatchRecord('002')];

    const results = await lifecycle.run(batch);

    expect(execute).toHaveBeenCalledWith(batch);
    expect(results).toHaveLength(2);
  });

  it('should boot lazily when run is called before init', async () => {
    await lifecycle.run([createDispatchRecord('001')]);

    expect(createRuntime).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('should close the runtime on shutdown', async () => {
    await lifecycle.init();

    await lifecycle.shutdown();

    expect(close).toHaveBeenCalledTimes(1);
    expect(lifecycle.isInitialized).toBe(false);
    expect(lifecycle.logger).toBeUndefined();
  });

  it('should ignore shutdown before init and repeated shutdowns', async () => {
    await lifecycle.shutdown();
    await lifecycle.init();
    await lifecycle.shutdown();
    await lifecycle.shutdown();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should close a runtime that finishes booting during shutdown', async () => {
    const booting = lifecycle.init();

    await lifecycle.shutdown();
    await booting;

    expect(createRuntime).toHaveBeenCalledTimes(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(lifecycle.isInitialized).toBe(false);
  });

  it('should shut down cleanly when a boot in flight fails', async () => {
    createRuntime.mockRejectedValueOnce(new Error('Environment validation failed'));
    const booting = expect(lifecycle.init()).rejects.toThrow('Environment validation failed');

    await expect(lifecycle.shutdown()).resolves.toBeUndefined();
    await booting;
    expect(close).not.toHaveBeenCalled();
  });

  it('should boot a fresh runtime after shutdown', async () => {
    await lifecycle.init();
    await lifecycle.shutdown();
    await lifecycle.init();

    expect(createRuntime).toHaveBeenCalledTimes(2);
  });

  it('should retry booting after a failed boot', async () => {
    createRuntime.mockRejectedValueOnce(new Error('Environment validation failed'));

    await expect(lifecycle.init()).rejects.toThrow('Environment validation failed');
    await lifecycle.init();

    expect(lifecycle.isInitialized).toBe(true);
    expect(createRuntime).toHaveBeenCalledTimes(2);
  });
});
