import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ProcessValidatorAdapter } from '../../../src/infrastructure/adapters/validator/process-validator.adapter';
import { ProcessRunnerService } from '../../../src/shared/process/process-runner.service';
import { createTestConfigService, createTestLogger } from '../helpers/mock-factories';

describe('ProcessValidatorAdapter', () => {
  let processRunner: ProcessRunnerService;
  let adapter: ProcessValidatorAdapter;

  const inputs = {
    sequencePath: '/scratch/row-1/recording.bin',
    labelPath: '/scratch/row-1/labels.json',
    thirdDataPath: '/scratch/row-1/extra.dat',
  };

  beforeEach(() => {
    processRunner = new ProcessRunnerService();
    adapter = new ProcessValidatorAdapter(
      createTestConfigService({
        VALIDATOR_COMMAND: '/usr/local/bin/check',
        VALIDATOR_TIMEOUT_SECONDS: '30',
        VALIDATOR_MAX_OUTPUT_MB: '1',
      }),
      processRunner,
      createTestLogger(),
    );
  });

  it('should run the command with the three paths as arguments', async () => {
    const run = vi.spyOn(processRunner, 'run').mockResolvedValue({
      kind: 'exited',
      exitCode: 0,
      stdout: 'ok\n',
      stderr: '',
    });

    await adapter.validate(inputs);

    expect(run).toHaveBeenCalledWith(
      '/usr/local/bin/check',
      ['/scratch/row-1/recording.bin', '/scratch/row-1/labels.json', '/scratch/row-1/extra.dat'],
      { timeoutMs: 30000, maxBufferBytes: 1048576 },
    );
  });

  it('should report a completed run with its exit code and output', async () => {
    vi.spyOn(processRunner, 'run').mockResolvedValue({
      kind: 'exited',
      exitCode: 2,
      stdout: '',
      stderr: 'bad data\n',
    });

    await expect(adapter.validate(inputs)).resolves.toEqual({
      kind: 'completed',
      exitCode: 2,
      stdout: '',
      stderr: 'bad data\n',
    });
  });

  it('should report a timeout with the command and bound', async () => {
    vi.spyOn(processRunner, 'run').mockResolvedValue({
      kind: 'timed-out',
      stdout: 'partial',
      stderr: '',
    });

    await expect(adapter.validate(inputs)).resolves.toEqual({
      kind: 'timed-out',
      command: '/usr/local/bin/check',
      timeoutSeconds: 30,
    });
  });

  it('should propagate spawn failures', async () => {
    vi.spyOn(processRunner, 'run').mockRejectedValue(new Error('spawn /usr/local/bin/check ENOENT'));

    await expect(adapter.validate(inputs)).rejects.toThrow('spawn /usr/local/bin/check ENOENT');
  });
});
