import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { FetchFileUseCase } from '../../../src/application/use-cases/fetch-file.use-case';
import { StorageClientRegistryAdapter } from '../../../src/infrastructure/adapters/storage/storage-client-registry.adapter';
import { FetchError } from '../../../src/domain/errors/fetch.error';
import { WorkerErrorCode } from '../../../src/domain/errors/worker-error';
import { InMemoryObjectStore } from '../../in-memory-adapters';
import {
  TEST_FIXTURES,
  createTempDir,
  createTestLogger,
  removeDir,
} from '../helpers/mock-factories';

describe('FetchFileUseCase', () => {
  let store: InMemoryObjectStore;
  let registry: StorageClientRegistryAdapter;
  let useCase: FetchFileUseCase;
  let directory: string;

  const recordings = TEST_FIXTURES.containerId('recordings');

  beforeEach(async () => {
    const logger = createTestLogger();
    store = new InMemoryObjectStore();
    registry = new StorageClientRegistryAdapter(store.factory, logger);
    useCase = new FetchFileUseCase(registry, logger);
    directory = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(directory);
  });

  it('should download the object under its own file name', async () => {
    store.put(recordings, 'seq_001/recording.bin', 'sequence bytes');

    const localPath = await useCase.fetch(
      TEST_FIXTURES.locator('recordings', 'seq_001/recording.bin'),
      directory,
    );

    expect(localPath).toBe(path.join(directory, 'recording.bin'));
    await expect(fs.readFile(localPath, 'utf8')).resolves.toBe('sequence bytes');
  });

  it('should reuse the client of a container across fetches', async () => {
    store.put(recordings, 'seq_001/recording.bin', 'one');
    store.put(recordings, 'seq_002/other.bin', 'two');

    await useCase.fetch(TEST_FIXTURES.locator('recordings', 'seq_001/recording.bin'), directory);
    await useCase.fetch(TEST_FIXTURES.locator('recordings', 'seq_002/other.bin'), directory);

    expect(store.createdClients).toHaveLength(1);
    expect(store.createdClients[0].downloads).toEqual([
      'seq_001/recording.bin',
      'seq_002/other.bin',
    ]);
  });

  it('should build one client per container', async () => {
    store.put(recordings, 'a.bin', 'a');
    store.put(TEST_FIXTURES.containerId('labels'), 'b.json', 'b');

    await useCase.fetch(TEST_FIXTURES.locator('recordings', 'a.bin'), directory);
    await useCase.fetch(TEST_FIXTURES.locator('labels', 'b.json'), directory);

    expect(registry.size).toBe(2);
  });

  it('should wrap a malformed locator in FetchError', async () => {
    const locator = 'https://example.com/file.bin';

    const promise = useCase.fetch(locator, directory);

    await expect(promise).rejects.toBeInstanceOf(FetchError);
    await expect(promise).rejects.toThrow(
      "Failed to fetch https://example.com/file.bin: URI missing '/paths/' segment: https://example.com/file.bin",
    );
    expect(registry.size).toBe(0);
  });

  it('should wrap a failed download in FetchError', async () => {
    const locator = TEST_FIXTURES.locator('recordings', 'seq_001/missing.bin');

    await expect(useCase.fetch(locator, directory)).rejects.toThrow(
      `Failed to fetch ${locator}: Object not found: seq_001/missing.bin`,
    );
  });

  it('should reject a locator without a file name', async () => {
    await expect(useCase.fetch('store://a/paths/', directory)).rejects.toThrow(
      'Failed to fetch store://a/paths/: Locator has no file name: store://a/paths/',
    );
  });

  it('should keep the original error as cause', async () => {
    const locator = TEST_FIXTURES.locator('recordings', 'gone.bin');

    try {
      await useCase.fetch(locator, directory);
      expect.unreachable('fetch should have rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.code).toBe(WorkerErrorCode.FETCH_FAILED);
        expect(error.locator).toBe(locator);
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });
});
