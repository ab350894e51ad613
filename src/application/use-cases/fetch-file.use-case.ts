import { Inject, Injectable } from '@nestjs/common';
import * as path from 'path';
import { FetchFilePort } from '../ports/input';
import { StorageClientRegistryPort } from '../ports/output';
import { LocatorVO } from '../../domain/value-objects/locator.vo';
import { FetchError } from '../../domain/errors';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { STORAGE_CLIENT_REGISTRY_PORT } from '../../infrastructure/injection-tokens';

/**
 * Fetch File Use Case
 * Resolves a locator to its container's client and downloads the object
 * into the given directory under its own file name. No retry.
 */
@Injectable()
export class FetchFileUseCase implements FetchFilePort {
  private readonly logger: PinoLoggerService;

  constructor(
    @Inject(STORAGE_CLIENT_REGISTRY_PORT)
    private readonly registry: StorageClientRegistryPort,
    logger: PinoLoggerService,
  ) {
    this.logger = logger.forContext(FetchFileUseCase.name);
  }

  async fetch(
    locator: string,
    destinationDirectory: string,
    correlationId?: string,
  ): Promise<string> {
    const logger = correlationId ? this.logger.withCorrelationId(correlationId) : this.logger;

    try {
      const parsed = LocatorVO.parse(locator);
      const client = this.registry.get(parsed.containerId);

      const fileName = parsed.fileName;
      if (!fileName) {
        throw new Error(`Locator has no file name: ${locator}`);
      }

      const localPath = path.join(destinationDirectory, fileName);

      logger.info({ locator, localPath }, 'Downloading object');
      await client.download(parsed.relativePath, localPath);

      return localPath;
    } catch (error) {
      throw FetchError.wrap(locator, error);
    }
  }
}
