import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ScratchSpacePort } from '../../../application/ports/output/scratch-space.port';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Local Scratch Space Adapter
 * One `row-XXXXXX` directory per call under the configured root.
 * The directory is removed recursively in `finally`; a removal failure
 * rejects the call.
 */
@Injectable()
export class LocalScratchSpaceAdapter implements ScratchSpacePort {
  private readonly rootDir: string;
  private readonly logger: PinoLoggerService;

  constructor(configService: ConfigService<AppConfig>, logger: PinoLoggerService) {
    const scratchConfig = configService.get('scratch', { infer: true });
    if (!scratchConfig) {
      throw new Error('Missing scratch configuration');
    }

    this.rootDir = scratchConfig.rootDir;
    this.logger = logger.forContext(LocalScratchSpaceAdapter.name);
  }

  async withDirectory<T>(work: (directory: string) => Promise<T>): Promise<T> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const directory = await fs.mkdtemp(path.join(this.rootDir, 'row-'));

    this.logger.debug({ directory }, 'Scratch directory created');

    try {
      return await work(directory);
    } finally {
      await fs.rm(directory, { recursive: true, force: true });
      this.logger.debug({ directory }, 'Scratch directory removed');
    }
  }
}
