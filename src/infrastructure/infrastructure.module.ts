import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigModule } from '../config/config.module';
import { AppConfig } from '../config/configuration';
import { SharedModule } from '../shared/shared.module';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import {
  STORAGE_CLIENT_FACTORY,
  STORAGE_CLIENT_REGISTRY_PORT,
  VALIDATOR_PORT,
  SCRATCH_SPACE_PORT,
} from './injection-tokens';

// Adapters (implementations)
import { StorageClientRegistryAdapter } from './adapters/storage/storage-client-registry.adapter';
import { createS3StorageClientFactory } from './adapters/storage/s3-storage-client.factory';
import { ProcessValidatorAdapter } from './adapters/validator/process-validator.adapter';
import { LocalScratchSpaceAdapter } from './adapters/scratch/local-scratch-space.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * The storage client registry is a singleton of this module, so its cached
 * clients live exactly as long as the application context.
 */
@Module({
  imports: [ConfigModule, SharedModule],
  providers: [
    // Storage adapters
    {
      provide: STORAGE_CLIENT_FACTORY,
      inject: [ConfigService, PinoLoggerService],
      useFactory: (configService: ConfigService<AppConfig>, logger: PinoLoggerService) => {
        const awsConfig = configService.get('aws', { infer: true });
        if (!awsConfig) {
          throw new Error('Missing aws configuration');
        }
        return createS3StorageClientFactory(awsConfig, logger);
      },
    },
    {
      provide: STORAGE_CLIENT_REGISTRY_PORT,
      useClass: StorageClientRegistryAdapter,
    },

    // Validator adapter
    {
      provide: VALIDATOR_PORT,
      useClass: ProcessValidatorAdapter,
    },

    // Scratch space adapter
    {
      provide: SCRATCH_SPACE_PORT,
      useClass: LocalScratchSpaceAdapter,
    },
  ],
  exports: [STORAGE_CLIENT_REGISTRY_PORT, VALIDATOR_PORT, SCRATCH_SPACE_PORT],
})
export class InfrastructureModule {}
