import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { FETCH_FILE_PORT, PROCESS_ROW_PORT } from '../infrastructure/injection-tokens';

// Use Cases
import { FetchFileUseCase, ProcessRowUseCase, RunBatchUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases
 *
 * Use cases depend on ports only; InfrastructureModule binds the adapters
 * to the port tokens.
 */
@Module({
  imports: [SharedModule, InfrastructureModule],
  providers: [
    {
      provide: FETCH_FILE_PORT,
      useClass: FetchFileUseCase,
    },
    {
      provide: PROCESS_ROW_PORT,
      useClass: ProcessRowUseCase,
    },
    RunBatchUseCase,
  ],
  exports: [
    // Entry point for the job runtime's mini-batches
    RunBatchUseCase,
  ],
})
export class ApplicationModule {}
