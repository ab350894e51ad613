import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';

/**
 * Application Module
 * Context for the validation worker: no HTTP server, no queue consumers.
 * The job runtime drives it through the hooks in `worker/entry.ts`.
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule],
})
export class AppModule {}
