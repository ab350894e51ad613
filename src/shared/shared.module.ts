import { Module } from '@nestjs/common';
import { LoggingModule } from './logging/logging.module';
import { ProcessModule } from './process/process.module';

@Module({
  imports: [LoggingModule, ProcessModule],
  exports: [LoggingModule, ProcessModule],
})
export class SharedModule {}
