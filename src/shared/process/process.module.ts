import { Module } from '@nestjs/common';
import { ProcessRunnerService } from './process-runner.service';

@Module({
  providers: [ProcessRunnerService],
  exports: [ProcessRunnerService],
})
export class ProcessModule {}
