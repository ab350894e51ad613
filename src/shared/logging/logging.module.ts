import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../../config/config.module';
import { PinoLoggerService } from './pino-logger.service';

/**
 * Single pino root shared by every provider; use `forContext` for a
 * per-class child.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [PinoLoggerService],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
