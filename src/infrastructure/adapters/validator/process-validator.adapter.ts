import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ValidatorPort } from '../../../application/ports/output/validator.port';
import { AppConfig } from '../../../config/configuration';
import {
  ValidationOutcome,
  ValidatorInputs,
} from '../../../domain/value-objects/validation-outcome.vo';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { ProcessRunnerService } from '../../../shared/process/process-runner.service';

/**
 * Process Validator Adapter
 * Implements ValidatorPort by running the configured executable as
 * `<command> <sequence> <label> <third-data>`.
 */
@Injectable()
export class ProcessValidatorAdapter implements ValidatorPort {
  private readonly command: string;
  private readonly timeoutSeconds: number;
  private readonly maxOutputBytes: number;
  private readonly logger: PinoLoggerService;

  constructor(
    configService: ConfigService<AppConfig>,
    private readonly processRunner: ProcessRunnerService,
    logger: PinoLoggerService,
  ) {
    const validatorConfig = configService.get('validator', { infer: true });
    if (!validatorConfig) {
      throw new Error('Missing validator configuration');
    }

    this.command = validatorConfig.command;
    this.timeoutSeconds = validatorConfig.timeoutSeconds;
    this.maxOutputBytes = validatorConfig.maxOutputBytes;
    this.logger = logger.forContext(ProcessValidatorAdapter.name);
  }

  async validate(inputs: ValidatorInputs): Promise<ValidationOutcome> {
    const args = [inputs.sequencePath, inputs.labelPath, inputs.thirdDataPath];
    const startTime = Date.now();

    this.logger.debug({ command: this.command, args }, 'Running validator');

    const outcome = await this.processRunner.run(this.command, args, {
      timeoutMs: this.timeoutSeconds * 1000,
      maxBufferBytes: this.maxOutputBytes,
    });

    const durationMs = Date.now() - startTime;

    if (outcome.kind === 'timed-out') {
      this.logger.warn(
        { command: this.command, timeoutSeconds: this.timeoutSeconds, durationMs },
        'Validator timed out',
      );
      return {
        kind: 'timed-out',
        command: this.command,
        timeoutSeconds: this.timeoutSeconds,
      };
    }

    this.logger.debug({ exitCode: outcome.exitCode, durationMs }, 'Validator finished');

    return {
      kind: 'completed',
      exitCode: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
    };
  }
}
