import { promises as fs } from 'fs';
import { ValidatorPort } from '../../src/application/ports/output/validator.port';
import {
  ValidationOutcome,
  ValidatorInputs,
} from '../../src/domain/value-objects/validation-outcome.vo';

export interface ValidatorCall {
  inputs: ValidatorInputs;
  contents: [string, string, string];
}

type Script = (inputs: ValidatorInputs, contents: ValidatorCall['contents']) => ValidationOutcome;

/**
 * Scripted Validator Adapter
 * Reads the three local files it is given, records them and answers with
 * whatever the script decides. Passes everything by default.
 */
export class ScriptedValidatorAdapter implements ValidatorPort {
  readonly calls: ValidatorCall[] = [];

  private script: Script = () => ({ kind: 'completed', exitCode: 0, stdout: 'ok\n', stderr: '' });

  respondWith(script: Script): void {
    this.script = script;
  }

  async validate(inputs: ValidatorInputs): Promise<ValidationOutcome> {
    const contents: ValidatorCall['contents'] = [
      await fs.readFile(inputs.sequencePath, 'utf8'),
      await fs.readFile(inputs.labelPath, 'utf8'),
      await fs.readFile(inputs.thirdDataPath, 'utf8'),
    ];

    this.calls.push({ inputs, contents });
    return this.script(inputs, contents);
  }
}
