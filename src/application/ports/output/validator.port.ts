import {
  ValidationOutcome,
  ValidatorInputs,
} from '../../../domain/value-objects/validation-outcome.vo';

/**
 * Validator Port (Driven Port)
 * Runs the external validation executable once against three local files.
 * Resolves with the exit or timeout outcome; rejects when the executable
 * could not be run at all.
 */
export interface ValidatorPort {
  validate(inputs: ValidatorInputs): Promise<ValidationOutcome>;
}
