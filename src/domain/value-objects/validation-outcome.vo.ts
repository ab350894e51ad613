/**
 * Result of one validator invocation that got as far as running.
 * Spawn failures are thrown instead.
 */
export type ValidationOutcome =
  | {
      kind: 'completed';
      exitCode: number;
      stdout: string;
      stderr: string;
    }
  | {
      kind: 'timed-out';
      command: string;
      timeoutSeconds: number;
    };

export interface ValidatorInputs {
  sequencePath: string;
  labelPath: string;
  thirdDataPath: string;
}
