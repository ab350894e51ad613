import { Injectable } from '@nestjs/common';
import { execFile } from 'child_process';
import { constants } from 'os';

export interface RunProcessOptions {
  timeoutMs: number;
  maxBufferBytes: number;
}

/**
 * How a bounded subprocess ended. Spawn failures reject instead.
 */
export type ProcessOutcome =
  | { kind: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { kind: 'timed-out'; stdout: string; stderr: string };

const MAX_BUFFER_EXCEEDED = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

function signalNumber(signal: string): number {
  const value: unknown = Reflect.get(constants.signals, signal);
  return typeof value === 'number' ? value : 0;
}

/**
 * Process Runner Service
 * Runs an executable without a shell, captures stdout/stderr as UTF-8 and
 * kills it once `timeoutMs` elapses.
 */
@Injectable()
export class ProcessRunnerService {
  run(
    command: string,
    args: readonly string[],
    options: RunProcessOptions,
  ): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        {
          encoding: 'utf8',
          timeout: options.timeoutMs,
          maxBuffer: options.maxBufferBytes,
          killSignal: 'SIGKILL',
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ kind: 'exited', exitCode: 0, stdout, stderr });
            return;
          }

          const code: unknown = error.code;

          if (code === MAX_BUFFER_EXCEEDED) {
            reject(error);
            return;
          }

          // `killed` is only set when this process sent the signal, i.e. on timeout
          if (error.killed) {
            resolve({ kind: 'timed-out', stdout, stderr });
            return;
          }

          if (typeof code === 'number') {
            resolve({ kind: 'exited', exitCode: code, stdout, stderr });
            return;
          }

          if (error.signal) {
            resolve({
              kind: 'exited',
              exitCode: -signalNumber(error.signal),
              stdout,
              stderr,
            });
            return;
          }

          reject(error);
        },
      );
    });
  }
}
