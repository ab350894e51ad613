import { z } from 'zod';
import { DispatchRow } from '../../domain/value-objects/dispatch-row.vo';
import { InvalidDispatchRowError } from '../../domain/errors/invalid-dispatch-row.error';

const locator = z.string().min(1, 'Locator cannot be empty');

// Extra columns of the dispatch table are ignored
export const DispatchRowSchema = z.object({
  sequence_path: locator,
  label_path: locator,
  third_data_path: locator,
});

export type DispatchRowDto = z.infer<typeof DispatchRowSchema>;

export function validateDispatchRow(data: unknown): DispatchRow {
  const result = DispatchRowSchema.safeParse(data);

  if (!result.success) {
    throw new InvalidDispatchRowError(
      result.error.errors.map((e) => `${e.path.join('.') || 'row'}: ${e.message}`),
    );
  }

  return {
    sequencePath: result.data.sequence_path,
    labelPath: result.data.label_path,
    thirdDataPath: result.data.third_data_path,
  };
}

/**
 * Best-effort echo of `sequence_path` for rows that failed validation
 */
export function sequencePathOf(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'sequence_path' in data) {
    const value: unknown = data.sequence_path;
    return typeof value === 'string' ? value : '';
  }
  return '';
}
