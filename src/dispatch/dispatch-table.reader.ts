import { promises as fs } from 'fs';
import { parseCsv, CsvRecord } from '../shared/csv/csv';

/**
 * Read a dispatch table (CSV with a header row) into raw records.
 * Records are left unvalidated; the batch runner validates each row.
 */
export async function readDispatchTable(tablePath: string): Promise<CsvRecord[]> {
  const text = await fs.readFile(tablePath, 'utf8');
  return parseCsv(text);
}

export function splitMiniBatches<T>(rows: readonly T[], miniBatchSize: number): T[][] {
  if (!Number.isInteger(miniBatchSize) || miniBatchSize < 1) {
    throw new Error(`Mini-batch size must be a positive integer, got ${miniBatchSize}`);
  }

  const batches: T[][] = [];
  for (let start = 0; start < rows.length; start += miniBatchSize) {
    batches.push(rows.slice(start, start + miniBatchSize));
  }
  return batches;
}
