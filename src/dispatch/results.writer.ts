import { promises as fs } from 'fs';
import { dirname } from 'path';
import { RESULT_COLUMNS, ResultRow } from '../domain/entities/result-record.entity';
import { formatCsvRow } from '../shared/csv/csv';

async function isMissingOrEmpty(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size === 0;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}

/**
 * Append result rows to a CSV file, writing the header first when the file
 * does not exist yet.
 */
export async function appendResultRows(
  resultsPath: string,
  rows: readonly ResultRow[],
): Promise<void> {
  await fs.mkdir(dirname(resultsPath), { recursive: true });

  const lines: string[] = [];
  if (await isMissingOrEmpty(resultsPath)) {
    lines.push(formatCsvRow(RESULT_COLUMNS));
  }
  for (const row of rows) {
    lines.push(formatCsvRow(RESULT_COLUMNS.map((column) => row[column])));
  }

  if (lines.length > 0) {
    await fs.appendFile(resultsPath, `${lines.join('\n')}\n`, 'utf8');
  }
}
