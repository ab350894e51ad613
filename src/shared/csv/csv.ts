/**
 * Minimal RFC 4180 CSV codec for dispatch tables and result files.
 *
 * Quoted fields may contain commas, doubled quotes and line breaks.
 * Blank lines are skipped; CRLF and LF are both accepted.
 */

export type CsvRecord = Record<string, string>;

export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = (): void => {
    if (fieldStarted || row.length > 0) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        inQuotes = true;
        fieldStarted = true;
        break;
      case ',':
        row.push(field);
        field = '';
        fieldStarted = true;
        break;
      case '\r':
        if (text[i + 1] === '\n') {
          i++;
        }
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        field += char;
        fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field in CSV input');
  }
  endRow();

  return rows;
}

/**
 * Parse CSV text whose first row is the header into one record per row.
 * Missing trailing cells become empty strings.
 */
export function parseCsv(text: string): CsvRecord[] {
  const [header, ...body] = parseCsvRows(text.replace(/^\uFEFF/, ''));
  if (!header) {
    return [];
  }

  const columns = header.map((name) => name.trim());
  return body.map((cells) => {
    const record: CsvRecord = {};
    columns.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: ReadonlyArray<string | number>): string {
  return values.map((value) => escapeField(String(value))).join(',');
}
