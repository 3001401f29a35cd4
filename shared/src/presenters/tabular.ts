/**
 * Comma-separated records. Column order always follows the key order of the first record.
 */

export type TabularRecord = Record<string, unknown>;

export function columnsOf(records: ReadonlyArray<TabularRecord>): string[] {
  return records.length > 0 ? Object.keys(records[0]) : [];
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('base64');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function quoteField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/**
 * Render records as CSV with CRLF line endings. Records missing a header column get an empty
 * field there; keys that the first record does not have are dropped.
 */
export function toCsv(records: ReadonlyArray<TabularRecord>, columns: string[] = columnsOf(records)): string {
  if (columns.length === 0) {
    return '';
  }
  const lines = [columns.map(quoteField).join(',')];
  for (const record of records) {
    lines.push(columns.map(column => quoteField(formatValue(record[column]))).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

/**
 * Split CSV text into rows of fields. Accepts CRLF or LF line endings and quoted fields
 * spanning several lines.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let quoted = false;

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

    if (char === '"') {
      inQuotes = true;
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      quoted = false;
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      quoted = false;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new Error('Malformed CSV: unterminated quoted field');
  }
  if (field !== '' || quoted || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * Parse CSV produced by `toCsv` (or any header-first CSV) back into records of strings.
 */
export function parseCsv(text: string): Record<string, string>[] {
  const [header, ...body] = parseCsvRows(text);
  if (!header) {
    return [];
  }
  return body.map(fields => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = fields[index] ?? '';
    });
    return record;
  });
}
