/**
 * Minimal RFC 4180 CSV codec: comma separator, `"` quoting with doubled quotes,
 * header row first, `\n` row terminator on write, `\n` or `\r\n` on read.
 */

export type CsvCell = string | number | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const s = typeof value === 'number' ? String(value) : value;
  if (NEEDS_QUOTING.test(s)) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

export function stringifyCsv(columns: string[], rows: Record<string, CsvCell>[]): string {
  const lines = [columns.map(formatCsvField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((col) => formatCsvField(row[col])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Parse CSV text into records of raw string fields. Fails on unterminated quotes
 * and on rows whose width differs from the header.
 */
export function parseCsv(text: string): { columns: string[]; rows: Record<string, string>[] } {
  const records = parseRecords(text);
  const columns = records.shift();
  if (columns === undefined) {
    return { columns: [], rows: [] };
  }

  const rows = records.map((fields, i) => {
    if (fields.length !== columns.length) {
      throw new Error(
        `Row ${i + 1} has ${fields.length} fields, expected ${columns.length} (${columns.join(', ')})`,
      );
    }
    const row: Record<string, string> = {};
    columns.forEach((col, j) => {
      row[col] = fields[j] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

function parseRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowHasContent = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
      rowHasContent = true;
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      if (rowHasContent || field !== '') {
        fields.push(field);
        records.push(fields);
      }
      fields = [];
      field = '';
      rowHasContent = false;
    } else {
      field += ch;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field');
  }
  if (rowHasContent || field !== '') {
    fields.push(field);
    records.push(fields);
  }
  return records;
}
