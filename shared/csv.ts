import { InvalidInputError } from './errors.js';
import type { ContactTable, TableRow } from './types.js';

export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

/**
 * Split CSV text into a header row and data rows.
 *
 * Handles quoted fields containing commas, line breaks and doubled quotes,
 * keeps quotes that appear mid-field as literal characters,
 * `\n` and `\r\n` line endings, and a leading byte-order mark. Blank lines
 * are dropped. Fields are returned exactly as written (no trimming).
 */
export function parseCsv(content: string): ParsedCsv {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const lines: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"' && current === '') {
      // only a quote opening a field starts quoting; any other is literal text
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      fields.push(current);
      lines.push(fields);
      fields = [];
      current = '';
    } else {
      current += char;
    }
  }

  if (inQuotes) {
    throw new InvalidInputError('Input CSV file ends inside a quoted field');
  }
  if (current !== '' || fields.length > 0) {
    fields.push(current);
    lines.push(fields);
  }

  const nonBlank = lines.filter(l => !(l.length === 1 && l[0] === ''));
  if (nonBlank.length === 0) {
    throw new InvalidInputError('Input CSV file is empty');
  }

  const [headers, ...rows] = nonBlank;
  rows.forEach((values, idx) => {
    if (values.length > headers.length) {
      throw new InvalidInputError(
        `Row ${idx + 1} has ${values.length} fields, expected at most ${headers.length}`,
      );
    }
  });

  return { headers, rows };
}

/**
 * Key every row by its lower-cased header. Short rows are padded with empty
 * strings; when two headers collide after lower-casing the first one wins.
 */
export function toContactTable(parsed: ParsedCsv): ContactTable {
  const columns = parsed.headers.map(h => h.toLowerCase());

  const rows = parsed.rows.map(values => {
    const row: TableRow = {};
    columns.forEach((col, idx) => {
      if (!Object.hasOwn(row, col)) row[col] = values[idx] ?? '';
    });
    return row;
  });

  return { columns, rows };
}
