import { parse } from 'csv-parse/sync';
import { ValidationError } from '../sla/errors';
import { CsvTable, RawRow } from './types';

/**
 * Read a CSV upload with a header row. Short rows are padded with empty
 * cells so every row carries every column.
 */
export function readCsv(input: Buffer | string): CsvTable {
  let records: unknown;
  try {
    records = parse(input, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      // spreadsheet exports leave rows of bare delimiters
      skip_records_with_empty_values: true,
      relax_column_count: true,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ValidationError('malformed_csv', `Unreadable CSV: ${message}`);
  }

  if (!isStringMatrix(records) || records.length === 0) {
    throw new ValidationError('malformed_csv', 'CSV has no header row');
  }

  const [header, ...body] = records;
  const rows: RawRow[] = body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((column, i) => {
      row[column] = cells[i] ?? '';
    });
    return row;
  });

  return { columns: header, rows };
}

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((r) => Array.isArray(r) && r.every((c) => typeof c === 'string'));
}
