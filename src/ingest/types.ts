import { DataQualityWarning, ValidationError } from '../sla/errors';

/** One CSV data row keyed by verbatim header */
export type RawRow = Readonly<Record<string, string>>;

export interface CsvTable {
  columns: string[];
  rows: RawRow[];
}

export type IngestResult<T> =
  | { ok: true; records: T[]; warnings: DataQualityWarning[] }
  | { ok: false; error: ValidationError };
