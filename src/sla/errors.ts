/**
 * Ingestion errors and warnings.
 *
 * A ValidationError rejects the whole upload. A DataQualityWarning is recorded
 * and the affected row is still admitted.
 */

export type ValidationErrorCode =
  | 'malformed_csv'
  | 'missing_column'
  | 'malformed_timestamp'
  | 'invalid_severity'
  | 'missing_value'
  | 'invalid_threshold'
  | 'no_severity_columns';

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;
  /** 1-based data row (header excluded); null for header-level problems */
  readonly row: number | null;
  readonly column: string | null;

  constructor(code: ValidationErrorCode, message: string, location?: { row?: number | null; column?: string | null }) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.row = location?.row ?? null;
    this.column = location?.column ?? null;
  }

  toJSON(): { error: 'validation_failed'; code: ValidationErrorCode; message: string; row: number | null; column: string | null } {
    return {
      error: 'validation_failed',
      code: this.code,
      message: this.message,
      row: this.row,
      column: this.column,
    };
  }
}

export type DataQualityCode =
  | 'resolved_before_created'
  | 'negative_reopen_count'
  | 'invalid_reopen_count'
  | 'duplicate_issue_key'
  | 'duplicate_company';

export interface DataQualityWarning {
  code: DataQualityCode;
  row: number;
  column: string | null;
  message: string;
}
