/**
 * SLA Matrix Ingestion
 *
 * The matrix is one row per company with a pair of minute budgets per severity:
 *
 *   CRM Company | Severity 1 First Response | Severity 1 Resolution | Severity 2 ...
 *
 * Each row is unpivoted into one SLAThreshold per severity that has at least
 * one budget.
 */

import { SLAThreshold, Severity, isSeverity } from '../sla/types';
import { DataQualityWarning, ValidationError } from '../sla/errors';
import { displayCompany, normalizeCompany } from '../sla/normalizer';
import { IngestResult, RawRow } from './types';

export const COMPANY_COLUMN = 'CRM Company';

const SEVERITY_COLUMN_RE = /^Severity\s*(\d+)\s*(First\s*Response|Resolution)\b/i;

const WHOLE_NUMBER_RE = /^\d+$/;

type BudgetKind = 'firstResponse' | 'resolution';

interface BudgetColumn {
  column: string;
  severity: Severity;
  kind: BudgetKind;
}

export function ingestThresholds(
  rows: readonly RawRow[],
  columns: readonly string[] = rows.length > 0 ? Object.keys(rows[0]) : [],
): IngestResult<SLAThreshold> {
  try {
    if (!columns.includes(COMPANY_COLUMN)) {
      throw new ValidationError('missing_column', `Missing required column: '${COMPANY_COLUMN}'`, {
        column: COMPANY_COLUMN,
      });
    }

    const budgetColumns = matchBudgetColumns(columns);
    if (budgetColumns.length === 0) {
      throw new ValidationError(
        'no_severity_columns',
        "Expected columns like 'Severity 1 First Response' and 'Severity 1 Resolution' (minutes)",
      );
    }

    const warnings: DataQualityWarning[] = [];
    const byCompany = new Map<string, SLAThreshold[]>();

    rows.forEach((raw, i) => {
      const row = i + 1;
      const rawCompany = (raw[COMPANY_COLUMN] ?? '').trim();
      if (!rawCompany) {
        throw new ValidationError('missing_value', `Row ${row}: "${COMPANY_COLUMN}" is empty`, {
          row,
          column: COMPANY_COLUMN,
        });
      }

      const companyKey = normalizeCompany(rawCompany);
      if (byCompany.has(companyKey)) {
        warnings.push({
          code: 'duplicate_company',
          row,
          column: COMPANY_COLUMN,
          message: `Company "${displayCompany(rawCompany)}" appears more than once; the later row replaces the earlier one`,
        });
      }
      byCompany.set(companyKey, thresholdsForRow(raw, row, displayCompany(rawCompany), companyKey, budgetColumns));
    });

    return { ok: true, records: Array.from(byCompany.values()).flat(), warnings };
  } catch (err) {
    if (err instanceof ValidationError) return { ok: false, error: err };
    throw err;
  }
}

function matchBudgetColumns(columns: readonly string[]): BudgetColumn[] {
  const matched: BudgetColumn[] = [];
  for (const column of columns) {
    const m = SEVERITY_COLUMN_RE.exec(column.trim());
    if (!m) continue;
    const n = parseInt(m[1], 10);
    if (!isSeverity(n)) {
      throw new ValidationError('invalid_severity', `Column "${column}": severity must be between 1 and 5`, {
        column,
      });
    }
    const kind: BudgetKind = m[2].toLowerCase().startsWith('first') ? 'firstResponse' : 'resolution';
    matched.push({ column, severity: n, kind });
  }
  return matched;
}

function thresholdsForRow(
  raw: RawRow,
  row: number,
  company: string,
  companyKey: string,
  budgetColumns: readonly BudgetColumn[],
): SLAThreshold[] {
  const bySeverity = new Map<Severity, SLAThreshold>();

  for (const { column, severity, kind } of budgetColumns) {
    const minutes = parseMinutes(raw[column] ?? '', row, column);
    if (minutes === null) continue;
    const t = bySeverity.get(severity) ?? {
      company,
      companyKey,
      severity,
      firstResponseMinutes: null,
      resolutionMinutes: null,
    };
    if (kind === 'firstResponse') t.firstResponseMinutes = minutes;
    else t.resolutionMinutes = minutes;
    bySeverity.set(severity, t);
  }

  return Array.from(bySeverity.values()).sort((a, b) => a.severity - b.severity);
}

/** Empty cell → null; anything but a positive whole number rejects the batch */
function parseMinutes(value: string, row: number, column: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const n = WHOLE_NUMBER_RE.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (!(n > 0)) {
    throw new ValidationError(
      'invalid_threshold',
      `Row ${row}, column "${column}": "${trimmed}" is not a positive number of minutes`,
      { row, column },
    );
  }
  return n;
}

/** Number of distinct companies in an ingested matrix */
export function countCompanies(thresholds: readonly SLAThreshold[]): number {
  return new Set(thresholds.map((t) => t.companyKey)).size;
}
