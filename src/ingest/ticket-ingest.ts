/**
 * Ticket Ingestion
 *
 * Maps rows of the issue-tracker CSV export onto Ticket records. Any malformed
 * value rejects the whole batch so that no partially-normalized table is ever
 * stored; data-quality problems are recorded as warnings instead.
 */

import { Ticket, Severity, isSeverity } from '../sla/types';
import { DataQualityWarning, ValidationError } from '../sla/errors';
import { displayCompany, normalizeCompany, parseTimestamp } from '../sla/normalizer';
import { IngestResult, RawRow } from './types';

/** Verbatim export headers */
export const TICKET_COLUMNS = {
  issueKey: 'Issue key',
  issueId: 'Issue id',
  severity: 'Custom field (Severity)',
  status: 'Status',
  firstResponseTarget: 'Custom field (First Response SLA Target Date)',
  firstResponseActual: 'Custom field (First Response SLA Actual Date)',
  created: 'Created',
  updated: 'Updated',
  resolved: 'Resolved',
  assignee: 'Assignee',
  environment: 'Custom field (Environment)',
  product: 'Custom field (Product)',
  summary: 'Summary',
  company: 'Custom field (CRM Company)',
  reopenCount: 'Custom field (Reopen Count)',
} as const;

export const REQUIRED_TICKET_COLUMNS: readonly string[] = [
  TICKET_COLUMNS.issueKey,
  TICKET_COLUMNS.severity,
  TICKET_COLUMNS.status,
  TICKET_COLUMNS.firstResponseTarget,
  TICKET_COLUMNS.firstResponseActual,
  TICKET_COLUMNS.created,
  TICKET_COLUMNS.resolved,
  TICKET_COLUMNS.assignee,
  TICKET_COLUMNS.product,
  TICKET_COLUMNS.company,
  TICKET_COLUMNS.reopenCount,
];

const SEVERITY_RE = /^(?:severity\s*)?(\d+)$/i;
const REOPEN_COUNT_RE = /^-?\d+$/;

export function ingestTickets(rows: readonly RawRow[], columns: readonly string[] = columnsOf(rows)): IngestResult<Ticket> {
  try {
    const missing = REQUIRED_TICKET_COLUMNS.filter((c) => !columns.includes(c));
    if (missing.length > 0) {
      throw new ValidationError('missing_column', `Missing columns: ${missing.join(', ')}`, { column: missing[0] });
    }

    const warnings: DataQualityWarning[] = [];
    const byKey = new Map<string, Ticket>();

    rows.forEach((raw, i) => {
      const rowNo = i + 1;
      const ticket = toTicket(raw, rowNo, warnings);
      if (byKey.has(ticket.issueKey)) {
        warnings.push({
          code: 'duplicate_issue_key',
          row: rowNo,
          column: TICKET_COLUMNS.issueKey,
          message: `Issue ${ticket.issueKey} appears more than once; the later row replaces the earlier one`,
        });
      }
      byKey.set(ticket.issueKey, ticket);
    });

    return { ok: true, records: Array.from(byKey.values()), warnings };
  } catch (err) {
    if (err instanceof ValidationError) return { ok: false, error: err };
    throw err;
  }
}

function toTicket(raw: RawRow, row: number, warnings: DataQualityWarning[]): Ticket {
  const cell = (column: string): string => (raw[column] ?? '').trim();
  const optionalCell = (column: string): string | null => cell(column) || null;
  const timestamp = (column: string): Date | null => parseTimestamp(cell(column), { row, column });

  const issueKey = cell(TICKET_COLUMNS.issueKey);
  if (!issueKey) {
    throw new ValidationError('missing_value', `Row ${row}: "${TICKET_COLUMNS.issueKey}" is empty`, {
      row,
      column: TICKET_COLUMNS.issueKey,
    });
  }

  const createdAt = timestamp(TICKET_COLUMNS.created);
  const resolvedAt = timestamp(TICKET_COLUMNS.resolved);
  if (createdAt && resolvedAt && resolvedAt.getTime() < createdAt.getTime()) {
    warnings.push({
      code: 'resolved_before_created',
      row,
      column: TICKET_COLUMNS.resolved,
      message: `Issue ${issueKey} is resolved before it was created; elapsed time is clamped to zero`,
    });
  }

  const rawCompany = cell(TICKET_COLUMNS.company);

  return {
    issueKey,
    issueId: optionalCell(TICKET_COLUMNS.issueId),
    severity: parseSeverity(cell(TICKET_COLUMNS.severity), row),
    status: cell(TICKET_COLUMNS.status),
    createdAt,
    updatedAt: timestamp(TICKET_COLUMNS.updated),
    resolvedAt,
    firstResponseTarget: timestamp(TICKET_COLUMNS.firstResponseTarget),
    firstResponseActual: timestamp(TICKET_COLUMNS.firstResponseActual),
    assignee: optionalCell(TICKET_COLUMNS.assignee),
    product: optionalCell(TICKET_COLUMNS.product),
    environment: optionalCell(TICKET_COLUMNS.environment),
    summary: optionalCell(TICKET_COLUMNS.summary),
    company: displayCompany(rawCompany),
    companyKey: normalizeCompany(rawCompany),
    reopenCount: parseReopenCount(cell(TICKET_COLUMNS.reopenCount), issueKey, row, warnings),
  };
}

/** Accepts "Severity 3" or "3" */
export function parseSeverity(value: string, row: number): Severity {
  const m = SEVERITY_RE.exec(value);
  const n = m ? parseInt(m[1], 10) : NaN;
  if (!isSeverity(n)) {
    throw new ValidationError(
      'invalid_severity',
      `Row ${row}, column "${TICKET_COLUMNS.severity}": "${value}" is not a severity between 1 and 5`,
      { row, column: TICKET_COLUMNS.severity },
    );
  }
  return n;
}

function parseReopenCount(value: string, issueKey: string, row: number, warnings: DataQualityWarning[]): number {
  if (value === '') return 0;
  if (!REOPEN_COUNT_RE.test(value)) {
    warnings.push({
      code: 'invalid_reopen_count',
      row,
      column: TICKET_COLUMNS.reopenCount,
      message: `Issue ${issueKey} has reopen count "${value}"; treated as 0`,
    });
    return 0;
  }
  const n = parseInt(value, 10);
  if (n < 0) {
    warnings.push({
      code: 'negative_reopen_count',
      row,
      column: TICKET_COLUMNS.reopenCount,
      message: `Issue ${issueKey} has negative reopen count ${n}; clamped to 0`,
    });
    return 0;
  }
  return n;
}

function columnsOf(rows: readonly RawRow[]): string[] {
  return rows.length > 0 ? Object.keys(rows[0]) : [];
}
