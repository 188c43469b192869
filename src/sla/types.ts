/**
 * SLA Compliance Types
 */

export const SEVERITIES = [1, 2, 3, 4, 5] as const;

export type Severity = (typeof SEVERITIES)[number];

export function isSeverity(value: number): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export interface Ticket {
  issueKey: string;
  issueId: string | null;
  severity: Severity;
  status: string;
  createdAt: Date | null;
  updatedAt: Date | null;
  resolvedAt: Date | null;
  firstResponseTarget: Date | null;
  firstResponseActual: Date | null;
  assignee: string | null;
  product: string | null;
  environment: string | null;
  summary: string | null;
  /** Display form: trimmed, whitespace collapsed */
  company: string;
  /** Join key: display form, case-folded */
  companyKey: string;
  reopenCount: number;
}

export interface SLAThreshold {
  company: string;
  companyKey: string;
  severity: Severity;
  /** Minutes; null when the matrix cell was empty */
  firstResponseMinutes: number | null;
  resolutionMinutes: number | null;
}

export type IndeterminateReason =
  | 'missing_first_response_target'
  | 'missing_first_response_actual'
  | 'missing_created'
  | 'missing_resolved'
  | 'no_threshold';

export type Compliance =
  | { state: 'compliant' }
  | { state: 'non_compliant' }
  | { state: 'indeterminate'; reason: IndeterminateReason };

export type DataQualityFlag = 'resolved_before_created';

export interface EnrichedTicket {
  ticket: Ticket;
  /** Status equals the terminal value; only these are scored */
  eligible: boolean;
  threshold: SLAThreshold | null;
  resolutionElapsedMinutes: number | null;
  firstResponse: Compliance;
  resolution: Compliance;
  firstResponseExceededPct: number | null;
  resolutionExceededPct: number | null;
  reopenHeavy: boolean;
  dataQuality: DataQualityFlag[];
}

export interface ComplianceOptions {
  terminalStatus: string;
}

// ───── Report shapes ────────────────────────────────────────────

export interface AssigneeAverage {
  assignee: string;
  ticketCount: number;
  avgResolutionMinutes: number;
}

export interface ProductAverage {
  product: string;
  ticketCount: number;
  avgResolutionMinutes: number;
}

export type ViolationDimension = 'first_response' | 'resolution';

export interface ViolationRow {
  issueKey: string;
  createdAt: Date | null;
  assignee: string | null;
  product: string | null;
  company: string;
  severity: Severity;
  reopenCount: number;
  category: 'violated' | 'missing_data';
  /** Dimensions whose SLA was breached */
  violations: ViolationDimension[];
  /** Dimensions that could not be judged for lack of a date */
  missingData: ViolationDimension[];
  firstResponse: Compliance;
  firstResponseExceededPct: number | null;
  resolution: Compliance;
  resolutionExceededPct: number | null;
  dataQuality: DataQualityFlag[];
}

export interface ReopenRow {
  issueKey: string;
  reopenCount: number;
  summary: string | null;
  status: string;
  createdAt: Date | null;
  assignee: string | null;
  product: string | null;
  firstResponseExceededPct: number | null;
  resolutionExceededPct: number | null;
  dataQuality: DataQualityFlag[];
}

export interface SeverityBreakdown {
  severity: Severity;
  compliant: number;
  nonCompliant: number;
  indeterminate: number;
  compliancePct: number | null;
}

export interface ComplianceSummary {
  totalTickets: number;
  eligibleTickets: number;
  resolution: {
    compliant: number;
    nonCompliant: number;
    indeterminate: number;
    compliancePct: number | null;
    coveragePct: number | null;
  };
  firstResponse: {
    compliant: number;
    nonCompliant: number;
    indeterminate: number;
    compliancePct: number | null;
  };
  medianResolutionMinutes: number | null;
  p90ResolutionMinutes: number | null;
  reopenHeavyTickets: number;
  /** Tickets carrying a data-quality flag, e.g. a clamped elapsed time */
  dataQualityFlagged: number;
  bySeverity: SeverityBreakdown[];
}
