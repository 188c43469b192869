/**
 * Report Aggregator
 *
 * Pure folds over an enriched ticket table. Every view returns an empty result
 * for an empty table.
 */

import {
  AssigneeAverage,
  Compliance,
  ComplianceSummary,
  EnrichedTicket,
  ProductAverage,
  ReopenRow,
  Severity,
  SeverityBreakdown,
  ViolationDimension,
  ViolationRow,
} from './types';
import { median, percentile, round } from './percentile';

type Evaluable = EnrichedTicket & { resolutionElapsedMinutes: number };

/** Eligible and with a determinate resolution verdict */
function isEvaluable(e: EnrichedTicket): e is Evaluable {
  return e.eligible && e.resolution.state !== 'indeterminate' && e.resolutionElapsedMinutes !== null;
}

function isMissingDate(c: Compliance): boolean {
  return c.state === 'indeterminate' && c.reason !== 'no_threshold';
}

function pct(part: number, whole: number): number | null {
  return whole > 0 ? round((part / whole) * 100) : null;
}

/** Nulls sort after every value */
function compareNullable(a: number | null, b: number | null, direction: 1 | -1): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return (a - b) * direction;
}

function createdMs(e: EnrichedTicket): number | null {
  return e.ticket.createdAt ? e.ticket.createdAt.getTime() : null;
}

// ───── Group averages ───────────────────────────────────────────

function groupAverages(
  tickets: readonly EnrichedTicket[],
  keyOf: (e: EnrichedTicket) => string | null,
): Array<{ key: string; ticketCount: number; avgResolutionMinutes: number }> {
  const groups = new Map<string, { sum: number; count: number }>();

  for (const e of tickets) {
    if (!isEvaluable(e)) continue;
    const key = keyOf(e);
    if (!key) continue;
    const g = groups.get(key) ?? { sum: 0, count: 0 };
    g.sum += e.resolutionElapsedMinutes;
    g.count += 1;
    groups.set(key, g);
  }

  return Array.from(groups.entries())
    .map(([key, g]) => ({ key, ticketCount: g.count, avgResolutionMinutes: round(g.sum / g.count) }))
    .sort((a, b) => a.avgResolutionMinutes - b.avgResolutionMinutes || a.key.localeCompare(b.key));
}

export function assigneeAverages(tickets: readonly EnrichedTicket[]): AssigneeAverage[] {
  return groupAverages(tickets, (e) => e.ticket.assignee).map(({ key, ...rest }) => ({ assignee: key, ...rest }));
}

export function productAverages(tickets: readonly EnrichedTicket[]): ProductAverage[] {
  return groupAverages(tickets, (e) => e.ticket.product).map(({ key, ...rest }) => ({ product: key, ...rest }));
}

// ───── Violations ───────────────────────────────────────────────

export function violations(tickets: readonly EnrichedTicket[]): ViolationRow[] {
  const rows: Array<{ row: ViolationRow; created: number | null }> = [];

  for (const e of tickets) {
    if (!e.eligible) continue;

    const breached: ViolationDimension[] = [];
    const missing: ViolationDimension[] = [];
    if (e.firstResponse.state === 'non_compliant') breached.push('first_response');
    if (e.resolution.state === 'non_compliant') breached.push('resolution');
    if (isMissingDate(e.firstResponse)) missing.push('first_response');
    if (isMissingDate(e.resolution)) missing.push('resolution');
    if (breached.length === 0 && missing.length === 0) continue;

    const t = e.ticket;
    rows.push({
      created: createdMs(e),
      row: {
        issueKey: t.issueKey,
        createdAt: t.createdAt,
        assignee: t.assignee,
        product: t.product,
        company: t.company,
        severity: t.severity,
        reopenCount: t.reopenCount,
        category: breached.length > 0 ? 'violated' : 'missing_data',
        violations: breached,
        missingData: missing,
        firstResponse: e.firstResponse,
        firstResponseExceededPct: e.firstResponseExceededPct,
        resolution: e.resolution,
        resolutionExceededPct: e.resolutionExceededPct,
        dataQuality: [...e.dataQuality],
      },
    });
  }

  rows.sort(
    (a, b) =>
      compareNullable(a.row.resolutionExceededPct, b.row.resolutionExceededPct, -1) ||
      compareNullable(a.row.firstResponseExceededPct, b.row.firstResponseExceededPct, -1) ||
      compareNullable(a.created, b.created, 1) ||
      a.row.issueKey.localeCompare(b.row.issueKey),
  );
  return rows.map((r) => r.row);
}

// ───── Reopens ──────────────────────────────────────────────────

/** Reopen-heavy tickets regardless of status, most reopened first, then oldest */
export function reopenHeavy(tickets: readonly EnrichedTicket[]): ReopenRow[] {
  return tickets
    .filter((e) => e.reopenHeavy)
    .sort(
      (a, b) =>
        b.ticket.reopenCount - a.ticket.reopenCount ||
        compareNullable(createdMs(a), createdMs(b), 1) ||
        a.ticket.issueKey.localeCompare(b.ticket.issueKey),
    )
    .map((e) => ({
      issueKey: e.ticket.issueKey,
      reopenCount: e.ticket.reopenCount,
      summary: e.ticket.summary,
      status: e.ticket.status,
      createdAt: e.ticket.createdAt,
      assignee: e.ticket.assignee,
      product: e.ticket.product,
      firstResponseExceededPct: e.firstResponseExceededPct,
      resolutionExceededPct: e.resolutionExceededPct,
      dataQuality: [...e.dataQuality],
    }));
}

// ───── Summary ──────────────────────────────────────────────────

interface Tally {
  compliant: number;
  nonCompliant: number;
  indeterminate: number;
}

function tally(items: readonly Compliance[]): Tally {
  const t: Tally = { compliant: 0, nonCompliant: 0, indeterminate: 0 };
  for (const c of items) {
    if (c.state === 'compliant') t.compliant++;
    else if (c.state === 'non_compliant') t.nonCompliant++;
    else t.indeterminate++;
  }
  return t;
}

export function summary(tickets: readonly EnrichedTicket[]): ComplianceSummary {
  const eligible = tickets.filter((e) => e.eligible);
  const resolution = tally(eligible.map((e) => e.resolution));
  const firstResponse = tally(eligible.map((e) => e.firstResponse));
  const elapsed = eligible.filter(isEvaluable).map((e) => e.resolutionElapsedMinutes);

  const bySeverityMap = new Map<Severity, Compliance[]>();
  for (const e of eligible) {
    const list = bySeverityMap.get(e.ticket.severity) ?? [];
    list.push(e.resolution);
    bySeverityMap.set(e.ticket.severity, list);
  }
  const bySeverity: SeverityBreakdown[] = Array.from(bySeverityMap.entries())
    .sort(([a], [b]) => a - b)
    .map(([severity, items]) => {
      const t = tally(items);
      return { severity, ...t, compliancePct: pct(t.compliant, t.compliant + t.nonCompliant) };
    });

  return {
    totalTickets: tickets.length,
    eligibleTickets: eligible.length,
    resolution: {
      ...resolution,
      compliancePct: pct(resolution.compliant, resolution.compliant + resolution.nonCompliant),
      coveragePct: pct(resolution.compliant + resolution.nonCompliant, eligible.length),
    },
    firstResponse: {
      ...firstResponse,
      compliancePct: pct(firstResponse.compliant, firstResponse.compliant + firstResponse.nonCompliant),
    },
    medianResolutionMinutes: median(elapsed),
    p90ResolutionMinutes: percentile(elapsed, 90),
    reopenHeavyTickets: tickets.filter((e) => e.reopenHeavy).length,
    dataQualityFlagged: tickets.filter((e) => e.dataQuality.length > 0).length,
    bySeverity,
  };
}
