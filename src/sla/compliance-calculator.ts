/**
 * Compliance Calculator
 *
 * Derives per-ticket first-response and resolution compliance. Missing inputs
 * never throw: they produce an indeterminate state with the reason attached.
 */

import {
  Compliance,
  ComplianceOptions,
  DataQualityFlag,
  EnrichedTicket,
  SLAThreshold,
  Ticket,
} from './types';
import { ThresholdIndex } from './sla-resolver';
import { round } from './percentile';

const MS_PER_MINUTE = 60_000;

const COMPLIANT: Compliance = { state: 'compliant' };
const NON_COMPLIANT: Compliance = { state: 'non_compliant' };

export function isEligible(ticket: Ticket, options: ComplianceOptions): boolean {
  return ticket.status === options.terminalStatus;
}

/** Whole minutes between created and resolved, clamped at zero */
export function resolutionElapsedMinutes(ticket: Ticket): number | null {
  if (!ticket.createdAt || !ticket.resolvedAt) return null;
  const diff = ticket.resolvedAt.getTime() - ticket.createdAt.getTime();
  return Math.max(0, Math.floor(diff / MS_PER_MINUTE));
}

export function firstResponseCompliance(ticket: Ticket): Compliance {
  if (!ticket.firstResponseTarget) return { state: 'indeterminate', reason: 'missing_first_response_target' };
  if (!ticket.firstResponseActual) return { state: 'indeterminate', reason: 'missing_first_response_actual' };
  return ticket.firstResponseActual.getTime() <= ticket.firstResponseTarget.getTime() ? COMPLIANT : NON_COMPLIANT;
}

export function resolutionCompliance(ticket: Ticket, threshold: SLAThreshold | null): Compliance {
  if (!ticket.createdAt) return { state: 'indeterminate', reason: 'missing_created' };
  if (!ticket.resolvedAt) return { state: 'indeterminate', reason: 'missing_resolved' };

  const budget = threshold?.resolutionMinutes ?? null;
  if (budget === null || budget <= 0) return { state: 'indeterminate', reason: 'no_threshold' };

  const elapsed = resolutionElapsedMinutes(ticket) ?? 0;
  return elapsed <= budget ? COMPLIANT : NON_COMPLIANT;
}

/**
 * Overrun of the resolution budget as a percentage of that budget.
 * Only defined for a non-compliant ticket.
 */
export function resolutionExceededPct(
  elapsedMinutes: number | null,
  threshold: SLAThreshold | null,
  compliance: Compliance,
): number | null {
  if (compliance.state !== 'non_compliant' || elapsedMinutes === null) return null;
  const budget = threshold?.resolutionMinutes ?? null;
  if (budget === null || budget <= 0) return null;
  return round(((elapsedMinutes - budget) / budget) * 100);
}

/**
 * Overrun of the first-response target as a percentage of the window between
 * creation and target. This is a different time base from the resolution budget.
 * Null for a ticket whose company and severity resolve to no threshold.
 */
export function firstResponseExceededPct(
  ticket: Ticket,
  threshold: SLAThreshold | null,
  compliance: Compliance,
): number | null {
  if (compliance.state !== 'non_compliant' || threshold === null) return null;
  const { createdAt, firstResponseTarget, firstResponseActual } = ticket;
  if (!createdAt || !firstResponseTarget || !firstResponseActual) return null;

  const window = (firstResponseTarget.getTime() - createdAt.getTime()) / MS_PER_MINUTE;
  if (window <= 0) return null;
  const delta = (firstResponseActual.getTime() - firstResponseTarget.getTime()) / MS_PER_MINUTE;
  return round((delta / window) * 100);
}

export function enrichTicket(
  ticket: Ticket,
  threshold: SLAThreshold | null,
  options: ComplianceOptions,
): EnrichedTicket {
  const dataQuality: DataQualityFlag[] = [];
  if (ticket.createdAt && ticket.resolvedAt && ticket.resolvedAt.getTime() < ticket.createdAt.getTime()) {
    dataQuality.push('resolved_before_created');
  }

  const elapsed = resolutionElapsedMinutes(ticket);
  const firstResponse = firstResponseCompliance(ticket);
  const resolution = resolutionCompliance(ticket, threshold);

  return {
    ticket,
    eligible: isEligible(ticket, options),
    threshold,
    resolutionElapsedMinutes: elapsed,
    firstResponse,
    resolution,
    firstResponseExceededPct: firstResponseExceededPct(ticket, threshold, firstResponse),
    resolutionExceededPct: resolutionExceededPct(elapsed, threshold, resolution),
    reopenHeavy: ticket.reopenCount > 1,
    dataQuality,
  };
}

/** Join every ticket against the matrix and derive its compliance */
export function enrichTickets(
  tickets: readonly Ticket[],
  thresholds: readonly SLAThreshold[],
  options: ComplianceOptions,
): EnrichedTicket[] {
  const index = new ThresholdIndex(thresholds);
  return tickets.map((t) => enrichTicket(t, index.resolve(t.companyKey, t.severity), options));
}
