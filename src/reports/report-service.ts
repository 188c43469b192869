/**
 * Report Service
 *
 * Loads one snapshot per request, enriches it, and runs a single aggregate.
 * Nothing derived is cached: the enriched table lives only for the call.
 */

import { SnapshotNotFoundError, SnapshotStore, DataSnapshot } from '../snapshot/types';
import { enrichTickets } from '../sla/compliance-calculator';
import {
  assigneeAverages,
  productAverages,
  reopenHeavy,
  summary,
  violations,
} from '../sla/aggregator';
import {
  AssigneeAverage,
  ComplianceOptions,
  ComplianceSummary,
  EnrichedTicket,
  ProductAverage,
  ReopenRow,
  ViolationRow,
} from '../sla/types';
import { reportDuration } from '../observability/metrics';
import { logger } from '../observability/logger';

export type ReportName = 'assignee_avg' | 'product_avg' | 'violations' | 'reopens' | 'summary';

export interface ReportEnvelope<T> {
  /** Null when nothing has been uploaded yet */
  snapshotId: string | null;
  generatedAt: Date;
  data: T;
}

export class ReportService {
  private readonly log = logger.child({ component: 'report-service' });

  constructor(
    private readonly store: SnapshotStore,
    private readonly options: ComplianceOptions,
  ) {}

  assigneeAverages(snapshotId?: string): Promise<ReportEnvelope<AssigneeAverage[]>> {
    return this.run('assignee_avg', snapshotId, assigneeAverages);
  }

  productAverages(snapshotId?: string): Promise<ReportEnvelope<ProductAverage[]>> {
    return this.run('product_avg', snapshotId, productAverages);
  }

  violations(snapshotId?: string): Promise<ReportEnvelope<ViolationRow[]>> {
    return this.run('violations', snapshotId, violations);
  }

  reopenHeavy(snapshotId?: string): Promise<ReportEnvelope<ReopenRow[]>> {
    return this.run('reopens', snapshotId, reopenHeavy);
  }

  summary(snapshotId?: string): Promise<ReportEnvelope<ComplianceSummary>> {
    return this.run('summary', snapshotId, summary);
  }

  private async load(snapshotId?: string): Promise<DataSnapshot | null> {
    if (!snapshotId) return this.store.getLatest();
    const snapshot = await this.store.get(snapshotId);
    if (!snapshot) throw new SnapshotNotFoundError(snapshotId);
    return snapshot;
  }

  private async run<T>(
    report: ReportName,
    snapshotId: string | undefined,
    aggregate: (tickets: readonly EnrichedTicket[]) => T,
  ): Promise<ReportEnvelope<T>> {
    const snapshot = await this.load(snapshotId);
    const timer = reportDuration.startTimer({ report });
    const enriched = snapshot ? enrichTickets(snapshot.tickets, snapshot.thresholds, this.options) : [];
    const data = aggregate(enriched);
    const seconds = timer();

    this.log.debug(
      { report, snapshotId: snapshot?.id ?? null, tickets: enriched.length, durationMs: Math.round(seconds * 1000) },
      'Report computed',
    );
    return { snapshotId: snapshot?.id ?? null, generatedAt: new Date(), data };
  }
}
