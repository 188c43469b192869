import {
  assigneeAverages,
  productAverages,
  reopenHeavy,
  summary,
  violations,
} from '../../src/sla/aggregator';
import { enrichTickets } from '../../src/sla/compliance-calculator';
import { Ticket } from '../../src/sla/types';
import { at, makeThreshold, makeTicket } from '../helpers/tickets';

const options = { terminalStatus: 'Permanently Closed' };

const thresholds = [
  makeThreshold({ severity: 1, resolutionMinutes: 120 }),
  makeThreshold({ severity: 2, resolutionMinutes: 240 }),
];

// T1 compliant, T2 breached, T3 compliant, T4 unresolved, T5 no threshold, T6 not closed
const tickets: Ticket[] = [
  makeTicket({ issueKey: 'T1', severity: 1, assignee: 'Alice', product: 'Portal', createdAt: at(0), resolvedAt: at(60) }),
  makeTicket({ issueKey: 'T2', severity: 1, assignee: 'Alice', product: 'Portal', createdAt: at(10), resolvedAt: at(190) }),
  makeTicket({ issueKey: 'T3', severity: 2, assignee: 'Bob', product: 'Billing', createdAt: at(20), resolvedAt: at(120) }),
  makeTicket({ issueKey: 'T4', severity: 2, assignee: 'Bob', product: 'Billing', createdAt: at(30), resolvedAt: null }),
  makeTicket({ issueKey: 'T5', severity: 3, assignee: 'Carol', product: 'Portal', createdAt: at(40), resolvedAt: at(70) }),
  makeTicket({ issueKey: 'T6', severity: 1, assignee: 'Dave', product: 'Mobile', status: 'Open', resolvedAt: at(500) }),
];

const enriched = enrichTickets(tickets, thresholds, options);

describe('Aggregator', () => {
  describe('assigneeAverages', () => {
    it('should average evaluable eligible tickets, lowest first', () => {
      expect(assigneeAverages(enriched)).toEqual([
        { assignee: 'Bob', ticketCount: 1, avgResolutionMinutes: 100 },
        { assignee: 'Alice', ticketCount: 2, avgResolutionMinutes: 120 },
      ]);
    });

    it('should omit tickets without an assignee', () => {
      const rows = assigneeAverages(enrichTickets([makeTicket({ assignee: null })], thresholds, options));
      expect(rows).toEqual([]);
    });

    it('should break ties by name', () => {
      const rows = assigneeAverages(
        enrichTickets(
          [
            makeTicket({ issueKey: 'A', assignee: 'Zed', resolvedAt: at(60) }),
            makeTicket({ issueKey: 'B', assignee: 'Amy', resolvedAt: at(60) }),
          ],
          thresholds,
          options,
        ),
      );
      expect(rows.map((r) => r.assignee)).toEqual(['Amy', 'Zed']);
    });
  });

  describe('productAverages', () => {
    it('should group by product and omit groups with nothing evaluable', () => {
      expect(productAverages(enriched)).toEqual([
        { product: 'Billing', ticketCount: 1, avgResolutionMinutes: 100 },
        { product: 'Portal', ticketCount: 2, avgResolutionMinutes: 120 },
      ]);
    });
  });

  describe('violations', () => {
    const rows = violations(enriched);

    it('should list breaches before missing data', () => {
      expect(rows.map((r) => r.issueKey)).toEqual(['T2', 'T4']);
    });

    it('should say which dimension breached and by how much', () => {
      expect(rows[0]).toMatchObject({
        issueKey: 'T2',
        category: 'violated',
        violations: ['resolution'],
        missingData: [],
        resolutionExceededPct: 50,
        firstResponseExceededPct: null,
      });
    });

    it('should surface missing dates separately from breaches', () => {
      expect(rows[1]).toMatchObject({
        issueKey: 'T4',
        category: 'missing_data',
        violations: [],
        missingData: ['resolution'],
        resolution: { state: 'indeterminate', reason: 'missing_resolved' },
      });
    });

    it('should not list a ticket only because its company has no threshold', () => {
      expect(rows.find((r) => r.issueKey === 'T5')).toBeUndefined();
    });

    it('should order breaches by resolution overrun, largest first', () => {
      const ordered = violations(
        enrichTickets(
          [
            makeTicket({ issueKey: 'SMALL', resolvedAt: at(150) }),
            makeTicket({ issueKey: 'LARGE', resolvedAt: at(300) }),
          ],
          thresholds,
          options,
        ),
      );
      expect(ordered.map((r) => [r.issueKey, r.resolutionExceededPct])).toEqual([
        ['LARGE', 150],
        ['SMALL', 25],
      ]);
    });
  });

  describe('reopenHeavy', () => {
    it('should order by reopen count, then oldest first', () => {
      const rows = reopenHeavy(
        enrichTickets(
          [
            makeTicket({ issueKey: 'R1', reopenCount: 5, createdAt: at(10) }),
            makeTicket({ issueKey: 'R2', reopenCount: 5, createdAt: at(0) }),
            makeTicket({ issueKey: 'R3', reopenCount: 3, createdAt: at(-100) }),
            makeTicket({ issueKey: 'R4', reopenCount: 1 }),
          ],
          thresholds,
          options,
        ),
      );
      expect(rows.map((r) => [r.issueKey, r.reopenCount])).toEqual([
        ['R2', 5],
        ['R1', 5],
        ['R3', 3],
      ]);
    });

    it('should include tickets that are not closed', () => {
      const rows = reopenHeavy(
        enrichTickets([makeTicket({ issueKey: 'OPEN', status: 'In Progress', reopenCount: 2 })], thresholds, options),
      );
      expect(rows).toHaveLength(1);
      expect(rows[0].status).toBe('In Progress');
    });
  });

  describe('summary', () => {
    const s = summary(enriched);

    it('should count eligible tickets by resolution state', () => {
      expect(s.totalTickets).toBe(6);
      expect(s.eligibleTickets).toBe(5);
      expect(s.resolution).toEqual({
        compliant: 2,
        nonCompliant: 1,
        indeterminate: 2,
        compliancePct: 66.67,
        coveragePct: 60,
      });
    });

    it('should agree with the violation list', () => {
      const breached = violations(enriched).filter((r) => r.violations.includes('resolution')).length;
      const recomputed = (s.resolution.compliant / (s.resolution.compliant + breached)) * 100;
      expect(s.resolution.compliancePct).toBeCloseTo(recomputed, 2);
    });

    it('should compute median and P90 over evaluable elapsed minutes', () => {
      // evaluable: 60, 180, 100
      expect(s.medianResolutionMinutes).toBe(100);
      expect(s.p90ResolutionMinutes).toBeCloseTo(164, 10);
    });

    it('should break down by severity present in the data', () => {
      expect(s.bySeverity).toEqual([
        { severity: 1, compliant: 1, nonCompliant: 1, indeterminate: 0, compliancePct: 50 },
        { severity: 2, compliant: 1, nonCompliant: 0, indeterminate: 1, compliancePct: 100 },
        { severity: 3, compliant: 0, nonCompliant: 0, indeterminate: 1, compliancePct: null },
      ]);
    });

    it('should report first-response compliance', () => {
      expect(s.firstResponse).toEqual({ compliant: 5, nonCompliant: 0, indeterminate: 0, compliancePct: 100 });
    });
  });

  describe('clamped elapsed time', () => {
    const clamped = enrichTickets(
      [
        makeTicket({
          issueKey: 'BACKWARDS',
          createdAt: at(60),
          resolvedAt: at(0),
          firstResponseActual: null,
          reopenCount: 3,
        }),
        makeTicket({ issueKey: 'NORMAL', resolvedAt: at(0) }),
      ],
      thresholds,
      options,
    );

    it('should carry the flag into violation rows', () => {
      expect(violations(clamped)).toEqual([
        expect.objectContaining({
          issueKey: 'BACKWARDS',
          category: 'missing_data',
          resolution: { state: 'compliant' },
          dataQuality: ['resolved_before_created'],
        }),
      ]);
    });

    it('should carry the flag into reopen rows', () => {
      expect(reopenHeavy(clamped).map((r) => [r.issueKey, r.dataQuality])).toEqual([
        ['BACKWARDS', ['resolved_before_created']],
      ]);
    });

    it('should count flagged tickets in the summary while still scoring them', () => {
      const s = summary(clamped);
      expect(s.dataQualityFlagged).toBe(1);
      expect(s.resolution.compliant).toBe(2);
      expect(s.medianResolutionMinutes).toBe(0);
    });

    it('should leave unflagged rows with an empty list', () => {
      expect(summary(enriched).dataQualityFlagged).toBe(0);
      expect(violations(enriched).every((r) => r.dataQuality.length === 0)).toBe(true);
    });
  });

  describe('empty table', () => {
    it('should return empty views and null statistics', () => {
      expect(assigneeAverages([])).toEqual([]);
      expect(productAverages([])).toEqual([]);
      expect(violations([])).toEqual([]);
      expect(reopenHeavy([])).toEqual([]);

      const s = summary([]);
      expect(s.resolution.compliancePct).toBeNull();
      expect(s.resolution.coveragePct).toBeNull();
      expect(s.firstResponse.compliancePct).toBeNull();
      expect(s.medianResolutionMinutes).toBeNull();
      expect(s.p90ResolutionMinutes).toBeNull();
      expect(s.bySeverity).toEqual([]);
      expect(s.dataQualityFlagged).toBe(0);
    });
  });
});
