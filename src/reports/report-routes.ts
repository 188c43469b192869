/**
 * Report Routes
 *
 * Every report answers 200 with an empty result until data has been uploaded.
 * `?snapshot=<id>` pins a report to an earlier upload.
 */

import { FastifyInstance } from 'fastify';
import { ReportService, ReportEnvelope } from './report-service';
import { SnapshotStore } from '../snapshot/types';
import { toJsonSafe, JsonSafe } from '../sla/serializer';
import { logger } from '../observability/logger';

interface ReportQuery {
  Querystring: { snapshot?: string };
}

interface SnapshotListQuery {
  Querystring: { limit: number };
}

const reportQuerySchema = {
  querystring: {
    type: 'object',
    properties: { snapshot: { type: 'string', minLength: 1 } },
  },
};

function envelope<T>(report: ReportEnvelope<T>): JsonSafe {
  return toJsonSafe({ status: 'ok', ...report });
}

export function registerReportRoutes(app: FastifyInstance, reports: ReportService, store: SnapshotStore): void {
  app.get<ReportQuery>('/reports/assignee_avg', { schema: reportQuerySchema }, async (req, reply) => {
    return reply.send(envelope(await reports.assigneeAverages(req.query.snapshot)));
  });

  app.get<ReportQuery>('/reports/product_avg', { schema: reportQuerySchema }, async (req, reply) => {
    return reply.send(envelope(await reports.productAverages(req.query.snapshot)));
  });

  app.get<ReportQuery>('/reports/violations', { schema: reportQuerySchema }, async (req, reply) => {
    return reply.send(envelope(await reports.violations(req.query.snapshot)));
  });

  app.get<ReportQuery>('/reports/reopens', { schema: reportQuerySchema }, async (req, reply) => {
    return reply.send(envelope(await reports.reopenHeavy(req.query.snapshot)));
  });

  app.get<ReportQuery>('/reports/summary', { schema: reportQuerySchema }, async (req, reply) => {
    return reply.send(envelope(await reports.summary(req.query.snapshot)));
  });

  app.get<SnapshotListQuery>('/snapshots', {
    schema: {
      querystring: {
        type: 'object',
        properties: { limit: { type: 'integer', minimum: 1, maximum: 100, default: 10 } },
      },
    },
  }, async (req, reply) => {
    const snapshots = await store.list(req.query.limit);
    return reply.send(toJsonSafe({ status: 'ok', snapshots }));
  });

  logger.info('Report routes registered');
}
