/**
 * Upload Routes
 *
 * POST /upload/tickets — replace the ticket table (multipart field "file")
 * POST /upload/sla     — replace the SLA threshold matrix
 *
 * A batch that fails validation is rejected whole and the current snapshot
 * stays in place.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { readCsv } from '../ingest/csv-reader';
import { ingestTickets } from '../ingest/ticket-ingest';
import { countCompanies, ingestThresholds } from '../ingest/threshold-ingest';
import { IngestResult, RawRow } from '../ingest/types';
import { SnapshotManager } from '../snapshot/snapshot-manager';
import { isEligible } from '../sla/compliance-calculator';
import { ComplianceOptions } from '../sla/types';
import { DataQualityWarning, ValidationError } from '../sla/errors';
import { requestLogger } from '../observability/logger';
import { dataQualityWarningsTotal, ingestedRowsTotal, uploadsTotal } from '../observability/metrics';
import { TraceContext, createTraceContext, spanTimings, withSpan } from '../observability/trace';

type UploadTable = 'tickets' | 'sla';

type CsvUpload = { ok: true; filename: string; buffer: Buffer } | { ok: false; reason: string };

async function receiveCsv(req: FastifyRequest): Promise<CsvUpload> {
  if (!req.isMultipart()) return { ok: false, reason: 'No file provided' };
  const data = await req.file();
  if (!data) return { ok: false, reason: 'No file provided' };
  if (!data.filename.toLowerCase().endsWith('.csv')) {
    // Drain the stream so the request completes
    data.file.resume();
    return { ok: false, reason: 'Only CSV supported' };
  }
  return { ok: true, filename: data.filename, buffer: await data.toBuffer() };
}

/** Receive, parse and ingest one CSV; a rejected batch has already been answered */
async function ingestUpload<T>(
  table: UploadTable,
  req: FastifyRequest,
  reply: FastifyReply,
  trace: TraceContext,
  ingest: (columns: string[], rows: RawRow[]) => IngestResult<T>,
): Promise<{ records: T[]; warnings: DataQualityWarning[] } | null> {
  const log = requestLogger(trace.requestId, { route: trace.route });

  const upload = await withSpan(trace, 'receive', () => receiveCsv(req));
  if (!upload.ok) {
    uploadsTotal.inc({ table, outcome: 'rejected' });
    reply.status(400).send({ error: upload.reason });
    return null;
  }

  let result: IngestResult<T>;
  try {
    const csv = await withSpan(trace, 'parse', () => readCsv(upload.buffer));
    result = await withSpan(trace, 'ingest', () => ingest(csv.columns, csv.rows));
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    result = { ok: false, error: err };
  }

  if (!result.ok) {
    uploadsTotal.inc({ table, outcome: 'rejected' });
    log.warn({ filename: upload.filename, err: result.error, timings: spanTimings(trace) }, 'Upload rejected');
    reply.status(400).send(result.error.toJSON());
    return null;
  }

  for (const w of result.warnings) {
    dataQualityWarningsTotal.inc({ code: w.code });
  }
  if (result.warnings.length > 0) {
    log.warn({ filename: upload.filename, warnings: result.warnings.length }, 'Upload admitted with data-quality warnings');
  }
  return { records: result.records, warnings: result.warnings };
}

export function registerUploadRoutes(
  app: FastifyInstance,
  snapshots: SnapshotManager,
  options: ComplianceOptions,
): void {
  app.post('/upload/tickets', async (req, reply) => {
    const trace = createTraceContext('/upload/tickets', req.id);
    const ingested = await ingestUpload('tickets', req, reply, trace, (columns, rows) => ingestTickets(rows, columns));
    if (!ingested) return reply;

    const snapshot = await withSpan(trace, 'commit', () => snapshots.replaceTickets(ingested.records));
    uploadsTotal.inc({ table: 'tickets', outcome: 'accepted' });
    ingestedRowsTotal.inc({ table: 'tickets' }, ingested.records.length);

    const eligible = ingested.records.filter((t) => isEligible(t, options)).length;
    requestLogger(trace.requestId).info(
      { snapshotId: snapshot.id, tickets: ingested.records.length, eligible, timings: spanTimings(trace) },
      'Ticket table replaced',
    );

    return reply.send({
      status: 'ok',
      snapshotId: snapshot.id,
      ticketsStored: ingested.records.length,
      eligibleTickets: eligible,
      warnings: ingested.warnings,
    });
  });

  app.post('/upload/sla', async (req, reply) => {
    const trace = createTraceContext('/upload/sla', req.id);
    const ingested = await ingestUpload('sla', req, reply, trace, (columns, rows) => ingestThresholds(rows, columns));
    if (!ingested) return reply;

    const snapshot = await withSpan(trace, 'commit', () => snapshots.replaceThresholds(ingested.records));
    uploadsTotal.inc({ table: 'sla', outcome: 'accepted' });
    ingestedRowsTotal.inc({ table: 'sla' }, ingested.records.length);

    const companies = countCompanies(ingested.records);
    requestLogger(trace.requestId).info(
      { snapshotId: snapshot.id, companies, rows: ingested.records.length, timings: spanTimings(trace) },
      'SLA matrix replaced',
    );

    return reply.send({
      status: 'ok',
      snapshotId: snapshot.id,
      companies,
      rows: ingested.records.length,
      warnings: ingested.warnings,
    });
  });
}
