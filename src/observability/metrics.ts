import client from 'prom-client';
import { env } from '../config/env';

export const registry = new client.Registry();

if (!env.isTest) {
  client.collectDefaultMetrics({ register: registry, prefix: 'sla_' });
}

export const httpRequestDuration = new client.Histogram({
  name: 'sla_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const uploadsTotal = new client.Counter({
  name: 'sla_uploads_total',
  help: 'CSV uploads by table and outcome',
  labelNames: ['table', 'outcome'] as const,
  registers: [registry],
});

export const ingestedRowsTotal = new client.Counter({
  name: 'sla_ingested_rows_total',
  help: 'Rows admitted by successful uploads',
  labelNames: ['table'] as const,
  registers: [registry],
});

export const dataQualityWarningsTotal = new client.Counter({
  name: 'sla_data_quality_warnings_total',
  help: 'Data-quality warnings recorded during ingestion',
  labelNames: ['code'] as const,
  registers: [registry],
});

export const reportDuration = new client.Histogram({
  name: 'sla_report_duration_seconds',
  help: 'Time to enrich a snapshot and build one report',
  labelNames: ['report'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
