/**
 * JSON encoding of snapshots for external stores. Instants are stored as
 * ISO-8601 strings and documents are schema-checked on the way back in.
 */

import Ajv from 'ajv';
import { SLAThreshold, Severity, Ticket } from '../sla/types';
import { DataSnapshot, SnapshotCorruptError } from './types';

type Iso = string | null;

interface PersistedTicket {
  issueKey: string;
  issueId: string | null;
  severity: Severity;
  status: string;
  createdAt: Iso;
  updatedAt: Iso;
  resolvedAt: Iso;
  firstResponseTarget: Iso;
  firstResponseActual: Iso;
  assignee: string | null;
  product: string | null;
  environment: string | null;
  summary: string | null;
  company: string;
  companyKey: string;
  reopenCount: number;
}

interface PersistedSnapshot {
  version: 1;
  id: string;
  createdAt: string;
  ticketsUploadedAt: Iso;
  thresholdsUploadedAt: Iso;
  tickets: PersistedTicket[];
  thresholds: SLAThreshold[];
}

const nullableString = { type: ['string', 'null'] };
const nullableInstant = { type: ['string', 'null'], format: 'date-time' };
const severity = { enum: [1, 2, 3, 4, 5] };
const nullableMinutes = { type: ['integer', 'null'], minimum: 1 };

const snapshotSchema = {
  type: 'object',
  required: ['version', 'id', 'createdAt', 'ticketsUploadedAt', 'thresholdsUploadedAt', 'tickets', 'thresholds'],
  properties: {
    version: { const: 1 },
    id: { type: 'string', minLength: 1 },
    createdAt: { type: 'string', format: 'date-time' },
    ticketsUploadedAt: nullableInstant,
    thresholdsUploadedAt: nullableInstant,
    tickets: {
      type: 'array',
      items: {
        type: 'object',
        required: [
          'issueKey', 'issueId', 'severity', 'status', 'createdAt', 'updatedAt', 'resolvedAt',
          'firstResponseTarget', 'firstResponseActual', 'assignee', 'product', 'environment',
          'summary', 'company', 'companyKey', 'reopenCount',
        ],
        properties: {
          issueKey: { type: 'string', minLength: 1 },
          issueId: nullableString,
          severity,
          status: { type: 'string' },
          createdAt: nullableInstant,
          updatedAt: nullableInstant,
          resolvedAt: nullableInstant,
          firstResponseTarget: nullableInstant,
          firstResponseActual: nullableInstant,
          assignee: nullableString,
          product: nullableString,
          environment: nullableString,
          summary: nullableString,
          company: { type: 'string' },
          companyKey: { type: 'string' },
          reopenCount: { type: 'integer', minimum: 0 },
        },
      },
    },
    thresholds: {
      type: 'array',
      items: {
        type: 'object',
        required: ['company', 'companyKey', 'severity', 'firstResponseMinutes', 'resolutionMinutes'],
        properties: {
          company: { type: 'string' },
          companyKey: { type: 'string' },
          severity,
          firstResponseMinutes: nullableMinutes,
          resolutionMinutes: nullableMinutes,
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
// ajv core ships no formats
ajv.addFormat('date-time', (value: string) => !Number.isNaN(Date.parse(value)));
const validateSnapshot = ajv.compile<PersistedSnapshot>(snapshotSchema);

function iso(d: Date | null): Iso {
  return d ? d.toISOString() : null;
}

function instant(s: Iso): Date | null {
  return s === null ? null : new Date(s);
}

export function encodeSnapshot(snapshot: DataSnapshot): string {
  const doc: PersistedSnapshot = {
    version: 1,
    id: snapshot.id,
    createdAt: snapshot.createdAt.toISOString(),
    ticketsUploadedAt: iso(snapshot.ticketsUploadedAt),
    thresholdsUploadedAt: iso(snapshot.thresholdsUploadedAt),
    tickets: snapshot.tickets.map((t) => ({
      ...t,
      createdAt: iso(t.createdAt),
      updatedAt: iso(t.updatedAt),
      resolvedAt: iso(t.resolvedAt),
      firstResponseTarget: iso(t.firstResponseTarget),
      firstResponseActual: iso(t.firstResponseActual),
    })),
    thresholds: [...snapshot.thresholds],
  };
  return JSON.stringify(doc);
}

export function decodeSnapshot(id: string, raw: string): DataSnapshot {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new SnapshotCorruptError(id, err instanceof Error ? err.message : 'not JSON');
  }

  if (!validateSnapshot(doc)) {
    throw new SnapshotCorruptError(id, ajv.errorsText(validateSnapshot.errors));
  }

  const tickets: Ticket[] = doc.tickets.map((t) => ({
    ...t,
    createdAt: instant(t.createdAt),
    updatedAt: instant(t.updatedAt),
    resolvedAt: instant(t.resolvedAt),
    firstResponseTarget: instant(t.firstResponseTarget),
    firstResponseActual: instant(t.firstResponseActual),
  }));

  return {
    id: doc.id,
    createdAt: new Date(doc.createdAt),
    tickets,
    thresholds: doc.thresholds,
    ticketsUploadedAt: instant(doc.ticketsUploadedAt),
    thresholdsUploadedAt: instant(doc.thresholdsUploadedAt),
  };
}
