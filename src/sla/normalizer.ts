/**
 * Join-key and timestamp normalization.
 *
 * Ticket exports and the SLA matrix spell company names inconsistently, so both
 * sides go through normalizeCompany() before any lookup.
 */

import { ValidationError } from './errors';

const MONTHS: Readonly<Record<string, number | undefined>> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

// "18/Aug/25 6:00 PM"
const TIMESTAMP_RE = /^(\d{1,2})\/([A-Za-z]{3})\/(\d{2})\s+(\d{1,2}):(\d{2})\s+([AaPp][Mm])$/;

/** Two-digit years below this map to 20xx, the rest to 19xx */
const YEAR_PIVOT = 69;

/** Trim and collapse internal whitespace; keeps the original casing */
export function displayCompany(raw: string): string {
  return raw.trim().replace(/\s+/g, ' ');
}

/** Join key: display form, case-folded */
export function normalizeCompany(raw: string): string {
  return displayCompany(raw).toLowerCase();
}

export interface CellLocation {
  row: number;
  column: string;
}

/**
 * Parse an export timestamp such as "18/Aug/25 6:00 PM" as a UTC instant.
 * An empty cell is an absent value; anything else that does not match fails.
 */
export function parseTimestamp(raw: string, at: CellLocation): Date | null {
  const value = raw.trim();
  if (value === '') return null;

  const m = TIMESTAMP_RE.exec(value);
  if (!m) throw malformed(value, at);

  const day = parseInt(m[1], 10);
  const month = MONTHS[m[2].toLowerCase()];
  const yy = parseInt(m[3], 10);
  const hour12 = parseInt(m[4], 10);
  const minute = parseInt(m[5], 10);
  const pm = m[6].toLowerCase() === 'pm';

  if (month === undefined || hour12 < 1 || hour12 > 12 || minute > 59) {
    throw malformed(value, at);
  }

  const year = yy < YEAR_PIVOT ? 2000 + yy : 1900 + yy;
  const hour = (hour12 % 12) + (pm ? 12 : 0);
  const date = new Date(Date.UTC(year, month, day, hour, minute));

  // Date.UTC rolls 31/Feb over into March
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month) {
    throw malformed(value, at);
  }
  return date;
}

function malformed(value: string, at: CellLocation): ValidationError {
  return new ValidationError(
    'malformed_timestamp',
    `Row ${at.row}, column "${at.column}": cannot parse "${value}" (expected e.g. "18/Aug/25 6:00 PM")`,
    at,
  );
}
