import { countCompanies, ingestThresholds } from '../../src/ingest/threshold-ingest';
import { readCsv } from '../../src/ingest/csv-reader';
import { ValidationError } from '../../src/sla/errors';

function ingest(csv: string): ReturnType<typeof ingestThresholds> {
  const table = readCsv(csv);
  return ingestThresholds(table.rows, table.columns);
}

function expectRejected(result: ReturnType<typeof ingestThresholds>): ValidationError {
  if (result.ok) throw new Error('expected the matrix to be rejected');
  return result.error;
}

const HEADER =
  'CRM Company,Severity 1 First Response,Severity 1 Resolution,Severity 2 First Response,Severity 2 Resolution';

describe('ingestThresholds', () => {
  it('should unpivot one row per company into thresholds per severity', () => {
    const result = ingest(`${HEADER}\nAcme,60,120,120,480\n`);
    if (!result.ok) throw result.error;
    expect(result.records).toEqual([
      { company: 'Acme', companyKey: 'acme', severity: 1, firstResponseMinutes: 60, resolutionMinutes: 120 },
      { company: 'Acme', companyKey: 'acme', severity: 2, firstResponseMinutes: 120, resolutionMinutes: 480 },
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('should skip severities with no budgets and keep partial pairs', () => {
    const result = ingest(`${HEADER}\nGlobex,,60,,\n`);
    if (!result.ok) throw result.error;
    expect(result.records).toEqual([
      { company: 'Globex', companyKey: 'globex', severity: 1, firstResponseMinutes: null, resolutionMinutes: 60 },
    ]);
  });

  it('should normalize company names for the join key', () => {
    const result = ingest(`${HEADER}\n  ACME   Corp ,60,120,,\n`);
    if (!result.ok) throw result.error;
    expect(result.records[0].company).toBe('ACME Corp');
    expect(result.records[0].companyKey).toBe('acme corp');
  });

  it('should accept suffixed headers such as "(mins)"', () => {
    const result = ingest('CRM Company,Severity 3 Resolution (mins)\nAcme,90\n');
    if (!result.ok) throw result.error;
    expect(result.records).toEqual([
      { company: 'Acme', companyKey: 'acme', severity: 3, firstResponseMinutes: null, resolutionMinutes: 90 },
    ]);
  });

  it('should keep the later row for a repeated company and warn', () => {
    const result = ingest(`${HEADER}\nAcme,60,120,,\nacme,30,90,,\n`);
    if (!result.ok) throw result.error;
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ severity: 1, firstResponseMinutes: 30, resolutionMinutes: 90 });
    expect(result.warnings.map((w) => [w.code, w.row])).toEqual([['duplicate_company', 2]]);
  });

  it('should reject a matrix without the company column', () => {
    const error = expectRejected(ingest('Customer,Severity 1 Resolution\nAcme,120\n'));
    expect(error.code).toBe('missing_column');
    expect(error.column).toBe('CRM Company');
  });

  it('should reject a matrix without severity columns', () => {
    expect(expectRejected(ingest('CRM Company,Notes\nAcme,hello\n')).code).toBe('no_severity_columns');
  });

  it('should reject a severity outside 1-5 in a header', () => {
    const error = expectRejected(ingest('CRM Company,Severity 7 Resolution\nAcme,120\n'));
    expect(error.code).toBe('invalid_severity');
    expect(error.column).toBe('Severity 7 Resolution');
  });

  it.each(['abc', '-5', '0', '1.5', '0x78', '1e2', '+60'])('should reject the budget %p', (value) => {
    const error = expectRejected(ingest(`CRM Company,Severity 1 Resolution\nAcme,120\nGlobex,${value}\n`));
    expect(error.code).toBe('invalid_threshold');
    expect(error.row).toBe(2);
    expect(error.column).toBe('Severity 1 Resolution');
  });

  it('should ignore blank spreadsheet rows', () => {
    const result = ingest(`${HEADER}\nAcme,60,120,,\n,,,,\n`);
    if (!result.ok) throw result.error;
    expect(result.records).toHaveLength(1);
    expect(result.warnings).toEqual([]);
  });

  it('should reject a row with an empty company', () => {
    expect(expectRejected(ingest('CRM Company,Severity 1 Resolution\n,120\n')).code).toBe('missing_value');
  });
});

describe('countCompanies', () => {
  it('should count distinct join keys', () => {
    const result = ingest(`${HEADER}\nAcme,60,120,120,480\nGlobex,30,60,,\n`);
    if (!result.ok) throw result.error;
    expect(result.records).toHaveLength(3);
    expect(countCompanies(result.records)).toBe(2);
  });
});
