import { stringify } from 'csv-stringify/sync';
import { AuditRun } from '../types';
import { expectedVersions, foundVersions, locations, STATUS_LABELS } from './fields';

export const TSV_COLUMNS = [
  'Package Name',
  'Status',
  'Expected Versions',
  'Found Versions',
  'Locations',
  'Original Status',
  'Detection Date',
] as const;

// one record per line, whatever the advisory text contained
export function sanitizeField(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

export function report(run: AuditRun): string {
  const rows = run.results.map((result) => [
    result.expectation.name,
    STATUS_LABELS[result.status],
    expectedVersions(result),
    foundVersions(result),
    locations(result),
    result.expectation.originalStatus ?? '',
    result.expectation.detectionDate ?? '',
  ]);

  return stringify([[...TSV_COLUMNS], ...rows].map((row) => row.map(sanitizeField)), {
    delimiter: '\t',
    quote: false,
    record_delimiter: 'unix',
  });
}
