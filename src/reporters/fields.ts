import { AuditResult, AuditStatus, LockOccurrence } from '../types';

export const STATUS_LABELS: Record<AuditStatus, string> = {
  Found: 'Found',
  PartialMatch: 'Partial Match',
  VersionMismatch: 'Version Mismatch',
  NotFound: 'Not Found',
};

export function occurrencesOf(result: AuditResult): readonly LockOccurrence[] {
  return result.status === 'NotFound' ? [] : result.occurrences;
}

export function evidenceOf(result: AuditResult): readonly LockOccurrence[] {
  switch (result.status) {
    case 'Found':
    case 'PartialMatch':
      return result.matches;
    case 'VersionMismatch':
      return result.occurrences;
    case 'NotFound':
      return [];
  }
}

export function expectedVersions(result: AuditResult): string {
  const { versions } = result.expectation;
  return versions.length === 0 ? 'Any' : versions.join(', ');
}

export function foundVersions(result: AuditResult): string {
  const versions = Array.from(new Set(occurrencesOf(result).map((o) => o.version)));
  return versions.length === 0 ? 'None' : versions.join(', ');
}

export function locations(result: AuditResult): string {
  const contexts = occurrencesOf(result).map((o) => o.context);
  return contexts.length === 0 ? 'None' : contexts.join('; ');
}
