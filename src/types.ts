export type LockSection = 'direct-dependency' | 'package-definition' | 'snapshot';

export interface LockOccurrence {
  readonly name: string;
  readonly version: string;
  readonly section: LockSection;
  readonly context: string; // e.g. ". (dependencies)" or "snapshots[react-dom@18.3.1(react@18.3.1)]"
  readonly specifier?: string;
}

export interface ExpectedPackage {
  readonly name: string;
  readonly versions: readonly string[];
  readonly originalStatus?: string;
  readonly detectionDate?: string;
}

export type BatchFormat = 'standard-list' | 'security-report';

export interface SkippedRow {
  line: number;
  reason: string;
  text: string;
}

export interface ParsedBatch {
  format: BatchFormat;
  expectations: ExpectedPackage[];
  skipped: SkippedRow[];
}

export type AuditStatus = 'Found' | 'PartialMatch' | 'VersionMismatch' | 'NotFound';

export type AuditResult =
  | {
      status: 'Found';
      expectation: ExpectedPackage;
      matches: LockOccurrence[];
      occurrences: LockOccurrence[];
    }
  | {
      status: 'PartialMatch';
      expectation: ExpectedPackage;
      matches: LockOccurrence[];
      occurrences: LockOccurrence[];
      unsatisfied: string[];
    }
  | {
      status: 'VersionMismatch';
      expectation: ExpectedPackage;
      occurrences: LockOccurrence[];
    }
  | {
      status: 'NotFound';
      expectation: ExpectedPackage;
    };

export interface AuditCounters {
  total: number;
  found: number;
  partial: number;
  mismatch: number;
  notFound: number;
}

export interface AuditRun {
  results: AuditResult[];
  counters: AuditCounters;
  skippedRows: number;
}
