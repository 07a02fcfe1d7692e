import { LockModel } from './package-managers/pnpm';
import { AuditCounters, AuditResult, AuditRun, ExpectedPackage, LockOccurrence } from './types';
import { classify, isSatisfied, matches, MatchMode } from './versions';

export interface QueryOptions {
  /** Let a shorter version act as a prefix ("18" accepts "18.3.1"). */
  prefix?: boolean;
}

function matchingOccurrences(
  occurrences: readonly LockOccurrence[],
  specs: readonly string[],
  mode: MatchMode,
): LockOccurrence[] {
  return occurrences.filter((occurrence) =>
    specs.some((spec) => matches(occurrence.version, spec, mode)),
  );
}

/**
 * Classifies one expectation against the lock model.
 */
export function audit(
  model: LockModel,
  expectation: ExpectedPackage,
  mode: MatchMode = 'prefix',
): AuditResult {
  const occurrences = [...model.occurrencesFor(expectation.name)];
  if (occurrences.length === 0) {
    return { status: 'NotFound', expectation };
  }

  const specs = expectation.versions;
  if (specs.length === 0) {
    return { status: 'Found', expectation, matches: occurrences, occurrences };
  }

  const versions = occurrences.map((occurrence) => occurrence.version);
  switch (classify(specs, versions, mode)) {
    case 'all':
      return {
        status: 'Found',
        expectation,
        matches: matchingOccurrences(occurrences, specs, mode),
        occurrences,
      };
    case 'some':
      return {
        status: 'PartialMatch',
        expectation,
        matches: matchingOccurrences(occurrences, specs, mode),
        occurrences,
        unsatisfied: specs.filter((spec) => !isSatisfied(spec, versions, mode)),
      };
    case 'none':
      return { status: 'VersionMismatch', expectation, occurrences };
  }
}

/**
 * Ad-hoc lookup of a single package. The version, when given, is matched
 * exactly unless `prefix` is set.
 */
export function query(
  model: LockModel,
  name: string,
  version?: string,
  options: QueryOptions = {},
): AuditResult {
  const expectation: ExpectedPackage = { name, versions: version ? [version] : [] };
  return audit(model, expectation, options.prefix ? 'prefix' : 'exact');
}

export function emptyCounters(): AuditCounters {
  return { total: 0, found: 0, partial: 0, mismatch: 0, notFound: 0 };
}

export function tally(results: readonly AuditResult[]): AuditCounters {
  const counters = emptyCounters();
  for (const result of results) {
    counters.total++;
    switch (result.status) {
      case 'Found':
        counters.found++;
        break;
      case 'PartialMatch':
        counters.partial++;
        break;
      case 'VersionMismatch':
        counters.mismatch++;
        break;
      case 'NotFound':
        counters.notFound++;
        break;
    }
  }
  return counters;
}

/**
 * Audits every expectation in the order given. Results are never re-sorted.
 */
export function runAudit(
  model: LockModel,
  expectations: readonly ExpectedPackage[],
  skippedRows = 0,
): AuditRun {
  const results = expectations.map((expectation) => audit(model, expectation));
  return { results, counters: tally(results), skippedRows };
}

/** Found or PartialMatch: at least one listed version is installed. */
export function isCompromised(result: AuditResult): boolean {
  return result.status === 'Found' || result.status === 'PartialMatch';
}
