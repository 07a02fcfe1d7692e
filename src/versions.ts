export type MatchMode = 'exact' | 'prefix';

export type Satisfaction = 'all' | 'some' | 'none';

/**
 * Dotted-segment comparison. A spec with fewer segments than the found
 * version acts as a prefix: "1.0" accepts "1.0.5" but not "1.10.0".
 * In exact mode the segment counts must agree as well.
 */
export function matches(found: string, spec: string, mode: MatchMode = 'prefix'): boolean {
  const foundParts = found.split('.');
  const specParts = spec.split('.');

  if (specParts.length > foundParts.length) return false;
  if (mode === 'exact' && specParts.length !== foundParts.length) return false;

  return specParts.every((part, i) => part === foundParts[i]);
}

export function isSatisfied(
  spec: string,
  foundVersions: Iterable<string>,
  mode: MatchMode = 'prefix',
): boolean {
  for (const version of foundVersions) {
    if (matches(version, spec, mode)) return true;
  }
  return false;
}

export function classify(
  expected: readonly string[],
  foundVersions: Iterable<string>,
  mode: MatchMode = 'prefix',
): Satisfaction {
  const versions = Array.from(new Set(foundVersions));
  const satisfied = expected.filter((spec) => isSatisfied(spec, versions, mode)).length;

  if (satisfied === 0) return 'none';
  if (satisfied === expected.length) return 'all';
  return 'some';
}
