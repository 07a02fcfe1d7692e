import * as yaml from 'js-yaml';
import { ParseError } from '../errors';
import { LockOccurrence } from '../types';

const DEPENDENCY_KINDS = ['dependencies', 'devDependencies', 'optionalDependencies'] as const;

export interface DependencyPath {
  name: string;
  version: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cleanupVersion(raw: string): string {
  const version = raw.split('(')[0].trim();
  // v5 appends peers as `_peer@x`; `link:` and `file:` references keep theirs
  return /^\d/.test(version) ? version.split('_')[0] : version;
}

/**
 * Decodes a `packages` or `snapshots` key into name and version.
 *
 * Handles every key shape pnpm has written:
 *   react@18.3.1                          (v9)
 *   /@ant-design/icons@4.8.3              (v6)
 *   react-dom@18.3.1(react@18.3.1)        (v9 snapshot with peers)
 *   /react-dom/18.2.0_react@18.2.0        (v5)
 */
export function parseDependencyPath(key: string): DependencyPath | null {
  let rest = key.trim();
  if (rest.startsWith('/')) rest = rest.slice(1);

  const paren = rest.indexOf('(');
  if (paren !== -1) rest = rest.slice(0, paren);

  // the version separator is the last '@' outside a leading '@scope/'
  const match = /^(@[^/@]+\/[^/@]+|[^/@]+)@(.+)$/.exec(rest);
  if (match) {
    const version = match[2].trim();
    return version ? { name: match[1], version } : null;
  }

  const segments = rest.split('/');
  // a non-default registry leads with its host: registry.example.com/foo/1.0.0
  if (segments.length > 2 && !segments[0].startsWith('@') && segments[0].includes('.')) {
    segments.shift();
  }
  const scoped = segments[0].startsWith('@');
  const nameLength = scoped ? 2 : 1;
  if (segments.length <= nameLength) return null;

  const name = segments.slice(0, nameLength).join('/');
  const version = cleanupVersion(segments[nameLength]);
  if (!name || name === '@' || !version) return null;
  return { name, version };
}

function sectionMapping(doc: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = doc[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ParseError(`Section "${key}" must be a mapping`);
  }
  return value;
}

// v6+ writes `{ specifier, version }`, v5 writes the bare version
function versionFromRef(ref: unknown): { version: string; specifier?: string } | null {
  if (typeof ref === 'string' || typeof ref === 'number') {
    const version = cleanupVersion(String(ref));
    return version ? { version } : null;
  }
  if (isRecord(ref)) {
    const { version, specifier } = ref;
    if (typeof version !== 'string' && typeof version !== 'number') return null;
    const cleaned = cleanupVersion(String(version));
    if (!cleaned) return null;
    return typeof specifier === 'string' ? { version: cleaned, specifier } : { version: cleaned };
  }
  return null;
}

/**
 * Read-only index of every place a package shows up in a pnpm lock file.
 */
export class LockModel {
  private readonly index = new Map<string, LockOccurrence[]>();

  constructor(
    occurrences: readonly LockOccurrence[],
    readonly lockfileVersion?: string,
    readonly warnings: readonly string[] = [],
  ) {
    for (const occurrence of occurrences) {
      const list = this.index.get(occurrence.name) ?? [];
      list.push(occurrence);
      this.index.set(occurrence.name, list);
    }
  }

  occurrencesFor(name: string): readonly LockOccurrence[] {
    return this.index.get(name) ?? [];
  }

  packageNames(): string[] {
    return Array.from(this.index.keys());
  }

  get size(): number {
    let total = 0;
    for (const list of this.index.values()) total += list.length;
    return total;
  }
}

function collectImporter(
  importerPath: string,
  importer: Record<string, unknown>,
  occurrences: LockOccurrence[],
  warnings: string[],
): void {
  for (const kind of DEPENDENCY_KINDS) {
    const deps = importer[kind];
    if (deps === undefined || deps === null) continue;
    if (!isRecord(deps)) {
      warnings.push(`Ignoring malformed ${kind} of importer "${importerPath}"`);
      continue;
    }
    for (const [name, ref] of Object.entries(deps)) {
      const resolved = versionFromRef(ref);
      if (!name || !resolved) {
        warnings.push(`Ignoring unreadable entry "${name}" in ${importerPath} (${kind})`);
        continue;
      }
      occurrences.push({
        name,
        version: resolved.version,
        section: 'direct-dependency',
        context: `${importerPath} (${kind})`,
        ...(resolved.specifier !== undefined ? { specifier: resolved.specifier } : {}),
      });
    }
  }
}

function collectKeys(
  mapping: Record<string, unknown>,
  section: 'package-definition' | 'snapshot',
  occurrences: LockOccurrence[],
  warnings: string[],
): void {
  for (const key of Object.keys(mapping)) {
    const parsed = parseDependencyPath(key);
    if (!parsed) {
      warnings.push(`Unable to read package key "${key}"`);
      continue;
    }
    occurrences.push({
      name: parsed.name,
      version: parsed.version,
      section,
      context: section === 'snapshot' ? `snapshots[${key}]` : 'packages',
    });
  }
}

export function loadLockModel(content: string): LockModel {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (e: unknown) {
    if (e instanceof yaml.YAMLException) {
      const { mark } = e;
      throw new ParseError(
        `YAML parse error: ${e.reason}`,
        mark ? { line: mark.line + 1, column: mark.column + 1 } : undefined,
      );
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new ParseError(`YAML parse error: ${msg}`);
  }

  if (!isRecord(parsed)) {
    throw new ParseError('Lock file is not a YAML mapping');
  }
  const doc = parsed;

  const legacyKinds = DEPENDENCY_KINDS.filter((kind) => kind in doc);
  const hasSection =
    'importers' in doc || 'packages' in doc || 'snapshots' in doc || legacyKinds.length > 0;
  if (!hasSection) {
    throw new ParseError('No importers, packages or snapshots section found in lock file');
  }

  const occurrences: LockOccurrence[] = [];
  const warnings: string[] = [];

  for (const [importerPath, importer] of Object.entries(sectionMapping(doc, 'importers'))) {
    if (!isRecord(importer)) {
      warnings.push(`Ignoring malformed importer "${importerPath}"`);
      continue;
    }
    collectImporter(importerPath, importer, occurrences, warnings);
  }

  // single-project v5 lock files keep the root's dependencies at the top level
  if (legacyKinds.length > 0) {
    collectImporter('.', doc, occurrences, warnings);
  }

  collectKeys(sectionMapping(doc, 'packages'), 'package-definition', occurrences, warnings);
  collectKeys(sectionMapping(doc, 'snapshots'), 'snapshot', occurrences, warnings);

  const rawVersion = doc.lockfileVersion;
  const lockfileVersion =
    typeof rawVersion === 'string' || typeof rawVersion === 'number' ? String(rawVersion) : undefined;

  return new LockModel(occurrences, lockfileVersion, warnings);
}
