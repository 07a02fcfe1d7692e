import * as fs from 'fs';
import * as path from 'path';
import { audit, isCompromised, query, runAudit, tally } from '../src/audit';
import { loadLockModel } from '../src/package-managers/pnpm';
import { parseExpectations } from '../src/utils/batch';

const REACT_LOCK = [
  "lockfileVersion: '9.0'",
  'importers:',
  '  .:',
  '    dependencies:',
  '      react:',
  '        specifier: ^18.3.1',
  '        version: 18.3.1',
  'packages:',
  '  react@18.3.1:',
  '    resolution: {integrity: sha512-placeholder}',
  '',
].join('\n');

const fixtureModel = () =>
  loadLockModel(
    fs.readFileSync(path.join(__dirname, 'fixtures', 'pnpm-v9', 'pnpm-lock.yaml'), 'utf8'),
  );

describe('Audit engine', () => {
  describe('query', () => {
    const model = loadLockModel(REACT_LOCK);

    test('should find a package by name with every occurrence as evidence', () => {
      const result = query(model, 'react');
      expect(result.status).toBe('Found');
      if (result.status !== 'Found') return;
      expect(result.matches).toHaveLength(2);
      expect(result.matches.map((o) => o.context)).toEqual(['. (dependencies)', 'packages']);
    });

    test('should report a version mismatch with the versions that were found', () => {
      const result = query(model, 'react', '17.0.0');
      expect(result.status).toBe('VersionMismatch');
      if (result.status !== 'VersionMismatch') return;
      expect(result.occurrences.map((o) => o.version)).toEqual(['18.3.1', '18.3.1']);
    });

    test('should report NotFound regardless of the requested version', () => {
      expect(query(model, 'lodash').status).toBe('NotFound');
      expect(query(model, 'lodash', '4.17.21').status).toBe('NotFound');
    });

    test('should match the ad-hoc version exactly unless prefix matching is asked for', () => {
      expect(query(model, 'react', '18').status).toBe('VersionMismatch');
      expect(query(model, 'react', '18', { prefix: true }).status).toBe('Found');
      expect(query(model, 'react', '18.3.1').status).toBe('Found');
    });

    test('should not confuse a bare name with a scoped one', () => {
      const scoped = loadLockModel('packages:\n  \'@types/react@18.3.3\': {}\n');
      expect(query(scoped, 'react').status).toBe('NotFound');
      expect(query(scoped, '@types/react').status).toBe('Found');
    });
  });

  describe('audit', () => {
    const model = fixtureModel();

    test('should return PartialMatch when only some specs are installed', () => {
      const result = audit(model, { name: 'lodash', versions: ['4.17.21', '4.17.19'] });
      expect(result).toEqual(
        expect.objectContaining({ status: 'PartialMatch', unsatisfied: ['4.17.19'] }),
      );
      if (result.status !== 'PartialMatch') return;
      expect(result.matches.map((o) => o.context)).toEqual([
        'packages',
        'snapshots[lodash@4.17.21]',
      ]);
      expect(result.occurrences).toHaveLength(5);
    });

    test('should return VersionMismatch when no spec is installed', () => {
      const result = audit(model, { name: 'typescript', versions: ['4.9.5'] });
      expect(result.status).toBe('VersionMismatch');
    });

    test('should apply prefix matching to batch specs', () => {
      const result = audit(model, { name: 'react-dom', versions: ['18'] });
      expect(result.status).toBe('Found');
    });

    test('should treat an empty spec list as any version', () => {
      expect(audit(model, { name: 'typescript', versions: [] }).status).toBe('Found');
    });
  });

  describe('runAudit', () => {
    test('should keep expectation order', () => {
      const model = fixtureModel();
      const run = runAudit(model, [
        { name: 'react', versions: [] },
        { name: 'lodash', versions: ['4.17.20'] },
        { name: 'axios', versions: [] },
      ]);
      expect(run.results.map((r) => r.expectation.name)).toEqual(['react', 'lodash', 'axios']);
    });

    test('should never alphabetize results', () => {
      const run = runAudit(loadLockModel(REACT_LOCK), [
        { name: 'pkgB', versions: [] },
        { name: 'pkgA', versions: [] },
      ]);
      expect(run.results.map((r) => r.expectation.name)).toEqual(['pkgB', 'pkgA']);
    });

    test('should count a missing package from a standard list row', () => {
      const batch = parseExpectations('Row\tPackage Name\tVersion(s)\n1\tlodash\t4.17.21, 4.17.20\n');
      const run = runAudit(loadLockModel(REACT_LOCK), batch.expectations, batch.skipped.length);

      expect(run.results[0].status).toBe('NotFound');
      expect(run.counters).toEqual({ total: 1, found: 0, partial: 0, mismatch: 0, notFound: 1 });
      expect(run.skippedRows).toBe(0);
    });

    test('should tally counters that sum to the total', () => {
      const batch = parseExpectations(
        fs.readFileSync(path.join(__dirname, 'fixtures', 'batches', 'standard-list.txt'), 'utf8'),
      );
      const run = runAudit(fixtureModel(), batch.expectations);

      expect(run.results.map((r) => r.status)).toEqual([
        'Found',
        'PartialMatch',
        'NotFound',
        'VersionMismatch',
      ]);
      expect(run.counters).toEqual({ total: 4, found: 1, partial: 1, mismatch: 1, notFound: 1 });
      const { found, partial, mismatch, notFound, total } = run.counters;
      expect(found + partial + mismatch + notFound).toBe(total);
    });
  });

  test('tally should start from zero', () => {
    expect(tally([])).toEqual({ total: 0, found: 0, partial: 0, mismatch: 0, notFound: 0 });
  });

  test('isCompromised should flag found and partially matched packages', () => {
    const model = fixtureModel();
    expect(isCompromised(audit(model, { name: 'lodash', versions: ['4.17.20'] }))).toBe(true);
    expect(isCompromised(audit(model, { name: 'lodash', versions: ['4.17.20', '1.0.0'] }))).toBe(true);
    expect(isCompromised(audit(model, { name: 'lodash', versions: ['1.0.0'] }))).toBe(false);
    expect(isCompromised(audit(model, { name: 'left-pad', versions: [] }))).toBe(false);
  });
});
