import Table = require('cli-table3');
import { AuditResult, AuditRun, AuditStatus } from '../types';
import { evidenceOf, expectedVersions, foundVersions, locations, STATUS_LABELS } from './fields';

type Paint = (text: string) => string;

export interface Palette {
  red: Paint;
  green: Paint;
  yellow: Paint;
  bold: Paint;
  dim: Paint;
  cyan: Paint;
}

export interface TextReportOptions {
  verbose?: boolean;
  palette?: Palette;
  warnings?: readonly string[];
}

const plain: Paint = (s) => s;

export const plainPalette: Palette = {
  red: plain,
  green: plain,
  yellow: plain,
  bold: plain,
  dim: plain,
  cyan: plain,
};

// batch lists are lists of known-bad releases, so "Found" is the alarming case
function paintStatus(status: AuditStatus, c: Palette): string {
  const label = STATUS_LABELS[status];
  switch (status) {
    case 'Found':
      return c.red(`✗ ${label}`);
    case 'PartialMatch':
      return c.red(`◐ ${label}`);
    case 'VersionMismatch':
      return c.yellow(`⚠ ${label}`);
    case 'NotFound':
      return c.green(`✓ ${label}`);
  }
}

function renderResult(result: AuditResult, verbose: boolean, c: Palette): string {
  const { name, versions } = result.expectation;
  const lines: string[] = [];
  const target = versions.length > 0 ? `${name} @ ${versions.join(', ')}` : name;

  switch (result.status) {
    case 'NotFound':
      lines.push(c.red(`✗ Package not found: ${name}`));
      break;
    case 'VersionMismatch':
      lines.push(c.red(`✗ Found package ${name} but no version matches`));
      lines.push(`  Expected: ${expectedVersions(result)}`);
      lines.push('  Found:');
      break;
    case 'PartialMatch':
      lines.push(c.yellow(`◐ Partially matched: ${target}`));
      lines.push(`  Missing: ${result.unsatisfied.join(', ')}`);
      break;
    case 'Found':
      lines.push(c.green(`✓ Found package: ${target}`));
      break;
  }

  const indent = result.status === 'VersionMismatch' ? '    ' : '  ';
  for (const occurrence of evidenceOf(result)) {
    let line = `${indent}${occurrence.context} @ ${occurrence.version}`;
    if (verbose && occurrence.specifier) {
      line += c.dim(` (specifier: ${occurrence.specifier})`);
    }
    lines.push(line);
  }

  return lines.join('\n') + '\n';
}

function renderRun(run: AuditRun, verbose: boolean, c: Palette): string {
  let output = '';

  // security reports carry their own status and detection date
  const advisory =
    verbose ||
    run.results.some(
      (r) => r.expectation.originalStatus !== undefined || r.expectation.detectionDate !== undefined,
    );

  const head = ['Package', 'Status', 'Expected', 'Found'];
  if (advisory) head.push('Advisory Status', 'Detected');
  if (verbose) head.push('Locations');
  const table = new Table({
    head: head.map((h) => c.bold(h)),
    style: {
      head: [], // colored by the palette
      border: [],
    },
  });

  run.results.forEach((result) => {
    const row = [
      c.bold(result.expectation.name),
      paintStatus(result.status, c),
      expectedVersions(result),
      foundVersions(result),
    ];
    if (advisory) {
      row.push(result.expectation.originalStatus ?? '', result.expectation.detectionDate ?? '');
    }
    if (verbose) row.push(c.dim(locations(result)));
    table.push(row);
  });

  if (run.results.length > 0) {
    output += table.toString() + '\n\n';
  }

  const { counters } = run;
  output += c.bold('Summary:') + '\n';
  output += `  Total: ${counters.total}\n`;
  output += `  Found: ${counters.found}\n`;
  output += `  Partial match: ${counters.partial}\n`;
  output += `  Version mismatch: ${counters.mismatch}\n`;
  output += `  Not found: ${counters.notFound}\n`;
  if (run.skippedRows > 0) {
    output += c.yellow(`  Skipped rows: ${run.skippedRows}`) + '\n';
  }

  return output;
}

export function report(subject: AuditResult | AuditRun, options: TextReportOptions = {}): string {
  const c = options.palette ?? plainPalette;
  const verbose = options.verbose ?? false;
  const warnings = options.warnings ?? [];

  let output = '';

  if (warnings.length > 0) {
    output += c.yellow(c.bold('⚠ Warnings:')) + '\n';
    warnings.forEach((msg) => {
      output += c.yellow(`  - ${msg}`) + '\n';
    });
    output += '\n';
  }

  output += 'results' in subject ? renderRun(subject, verbose, c) : renderResult(subject, verbose, c);
  return output;
}
