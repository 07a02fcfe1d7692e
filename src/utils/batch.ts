import { parse } from 'csv-parse/sync';
import { FormatError } from '../errors';
import { BatchFormat, ExpectedPackage, ParsedBatch, SkippedRow } from '../types';

interface RowCells {
  name?: string;
  versions?: string;
  detectionDate?: string;
  status?: string;
}

const QUOTES = /^["'`“”‘’]+|["'`“”‘’]+$/g;

export function detectFormat(header: string): BatchFormat {
  if (/\bRow\b/.test(header) && header.includes('Package Name')) return 'standard-list';
  if (header.includes('Compromised Version(s)')) return 'security-report';
  throw new FormatError(header.trim());
}

function unquote(cell: string): string {
  return cell.trim().replace(QUOTES, '').trim();
}

function splitTabbed(line: string): string[] {
  const records: unknown = parse(line, {
    delimiter: '\t',
    quote: false,
    record_delimiter: '\n',
    relax_column_count: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records) || !Array.isArray(records[0])) return [];
  return records[0].map((cell: unknown) => String(cell));
}

// a comma followed by spaces stays inside the version cell
function splitWhitespace(line: string): string[] {
  return line.trim().replace(/,\s+/g, ',').split(/\s+/);
}

function toCells(format: BatchFormat, line: string, tabbed: boolean): RowCells {
  if (tabbed) {
    const cells = splitTabbed(line);
    return format === 'standard-list'
      ? { name: cells[1], versions: cells[2] }
      : { name: cells[0], versions: cells[1], detectionDate: cells[2], status: cells[3] };
  }

  const tokens = splitWhitespace(line);
  if (format === 'standard-list') {
    return {
      name: tokens[1],
      versions: tokens.length > 2 ? tokens.slice(2).join(',') : undefined,
    };
  }
  return {
    name: tokens[0],
    versions: tokens[1],
    detectionDate: tokens[2],
    status: tokens.length > 3 ? tokens.slice(3).join(' ') : undefined,
  };
}

/**
 * Strips the notes advisories tend to leave on a version:
 * "1.0.0 (confirmed)", "1.0.0*", "1.0.0 ⚠️".
 */
export function cleanVersionToken(token: string): string {
  return unquote(token)
    .replace(/\s*\([^)]*\)\s*$/, '')
    .replace(/[^0-9A-Za-z.+-]+$/, '')
    .trim();
}

export function parseVersionList(cell: string): string[] {
  return unquote(cell)
    .split(',')
    .map(cleanVersionToken)
    .filter((version) => version.length > 0);
}

function optionalCell(cell: string | undefined): string | undefined {
  if (cell === undefined) return undefined;
  const value = unquote(cell);
  return value || undefined;
}

/**
 * Parses a batch list of packages to audit. The header line decides the
 * layout; rows that lack a name or version column are skipped and reported.
 */
export function parseExpectations(raw: string): ParsedBatch {
  const lines = raw.replace(/^\uFEFF/, '').split(/\r\n|\r|\n/);
  const headerIndex = lines.findIndex((line) => line.trim().length > 0);
  if (headerIndex === -1) {
    return { format: 'standard-list', expectations: [], skipped: [] };
  }

  const header = lines[headerIndex];
  const format = detectFormat(header);
  const tabbed = header.includes('\t');

  const expectations: ExpectedPackage[] = [];
  const skipped: SkippedRow[] = [];

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim().length === 0) continue;

    const cells = toCells(format, line, tabbed);
    const name = cells.name === undefined ? '' : unquote(cells.name);
    if (!name) {
      skipped.push({ line: i + 1, reason: 'missing package name', text: line });
      continue;
    }
    if (cells.versions === undefined) {
      skipped.push({ line: i + 1, reason: 'missing version column', text: line });
      continue;
    }

    const detectionDate = optionalCell(cells.detectionDate);
    const originalStatus = optionalCell(cells.status);
    expectations.push({
      name,
      versions: parseVersionList(cells.versions),
      ...(originalStatus !== undefined ? { originalStatus } : {}),
      ...(detectionDate !== undefined ? { detectionDate } : {}),
    });
  }

  return { format, expectations, skipped };
}
