import * as fs from 'fs';
import * as path from 'path';
import { Command, CommanderError, Option } from 'commander';
import { isCompromised, query, runAudit } from './audit';
import { loadConfig, OutputFormat } from './config';
import { FormatError, ParseError } from './errors';
import { loadLockModel } from './package-managers/pnpm';
import * as jsonReporter from './reporters/json';
import * as textReporter from './reporters/text';
import * as tsvReporter from './reporters/tsv';
import { AuditResult, AuditRun } from './types';
import { parseExpectations } from './utils/batch';
import { colorEnabled, createLogger, Logger } from './utils/logger';
import pkg from '../package.json';

export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ERROR = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}

interface CliOptions {
  file?: string;
  batch?: string;
  output?: string;
  format?: OutputFormat;
  prefix?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  debug?: boolean;
  color: boolean;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  cwd: process.cwd(),
};

function readText(filePath: string, what: string): string {
  if (!fs.existsSync(filePath)) {
    throw new Error(`${what} not found at ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf8');
}

function hintFor(error: unknown): string | undefined {
  if (error instanceof ParseError) {
    return 'Hint: Is this a pnpm-lock.yaml? Regenerate it with `pnpm install` if it was edited by hand.';
  }
  if (error instanceof FormatError) {
    return 'Hint: The first line must be a "Row<TAB>Package Name<TAB>Version(s)" or a "Package Name<TAB>Compromised Version(s)<TAB>Detection Date<TAB>Status" header.';
  }
  if (error instanceof Error && error.message.startsWith('Lock file not found')) {
    return 'Hint: Run `pnpm install` to generate a lockfile, or point at one with --file.';
  }
  return undefined;
}

function execute(
  packageName: string | undefined,
  version: string | undefined,
  options: CliOptions,
  io: CliIO,
  log: Logger,
): number {
  const config = loadConfig(io.cwd, (msg) => log.warn(msg));
  const verbose = options.verbose ?? config.verbose;
  const format = options.format ?? config.format;
  const prefix = options.prefix ?? config.prefix;
  const outputPath = options.output ?? config.output;

  const lockPath = path.resolve(io.cwd, options.file ?? config.file);
  log.debug(`Reading lock file: ${lockPath}`);
  const model = loadLockModel(readText(lockPath, 'Lock file'));
  log.debug(`Indexed ${model.size} occurrences of ${model.packageNames().length} packages.`);
  model.warnings.forEach((w) => log.debug(w));

  if (verbose && format === 'text') {
    log.info(`Lockfile version: ${model.lockfileVersion ?? 'unknown'}`);
  }

  const render = (subject: AuditResult | AuditRun, warnings: string[] = []) => {
    io.stdout(
      format === 'json'
        ? jsonReporter.report(subject, warnings) + '\n'
        : textReporter.report(subject, { verbose, palette: log.palette, warnings }),
    );
  };

  if (options.batch) {
    const batchPath = path.resolve(io.cwd, options.batch);
    log.debug(`Reading batch file: ${batchPath}`);
    const batch = parseExpectations(readText(batchPath, 'Batch file'));
    if (verbose && format === 'text') {
      log.info(`Batch mode: ${batch.expectations.length} packages (${batch.format})`);
    }

    const run = runAudit(model, batch.expectations, batch.skipped.length);
    render(
      run,
      batch.skipped.map((row) => `Skipped line ${row.line}: ${row.reason}`),
    );

    if (outputPath) {
      const reportPath = path.resolve(io.cwd, outputPath);
      fs.writeFileSync(reportPath, tsvReporter.report(run), 'utf8');
      if (format === 'text') log.success(`Report written to ${reportPath}`);
    }

    const compromised = run.results.some(isCompromised);
    if (compromised && options.dryRun) {
      if (format === 'text') log.warn('[DRY RUN] Compromised versions found, but exiting with 0.');
      return EXIT_OK;
    }
    return compromised ? EXIT_FINDINGS : EXIT_OK;
  }

  if (!packageName) {
    throw new Error('Specify a package name or use --batch <file>.');
  }

  const result = query(model, packageName, version, { prefix });
  render(result);
  if (result.status === 'Found' || options.dryRun) return EXIT_OK;
  return EXIT_FINDINGS;
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();
  program
    .name('lockwatch')
    .description('Audit a pnpm lock file for specific packages and versions, one at a time or from an advisory list.')
    .version(pkg.version)
    .argument('[package]', 'package name to look for (e.g. antd or @ant-design/icons)')
    .argument('[version]', 'version to look for; any version when omitted')
    .option('-f, --file <path>', 'path to pnpm-lock.yaml (default: pnpm-lock.yaml)')
    .option('-b, --batch <path>', 'batch mode: file listing the packages to check')
    .option('-o, --output <path>', 'write a TSV report (batch mode)')
    .addOption(new Option('--format <format>', 'console output format').choices(['text', 'json']))
    .option('--prefix', 'treat the version argument as a prefix ("18" matches 18.3.1)')
    .option('-v, --verbose', 'show detailed output')
    .option('--dry-run', 'always exit with 0 after a completed audit (useful for CI)')
    .option('--debug', 'enable debug logging')
    .option('--no-color', 'disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
  return program;
}

/**
 * Runs the CLI and resolves with the process exit code.
 */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);
  let exitCode = EXIT_OK;

  program.action(
    (packageName: string | undefined, version: string | undefined, options: CliOptions) => {
      const log = createLogger({
        debug: options.debug,
        color: colorEnabled(options.color),
        stdout: (line) => io.stdout(line + '\n'),
        stderr: (line) => io.stderr(line + '\n'),
      });
      try {
        exitCode = execute(packageName, version, options, io, log);
      } catch (error: unknown) {
        const msg = error instanceof Error ? error.message : String(error);
        log.error(`Error: ${msg}`);
        const hint = hintFor(error);
        if (hint) log.dim(hint);
        exitCode = EXIT_ERROR;
      }
    },
  );

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_ERROR;
    }
    throw error;
  }
  return exitCode;
}
