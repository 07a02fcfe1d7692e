import { cosmiconfigSync } from 'cosmiconfig';

export type OutputFormat = 'text' | 'json';

export interface LockwatchConfig {
  file: string;
  output?: string;
  verbose: boolean;
  format: OutputFormat;
  prefix: boolean;
}

export const defaultConfig: LockwatchConfig = {
  file: 'pnpm-lock.yaml',
  verbose: false,
  format: 'text',
  prefix: false,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps the recognised keys of a loaded configuration; anything of the
 * wrong type is dropped in favour of the default.
 */
export function normalizeConfig(raw: unknown): LockwatchConfig {
  const config: LockwatchConfig = { ...defaultConfig };
  if (!isRecord(raw)) return config;

  if (typeof raw.file === 'string' && raw.file) config.file = raw.file;
  if (typeof raw.output === 'string' && raw.output) config.output = raw.output;
  if (typeof raw.verbose === 'boolean') config.verbose = raw.verbose;
  if (raw.format === 'text' || raw.format === 'json') config.format = raw.format;
  if (typeof raw.prefix === 'boolean') config.prefix = raw.prefix;

  return config;
}

export function loadConfig(
  searchFrom: string = process.cwd(),
  onWarning: (message: string) => void = (message) => console.warn(message),
): LockwatchConfig {
  const explorer = cosmiconfigSync('lockwatch');
  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      return normalizeConfig(result.config);
    }
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    onWarning(`Failed to load configuration file: ${msg}`);
  }
  return { ...defaultConfig };
}
