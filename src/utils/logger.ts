import chalk from 'chalk';
import { Palette } from '../reporters/text';

export interface LoggerOptions {
  debug?: boolean;
  color?: boolean;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export interface Logger {
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug(msg: string): void;
  dim(msg: string): void;
  palette: Palette;
}

export function colorEnabled(requested = true): boolean {
  return requested && !process.env.NO_COLOR;
}

export function createPalette(color: boolean): Palette {
  const c = new chalk.Instance({ level: color ? chalk.level : 0 });
  return { red: c.red, green: c.green, yellow: c.yellow, bold: c.bold, dim: c.dim, cyan: c.cyan };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const palette = createPalette(options.color ?? colorEnabled());
  const out = options.stdout ?? ((line: string) => console.log(line));
  const err = options.stderr ?? ((line: string) => console.error(line));

  return {
    info: (msg) => out(palette.cyan('ℹ') + ' ' + msg),
    success: (msg) => out(palette.green('✓') + ' ' + msg),
    warn: (msg) => err(palette.yellow('⚠') + ' ' + msg),
    error: (msg) => err(palette.red('✗') + ' ' + msg),
    debug: (msg) => {
      if (options.debug) err(palette.dim(`[DEBUG] ${msg}`));
    },
    dim: (msg) => out(palette.dim(msg)),
    palette,
  };
}
