import chalk from 'chalk';
import { createLogger, createPalette } from '../src/utils/logger';

describe('Logger', () => {
  test('should follow the color support chalk detected', () => {
    expect(createPalette(true).red('x')).toBe(chalk.red('x'));
    expect(createPalette(false).red('x')).toBe('x');
  });

  test('should route lines to stdout and stderr', () => {
    const out: string[] = [];
    const err: string[] = [];
    const log = createLogger({
      color: false,
      stdout: (line) => out.push(line),
      stderr: (line) => err.push(line),
    });

    log.info('reading');
    log.success('done');
    log.warn('careful');
    log.error('broken');
    log.debug('hidden');

    expect(out).toEqual(['ℹ reading', '✓ done']);
    expect(err).toEqual(['⚠ careful', '✗ broken']);
  });

  test('should print debug lines only when asked to', () => {
    const err: string[] = [];
    const log = createLogger({ debug: true, color: false, stderr: (line) => err.push(line) });
    log.debug('Indexed 3 occurrences');
    expect(err).toEqual(['[DEBUG] Indexed 3 occurrences']);
  });
});
