export { LockModel, loadLockModel, parseDependencyPath } from './package-managers/pnpm';
export type { DependencyPath } from './package-managers/pnpm';
export { matches, classify, isSatisfied } from './versions';
export type { MatchMode, Satisfaction } from './versions';
export {
  cleanVersionToken,
  detectFormat,
  parseExpectations,
  parseVersionList,
} from './utils/batch';
export { audit, query, runAudit, tally, isCompromised } from './audit';
export type { QueryOptions } from './audit';
export { report as renderConsole, plainPalette } from './reporters/text';
export type { Palette, TextReportOptions } from './reporters/text';
export { report as renderTsv, TSV_COLUMNS } from './reporters/tsv';
export { report as renderJson } from './reporters/json';
export { ParseError, FormatError } from './errors';
export { loadConfig, defaultConfig } from './config';
export type { LockwatchConfig } from './config';
export * from './types';
