import { AuditResult, AuditRun } from '../types';

export function report(subject: AuditResult | AuditRun, warnings: readonly string[] = []) {
  const body = 'results' in subject ? { ...subject } : { result: subject };
  return JSON.stringify({ ...body, warnings }, null, 2);
}
