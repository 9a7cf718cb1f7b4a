import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { ReportIOError } from './errors.js';

export interface AuditEntry {
  timestamp: Date;
  prUrl: string;
  issueKey: string;
  effort: string;
  linesChanged: number;
  filesChanged: number;
}

/**
 * One tab-separated line per created issue
 */
export function formatAuditLine(entry: AuditEntry): string {
  return [
    entry.timestamp.toISOString(),
    entry.prUrl,
    entry.issueKey,
    entry.effort,
    `lines=${entry.linesChanged}`,
    `files=${entry.filesChanged}`,
  ].join('\t');
}

export function appendAuditEntry(logPath: string, entry: AuditEntry): void {
  try {
    mkdirSync(dirname(logPath), { recursive: true });
    appendFileSync(logPath, `${formatAuditLine(entry)}\n`, 'utf-8');
  } catch (err) {
    throw new ReportIOError(logPath, 'write', err);
  }
}
