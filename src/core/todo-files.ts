/**
 * Daily TODO and weekly summary files written by `jira-rollup sync`.
 *
 * Daily lines follow `- [ ] KEY: summary [status]`, the shape the quarterly
 * scanner reads back.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import type { TrackedIssue } from './jira-cli.js';
import { ReportIOError } from './errors.js';
import { dateToString, formatWeekLabel, getISOWeek } from '../utils/dates.js';

/**
 * Keep the trailing [status] token unambiguous: no brackets or line breaks in the summary
 */
export function sanitizeSummary(summary: string): string {
  return summary
    .replace(/\[/g, '(')
    .replace(/\]/g, ')')
    .replace(/\s+/g, ' ')
    .trim();
}

export function formatTodoLine(issue: TrackedIssue): string {
  return `- [ ] ${issue.key}: ${sanitizeSummary(issue.summary)} [${issue.status}]`;
}

export function renderDailyTodo(issues: TrackedIssue[], syncedAt: Date): string {
  const lines = [
    `# TODO ${dateToString(syncedAt)}`,
    '',
    `_Synced from Jira at ${syncedAt.toISOString()}_`,
    '',
  ];
  if (issues.length === 0) {
    lines.push('_No assigned issues._');
  } else {
    lines.push(...issues.map(formatTodoLine));
  }
  return lines.join('\n') + '\n';
}

/**
 * Counts per value, most frequent first (ties by name)
 */
export function countBy(values: string[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function groupByStatus(issues: TrackedIssue[]): Map<string, TrackedIssue[]> {
  const groups = new Map<string, TrackedIssue[]>();
  for (const issue of issues) {
    const group = groups.get(issue.status);
    if (group) {
      group.push(issue);
    } else {
      groups.set(issue.status, [issue]);
    }
  }
  return groups;
}

export function renderWeeklySummary(issues: TrackedIssue[], windowEnd: Date): string {
  const { year, week } = getISOWeek(windowEnd);
  const windowStart = new Date(windowEnd);
  windowStart.setDate(windowStart.getDate() - 7);

  const lines = [
    `# Weekly Summary ${formatWeekLabel(year, week)}`,
    '',
    `_Issues updated ${dateToString(windowStart)} → ${dateToString(windowEnd)}: ${issues.length}_`,
    '',
    '## Status',
    '',
  ];

  const statusCounts = countBy(issues.map((i) => i.status));
  lines.push(...(statusCounts.length ? statusCounts.map(([s, n]) => `- ${s}: ${n}`) : ['- none']));

  lines.push('', '## Priority', '');
  const priorityCounts = countBy(issues.map((i) => i.priority ?? 'None'));
  lines.push(
    ...(priorityCounts.length ? priorityCounts.map(([p, n]) => `- ${p}: ${n}`) : ['- none'])
  );

  lines.push('', '## Issues by Status');
  for (const [status, group] of groupByStatus(issues)) {
    lines.push('', `### ${status}`, '');
    lines.push(...group.map((i) => `- ${i.key}: ${sanitizeSummary(i.summary)}`));
  }

  return lines.join('\n') + '\n';
}

export function dailyFilePath(dailyDir: string, date: Date): string {
  return join(dailyDir, `${dateToString(date)}.md`);
}

export function weeklyFilePath(weeklyDir: string, date: Date): string {
  const { year, week } = getISOWeek(date);
  return join(weeklyDir, `${formatWeekLabel(year, week)}.md`);
}

export function weeklySummaryExists(weeklyDir: string, date: Date): boolean {
  return existsSync(weeklyFilePath(weeklyDir, date));
}

export function writeTextFile(path: string, content: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content, 'utf-8');
  } catch (err) {
    throw new ReportIOError(path, 'write', err);
  }
}
