/**
 * Quarterly report composer
 *
 * Turns an AggregateState plus the year's weekly summary files into one
 * Markdown document and writes it to <reportsDir>/<YYYY-QN>.md.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { scanQuarter, type AggregateState } from './daily-scanner.js';
import { ReportIOError } from './errors.js';
import { formatQuarterLabel, quarterMonths, type QuarterSelector } from './quarter.js';
import {
  computeInsights,
  issueLink,
  renderBar,
  sortedIssueKeys,
  statusDistribution,
  weeklyBreakdown,
  type QuarterInsights,
} from './quarterly-stats.js';

export interface WeeklySummaryFile {
  /** File name without extension, e.g. 2025-W03 */
  name: string;
  content: string;
}

export interface QuarterlyReportInput {
  selector: QuarterSelector;
  state: AggregateState;
  weeklySummaries: WeeklySummaryFile[];
  browseUrl: string;
  generatedAt: Date;
}

export interface QuarterlyReportResult {
  path: string;
  label: string;
  state: AggregateState;
  insights: QuarterInsights;
  weeklySummaries: number;
}

function monthName(year: number, month: number): string {
  return new Date(year, month - 1, 1).toLocaleString('en-US', { month: 'long' });
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

// ─── Sections ─────────────────────────────────────────────────────────────────

function renderHeader(selector: QuarterSelector, generatedAt: Date): string[] {
  const [first, , last] = quarterMonths(selector);
  return [
    `# Quarterly Jira Report: ${formatQuarterLabel(selector)}`,
    '',
    `**Period:** ${monthName(selector.year, first)} – ${monthName(selector.year, last)} ${selector.year}`,
    `_Generated: ${generatedAt.toISOString()}_`,
  ];
}

function renderKeyMetrics(state: AggregateState): string[] {
  return [
    '## Key Metrics',
    '',
    '| Metric | Value |',
    '| --- | --- |',
    `| Total mentions | ${state.total} |`,
    `| Unique issues | ${state.uniqueIssues.size} |`,
    `| Active weeks | ${state.byWeek.size} |`,
    `| Days with files | ${state.filesScanned} |`,
    `| Unparsed list items | ${state.unparsedLines} |`,
  ];
}

function renderStatusDistribution(state: AggregateState): string[] {
  const lines = ['## Status Distribution', ''];
  const rows = statusDistribution(state);
  if (rows.length === 0) {
    lines.push('_No mentions recorded._');
    return lines;
  }

  lines.push('```');
  const width = Math.max(...rows.map((r) => r.status.length));
  for (const row of rows) {
    const pct = `${row.percentage.toFixed(1)}%`.padStart(6);
    lines.push(
      `${row.status.padEnd(width)}  ${String(row.count).padStart(4)}  ${pct}  ${renderBar(row.barLength)}`
    );
  }
  lines.push('```');
  return lines;
}

function renderWeeklyBreakdown(state: AggregateState): string[] {
  const lines = ['## Weekly Breakdown', ''];
  const rows = weeklyBreakdown(state);
  if (rows.length === 0) {
    lines.push('_No mentions recorded._');
    return lines;
  }
  for (const row of rows) {
    lines.push(`- Week ${row.week}: ${plural(row.count, 'mention')}`);
  }
  return lines;
}

function renderUniqueIssues(state: AggregateState, browseUrl: string): string[] {
  const lines = ['## Unique Issues', ''];
  const keys = sortedIssueKeys(state);
  if (keys.length === 0) {
    lines.push('_No issues recorded._');
    return lines;
  }
  for (const key of keys) {
    lines.push(`- ${issueLink(key, browseUrl)}`);
  }
  return lines;
}

function renderWeeklySummaries(summaries: WeeklySummaryFile[]): string[] {
  const lines = ['## Weekly Summaries', ''];
  if (summaries.length === 0) {
    lines.push('_No weekly summaries found._');
    return lines;
  }
  summaries.forEach((summary, index) => {
    if (index > 0) lines.push('');
    // Content is kept verbatim; the line join supplies one final newline
    const content = summary.content.endsWith('\n') ? summary.content.slice(0, -1) : summary.content;
    lines.push(`### ${summary.name}`, '', content);
  });
  return lines;
}

function renderInsights(insights: QuarterInsights): string[] {
  const { busiestWeek, averagePerWeek, statusCounts: counts } = insights;

  const lines = [
    '## Insights',
    '',
    busiestWeek
      ? `- Busiest week: Week ${busiestWeek.week} (${plural(busiestWeek.count, 'mention')})`
      : '- Busiest week: no data',
    averagePerWeek !== null
      ? `- Average mentions per week: ${averagePerWeek.toFixed(1)}`
      : '- Average mentions per week: no data',
    `- New: ${counts.New} · In Progress: ${counts['In Progress']} · Review: ${counts.Review}`,
    '',
    '## Recommendations',
    '',
  ];

  if (counts.New > 0) {
    lines.push(`- Triage the ${plural(counts.New, 'mention')} of issues still in New.`);
  }
  if (counts['In Progress'] > 0) {
    lines.push(
      `- Check ${plural(counts['In Progress'], 'In Progress mention')} for work that can be closed or split.`
    );
  }
  if (counts.Review > 0) {
    lines.push(`- Follow up on ${plural(counts.Review, 'mention')} waiting in Review.`);
  }
  lines.push('- Run `jira-rollup sync` every working day so the next report is complete.');

  return lines;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function composeQuarterlyReport(input: QuarterlyReportInput): string {
  const { selector, state, weeklySummaries, browseUrl, generatedAt } = input;

  const sections = [
    renderHeader(selector, generatedAt),
    renderKeyMetrics(state),
    renderStatusDistribution(state),
    renderWeeklyBreakdown(state),
    renderUniqueIssues(state, browseUrl),
    renderWeeklySummaries(weeklySummaries),
    renderInsights(computeInsights(state)),
  ];

  return sections.map((lines) => lines.join('\n')).join('\n\n') + '\n';
}

/**
 * Weekly summary files of the given year (YYYY-Www.md), sorted by file name
 */
export function loadWeeklySummaries(weeklyDir: string, year: number): WeeklySummaryFile[] {
  if (!existsSync(weeklyDir)) return [];

  let names: string[];
  try {
    names = readdirSync(weeklyDir);
  } catch (err) {
    throw new ReportIOError(weeklyDir, 'read', err);
  }

  const prefix = `${year}-W`;
  return names
    .filter((name) => name.startsWith(prefix) && name.endsWith('.md'))
    .sort()
    .map((name) => {
      const path = join(weeklyDir, name);
      try {
        return { name: name.slice(0, -'.md'.length), content: readFileSync(path, 'utf-8') };
      } catch (err) {
        throw new ReportIOError(path, 'read', err);
      }
    });
}

/**
 * Write through a temp file and rename, so an aborted run never leaves a
 * truncated report in place
 */
export function writeReportAtomically(path: string, content: string): void {
  const tmp = `${path}.tmp`;
  try {
    writeFileSync(tmp, content, 'utf-8');
    renameSync(tmp, path);
  } catch (err) {
    throw new ReportIOError(path, 'write', err);
  }
}

export function ensureDirectory(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new ReportIOError(dir, 'create', err);
  }
}

export function reportPath(reportsDir: string, selector: QuarterSelector): string {
  return join(reportsDir, `${formatQuarterLabel(selector)}.md`);
}

/**
 * Scan, compose and write the report for one quarter
 */
export function generateQuarterlyReport(options: {
  selector: QuarterSelector;
  dailyDir: string;
  weeklyDir: string;
  reportsDir: string;
  browseUrl: string;
  now?: Date;
}): QuarterlyReportResult {
  const { selector, dailyDir, weeklyDir, reportsDir, browseUrl } = options;

  ensureDirectory(reportsDir);

  const state = scanQuarter(dailyDir, selector);
  const weeklySummaries = loadWeeklySummaries(weeklyDir, selector.year);
  const content = composeQuarterlyReport({
    selector,
    state,
    weeklySummaries,
    browseUrl,
    generatedAt: options.now ?? new Date(),
  });

  const path = reportPath(reportsDir, selector);
  writeReportAtomically(path, content);

  return {
    path,
    label: formatQuarterLabel(selector),
    state,
    insights: computeInsights(state),
    weeklySummaries: weeklySummaries.length,
  };
}
