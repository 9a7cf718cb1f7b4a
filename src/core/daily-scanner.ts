/**
 * Daily file scanner
 *
 * Walks the calendar days of a quarter, reads each day's TODO file written by
 * `jira-rollup sync` and accumulates mention counts into an AggregateState.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ReportIOError } from './errors.js';
import {
  calendarDayToString,
  quarterDays,
  type CalendarDay,
  type QuarterSelector,
} from './quarter.js';
import { getISOWeek } from '../utils/dates.js';

export interface DailyRecord {
  key: string;
  status: string;
}

export interface AggregateState {
  /** Matched lines across all scanned files */
  total: number;
  byStatus: Map<string, number>;
  /** ISO week number of the file date → mentions */
  byWeek: Map<number, number>;
  /** First-seen order */
  uniqueIssues: Set<string>;
  /** Daily files found and read */
  filesScanned: number;
  /** List items that were not unchecked issue records */
  unparsedLines: number;
}

// - [ ] ACM-12: summary text [In Progress]
const RECORD_PATTERN = /^\s*- \[ \] ([A-Z][A-Z0-9]*-\d+):.*\[([^[\]]+)\]\s*$/;
const LIST_ITEM_PATTERN = /^\s*[-*] /;

export function createAggregateState(): AggregateState {
  return {
    total: 0,
    byStatus: new Map(),
    byWeek: new Map(),
    uniqueIssues: new Set(),
    filesScanned: 0,
    unparsedLines: 0,
  };
}

/**
 * Extract (key, status) from one daily line, or null when the line is not an
 * unchecked issue TODO
 */
export function parseDailyRecord(line: string): DailyRecord | null {
  const match = line.match(RECORD_PATTERN);
  if (!match) return null;

  const status = match[2].trim();
  if (!status) return null;

  return { key: match[1], status };
}

export function dailyFileName(day: CalendarDay): string {
  return `${calendarDayToString(day)}.md`;
}

/**
 * Fold one file's content into the state. Every matching line counts once
 * towards total, its status and the file's ISO week.
 */
export function accumulateDailyContent(state: AggregateState, content: string, week: number): void {
  for (const line of content.split(/\r?\n/)) {
    const record = parseDailyRecord(line);
    if (!record) {
      if (LIST_ITEM_PATTERN.test(line)) state.unparsedLines++;
      continue;
    }

    state.total++;
    state.byStatus.set(record.status, (state.byStatus.get(record.status) ?? 0) + 1);
    state.byWeek.set(week, (state.byWeek.get(week) ?? 0) + 1);
    state.uniqueIssues.add(record.key);
  }
}

/**
 * Scan every day of the quarter in date order. Missing files are skipped;
 * a file that exists but cannot be read aborts the scan.
 */
export function scanQuarter(dailyDir: string, selector: QuarterSelector): AggregateState {
  const state = createAggregateState();

  for (const day of quarterDays(selector)) {
    const path = join(dailyDir, dailyFileName(day));
    if (!existsSync(path)) continue;

    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new ReportIOError(path, 'read', err);
    }

    state.filesScanned++;
    const { week } = getISOWeek(new Date(day.year, day.month - 1, day.day));
    accumulateDailyContent(state, content, week);
  }

  return state;
}
