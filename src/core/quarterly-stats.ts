import type { AggregateState } from './daily-scanner.js';

export const BAR_WIDTH = 50;
export const BAR_CHAR = '█';

/** Statuses called out in the insights block, spelled as jira returns them */
export const TRACKED_STATUSES = ['New', 'In Progress', 'Review'] as const;
export type TrackedStatus = (typeof TRACKED_STATUSES)[number];

export interface StatusRow {
  status: string;
  count: number;
  percentage: number;
  barLength: number;
}

export interface WeekRow {
  week: number;
  count: number;
}

export interface QuarterInsights {
  busiestWeek: WeekRow | null;
  /** Mentions per active week, one decimal; null when no week has data */
  averagePerWeek: number | null;
  statusCounts: Record<TrackedStatus, number>;
}

function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export function percentageOf(count: number, total: number): number {
  if (total === 0) return 0;
  return roundOneDecimal((count / total) * 100);
}

export function barLengthOf(count: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((count / total) * BAR_WIDTH);
}

/**
 * Status rows ordered by count (desc), then name
 */
export function statusDistribution(state: AggregateState): StatusRow[] {
  return Array.from(state.byStatus.entries())
    .map(([status, count]) => ({
      status,
      count,
      percentage: percentageOf(count, state.total),
      barLength: barLengthOf(count, state.total),
    }))
    .sort((a, b) => b.count - a.count || a.status.localeCompare(b.status));
}

export function weeklyBreakdown(state: AggregateState): WeekRow[] {
  return Array.from(state.byWeek.entries())
    .map(([week, count]) => ({ week, count }))
    .sort((a, b) => a.week - b.week);
}

/**
 * Compare issue keys by project, then by numeric id (ACM-2 before ACM-10)
 */
export function compareIssueKeys(a: string, b: string): number {
  const [projectA, numA] = splitKey(a);
  const [projectB, numB] = splitKey(b);
  if (projectA !== projectB) return projectA < projectB ? -1 : 1;
  return numA - numB;
}

function splitKey(key: string): [string, number] {
  const dash = key.lastIndexOf('-');
  return [key.slice(0, dash), parseInt(key.slice(dash + 1), 10)];
}

export function sortedIssueKeys(state: AggregateState): string[] {
  return Array.from(state.uniqueIssues).sort(compareIssueKeys);
}

export function issueLink(key: string, browseUrl: string): string {
  return `[${key}](${browseUrl.replace(/\/+$/, '')}/${key})`;
}

export function computeInsights(state: AggregateState): QuarterInsights {
  const weeks = weeklyBreakdown(state);

  let busiestWeek: WeekRow | null = null;
  for (const row of weeks) {
    // weeks are ascending, so strict > keeps the lowest week on ties
    if (!busiestWeek || row.count > busiestWeek.count) {
      busiestWeek = row;
    }
  }

  const averagePerWeek = weeks.length > 0 ? roundOneDecimal(state.total / weeks.length) : null;

  const countOf = (status: TrackedStatus): number => state.byStatus.get(status) ?? 0;
  const statusCounts: Record<TrackedStatus, number> = {
    New: countOf('New'),
    'In Progress': countOf('In Progress'),
    Review: countOf('Review'),
  };

  return { busiestWeek, averagePerWeek, statusCounts };
}

export function renderBar(length: number): string {
  return BAR_CHAR.repeat(length);
}
