/**
 * Daily file scanner tests
 *
 * Uses real temporary directories laid out the way `sync` writes them.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  accumulateDailyContent,
  createAggregateState,
  parseDailyRecord,
  scanQuarter,
} from '../src/core/daily-scanner.js';
import { ReportIOError } from '../src/core/errors.js';

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function createTestDir(): string {
  const dir = join(
    tmpdir(),
    `jira-rollup-scan-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
  );
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeDaily(dir: string, date: string, lines: string[]): void {
  writeFileSync(join(dir, `${date}.md`), [`# TODO ${date}`, '', ...lines, ''].join('\n'));
}

function sum(map: Map<unknown, number>): number {
  return Array.from(map.values()).reduce((a, b) => a + b, 0);
}

const Q1_2025 = { year: 2025, quarter: 1 } as const;

// ─── parseDailyRecord ─────────────────────────────────────────────────────────

describe('parseDailyRecord', () => {
  it('extracts key and status from an unchecked TODO line', () => {
    expect(parseDailyRecord('- [ ] ACM-1: fix bug [In Progress]')).toEqual({
      key: 'ACM-1',
      status: 'In Progress',
    });
  });

  it('accepts indentation, digits in the project and trailing spaces', () => {
    expect(parseDailyRecord('  - [ ] AB2-17: nested item [Review]  ')).toEqual({
      key: 'AB2-17',
      status: 'Review',
    });
  });

  it('takes the last bracketed token as the status', () => {
    expect(parseDailyRecord('- [ ] ACM-3: handle [edge] case [Blocked]')).toEqual({
      key: 'ACM-3',
      status: 'Blocked',
    });
  });

  it.each([
    ['checked item', '- [x] ACM-1: done [Done]'],
    ['no key', '- [ ] fix bug [New]'],
    ['no colon after key', '- [ ] ACM-1 fix bug [New]'],
    ['no status', '- [ ] ACM-1: fix bug'],
    ['lowercase key', '- [ ] acm-1: fix bug [New]'],
    ['heading', '# TODO 2025-01-06'],
    ['empty status', '- [ ] ACM-1: fix bug [ ]'],
  ])('ignores a line with %s', (_label, line) => {
    expect(parseDailyRecord(line)).toBeNull();
  });
});

// ─── accumulateDailyContent ───────────────────────────────────────────────────

describe('accumulateDailyContent', () => {
  it('counts every matching line towards total, status and week', () => {
    const state = createAggregateState();
    accumulateDailyContent(
      state,
      ['- [ ] ACM-1: a [New]', '- [ ] ACM-1: a again [New]', '- [ ] ACM-2: b [Review]'].join('\n'),
      9
    );

    expect(state.total).toBe(3);
    expect(state.byStatus.get('New')).toBe(2);
    expect(state.byStatus.get('Review')).toBe(1);
    expect(state.byWeek.get(9)).toBe(3);
    expect(Array.from(state.uniqueIssues)).toEqual(['ACM-1', 'ACM-2']);
  });

  it('counts list items that are not issue records as unparsed', () => {
    const state = createAggregateState();
    accumulateDailyContent(
      state,
      ['# TODO', '', '- [x] ACM-9: done [Done]', '- random note', '* [ ] ACM-3: starred [New]', 'plain text', '   '].join('\r\n'),
      1
    );

    expect(state.total).toBe(0);
    expect(state.unparsedLines).toBe(3);
  });
});

// ─── scanQuarter ──────────────────────────────────────────────────────────────

describe('scanQuarter', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('aggregates the two-day example', () => {
    writeDaily(dir, '2025-01-06', ['- [ ] ACM-1: fix bug [In Progress]', '- [ ] ACM-2: add test [New]']);
    writeDaily(dir, '2025-01-14', ['- [ ] ACM-1: fix bug [Review]']);

    const state = scanQuarter(dir, Q1_2025);

    expect(state.total).toBe(3);
    expect(state.uniqueIssues.size).toBe(2);
    expect(Object.fromEntries(state.byStatus)).toEqual({ 'In Progress': 1, New: 1, Review: 1 });
    expect(Object.fromEntries(state.byWeek)).toEqual({ 2: 2, 3: 1 });
    expect(state.filesScanned).toBe(2);
  });

  it('scans only the months of the selected quarter', () => {
    writeDaily(dir, '2024-12-31', ['- [ ] ACM-90: old [New]']);
    writeDaily(dir, '2025-01-01', ['- [ ] ACM-1: first [New]']);
    writeDaily(dir, '2025-03-31', ['- [ ] ACM-2: last [Review]']);
    writeDaily(dir, '2025-04-01', ['- [ ] ACM-91: next quarter [New]']);

    const state = scanQuarter(dir, Q1_2025);

    expect(state.total).toBe(2);
    expect(Array.from(state.uniqueIssues)).toEqual(['ACM-1', 'ACM-2']);
    expect(state.filesScanned).toBe(2);
  });

  it('treats a file with no matching lines as contributing nothing', () => {
    writeDaily(dir, '2025-02-03', ['_No assigned issues._', 'nothing here']);

    const state = scanQuarter(dir, Q1_2025);

    expect(state.total).toBe(0);
    expect(state.byStatus.size).toBe(0);
    expect(state.byWeek.size).toBe(0);
    expect(state.uniqueIssues.size).toBe(0);
    expect(state.filesScanned).toBe(1);
  });

  it('returns an empty state for a missing directory', () => {
    const state = scanQuarter(join(dir, 'does-not-exist'), Q1_2025);
    expect(state.total).toBe(0);
    expect(state.filesScanned).toBe(0);
  });

  it('fails with ReportIOError when a daily file cannot be read', () => {
    mkdirSync(join(dir, '2025-01-02.md'));

    expect(() => scanQuarter(dir, Q1_2025)).toThrow(ReportIOError);
  });

  it('keeps the count invariants across many files', () => {
    const statuses = ['New', 'In Progress', 'Review', 'Blocked'];
    let written = 0;
    for (let day = 1; day <= 28; day += 3) {
      const lines: string[] = [];
      for (let i = 0; i < (day % 4) + 1; i++) {
        lines.push(`- [ ] ACM-${(day + i) % 7}: item [${statuses[(day + i) % statuses.length]}]`);
        written++;
      }
      lines.push('- [x] ACM-100: finished [Done]');
      writeDaily(dir, `2025-02-${String(day).padStart(2, '0')}`, lines);
    }

    const state = scanQuarter(dir, Q1_2025);

    expect(state.total).toBe(written);
    expect(sum(state.byStatus)).toBe(state.total);
    expect(sum(state.byWeek)).toBe(state.total);
    expect(state.uniqueIssues.size).toBeLessThanOrEqual(state.total);
    expect(state.uniqueIssues.size).toBe(7);
  });
});
