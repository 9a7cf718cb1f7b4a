import { QuarterFormatError } from './errors.js';
import { daysInMonth } from '../utils/dates.js';

export type QuarterNumber = 1 | 2 | 3 | 4;

export interface QuarterSelector {
  year: number;
  quarter: QuarterNumber;
}

/** One calendar day of a quarter (month is 1-based) */
export interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

const QUARTER_LABEL = /^(\d{4})-Q([1-4])$/i;
// Earlier years would need unpadded file names and two-digit Date years
const MIN_YEAR = 1000;

function toQuarterNumber(n: number): QuarterNumber {
  switch (n) {
    case 1:
    case 2:
    case 3:
    case 4:
      return n;
    default:
      throw new RangeError(`quarter out of range: ${n}`);
  }
}

/**
 * Parse a YYYY-QN label
 */
export function parseQuarterLabel(label: string): QuarterSelector {
  const match = label.trim().match(QUARTER_LABEL);
  if (!match) {
    throw new QuarterFormatError(label);
  }
  const year = parseInt(match[1], 10);
  if (year < MIN_YEAR) {
    throw new QuarterFormatError(label);
  }
  return {
    year,
    quarter: toQuarterNumber(parseInt(match[2], 10)),
  };
}

export function quarterForDate(date: Date): QuarterSelector {
  return {
    year: date.getFullYear(),
    quarter: toQuarterNumber(Math.floor(date.getMonth() / 3) + 1),
  };
}

/**
 * Use the explicit label when given, otherwise the quarter containing `now`
 */
export function resolveQuarter(label?: string, now: Date = new Date()): QuarterSelector {
  if (label === undefined) {
    return quarterForDate(now);
  }
  return parseQuarterLabel(label);
}

export function formatQuarterLabel({ year, quarter }: QuarterSelector): string {
  return `${year}-Q${quarter}`;
}

export function quarterMonths({ quarter }: QuarterSelector): [number, number, number] {
  const first = (quarter - 1) * 3 + 1;
  return [first, first + 1, first + 2];
}

/**
 * Every real calendar day of the quarter, in date order
 */
export function quarterDays(selector: QuarterSelector): CalendarDay[] {
  const days: CalendarDay[] = [];
  for (const month of quarterMonths(selector)) {
    const last = daysInMonth(selector.year, month);
    for (let day = 1; day <= last; day++) {
      days.push({ year: selector.year, month, day });
    }
  }
  return days;
}

export function calendarDayToString({ year, month, day }: CalendarDay): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
