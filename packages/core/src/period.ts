import { PeriodError } from './errors.js';
import type { DateRange } from './normalize/types.js';

export type PeriodPreset = 'last-week' | 'last-month' | 'last-quarter';

export const PERIOD_PRESETS: Record<PeriodPreset, number> = {
  'last-week': 7,
  'last-month': 30,
  'last-quarter': 90,
};

export interface ReportPeriod {
  current: DateRange;
  comparison?: DateRange;
}

export interface ResolvePeriodOptions {
  preset?: PeriodPreset;
  start?: string;
  end?: string;
  /** Defaults to the real current date; injectable for tests. */
  today?: Date;
}

export interface ResolvedPeriod {
  range: DateRange;
  warnings: string[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 86_400_000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseIsoDate(value: string): Date {
  if (!ISO_DATE.test(value)) {
    throw new PeriodError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || toIsoDate(date) !== value) {
    throw new PeriodError(`Invalid date "${value}"`);
  }
  return date;
}

export function addDays(value: string, days: number): string {
  return toIsoDate(new Date(parseIsoDate(value).getTime() + days * DAY_MS));
}

/** Inclusive length of a range in days. */
export function rangeLength(range: DateRange): number {
  return Math.round((parseIsoDate(range.end).getTime() - parseIsoDate(range.start).getTime()) / DAY_MS) + 1;
}

/**
 * Resolve the active report window. Presets end yesterday; an explicit end
 * date after today is clamped to yesterday. Today itself is accepted.
 */
export function resolvePeriod(options: ResolvePeriodOptions = {}): ResolvedPeriod {
  const today = toIsoDate(options.today ?? new Date());
  const yesterday = addDays(today, -1);
  const warnings: string[] = [];

  if (options.start === undefined && options.end === undefined) {
    const days = PERIOD_PRESETS[options.preset ?? 'last-week'];
    return { range: { start: addDays(yesterday, -(days - 1)), end: yesterday }, warnings };
  }

  if (options.start === undefined) {
    throw new PeriodError('--end-date requires --start-date');
  }

  parseIsoDate(options.start);
  let end = options.end ?? yesterday;
  parseIsoDate(end);

  if (end > today) {
    warnings.push(`End date ${end} is in the future; using ${yesterday}`);
    end = yesterday;
  }
  if (end < options.start) {
    throw new PeriodError(`End date ${end} is before start date ${options.start}`);
  }

  return { range: { start: options.start, end }, warnings };
}

/** The window of equal length that ends the day before `range` starts. */
export function previousPeriod(range: DateRange): DateRange {
  const length = rangeLength(range);
  const end = addDays(range.start, -1);
  return { start: addDays(end, -(length - 1)), end };
}

export function formatRange(range: DateRange): string {
  return `${range.start} to ${range.end}`;
}
