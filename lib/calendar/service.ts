/**
 * Hourly calendar helpers. All arithmetic runs on UTC epoch values so the
 * hourly grid never bends around DST transitions: extracts report 24
 * wall-clock hours per day regardless of local clock changes.
 */

import { getDaysInYear, isValid, parse } from 'date-fns';
import { IntegrityError } from '../errors';
import type { CalendarDate, HourTimestamp } from '../types/matrix';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

// Excel serial day 0 (accounts for the 1900 leap-year quirk for serials >= 61)
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);

const TEXT_DATE_FORMATS = [
  'yyyy-MM-dd',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy/MM/dd',
  'd/M/yyyy',
  'd-M-yyyy',
];

const pad2 = (n: number) => String(n).padStart(2, '0');

export function formatCalendarDate(date: CalendarDate): string {
  return `${date.year}-${pad2(date.month)}-${pad2(date.day)}`;
}

export function toHourTimestamp(date: CalendarDate, hour: number): HourTimestamp {
  return `${formatCalendarDate(date)} ${pad2(hour)}:00:00`;
}

function timestampFromEpoch(ms: number): HourTimestamp {
  const d = new Date(ms);
  return toHourTimestamp(
    { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() },
    d.getUTCHours()
  );
}

export function yearOf(timestamp: HourTimestamp): number {
  return Number(timestamp.slice(0, 4));
}

export function expectedHoursInYear(year: number): number {
  return getDaysInYear(new Date(year, 0, 1)) * 24;
}

/**
 * Every hour of `year`, from Jan 1 00:00 through Dec 31 23:00 inclusive.
 * Throws IntegrityError when the generated count is not 8760/8784.
 */
export function hourlyIndexForYear(year: number): HourTimestamp[] {
  const start = Date.UTC(year, 0, 1);
  const end = Date.UTC(year + 1, 0, 1);
  const index: HourTimestamp[] = [];
  for (let t = start; t < end; t += HOUR_MS) {
    index.push(timestampFromEpoch(t));
  }

  const expected = expectedHoursInYear(year);
  if (index.length !== expected) {
    throw new IntegrityError(`Hourly index for ${year} has ${index.length} rows, expected ${expected}`);
  }
  return index;
}

function plausible(date: CalendarDate): CalendarDate | null {
  return date.year >= 1900 && date.year <= 2200 ? date : null;
}

/**
 * Reads a spreadsheet date cell: Excel serial numbers, Date objects, or text
 * in ISO (`2021-01-31`) or day-first (`31/01/2021`) form. Returns null when
 * the cell cannot be read as a calendar date.
 */
export function parseCalendarDate(value: unknown): CalendarDate | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 1) return null;
    const d = new Date(EXCEL_EPOCH_MS + Math.floor(value) * DAY_MS);
    return plausible({ year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() });
  }

  if (value instanceof Date) {
    if (!isValid(value)) return null;
    return plausible({ year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate() });
  }

  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!text) return null;

  const reference = new Date(2000, 0, 1);
  for (const format of TEXT_DATE_FORMATS) {
    const d = parse(text, format, reference);
    if (isValid(d)) {
      return plausible({ year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() });
    }
  }
  return null;
}
