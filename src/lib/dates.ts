/** Calendar date in `YYYY-MM-DD` form. All arithmetic is done in UTC. */
export type ISODate = string;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY  = 24 * 60 * 60 * 1000;

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

export function isValidISODate(s: string): boolean {
  const m = ISO_DATE_RE.exec(s);
  if (!m) return false;
  const month = parseInt(m[2], 10);
  const day   = parseInt(m[3], 10);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(parseInt(m[1], 10), month);
}

export function dateParts(iso: ISODate): DateParts {
  const m = ISO_DATE_RE.exec(iso);
  if (!m) throw new Error(`Not an ISO date: ${iso}`);
  return { year: parseInt(m[1], 10), month: parseInt(m[2], 10), day: parseInt(m[3], 10) };
}

export function fromParts(year: number, month: number, day: number): ISODate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function toISODate(date: Date): ISODate {
  return fromParts(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

export function parseISODate(iso: ISODate): Date {
  const { year, month, day } = dateParts(iso);
  // Date.UTC reads years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : MONTH_DAYS[month - 1];
}

export function isLastDayOfMonth(iso: ISODate): boolean {
  const { year, month, day } = dateParts(iso);
  return day === daysInMonth(year, month);
}

export function isLastDayOfFebruary(iso: ISODate): boolean {
  return dateParts(iso).month === 2 && isLastDayOfMonth(iso);
}

export function endOfMonth(iso: ISODate): ISODate {
  const { year, month } = dateParts(iso);
  return fromParts(year, month, daysInMonth(year, month));
}

/**
 * Shift by whole months, clamping the day to the target month's length
 * (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonths(iso: ISODate, months: number): ISODate {
  const { year, month, day } = dateParts(iso);
  const index = year * 12 + (month - 1) + months;
  const y = Math.floor(index / 12);
  const m = index - y * 12 + 1;
  return fromParts(y, m, Math.min(day, daysInMonth(y, m)));
}

/** Actual calendar days from `a` to `b` (negative when `b` is earlier). */
export function daysBetween(a: ISODate, b: ISODate): number {
  return Math.round((parseISODate(b).getTime() - parseISODate(a).getTime()) / MS_PER_DAY);
}
