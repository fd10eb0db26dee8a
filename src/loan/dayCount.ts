import {
  ISODate,
  addMonths,
  dateParts,
  daysBetween,
  daysInYear,
  fromParts,
  isLastDayOfFebruary,
  isLastDayOfMonth,
  isLeapYear,
} from '../lib/dates';
import { InvalidDateRangeError } from './errors';
import type { CompoundingMethod } from './types';

export interface DayCount {
  /** Days in the period as the convention counts them. */
  days: number;
  yearFraction: number;
}

export interface DayCountOptions {
  /** Termination date of the loan; only 30E/360 ISDA looks at it. */
  maturityDate?: ISODate;
}

interface DayAdjustment {
  d1: number;
  d2: number;
}

// ── 30/360 family ─────────────────────────────────────────────────────────────

function thirty360(start: ISODate, end: ISODate, adjust: (d1: number, d2: number) => DayAdjustment): DayCount {
  const s = dateParts(start);
  const e = dateParts(end);
  const { d1, d2 } = adjust(s.day, e.day);
  const days = 360 * (e.year - s.year) + 30 * (e.month - s.month) + (d2 - d1);
  return { days, yearFraction: days / 360 };
}

function thirtyA360(start: ISODate, end: ISODate): DayCount {
  return thirty360(start, end, (d1, d2) => {
    const a1 = Math.min(d1, 30);
    return { d1: a1, d2: d2 === 31 && a1 === 30 ? 30 : d2 };
  });
}

function thirtyU360(start: ISODate, end: ISODate): DayCount {
  const febEnd1 = isLastDayOfFebruary(start);
  const febEnd2 = isLastDayOfFebruary(end);
  return thirty360(start, end, (d1, d2) => {
    let a1 = d1;
    let a2 = d2;
    if (febEnd1 && febEnd2) a2 = 30;
    if (febEnd1) a1 = 30;
    if (a2 === 31 && a1 >= 30) a2 = 30;
    if (a1 === 31) a1 = 30;
    return { d1: a1, d2: a2 };
  });
}

function thirtyE360(start: ISODate, end: ISODate): DayCount {
  return thirty360(start, end, (d1, d2) => ({ d1: Math.min(d1, 30), d2: Math.min(d2, 30) }));
}

function thirtyE360Isda(start: ISODate, end: ISODate, maturityDate?: ISODate): DayCount {
  const keepFebruaryEnd = end === maturityDate && dateParts(end).month === 2;
  return thirty360(start, end, (d1, d2) => ({
    d1: isLastDayOfMonth(start) ? 30 : d1,
    d2: isLastDayOfMonth(end) && !keepFebruaryEnd ? 30 : d2,
  }));
}

// ── Actual day counts ─────────────────────────────────────────────────────────

function actualOver(basis: number, start: ISODate, end: ISODate): DayCount {
  const days = daysBetween(start, end);
  return { days, yearFraction: days / basis };
}

/** Days falling in each calendar year, each over that year's length. */
function actualActualIsda(start: ISODate, end: ISODate): DayCount {
  const days = daysBetween(start, end);
  const y1 = dateParts(start).year;
  const y2 = dateParts(end).year;
  if (y1 === y2) return { days, yearFraction: days / daysInYear(y1) };

  const headDays = daysBetween(start, fromParts(y1 + 1, 1, 1));
  const tailDays = daysBetween(fromParts(y2, 1, 1), end);
  const yearFraction = headDays / daysInYear(y1) + (y2 - y1 - 1) + tailDays / daysInYear(y2);
  return { days, yearFraction };
}

function containsLeapDay(after: ISODate, through: ISODate): boolean {
  const y1 = dateParts(after).year;
  const y2 = dateParts(through).year;
  for (let y = y1; y <= y2; y++) {
    if (!isLeapYear(y)) continue;
    const leapDay = fromParts(y, 2, 29);
    if (leapDay > after && leapDay <= through) return true;
  }
  return false;
}

/**
 * Whole years are stepped back from the end date; the remaining stub is
 * divided by 366 when it spans a Feb 29.
 */
function actualActualAfb(start: ISODate, end: ISODate): DayCount {
  const days = daysBetween(start, end);
  let wholeYears = 0;
  let cursor = end;
  for (;;) {
    const previous = addMonths(cursor, -12);
    if (previous < start) break;
    wholeYears += 1;
    cursor = previous;
  }
  const stubDays = daysBetween(start, cursor);
  const basis = containsLeapDay(start, cursor) ? 366 : 365;
  return { days, yearFraction: wholeYears + stubDays / basis };
}

// ── Public API ────────────────────────────────────────────────────────────────

function assertNever(value: never): never {
  throw new Error(`Unhandled compounding method: ${String(value)}`);
}

export function dayCount(
  convention: CompoundingMethod,
  start: ISODate,
  end: ISODate,
  options: DayCountOptions = {}
): DayCount {
  if (end <= start) throw new InvalidDateRangeError(start, end);

  switch (convention) {
    case '30A/360':      return thirtyA360(start, end);
    case '30U/360':      return thirtyU360(start, end);
    case '30E/360':      return thirtyE360(start, end);
    case '30E/360 ISDA': return thirtyE360Isda(start, end, options.maturityDate);
    case 'A/360':        return actualOver(360, start, end);
    case 'A/365F':       return actualOver(365, start, end);
    case 'A/A ISDA':     return actualActualIsda(start, end);
    case 'A/A AFB':      return actualActualAfb(start, end);
    default:             return assertNever(convention);
  }
}

export function yearFraction(
  convention: CompoundingMethod,
  start: ISODate,
  end: ISODate,
  options?: DayCountOptions
): number {
  return dayCount(convention, start, end, options).yearFraction;
}
