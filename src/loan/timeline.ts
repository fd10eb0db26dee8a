import { ISODate, addMonths, endOfMonth, isLastDayOfMonth } from '../lib/dates';
import { InvalidDateRangeError } from './errors';
import { LoanConfiguration, PAYMENTS_PER_YEAR, PaymentFrequency } from './types';

export function monthsPerPeriod(frequency: PaymentFrequency): number {
  return 12 / PAYMENTS_PER_YEAR[frequency];
}

/**
 * Regular payment dates of a loan, in order. Each date is derived from the
 * anchor rather than from its predecessor, so a 31st stays a 31st where the
 * month allows. An end-date term closes with a stub period ending on that
 * date.
 *
 * The anchor is the first payment date when given, and is kept as is. Without
 * one it is one period after the start date, or with `paymentEndOfMonth` the
 * end of the start month (the end of the next period's month when the start
 * already is a month end). `paymentEndOfMonth` moves every later date to the
 * end of its month.
 */
export function paymentDates(loan: LoanConfiguration): ISODate[] {
  const step = monthsPerPeriod(loan.frequency);
  if (loan.firstPaymentDate !== undefined && loan.firstPaymentDate <= loan.startDate) {
    throw new InvalidDateRangeError(loan.startDate, loan.firstPaymentDate);
  }
  const anchor = loan.firstPaymentDate ?? defaultAnchor(loan, step);
  const dateAt = (k: number): ISODate => {
    if (k === 0) return anchor;
    const d = addMonths(anchor, k * step);
    return loan.paymentEndOfMonth ? endOfMonth(d) : d;
  };

  if ('periods' in loan.term) {
    return Array.from({ length: loan.term.periods }, (_, k) => dateAt(k));
  }

  const { endDate } = loan.term;
  if (endDate <= loan.startDate) throw new InvalidDateRangeError(loan.startDate, endDate);
  const dates: ISODate[] = [];
  for (let k = 0; ; k++) {
    const d = dateAt(k);
    if (d >= endDate) break;
    dates.push(d);
  }
  dates.push(endDate);
  return dates;
}

function defaultAnchor(loan: LoanConfiguration, step: number): ISODate {
  if (!loan.paymentEndOfMonth) return addMonths(loan.startDate, step);
  return isLastDayOfMonth(loan.startDate)
    ? endOfMonth(addMonths(loan.startDate, step))
    : endOfMonth(loan.startDate);
}

/** Date of the last scheduled payment. */
export function maturityDate(loan: LoanConfiguration): ISODate {
  const dates = paymentDates(loan);
  return dates.length > 0 ? dates[dates.length - 1] : loan.startDate;
}
