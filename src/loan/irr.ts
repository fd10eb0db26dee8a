import { ISODate, daysBetween } from '../lib/dates';
import type { Payment } from './types';

interface CashFlow {
  date: ISODate;
  amount: number;
}

function xnpv(rate: number, flows: readonly CashFlow[]): number {
  const t0 = flows[0].date;
  return flows.reduce((sum, cf) => sum + cf.amount / Math.pow(1 + rate, daysBetween(t0, cf.date) / 365), 0);
}

/**
 * Annualized internal rate of return for irregular cash flows (XIRR).
 *
 * Solved by bisection over [-99.99%, 1000%]; returns null when XNPV does not
 * change sign over that range.
 */
export function xirr(flows: readonly CashFlow[]): number | null {
  if (flows.length < 2) return null;

  let lo = -0.9999;
  let hi = 10;
  const npvLo = xnpv(lo, flows);
  const npvHi = xnpv(hi, flows);
  if (npvLo === 0) return lo;
  if (npvHi === 0) return hi;
  if (npvLo * npvHi > 0) return null;

  for (let i = 0; i < 200; i++) {
    const mid  = (lo + hi) / 2;
    const fMid = xnpv(mid, flows);
    if (fMid === 0 || hi - lo < 1e-12) return mid;
    if (fMid * npvLo > 0) lo = mid;
    else hi = mid;
  }
  return (lo + hi) / 2;
}

/**
 * Effective annual cost of a loan: the opening balance is paid out on the
 * first period's start date and every row's total payment comes back on its
 * end date.
 */
export function effectiveAnnualRate(payments: readonly Payment[]): number | null {
  if (payments.length === 0) return null;
  const flows: CashFlow[] = [
    { date: payments[0].startDate, amount: -payments[0].openingBalance },
    ...payments.map(p => ({ date: p.endDate, amount: p.totalPayment })),
  ];
  return xirr(flows);
}
