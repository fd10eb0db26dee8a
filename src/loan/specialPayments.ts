import { ISODate, addMonths, isValidISODate } from '../lib/dates';
import { InvalidSpecialPaymentError } from './errors';
import { maturityDate, monthsPerPeriod } from './timeline';
import type { LoanConfiguration, RecurringSpecialPayment, SpecialPayment } from './types';

export interface LoanLifetime {
  /** Exclusive: nothing can be paid back on the disbursement day. */
  start: ISODate;
  /** Inclusive: the last scheduled payment date. */
  end: ISODate;
}

/**
 * Append-only, date-ordered collection of ad-hoc extra payments for one
 * schedule computation. Entries sharing a date keep insertion order.
 */
export class SpecialPaymentRegistry {
  private readonly entries: SpecialPayment[] = [];

  constructor(readonly lifetime: LoanLifetime) {}

  static forLoan(loan: LoanConfiguration): SpecialPaymentRegistry {
    return new SpecialPaymentRegistry({ start: loan.startDate, end: maturityDate(loan) });
  }

  get size(): number {
    return this.entries.length;
  }

  all(): readonly SpecialPayment[] {
    return this.entries;
  }

  add(payment: SpecialPayment): void {
    this.validate(payment);
    this.insert(payment);
  }

  /** Expands a recurring plan; nothing is added unless every instalment is valid. */
  addRecurring(plan: RecurringSpecialPayment): void {
    if (!Number.isInteger(plan.count) || plan.count < 1) {
      throw new InvalidSpecialPaymentError(`Recurring special payment count must be a positive integer, got ${plan.count}`);
    }
    const step = monthsPerPeriod(plan.frequency);
    const expanded: SpecialPayment[] = Array.from({ length: plan.count }, (_, i) => ({
      amount: plan.amount,
      date:   addMonths(plan.firstDate, i * step),
      policy: plan.policy,
    }));
    expanded.forEach(p => this.validate(p));
    expanded.forEach(p => this.insert(p));
  }

  *paymentsOn(date: ISODate): IterableIterator<SpecialPayment> {
    for (const p of this.entries) {
      if (p.date > date) return;
      if (p.date === date) yield p;
    }
  }

  /** Entries dated in `(after, through]`. */
  *paymentsBetween(after: ISODate, through: ISODate): IterableIterator<SpecialPayment> {
    for (const p of this.entries) {
      if (p.date > through) return;
      if (p.date > after) yield p;
    }
  }

  private validate(payment: SpecialPayment): void {
    if (!Number.isFinite(payment.amount) || payment.amount <= 0) {
      throw new InvalidSpecialPaymentError(`Special payment amount must be positive, got ${payment.amount}`);
    }
    if (!isValidISODate(payment.date)) {
      throw new InvalidSpecialPaymentError(`Special payment date ${payment.date} is not a valid YYYY-MM-DD date`);
    }
    const { start, end } = this.lifetime;
    if (payment.date <= start || payment.date > end) {
      throw new InvalidSpecialPaymentError(
        `Special payment date ${payment.date} is outside the loan lifetime (${start}, ${end}]`
      );
    }
  }

  private insert(payment: SpecialPayment): void {
    const entry = Object.freeze({ ...payment });
    const at = this.entries.findIndex(p => p.date > entry.date);
    if (at === -1) this.entries.push(entry);
    else this.entries.splice(at, 0, entry);
  }
}
