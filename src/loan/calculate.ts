import { effectiveAnnualRate } from './irr';
import { generateSchedule } from './schedule';
import { SpecialPaymentRegistry } from './specialPayments';
import { summarizeSchedule } from './summary';
import type { LoanConfiguration, LoanSummary, Payment, RecurringSpecialPayment, SpecialPayment } from './types';

export interface LoanScheduleResult {
  payments: Payment[];
  summary: LoanSummary;
  effectiveAnnualRate: number | null;
}

/** Registry, schedule, summary and effective rate for one loan in one call. */
export function calculateLoanSchedule(
  loan: LoanConfiguration,
  specialPayments: readonly SpecialPayment[] = [],
  recurringSpecialPayments: readonly RecurringSpecialPayment[] = []
): LoanScheduleResult {
  const registry = SpecialPaymentRegistry.forLoan(loan);
  specialPayments.forEach(p => registry.add(p));
  recurringSpecialPayments.forEach(p => registry.addRecurring(p));

  const payments = generateSchedule(loan, registry);
  return {
    payments,
    summary: summarizeSchedule(payments),
    effectiveAnnualRate: effectiveAnnualRate(payments),
  };
}
