import { roundMoney } from '../lib/money';
import { EmptyScheduleError } from './errors';
import type { LoanSummary, Payment } from './types';

export function summarizeSchedule(payments: readonly Payment[]): LoanSummary {
  if (payments.length === 0) throw new EmptyScheduleError();

  let totalInterest = 0;
  let totalPrincipal = 0;
  let totalSpecialPayments = 0;
  for (const p of payments) {
    totalInterest        += p.interest;
    totalPrincipal       += p.principal;
    totalSpecialPayments += p.specialPrincipal;
  }

  const first = payments[0];
  const last  = payments[payments.length - 1];
  const totalRepaid = roundMoney(totalPrincipal + totalSpecialPayments);
  const totalPaid   = roundMoney(totalRepaid + totalInterest);

  return {
    loanAmount: first.openingBalance,
    totalInterest: roundMoney(totalInterest),
    totalPrincipal: roundMoney(totalPrincipal),
    totalSpecialPayments: roundMoney(totalSpecialPayments),
    totalRepaid,
    totalPaid,
    repaymentToPrincipal: totalRepaid === 0 ? 0 : roundMoney(totalPaid / totalRepaid),
    periods: payments.length,
    payoffDate: last.endDate,
    residualBalance: last.balance,
  };
}
