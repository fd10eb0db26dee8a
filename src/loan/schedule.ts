import logger from '../lib/logger';
import { annuityPayment, roundMoney } from '../lib/money';
import { dayCount } from './dayCount';
import { NegativeAmortizationError } from './errors';
import { SpecialPaymentRegistry } from './specialPayments';
import { paymentDates } from './timeline';
import { LoanConfiguration, LoanType, PAYMENTS_PER_YEAR, Payment } from './types';

/** Running installment state, replaced when a REDUCE_INSTALLMENT payment re-amortizes the loan. */
export type InstallmentPlan =
  | { readonly loanType: 'ANNUITY'; readonly installment: number }
  | { readonly loanType: 'LINEAR'; readonly principalPerPeriod: number }
  | { readonly loanType: 'INTEREST_ONLY' };

function assertNever(value: never): never {
  throw new Error(`Unhandled loan type: ${JSON.stringify(value)}`);
}

/**
 * Installment terms for `balance` repaid over `periods` principal-bearing
 * periods at `periodicRate`. `override` replaces the computed figure.
 */
export function planInstallments(
  loanType: LoanType,
  balance: number,
  periods: number,
  periodicRate: number,
  override?: number
): InstallmentPlan {
  switch (loanType) {
    case 'ANNUITY':
      return {
        loanType: 'ANNUITY',
        installment: override ?? roundMoney(annuityPayment(balance, periodicRate, periods)),
      };
    case 'LINEAR':
      return {
        loanType: 'LINEAR',
        principalPerPeriod: override ?? (periods > 0 ? roundMoney(balance / periods) : 0),
      };
    case 'INTEREST_ONLY':
      return { loanType: 'INTEREST_ONLY' };
    default:
      return assertNever(loanType);
  }
}

/**
 * `interest` is what the period actually accrued; `regularInterest` is what a
 * regular-length period at the nominal periodic rate would accrue on the same
 * balance. An installment below the regular figure can never amortize the loan.
 * A stub or a long actual-day month that accrues more than the installment pays
 * its interest with no scheduled principal.
 */
function scheduledPrincipal(plan: InstallmentPlan, interest: number, regularInterest: number, period: number): number {
  switch (plan.loanType) {
    case 'ANNUITY':
      if (plan.installment < regularInterest) {
        throw new NegativeAmortizationError(period, regularInterest, plan.installment);
      }
      return Math.max(0, roundMoney(plan.installment - interest));
    case 'LINEAR':
      return plan.principalPerPeriod;
    case 'INTEREST_ONLY':
      return 0;
    default:
      return assertNever(plan);
  }
}

/**
 * Period-by-period amortization of a loan.
 *
 * Interest accrues on the opening balance over `(start, end]` under the
 * loan's day-count convention. Special payments dated inside a period are
 * applied at its end, after the scheduled principal, each capped at what is
 * still owed. The final configured period always clears the balance, and the
 * loop stops at the first period that leaves nothing outstanding.
 *
 * Several special payments in one period are applied in registry order; when
 * any of them asks to reduce the installment, the loan is re-amortized once,
 * on the balance left after all of them.
 */
export function generateSchedule(loan: LoanConfiguration, registry: SpecialPaymentRegistry): Payment[] {
  const dates        = paymentDates(loan);
  const totalPeriods = dates.length;
  const maturity     = dates[totalPeriods - 1];
  const interestOnly = Math.min(loan.interestOnlyPeriods ?? 0, totalPeriods);
  const periodicRate = loan.annualRate / PAYMENTS_PER_YEAR[loan.frequency];

  let balance = roundMoney(loan.principal);
  let plan = planInstallments(
    loan.loanType, balance, totalPeriods - interestOnly, periodicRate, loan.installmentAmount
  );
  let periodStart = loan.startDate;
  const payments: Payment[] = [];

  for (let i = 0; i < totalPeriods && balance > 0; i++) {
    const period    = i + 1;
    const periodEnd = dates[i];
    const { yearFraction } = dayCount(loan.compounding, periodStart, periodEnd, { maturityDate: maturity });
    const interest = roundMoney(balance * loan.annualRate * yearFraction);
    const regularInterest = roundMoney(balance * periodicRate);

    let principal: number;
    if (period === totalPeriods)      principal = balance;
    else if (period <= interestOnly)  principal = 0;
    else                              principal = Math.min(scheduledPrincipal(plan, interest, regularInterest, period), balance);

    let special = 0;
    let reamortize = false;
    for (const extra of registry.paymentsBetween(periodStart, periodEnd)) {
      const owed = roundMoney(balance - principal - special);
      special = roundMoney(special + Math.min(roundMoney(extra.amount), owed));
      if (extra.policy === 'REDUCE_INSTALLMENT') reamortize = true;
    }

    const closing     = roundMoney(balance - principal - special);
    const installment = roundMoney(interest + principal);
    payments.push({
      period,
      startDate: periodStart,
      endDate: periodEnd,
      yearFraction,
      openingBalance: balance,
      interest,
      principal,
      specialPrincipal: special,
      installment,
      totalPayment: roundMoney(installment + special),
      balance: closing,
    });

    if (reamortize && closing > 0) {
      plan = planInstallments(loan.loanType, closing, totalPeriods - Math.max(period, interestOnly), periodicRate);
    }
    balance = closing;
    periodStart = periodEnd;
  }

  logger.debug(
    { loanType: loan.loanType, configured: totalPeriods, periods: payments.length, specialPayments: registry.size },
    payments.length < totalPeriods ? 'Schedule paid off early' : 'Schedule generated'
  );
  return payments;
}
