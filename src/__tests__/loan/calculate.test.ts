import { calculateLoanSchedule } from '../../loan/calculate';
import { InvalidSpecialPaymentError } from '../../loan/errors';
import { LoanConfiguration } from '../../loan/types';

const LOAN: LoanConfiguration = {
  principal: 120_000,
  annualRate: 0.06,
  startDate: '2024-01-01',
  term: { periods: 12 },
  frequency: 'MONTHLY',
  loanType: 'ANNUITY',
  compounding: '30E/360 ISDA',
};

describe('calculateLoanSchedule', () => {
  test('returns rows, summary and effective rate together', () => {
    const result = calculateLoanSchedule(LOAN);
    expect(result.payments).toHaveLength(12);
    expect(result.summary.periods).toBe(12);
    expect(result.summary.totalPaid).toBe(123935.66);
    expect(result.effectiveAnnualRate).toBeCloseTo(0.06164, 4);
  });

  test('applies one-off and recurring special payments', () => {
    const result = calculateLoanSchedule(
      LOAN,
      [{ amount: 20_000, date: '2024-07-01', policy: 'REDUCE_TERM' }],
      [{ amount: 1_000, firstDate: '2024-02-01', count: 2, frequency: 'MONTHLY', policy: 'REDUCE_TERM' }]
    );
    expect(result.payments[0].specialPrincipal).toBe(1_000);
    expect(result.payments[1].specialPrincipal).toBe(1_000);
    expect(result.summary.totalSpecialPayments).toBe(22_000);
    expect(result.summary.totalRepaid).toBe(120_000);
  });

  test('propagates registry validation errors', () => {
    expect(() =>
      calculateLoanSchedule(LOAN, [{ amount: 100, date: '2026-01-01', policy: 'REDUCE_TERM' }])
    ).toThrow(InvalidSpecialPaymentError);
  });
});
