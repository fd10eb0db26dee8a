import { effectiveAnnualRate, xirr } from '../../loan/irr';
import { generateSchedule } from '../../loan/schedule';
import { SpecialPaymentRegistry } from '../../loan/specialPayments';
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

describe('xirr', () => {
  test('one year, one repayment', () => {
    const rate = xirr([
      { date: '2023-01-01', amount: -1000 },
      { date: '2024-01-01', amount: 1100 },
    ]);
    expect(rate).toBeCloseTo(0.1, 8);
  });

  test('null without a sign change', () => {
    expect(xirr([
      { date: '2023-01-01', amount: 1000 },
      { date: '2024-01-01', amount: 1100 },
    ])).toBeNull();
  });

  test('null for fewer than two flows', () => {
    expect(xirr([{ date: '2023-01-01', amount: -1000 }])).toBeNull();
  });
});

describe('effectiveAnnualRate', () => {
  test('monthly 6% nominal compounds to about 6.16% a year', () => {
    const payments = generateSchedule(LOAN, SpecialPaymentRegistry.forLoan(LOAN));
    expect(effectiveAnnualRate(payments)).toBeCloseTo(0.06164, 4);
  });

  test('zero for an interest-free loan', () => {
    const loan: LoanConfiguration = { ...LOAN, annualRate: 0 };
    expect(effectiveAnnualRate(generateSchedule(loan, SpecialPaymentRegistry.forLoan(loan)))).toBeCloseTo(0, 8);
  });

  test('null for an empty schedule', () => {
    expect(effectiveAnnualRate([])).toBeNull();
  });
});
