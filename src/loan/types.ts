import type { ISODate } from '../lib/dates';

export type { ISODate };

// ── Closed tag sets ───────────────────────────────────────────────────────────

export const LOAN_TYPES = ['ANNUITY', 'LINEAR', 'INTEREST_ONLY'] as const;
export type LoanType = typeof LOAN_TYPES[number];

export const COMPOUNDING_METHODS = [
  '30A/360',
  '30U/360',
  '30E/360',
  '30E/360 ISDA',
  'A/360',
  'A/365F',
  'A/A ISDA',
  'A/A AFB',
] as const;
export type CompoundingMethod = typeof COMPOUNDING_METHODS[number];

export const PAYMENT_FREQUENCIES = ['MONTHLY', 'QUARTERLY', 'SEMI_ANNUAL', 'ANNUAL'] as const;
export type PaymentFrequency = typeof PAYMENT_FREQUENCIES[number];

export const PAYMENTS_PER_YEAR: Record<PaymentFrequency, number> = {
  MONTHLY:     12,
  QUARTERLY:   4,
  SEMI_ANNUAL: 2,
  ANNUAL:      1,
};

export const SPECIAL_PAYMENT_POLICIES = ['REDUCE_TERM', 'REDUCE_INSTALLMENT'] as const;
export type SpecialPaymentPolicy = typeof SPECIAL_PAYMENT_POLICIES[number];

// ── Inputs ────────────────────────────────────────────────────────────────────

export type LoanTerm =
  | { readonly periods: number }
  | { readonly endDate: ISODate };

export interface LoanConfiguration {
  readonly principal: number;
  /** Nominal annual rate as a decimal: 0.06 is 6%. */
  readonly annualRate: number;
  /** Disbursement date; interest accrues from here. */
  readonly startDate: ISODate;
  readonly term: LoanTerm;
  readonly frequency: PaymentFrequency;
  readonly loanType: LoanType;
  readonly compounding: CompoundingMethod;
  /** Shortens or stretches the first period. Defaults to one period after `startDate`. */
  readonly firstPaymentDate?: ISODate;
  readonly paymentEndOfMonth?: boolean;
  /** Leading periods that pay interest only (ANNUITY and LINEAR). */
  readonly interestOnlyPeriods?: number;
  /** ANNUITY: total installment. LINEAR: principal component. */
  readonly installmentAmount?: number;
}

export interface SpecialPayment {
  readonly amount: number;
  readonly date: ISODate;
  readonly policy: SpecialPaymentPolicy;
}

export interface RecurringSpecialPayment {
  readonly amount: number;
  readonly firstDate: ISODate;
  readonly count: number;
  readonly frequency: PaymentFrequency;
  readonly policy: SpecialPaymentPolicy;
}

// ── Outputs ───────────────────────────────────────────────────────────────────

export interface Payment {
  readonly period: number;
  readonly startDate: ISODate;
  readonly endDate: ISODate;
  readonly yearFraction: number;
  readonly openingBalance: number;
  readonly interest: number;
  readonly principal: number;
  readonly specialPrincipal: number;
  /** interest + principal */
  readonly installment: number;
  /** installment + specialPrincipal */
  readonly totalPayment: number;
  readonly balance: number;
}

export interface LoanSummary {
  readonly loanAmount: number;
  readonly totalInterest: number;
  readonly totalPrincipal: number;
  readonly totalSpecialPayments: number;
  readonly totalRepaid: number;
  readonly totalPaid: number;
  /** totalPaid / totalRepaid, two decimals */
  readonly repaymentToPrincipal: number;
  readonly periods: number;
  readonly payoffDate: ISODate;
  readonly residualBalance: number;
}
