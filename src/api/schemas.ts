import { z } from 'zod';
import { config } from '../config';
import { isValidISODate } from '../lib/dates';
import { monthsPerPeriod, paymentDates } from '../loan/timeline';
import {
  COMPOUNDING_METHODS,
  LOAN_TYPES,
  LoanConfiguration,
  LoanTerm,
  PAYMENTS_PER_YEAR,
  PAYMENT_FREQUENCIES,
  PaymentFrequency,
  SPECIAL_PAYMENT_POLICIES,
} from '../loan/types';

// A 1200-period annual loan from the last accepted year still ends before 9999.
const MIN_YEAR = 1900;
const MAX_YEAR = 2999;

const isoDate = z
  .string()
  .refine(isValidISODate, { message: 'Expected a valid YYYY-MM-DD date' })
  .refine(s => {
    const year = parseInt(s.slice(0, 4), 10);
    return year >= MIN_YEAR && year <= MAX_YEAR;
  }, { message: `Year must be between ${MIN_YEAR} and ${MAX_YEAR}` });
const amount  = z.number().finite().positive();

const termSchema = z.union([
  z.object({ periods: z.number().int().positive().max(config.maxPeriods) }).strict(),
  z.object({ months: z.number().int().positive().max(config.maxPeriods * 12) }).strict(),
  z.object({ years: z.number().int().positive().max(config.maxPeriods) }).strict(),
  z.object({ endDate: isoDate }).strict(),
]);

const loanFields = z.object({
  principal:           z.number().finite().min(0.01),
  annualRate:          z.number().finite().min(0).max(1),   // decimal, 0.06 = 6%
  startDate:           isoDate,
  term:                termSchema,
  frequency:           z.enum(PAYMENT_FREQUENCIES).default('MONTHLY'),
  loanType:            z.enum(LOAN_TYPES).default('ANNUITY'),
  compounding:         z.enum(COMPOUNDING_METHODS).default('30E/360 ISDA'),
  firstPaymentDate:    isoDate.optional(),
  paymentEndOfMonth:   z.boolean().optional(),
  interestOnlyPeriods: z.number().int().min(0).optional(),
  installmentAmount:   amount.optional(),
});

type LoanFields = z.infer<typeof loanFields>;

function resolveTerm(term: LoanFields['term'], frequency: PaymentFrequency): LoanTerm {
  if ('periods' in term) return { periods: term.periods };
  if ('months' in term)  return { periods: term.months / monthsPerPeriod(frequency) };
  if ('years' in term)   return { periods: term.years * PAYMENTS_PER_YEAR[frequency] };
  return { endDate: term.endDate };
}

function toLoanConfiguration(loan: LoanFields): LoanConfiguration {
  return { ...loan, term: resolveTerm(loan.term, loan.frequency) };
}

// Cross-field rules; only runs once every field has parsed cleanly.
function checkLoan(loan: LoanFields, ctx: z.RefinementCtx): void {
  if (loan.firstPaymentDate !== undefined && loan.firstPaymentDate <= loan.startDate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['firstPaymentDate'], message: 'firstPaymentDate must be after startDate' });
    return;
  }
  if ('endDate' in loan.term && loan.term.endDate <= loan.startDate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['term', 'endDate'], message: 'endDate must be after startDate' });
    return;
  }
  if ('months' in loan.term && loan.term.months % monthsPerPeriod(loan.frequency) !== 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['term', 'months'],
      message: `months must be a multiple of ${monthsPerPeriod(loan.frequency)} for ${loan.frequency} payments`,
    });
    return;
  }

  if (loan.loanType === 'INTEREST_ONLY' && loan.installmentAmount !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['installmentAmount'],
      message: 'installmentAmount does not apply to INTEREST_ONLY loans',
    });
    return;
  }

  const periods = paymentDates(toLoanConfiguration(loan)).length;
  if (periods > config.maxPeriods) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['term'], message: `term exceeds ${config.maxPeriods} periods` });
  }
  if (loan.interestOnlyPeriods !== undefined && loan.interestOnlyPeriods >= periods) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['interestOnlyPeriods'],
      message: `interestOnlyPeriods must be less than the ${periods} scheduled periods`,
    });
  }
}

export const loanSchema = loanFields
  .pipe(z.custom<LoanFields>().superRefine(checkLoan))
  .transform(toLoanConfiguration);

export const specialPaymentSchema = z.object({
  amount,
  date:   isoDate,
  policy: z.enum(SPECIAL_PAYMENT_POLICIES).default('REDUCE_TERM'),
});

export const recurringSpecialPaymentSchema = z.object({
  amount,
  firstDate: isoDate,
  count:     z.number().int().positive().max(1200),
  frequency: z.enum(PAYMENT_FREQUENCIES).default('MONTHLY'),
  policy:    z.enum(SPECIAL_PAYMENT_POLICIES).default('REDUCE_TERM'),
});

export const scheduleRequestSchema = z.object({
  loan:                     loanSchema,
  specialPayments:          z.array(specialPaymentSchema).max(1000).default([]),
  recurringSpecialPayments: z.array(recurringSpecialPaymentSchema).max(100).default([]),
});

export type ScheduleRequest = z.infer<typeof scheduleRequestSchema>;

export const dayCountQuerySchema = z.object({
  convention:   z.enum(COMPOUNDING_METHODS),
  start:        isoDate,
  end:          isoDate,
  maturityDate: isoDate.optional(),
});

/** Flattens zod issues into `{ path, message }` pairs for a 400 response. */
export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
}
