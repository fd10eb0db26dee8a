import type { ISODate } from '../lib/dates';

export type LoanScheduleErrorCode =
  | 'INVALID_DATE_RANGE'
  | 'INVALID_SPECIAL_PAYMENT'
  | 'NEGATIVE_AMORTIZATION'
  | 'EMPTY_SCHEDULE';

/** Base for every deterministic input or configuration failure of the engine. */
export abstract class LoanScheduleError extends Error {
  abstract readonly code: LoanScheduleErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDateRangeError extends LoanScheduleError {
  readonly code = 'INVALID_DATE_RANGE';

  constructor(readonly start: ISODate, readonly end: ISODate) {
    super(`End date ${end} must be after start date ${start}`);
  }
}

export class InvalidSpecialPaymentError extends LoanScheduleError {
  readonly code = 'INVALID_SPECIAL_PAYMENT';

  constructor(message: string) {
    super(message);
  }
}

export class NegativeAmortizationError extends LoanScheduleError {
  readonly code = 'NEGATIVE_AMORTIZATION';

  constructor(readonly period: number, readonly interest: number, readonly installment: number) {
    super(
      `Interest of ${interest.toFixed(2)} in period ${period} exceeds the installment of ` +
      `${installment.toFixed(2)}; the balance would grow`
    );
  }
}

export class EmptyScheduleError extends LoanScheduleError {
  readonly code = 'EMPTY_SCHEDULE';

  constructor() {
    super('Cannot summarize an empty payment schedule');
  }
}
