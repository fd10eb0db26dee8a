/**
 * Tests for /api/schedules routes.
 */

jest.mock('../../lib/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import request from 'supertest';
import { createApp } from '../../app';
import logger from '../../lib/logger';

const app = createApp();

const LOAN = {
  principal: 120000,
  annualRate: 0.06,
  startDate: '2024-01-01',
  term: { periods: 12 },
};

afterEach(() => jest.clearAllMocks());

describe('POST /api/schedules', () => {
  test('returns the schedule with defaults applied', async () => {
    const res = await request(app).post('/api/schedules').send({ loan: LOAN });
    expect(res.status).toBe(200);
    expect(res.body.data.payments).toHaveLength(12);
    expect(res.body.data.payments[0]).toMatchObject({ period: 1, interest: 600, installment: 10327.97 });
    expect(res.body.data.summary).toMatchObject({ periods: 12, payoffDate: '2025-01-01', totalInterest: 3935.66 });
    expect(res.body.data.effectiveAnnualRate).toBeCloseTo(0.06164, 4);
  });

  test('accepts a term in years', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: { ...LOAN, term: { years: 1 }, loanType: 'LINEAR' } });
    expect(res.status).toBe(200);
    expect(res.body.data.payments[11].installment).toBe(10050);
  });

  test('applies special payments', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: LOAN, specialPayments: [{ amount: 20000, date: '2024-07-01' }] });
    expect(res.status).toBe(200);
    expect(res.body.data.summary.periods).toBe(11);
    expect(res.body.data.summary.totalSpecialPayments).toBe(20000);
  });

  test('logs the calculated schedule', async () => {
    await request(app).post('/api/schedules').send({ loan: LOAN });
    expect(logger.info).toHaveBeenCalledWith(
      { loanType: 'ANNUITY', periods: 12, payoffDate: '2025-01-01' },
      'Schedule calculated'
    );
  });

  test('returns 400 with issues for invalid input', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: { ...LOAN, principal: -5, startDate: '2024-02-30' } });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid request');
    const paths = res.body.issues.map((i: { path: string }) => i.path);
    expect(paths).toContain('loan.principal');
    expect(paths).toContain('loan.startDate');
  });

  test('returns 400 when the first payment date precedes the start', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: { ...LOAN, firstPaymentDate: '2023-12-01' } });
    expect(res.status).toBe(400);
    expect(res.body.issues).toEqual([
      { path: 'loan.firstPaymentDate', message: 'firstPaymentDate must be after startDate' },
    ]);
  });

  test('returns 422 for a special payment outside the loan lifetime', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: LOAN, specialPayments: [{ amount: 100, date: '2026-01-01' }] });
    expect(res.status).toBe(422);
    expect(res.body.code).toBe('INVALID_SPECIAL_PAYMENT');
    expect(logger.warn).toHaveBeenCalled();
  });

  test('returns 422 for negative amortization', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .send({ loan: { ...LOAN, installmentAmount: 500 } });
    expect(res.status).toBe(422);
    expect(res.body.code).toBe('NEGATIVE_AMORTIZATION');
  });

  test('returns 400 for malformed JSON', async () => {
    const res = await request(app)
      .post('/api/schedules')
      .set('Content-Type', 'application/json')
      .send('{"loan": ');
    expect(res.status).toBe(400);
  });
});

describe('POST /api/schedules/summary', () => {
  test('returns the summary without rows', async () => {
    const res = await request(app)
      .post('/api/schedules/summary')
      .send({ loan: { ...LOAN, loanType: 'INTEREST_ONLY' } });
    expect(res.status).toBe(200);
    expect(res.body.data.payments).toBeUndefined();
    expect(res.body.data).toMatchObject({ totalInterest: 7200, totalPaid: 127200, periods: 12 });
  });
});

describe('fallbacks', () => {
  test('GET /health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  test('unknown routes return 404', async () => {
    const res = await request(app).get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
