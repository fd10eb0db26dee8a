/**
 * Tests for /api/day-count.
 */

jest.mock('../../lib/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import request from 'supertest';
import { createApp } from '../../app';

const app = createApp();

describe('GET /api/day-count', () => {
  test('returns the year fraction for a convention', async () => {
    const res = await request(app)
      .get('/api/day-count')
      .query({ convention: '30E/360 ISDA', start: '2023-01-01', end: '2023-07-01' });
    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({
      convention: '30E/360 ISDA', start: '2023-01-01', end: '2023-07-01', days: 180, yearFraction: 0.5,
    });
  });

  test('passes the maturity date through', async () => {
    const res = await request(app)
      .get('/api/day-count')
      .query({ convention: '30E/360 ISDA', start: '2024-01-31', end: '2024-02-29', maturityDate: '2024-02-29' });
    expect(res.body.data.days).toBe(29);
  });

  test('returns 400 for an unknown convention', async () => {
    const res = await request(app)
      .get('/api/day-count')
      .query({ convention: 'ACT/ACT', start: '2023-01-01', end: '2023-07-01' });
    expect(res.status).toBe(400);
    expect(res.body.issues[0].path).toBe('convention');
  });

  test('returns 422 when the end is not after the start', async () => {
    const res = await request(app)
      .get('/api/day-count')
      .query({ convention: 'A/360', start: '2023-07-01', end: '2023-01-01' });
    expect(res.status).toBe(422);
    expect(res.body.code).toBe('INVALID_DATE_RANGE');
  });
});
