import dotenv from 'dotenv';
dotenv.config();

function get(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}
function getInt(key: string, fallback: number): number {
  const v = parseInt(get(key), 10);
  return Number.isFinite(v) && v > 0 ? v : fallback;
}

const nodeEnv = get('NODE_ENV', 'development');
const isProd  = nodeEnv === 'production';
const isTest  = nodeEnv === 'test';

function defaultLogLevel(): string {
  if (isTest) return 'silent';
  return isProd ? 'info' : 'debug';
}

export const config = {
  nodeEnv,
  isProd,
  isTest,
  port:          getInt('PORT', 3020),
  logLevel:      get('LOG_LEVEL', defaultLogLevel()),
  corsOrigin:    get('CORS_ORIGIN', 'http://localhost:5173'),

  // ── Request limits ─────────────────────────────────────────────────────
  rateLimitMax:  getInt('RATE_LIMIT_MAX', 200),   // per 15 minutes per IP
  bodyLimit:     get('BODY_LIMIT', '256kb'),
  maxPeriods:    getInt('MAX_PERIODS', 1200),     // 100 years of monthly payments
};
