import pino from 'pino';
import { config } from '../config';

const logger = pino({
  level: config.logLevel,
  transport:
    !config.isProd && !config.isTest
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss' } }
      : undefined,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: { service: 'loan-schedule-service' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
