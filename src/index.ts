import { config } from './config';
import { createApp } from './app';
import logger from './lib/logger';

// ── Process-level error handlers ──────────────────────────────────────────────
process.on('unhandledRejection', (reason) => {
  logger.error({ reason: reason instanceof Error ? reason.message : String(reason) }, 'Unhandled Promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err: err.message }, 'Uncaught exception, shutting down');
  process.exit(1);
});

function main(): void {
  logger.info({ env: config.nodeEnv }, 'Starting loan-schedule-service');

  const server = createApp().listen(config.port, () => {
    logger.info({ port: config.port }, 'API listening');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Graceful shutdown initiated');
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT',  () => shutdown('SIGINT'));
}

main();
