import type { Server } from 'http';
import { config } from './core/config';
import { pool } from './core/db';
import { logger } from './core/logger';
import { createApp } from './app';
import { runStartupTasks } from './loaders/startup';
import { initSchedulers, stopSchedulers } from './schedulers';
import { getErrorMessage } from './utils/errorUtils';

let isShuttingDown = false;
let httpServer: Server | null = null;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception', { error });
  if (error.message.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: reason });
});

process.on('SIGTERM', () => {
  logger.info('[Process] Received SIGTERM signal');
  void gracefulShutdown('SIGTERM');
});

process.on('SIGINT', () => {
  logger.info('[Process] Received SIGINT signal');
  void gracefulShutdown('SIGINT');
});

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    stopSchedulers();

    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        setTimeout(resolve, 5000);
      });
    }

    await pool.end();

    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

async function main() {
  logger.info(`[Startup] Environment: ${config.env}`);
  logger.info(`[Startup] DATABASE_URL: ${config.databaseUrl ? 'configured' : 'MISSING'}`);

  await runStartupTasks();

  const app = createApp();
  httpServer = app.listen(config.port, '0.0.0.0', () => {
    logger.info(`[Startup] HTTP server listening on port ${config.port}`);
  });
  httpServer.on('error', (err: unknown) => {
    logger.error('[Startup] Server failed to start', { error: err });
    process.exit(1);
  });

  initSchedulers();
}

main().catch((err: unknown) => {
  logger.error(`[Startup] Fatal: ${getErrorMessage(err)}`, { error: err });
  process.exit(1);
});
