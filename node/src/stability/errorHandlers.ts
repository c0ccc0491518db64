// Process-level handlers, graceful shutdown and the per-request timeout.
import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { logger, errMessage } from '@/services/logger';
import { createErrorResponse } from '@/utils/errorResponse';

const SHUTDOWN_GRACE_MS = 15000;

export function setupProcessHandlers(server: Server, cleanup: () => Promise<void>): void {
  let shuttingDown = false;

  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`graceful shutdown: ${reason}`);

    const forced = setTimeout(() => {
      logger.error('forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    forced.unref();

    try {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await cleanup();
      process.exit(exitCode);
    } catch (err) {
      logger.error('error during shutdown', { err: errMessage(err) });
      process.exit(1);
    }
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      void shutdown(signal, 0);
    });
  }

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandled promise rejection', { err: errMessage(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.fatal('uncaught exception', { err: error.message, stack: error.stack });
    void shutdown('uncaughtException', 1);
  });
}

export function requestTimeout(timeoutMs: number) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(408).json(createErrorResponse(`Request exceeded ${timeoutMs}ms timeout`, undefined, 'request_timeout'));
      }
    }, timeoutMs);
    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));
    next();
  };
}
