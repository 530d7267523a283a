// Process-level error handlers, graceful shutdown and request timeouts

import type { Server } from 'http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger, errorMessage } from '@/services/logger';

const log = logger.getSubLogger({ name: 'process' });

type Cleanup = () => Promise<void>;

let serverInstance: Server | null = null;
const cleanups: Cleanup[] = [];

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs during shutdown after the HTTP server stops accepting requests. */
export function registerCleanup(fn: Cleanup): void {
  cleanups.push(fn);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('process:unhandled_rejection', {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    if (process.env.NODE_ENV !== 'production') {
      void gracefulShutdown('unhandledRejection', 1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    log.fatal('process:uncaught_exception', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      log.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

async function closeServer(): Promise<void> {
  const server = serverInstance;
  if (!server) return;
  await new Promise<void>((resolve) => {
    server.close((err) => {
      if (err) log.warn('process:server_close_failed', { error: err.message });
      else log.info('process:server_closed');
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  log.info('process:shutdown', { reason });

  // Give ongoing requests time to complete
  const forced = setTimeout(() => {
    log.error('process:forced_shutdown');
    process.exit(1);
  }, 15000);
  forced.unref();

  let code = exitCode;
  try {
    await closeServer();
    for (const fn of cleanups) {
      await fn();
    }
    log.info('process:cleanup_done');
  } catch (error) {
    log.error('process:cleanup_failed', { error: errorMessage(error) });
    code = 1;
  }
  clearTimeout(forced);
  process.exit(code);
}

export function requestTimeout(timeoutMs = 30000): RequestHandler {
  return (_req: Request, res: Response, next: NextFunction) => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(408).json({
          success: false,
          code: 'request_timeout',
          message: `Request exceeded ${timeoutMs}ms timeout`,
        });
      }
    }, timeoutMs);

    res.on('finish', () => clearTimeout(timeout));
    res.on('close', () => clearTimeout(timeout));

    next();
  };
}
