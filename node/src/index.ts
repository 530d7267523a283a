// Load environment variables FIRST so the logger picks up LOG_LEVEL
import 'dotenv/config';
import { loadAppConfig } from '@/config/app.config';
import { logger, errorMessage } from '@/services/logger';
import { buildPipelineDeps } from '@/services/pipeline-deps';
import { createApp } from '@/app';
import {
  registerCleanup,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

async function main(): Promise<void> {
  const config = loadAppConfig();

  setupUnhandledRejectionHandler();
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  logger.info('server:starting', { nodeEnv: config.nodeEnv, logLevel: config.logLevel, dataPath: config.dataPath });
  const deps = await buildPipelineDeps(config);
  registerCleanup(() => deps.close());

  const app = createApp(deps, {
    nodeEnv: config.nodeEnv,
    corsOrigins: process.env.CORS_ORIGIN?.split(','),
  });

  const server = app.listen(config.port, () => {
    logger.info('server:listening', { port: config.port, records: deps.store.size });
  });
  setServerInstance(server);
}

main().catch((err: unknown) => {
  logger.fatal('server:startup_failed', { error: errorMessage(err) });
  process.exit(1);
});
