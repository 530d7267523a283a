import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import type { PipelineDeps } from '@/services/pipeline-deps';
import { createQueryRouter } from '@/routes/query';
import { createCacheRouter } from '@/routes/cache';
import { createRecordsRouter } from '@/routes/records';
import { errorMiddleware, notFoundHandler } from '@/middleware/error.middleware';
import { requestTimeout } from '@/stability/errorHandlers';

export interface AppOptions {
  nodeEnv: string;
  corsOrigins?: string[];
}

type AppDeps = Pick<PipelineDeps, 'store' | 'cache' | 'cacheStore' | 'vectorIndex' | 'queryService' | 'vectorBreaker' | 'generatorBreaker'>;

export function createApp(deps: AppDeps, options: AppOptions) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: options.corsOrigins ?? ['http://localhost:3000'], credentials: true }));
  app.use(requestTimeout(30000));
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  app.use(morgan(options.nodeEnv === 'development' ? 'dev' : 'combined'));

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      service: 'review-insights',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      records: deps.store.size,
      vectorIndex: deps.vectorIndex ? deps.vectorIndex.name : null,
      vectorCircuit: deps.vectorBreaker.getState(),
      generatorCircuit: deps.generatorBreaker.getState(),
      cacheStore: { name: deps.cacheStore.name, available: deps.cacheStore.isAvailable() },
    });
  });

  app.use('/api/query', createQueryRouter(deps.queryService));
  app.use('/api/cache', createCacheRouter(deps.cache));
  app.use('/api/records', createRecordsRouter(deps.store));

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
