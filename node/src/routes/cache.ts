import express, { type Request, type Response, type NextFunction } from 'express';
import type { SemanticCache } from '@/services/cache/semantic-cache';
import { ServiceUnavailableError } from '@/utils/errors';
import { createSuccessResponse } from '@/utils/errorResponse';

export function createCacheRouter(cache: SemanticCache | null) {
  const router = express.Router();

  if (!cache) {
    router.use((_req: Request, _res: Response, next: NextFunction) => {
      next(new ServiceUnavailableError('Query cache is not configured'));
    });
    return router;
  }
  const semanticCache: SemanticCache = cache;

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(createSuccessResponse(await semanticCache.stats()));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const removed = await semanticCache.clear();
      res.json(createSuccessResponse({ removed }));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
