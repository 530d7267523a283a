import express, { type Request, type Response, type NextFunction } from 'express';
import type { QueryService } from '@/services/query-service';
import { logger } from '@/services/logger';
import { ValidationError } from '@/utils/errors';
import { createSuccessResponse } from '@/utils/errorResponse';
import { validateQueryRequest } from './query.validation';

export function createQueryRouter(queryService: QueryService) {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateQueryRequest(req.body);
    if (!validation.success) {
      logger.warn('http:validation_failed', { path: '/api/query', errors: validation.error });
      next(new ValidationError('Invalid query request', validation.error));
      return;
    }

    try {
      const result = await queryService.answer(validation.data);
      res.json(createSuccessResponse(result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
