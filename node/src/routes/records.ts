import express, { type Request, type Response } from 'express';
import type { RecordStore } from '@/services/records/record-store';
import { createSuccessResponse } from '@/utils/errorResponse';

export function createRecordsRouter(store: RecordStore) {
  const router = express.Router();

  router.get('/stats', (_req: Request, res: Response) => {
    res.json(createSuccessResponse(store.describe()));
  });

  return router;
}
