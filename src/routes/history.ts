import fs from 'fs/promises';
import path from 'path';
import { Router } from 'express';
import { z } from 'zod';
import { CallControlError } from '../errors';
import type { CallHistoryStore } from '../history/types';
import { toHistoryDto } from '../history/types';
import { asyncRoute } from './asyncRoute';

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export function createHistoryRouter(history: CallHistoryStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncRoute(async (req, res) => {
      const parsed = ListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new CallControlError('ValidationFailed', 'limit must be 1..200 and offset >= 0');
      }
      const records = await history.list(parsed.data);
      res.status(200).json({
        success: true,
        limit: parsed.data.limit,
        offset: parsed.data.offset,
        calls: records.map(toHistoryDto),
      });
    }),
  );

  router.get(
    '/:id',
    asyncRoute(async (req, res) => {
      const record = await history.get(req.params.id);
      if (!record) {
        throw new CallControlError('NotFound', 'call history record not found', { record_id: req.params.id });
      }
      res.status(200).json({ success: true, call: toHistoryDto(record) });
    }),
  );

  router.get(
    '/:id/recording',
    asyncRoute(async (req, res) => {
      const record = await history.get(req.params.id);
      if (!record) {
        throw new CallControlError('NotFound', 'call history record not found', { record_id: req.params.id });
      }
      if (!record.recordingPath || !(await fileExists(record.recordingPath))) {
        throw new CallControlError('NotFound', 'recording not available', { record_id: record.id });
      }
      res.sendFile(path.resolve(record.recordingPath));
    }),
  );

  return router;
}
