import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors/PipelineErrors';
import type { PipelineOrchestrator } from '../services/pipeline/PipelineOrchestrator';
import { sendError } from './errorResponse';

const ingestRequestSchema = z.object({
  documents: z.array(z.unknown()),
  rebuild: z.boolean().default(false),
  forumWindow: z
    .object({
      from: z.coerce.date().optional(),
      to: z.coerce.date().optional()
    })
    .optional()
});

export function createIngestRouter(orchestrator: PipelineOrchestrator) {
  const router = express.Router();

  router.post('/ingest', async (req: Request, res: Response) => {
    try {
      const parsed = ingestRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(
          'documents must be an array of raw documents; forumWindow.from and forumWindow.to must be dates'
        );
      }

      const { documents, rebuild, forumWindow } = parsed.data;
      const report = await orchestrator.ingest(documents, { rebuild, forumWindow });
      res.status(201).json(report);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/ingest/status', (req: Request, res: Response) => {
    res.json(orchestrator.getIngestionStatus());
  });

  router.get('/index/stats', (req: Request, res: Response) => {
    res.json(orchestrator.getIndexStats());
  });

  return router;
}
