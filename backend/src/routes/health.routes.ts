import express, { Request, Response } from 'express';
import type { DatabaseHealth } from '../config/database';
import type { PipelineOrchestrator } from '../services/pipeline/PipelineOrchestrator';

export function createHealthRouter(
  orchestrator: PipelineOrchestrator,
  databaseHealth?: () => Promise<DatabaseHealth>
) {
  const router = express.Router();

  router.get('/', async (req: Request, res: Response) => {
    try {
      const database = databaseHealth ? await databaseHealth() : undefined;
      const index = orchestrator.getIndexStats();

      res.status(index.status === 'ready' ? 200 : 503).json({
        status: index.status === 'ready' ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        database,
        index,
        ingestion: orchestrator.getIngestionStatus(),
        service: 'course-qa-backend'
      });
    } catch (error) {
      res.status(500).json({
        status: 'error',
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }
  });

  return router;
}
