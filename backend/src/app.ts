import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import type { DatabaseHealth } from './config/database';
import type { PipelineOrchestrator } from './services/pipeline/PipelineOrchestrator';
import { createHealthRouter } from './routes/health.routes';
import { createAnswerRouter } from './routes/answer.routes';
import { createIngestRouter } from './routes/ingest.routes';
import { sendError } from './routes/errorResponse';
import { ValidationError } from './errors/PipelineErrors';

export interface AppOptions {
  databaseHealth?: () => Promise<DatabaseHealth>;
}

export function createApp(orchestrator: PipelineOrchestrator, options: AppOptions = {}) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  app.use('/api/health', createHealthRouter(orchestrator, options.databaseHealth));
  app.use('/api', createIngestRouter(orchestrator));
  app.use('/api', createAnswerRouter(orchestrator));

  app.get('/', (req, res) => {
    res.json({
      message: 'Course Q&A Backend API',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: '/api/health',
        answer: '/api/answer',
        ingest: '/api/ingest',
        stats: '/api/index/stats'
      }
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const parseFailed =
      typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed';
    sendError(res, parseFailed ? new ValidationError('Request body is not valid JSON') : error);
  });

  return app;
}
