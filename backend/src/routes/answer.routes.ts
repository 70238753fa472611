import express, { Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors/PipelineErrors';
import type { PipelineOrchestrator } from '../services/pipeline/PipelineOrchestrator';
import type { AttachmentPayload } from '../types/Pipeline';
import { sendError } from './errorResponse';

const answerRequestSchema = z.object({
  question: z.string().default(''),
  image: z.string().optional(),
  attachments: z
    .array(z.object({ mimeType: z.string().default(''), base64Bytes: z.string() }))
    .default([]),
  sessionId: z.string().min(1).optional()
});

export function createAnswerRouter(orchestrator: PipelineOrchestrator) {
  const router = express.Router();

  const handleAnswer = async (req: Request, res: Response) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const parsed = answerRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
      }

      const { question, image, attachments, sessionId } = parsed.data;
      const payloads: AttachmentPayload[] = image ? [{ mimeType: '', base64Bytes: image }, ...attachments] : attachments;

      if (!question.trim() && payloads.length === 0) {
        throw new ValidationError('Either question or image must be provided.');
      }

      const result = await orchestrator.answer(question, payloads, { sessionId, signal: controller.signal });

      res.json({
        answer: result.answerText,
        links: result.links.map(link => ({ url: link.url, text: link.excerpt })),
        ...(result.warnings.length > 0 ? { warnings: result.warnings } : {})
      });
    } catch (error) {
      sendError(res, error);
    }
  };

  router.post('/', handleAnswer);
  router.post('/answer', handleAnswer);

  return router;
}
