import { z } from 'zod';
import { IngestionError } from '../../errors/PipelineErrors';
import type { RawDocument } from '../../types/Pipeline';

export const rawDocumentSchema = z.object({
  sourceUrl: z.string(),
  rawText: z.string(),
  corpus: z.enum(['course', 'forum']),
  title: z.string().optional(),
  fetchedAt: z.union([z.string(), z.date()]).optional(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional()
});

/** Checks the shape of one scraped document before normalization. */
export function parseRawDocument(value: unknown): RawDocument {
  const result = rawDocumentSchema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const sourceUrl =
    typeof value === 'object' && value !== null && 'sourceUrl' in value && typeof value.sourceUrl === 'string'
      ? value.sourceUrl
      : '';
  const reason = result.error.issues.map(issue => `${issue.path.join('.') || 'document'}: ${issue.message}`).join('; ');
  throw new IngestionError(sourceUrl, reason);
}
