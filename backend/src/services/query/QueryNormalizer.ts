import * as FileType from 'file-type';
import type { RetryConfig } from '../../config/environment';
import {
  AttachmentProcessingError,
  CaptioningCapabilityError,
  ValidationError,
  errorMessage
} from '../../errors/PipelineErrors';
import type { ImageCaptioner } from '../../types/LLM';
import type { Attachment, AttachmentPayload, QueryContext } from '../../types/Pipeline';
import { withRetry } from '../llm/retry';

export const SUPPORTED_IMAGE_TYPES: ReadonlySet<string> = new Set([
  'image/png',
  'image/jpeg',
  'image/gif',
  'image/webp'
]);

const DATA_URL_PREFIX = /^data:([\w/+.-]+);base64,/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export interface QueryNormalizerOptions {
  captionMaxChars: number;
  retry: RetryConfig;
}

/**
 * Folds image attachments into the question text. Each readable image is
 * described by the captioning model; anything that cannot be read becomes a
 * warning and the query carries on without it.
 */
export class QueryNormalizer {
  constructor(
    private readonly captioner: ImageCaptioner,
    private readonly options: QueryNormalizerOptions
  ) {}

  async normalize(
    questionText: string,
    payloads: readonly AttachmentPayload[] = [],
    signal?: AbortSignal
  ): Promise<QueryContext> {
    const question = questionText.trim();
    const warnings: string[] = [];
    const attachments: Attachment[] = [];
    const captions: string[] = [];

    for (const [index, payload] of payloads.entries()) {
      try {
        const attachment = await this.decodeAttachment(payload, index);
        attachments.push(attachment);
        captions.push(`Image context (attachment ${index + 1}): ${await this.describe(attachment, index, signal)}`);
      } catch (error) {
        if (error instanceof AttachmentProcessingError) {
          console.warn(error.message);
          warnings.push(error.message);
          continue;
        }
        throw error;
      }
    }

    const normalizedText = [question, ...captions].filter(part => part.length > 0).join('\n\n');
    if (!normalizedText) {
      throw new ValidationError('Either a question or a readable image attachment is required');
    }

    return { questionText: question, normalizedText, attachments, warnings };
  }

  async decodeAttachment(payload: AttachmentPayload, index: number): Promise<Attachment> {
    if (typeof payload?.base64Bytes !== 'string') {
      throw new AttachmentProcessingError(index, 'attachment data must be a base64 string');
    }

    let data = payload.base64Bytes.trim();
    const dataUrl = DATA_URL_PREFIX.exec(data);
    if (dataUrl) {
      data = data.slice(dataUrl[0].length);
    }
    data = data.replace(/\s+/g, '');

    if (data.length === 0 || data.length % 4 !== 0 || !BASE64_PATTERN.test(data)) {
      throw new AttachmentProcessingError(index, 'attachment data is not valid base64');
    }

    const bytes = Buffer.from(data, 'base64');
    let detected: Awaited<ReturnType<typeof FileType.fromBuffer>>;
    try {
      detected = await FileType.fromBuffer(bytes);
    } catch {
      // truncated files can end the sniffer's read early
      detected = undefined;
    }
    if (!detected) {
      throw new AttachmentProcessingError(index, 'unrecognized or corrupt image data');
    }
    if (!SUPPORTED_IMAGE_TYPES.has(detected.mime)) {
      throw new AttachmentProcessingError(index, `unsupported attachment type ${detected.mime}`);
    }

    const declared = payload.mimeType || dataUrl?.[1];
    if (declared && declared !== detected.mime) {
      console.warn(`Attachment ${index + 1} declared as ${declared} but contains ${detected.mime}`);
    }

    return { mimeType: detected.mime, bytes };
  }

  private async describe(attachment: Attachment, index: number, signal?: AbortSignal): Promise<string> {
    let description: string;
    try {
      description = await withRetry(
        attemptSignal => this.captioner.describeImage(attachment.bytes, attachment.mimeType, { signal: attemptSignal }),
        { ...this.options.retry, signal, operation: 'Image description' },
        (lastError, attempts) =>
          new CaptioningCapabilityError(`Image description failed: ${errorMessage(lastError)}`, attempts, lastError)
      );
    } catch (error) {
      if (error instanceof CaptioningCapabilityError) {
        throw new AttachmentProcessingError(index, error.message);
      }
      throw error;
    }

    const text = description.replace(/\s+/g, ' ').trim();
    if (!text) {
      throw new AttachmentProcessingError(index, 'the image description was empty');
    }

    const limit = this.options.captionMaxChars;
    return text.length > limit ? `${text.slice(0, limit).trimEnd()}...` : text;
  }
}
