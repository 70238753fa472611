import { createHash } from 'node:crypto';
import * as cheerio from 'cheerio';
import { IngestionError } from '../../errors/PipelineErrors';
import { CORPORA, type Corpus, type Document, type DocumentMetadata, type RawDocument } from '../../types/Pipeline';

const HTML_TAG_PATTERN = /<\/?(html|body|div|p|span|a|h[1-6]|ul|ol|li|pre|code|br|table|article|section)\b[^>]*>/i;
const BLOCK_SELECTOR = 'p, div, li, pre, blockquote, tr, article, section, table, ul, ol';
const FORUM_QUOTE_PATTERN = /\[quote=[^\]]*\][\s\S]*?\[\/quote\]\s*/g;
const MENTION_PATTERN = /(^|\s)@\w+\b/g;
const URL_PATTERN = /https?:\/\/\S+|www\.\S+/g;
const CODE_BLOCK_PATTERN = /```[\s\S]*?```/g;

export const MIN_FORUM_POST_LENGTH = 25;
export const CODE_PLACEHOLDER = '[code]';

export interface DocumentNormalizerOptions {
  now?: () => Date;
}

/** Inclusive bounds on when a forum post was written; an absent bound is open. */
export interface DateWindow {
  from?: Date;
  to?: Date;
}

export function documentIdFor(sourceUrl: string): string {
  return createHash('md5').update(sourceUrl).digest('hex');
}

/** When a forum post was written, from the scraper's `created_at`. */
export function postedAt(document: Pick<Document, 'metadata'>): Date | undefined {
  const value = document.metadata.created_at;
  if (typeof value !== 'string') {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Course pages are always inside the window. A forum post without a readable
 * `created_at` is outside any window that sets a bound.
 */
export function isWithinWindow(document: Document, window: DateWindow): boolean {
  if (document.corpus !== 'forum' || (!window.from && !window.to)) {
    return true;
  }
  const posted = postedAt(document);
  if (!posted) {
    return false;
  }
  return (!window.from || posted >= window.from) && (!window.to || posted <= window.to);
}

function countField(value: string | number | boolean | undefined): number {
  const count = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : 0;
  return Number.isFinite(count) && count > 0 ? count : 0;
}

/**
 * Forum posts start at 0.5 and gain for an accepted answer, likes and replies;
 * course material scores 1. Stored for display and filtering, never used in ranking.
 */
export function qualityScore(corpus: Corpus, metadata: DocumentMetadata): number {
  if (corpus === 'course') {
    return 1;
  }
  const accepted = metadata.is_accepted_answer === true || metadata.is_accepted_answer === 'true';
  const score =
    0.5 +
    (accepted ? 0.3 : 0) +
    Math.min(0.2, countField(metadata.like_count) / 50) +
    Math.min(0.1, countField(metadata.reply_count) / 20);
  return Math.round(score * 100) / 100;
}

export class DocumentNormalizer {
  private readonly now: () => Date;

  constructor(options: DocumentNormalizerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  normalize(raw: RawDocument): Document {
    const sourceUrl = this.validateSource(raw);
    const corpus = raw.corpus;

    const { body, frontMatter } = this.extractFrontMatter(raw.rawText);
    const title = raw.title?.trim() || frontMatter.title || undefined;
    const fetchedAt = this.resolveFetchedAt(raw, frontMatter.downloaded_at);

    let text = HTML_TAG_PATTERN.test(body) ? this.htmlToText(body) : body;
    if (corpus === 'forum') {
      text = text
        .replace(FORUM_QUOTE_PATTERN, '')
        .replace(MENTION_PATTERN, '$1')
        .replace(CODE_BLOCK_PATTERN, CODE_PLACEHOLDER);
    }
    text = this.cleanWhitespace(text.replace(URL_PATTERN, ''));

    if (corpus === 'forum' && text.length > 0 && text.length < MIN_FORUM_POST_LENGTH) {
      throw new IngestionError(sourceUrl, `forum post is shorter than ${MIN_FORUM_POST_LENGTH} characters`);
    }

    const metadata: DocumentMetadata = { ...frontMatter, ...(raw.metadata ?? {}) };
    delete metadata.title;
    Object.assign(metadata, this.derivedMetadata(sourceUrl, corpus, text, metadata));

    return {
      id: documentIdFor(sourceUrl),
      sourceUrl,
      title,
      rawText: text,
      corpus,
      fetchedAt,
      contentHash: createHash('sha256').update(`${corpus}\n${title ?? ''}\n${text}`).digest('hex'),
      metadata
    };
  }

  private validateSource(raw: RawDocument): string {
    const sourceUrl = typeof raw.sourceUrl === 'string' ? raw.sourceUrl.trim() : '';
    if (!sourceUrl) {
      throw new IngestionError('', 'sourceUrl is required');
    }

    let parsed: URL;
    try {
      parsed = new URL(sourceUrl);
    } catch {
      throw new IngestionError(sourceUrl, 'sourceUrl is not a valid URL');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new IngestionError(sourceUrl, `unsupported protocol ${parsed.protocol}`);
    }

    if (!CORPORA.some((corpus: Corpus) => corpus === raw.corpus)) {
      throw new IngestionError(sourceUrl, `unknown corpus "${String(raw.corpus)}"`);
    }
    if (typeof raw.rawText !== 'string') {
      throw new IngestionError(sourceUrl, 'rawText must be a string');
    }

    return sourceUrl;
  }

  private derivedMetadata(
    sourceUrl: string,
    corpus: Corpus,
    text: string,
    metadata: DocumentMetadata
  ): DocumentMetadata {
    let contentType = 'course_material';
    if (corpus === 'forum') {
      const isReply = metadata.is_reply === true || metadata.is_reply === 'true';
      const kind = text.toLowerCase().includes(CODE_PLACEHOLDER) ? 'code' : 'text';
      contentType = `${kind}_${isReply ? 'answer' : 'question'}`;
    }

    return {
      domain: new URL(sourceUrl).host,
      quality_score: qualityScore(corpus, metadata),
      content_type: contentType
    };
  }

  private resolveFetchedAt(raw: RawDocument, frontMatterDate: string | undefined): Date {
    const value = raw.fetchedAt ?? frontMatterDate;
    if (value === undefined) {
      return this.now();
    }

    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new IngestionError(raw.sourceUrl, `invalid fetchedAt "${String(value)}"`);
    }
    return date;
  }

  /** Scraped course pages carry a `---` delimited key/value header. */
  private extractFrontMatter(text: string): { body: string; frontMatter: Record<string, string> } {
    const frontMatter: Record<string, string> = {};
    if (!text.startsWith('---')) {
      return { body: text, frontMatter };
    }

    const end = text.indexOf('\n---', 3);
    if (end === -1) {
      return { body: text, frontMatter };
    }

    for (const line of text.slice(3, end).split('\n')) {
      const separator = line.indexOf(':');
      if (separator === -1) continue;
      const key = line.slice(0, separator).trim();
      const value = line.slice(separator + 1).trim().replace(/^"(.*)"$/, '$1');
      if (key) {
        frontMatter[key] = value;
      }
    }

    return { body: text.slice(end + 4), frontMatter };
  }

  private htmlToText(html: string): string {
    const $ = cheerio.load(html);
    $('script, style, noscript, nav, footer').remove();
    $('br').replaceWith('\n');
    $('h1, h2, h3, h4, h5, h6').each((_, element) => {
      const level = Number(element.tagName.slice(1));
      $(element).before(`\n\n${'#'.repeat(level)} `).after('\n\n');
    });
    $(BLOCK_SELECTOR).each((_, element) => {
      $(element).after('\n\n');
    });
    return $.root().text();
  }

  private cleanWhitespace(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t\f\v\u00a0]+/g, ' ')
      .replace(/ *\n */g, '\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}
