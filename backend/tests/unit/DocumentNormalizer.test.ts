import { describe, expect, it } from 'vitest';
import { IngestionError } from '../../src/errors/PipelineErrors';
import {
  DocumentNormalizer,
  documentIdFor,
  isWithinWindow,
  qualityScore
} from '../../src/services/ingestion/DocumentNormalizer';
import { parseRawDocument } from '../../src/services/ingestion/RawDocumentParser';

const NOW = new Date('2024-05-01T00:00:00.000Z');
const normalizer = new DocumentNormalizer({ now: () => NOW });

describe('DocumentNormalizer', () => {
  it('reads the front matter of scraped course pages', () => {
    const document = normalizer.normalize({
      sourceUrl: 'https://course.example.edu/#/docker',
      corpus: 'course',
      rawText:
        '---\ntitle: "Docker"\noriginal_url: https://origin.example.edu/docker\ndownloaded_at: 2024-03-01T10:00:00Z\n---\n' +
        '# Docker\n\nUse Podman.'
    });

    expect(document.id).toBe(documentIdFor('https://course.example.edu/#/docker'));
    expect(document.title).toBe('Docker');
    expect(document.rawText).toBe('# Docker\n\nUse Podman.');
    expect(document.fetchedAt).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(document.metadata).toEqual({
      original_url: 'https://origin.example.edu/docker',
      downloaded_at: '2024-03-01T10:00:00Z',
      domain: 'course.example.edu',
      quality_score: 1,
      content_type: 'course_material'
    });
  });

  it('converts HTML to text with markdown headings', () => {
    const document = normalizer.normalize({
      sourceUrl: 'https://course.example.edu/setup',
      corpus: 'course',
      rawText: '<html><body><h2>Setup</h2><p>Install <b>uv</b> first.</p><script>alert(1)</script></body></html>'
    });

    expect(document.rawText).toBe('## Setup\n\nInstall uv first.');
  });

  it('strips quotes, mentions and links from forum posts', () => {
    const document = normalizer.normalize({
      sourceUrl: 'https://forum.example.edu/t/permissions/7',
      corpus: 'forum',
      rawText:
        '[quote=alice]old text[/quote]\n@bob you need to run chmod on the data folder, see https://example.com/docs for details'
    });

    expect(document.rawText).toBe('you need to run chmod on the data folder, see for details');
    expect(document.fetchedAt).toEqual(NOW);
    expect(document.corpus).toBe('forum');
  });

  it('marks fenced code in forum posts and scores the post', () => {
    const document = normalizer.normalize({
      sourceUrl: 'https://forum.example.edu/t/permissions/7/2',
      corpus: 'forum',
      rawText: 'Running the script fails:\n```\nopen("/data/out.csv", "w")\n```\nRun it from your home folder instead.',
      metadata: { created_at: '2024-02-10T08:30:00.000Z', is_accepted_answer: true, like_count: 5, reply_count: 1, is_reply: true }
    });

    expect(document.rawText).toBe('Running the script fails:\n[code]\nRun it from your home folder instead.');
    expect(document.metadata).toEqual({
      created_at: '2024-02-10T08:30:00.000Z',
      is_accepted_answer: true,
      like_count: 5,
      reply_count: 1,
      is_reply: true,
      domain: 'forum.example.edu',
      quality_score: 0.95,
      content_type: 'code_answer'
    });
  });

  it('leaves fenced code in course pages alone', () => {
    const document = normalizer.normalize({
      sourceUrl: 'https://course.example.edu/uv',
      corpus: 'course',
      rawText: 'Install it:\n```\npip install uv\n```'
    });

    expect(document.rawText).toBe('Install it:\n```\npip install uv\n```');
  });

  it('rejects forum posts too short to be useful', () => {
    expect(() =>
      normalizer.normalize({ sourceUrl: 'https://forum.example.edu/t/1', corpus: 'forum', rawText: 'thanks!' })
    ).toThrow(IngestionError);
  });

  it('keeps an empty document so the chunker can skip it', () => {
    const document = normalizer.normalize({ sourceUrl: 'https://forum.example.edu/t/2', corpus: 'forum', rawText: '  ' });
    expect(document.rawText).toBe('');
  });

  it.each(['not a url', 'ftp://files.example.edu/notes', ''])('rejects source URL %j', sourceUrl => {
    expect(() => normalizer.normalize({ sourceUrl, corpus: 'course', rawText: 'Some course text' })).toThrow(
      IngestionError
    );
  });

  it('hashes content so identical input is detected as unchanged', () => {
    const raw = { sourceUrl: 'https://course.example.edu/a', corpus: 'course' as const, rawText: 'Same text' };
    const first = normalizer.normalize(raw);
    const second = normalizer.normalize({ ...raw });
    const edited = normalizer.normalize({ ...raw, rawText: 'Same text, edited' });

    expect(second.contentHash).toBe(first.contentHash);
    expect(edited.contentHash).not.toBe(first.contentHash);
    expect(edited.id).toBe(first.id);
  });

  it('rejects an unparseable fetchedAt', () => {
    expect(() =>
      normalizer.normalize({
        sourceUrl: 'https://course.example.edu/a',
        corpus: 'course',
        rawText: 'Some course text',
        fetchedAt: 'yesterday-ish'
      })
    ).toThrow(IngestionError);
  });
});

describe('parseRawDocument', () => {
  it('accepts a well-formed document', () => {
    expect(
      parseRawDocument({ sourceUrl: 'https://course.example.edu/a', rawText: 'text', corpus: 'forum', title: 'A' })
    ).toEqual({ sourceUrl: 'https://course.example.edu/a', rawText: 'text', corpus: 'forum', title: 'A' });
  });

  it('reports the source URL of a malformed document', () => {
    try {
      parseRawDocument({ sourceUrl: 'https://course.example.edu/a', corpus: 'wiki' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IngestionError);
      expect(error).toMatchObject({ sourceUrl: 'https://course.example.edu/a' });
    }
  });
});

describe('qualityScore', () => {
  it('scores course material above any forum post', () => {
    expect(qualityScore('course', {})).toBe(1);
    expect(qualityScore('forum', {})).toBe(0.5);
  });

  it('caps the gain from likes and replies', () => {
    expect(qualityScore('forum', { like_count: 5, reply_count: 1 })).toBe(0.65);
    expect(qualityScore('forum', { is_accepted_answer: 'true', like_count: 500, reply_count: '40' })).toBe(1.1);
    expect(qualityScore('forum', { like_count: 'many', reply_count: -3 })).toBe(0.5);
  });
});

describe('isWithinWindow', () => {
  const forumPost = (createdAt?: string) =>
    normalizer.normalize({
      sourceUrl: 'https://forum.example.edu/t/window/1',
      corpus: 'forum',
      rawText: 'The deadline for the project was extended by a week.',
      metadata: createdAt === undefined ? {} : { created_at: createdAt }
    });
  const window = { from: new Date('2024-01-01T00:00:00.000Z'), to: new Date('2024-04-14T00:00:00.000Z') };

  it('keeps forum posts written inside the window, bounds included', () => {
    expect(isWithinWindow(forumPost('2024-02-10T08:30:00.000Z'), window)).toBe(true);
    expect(isWithinWindow(forumPost('2024-04-14T00:00:00.000Z'), window)).toBe(true);
    expect(isWithinWindow(forumPost('2024-04-14T00:00:01Z'), window)).toBe(false);
    expect(isWithinWindow(forumPost('2023-12-31T23:59:59Z'), window)).toBe(false);
  });

  it('drops forum posts without a readable date once a bound is set', () => {
    expect(isWithinWindow(forumPost(), window)).toBe(false);
    expect(isWithinWindow(forumPost('last tuesday'), window)).toBe(false);
    expect(isWithinWindow(forumPost(), {})).toBe(true);
  });

  it('never filters course pages', () => {
    const page = normalizer.normalize({ sourceUrl: 'https://course.example.edu/a', corpus: 'course', rawText: 'Notes' });
    expect(isWithinWindow(page, window)).toBe(true);
  });
});
