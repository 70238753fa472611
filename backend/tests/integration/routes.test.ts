import type { Server } from 'node:http';
import { once } from 'node:events';
import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../../src/app';
import type { PipelineOrchestrator } from '../../src/services/pipeline/PipelineOrchestrator';
import { InMemoryIndexStore } from '../../src/services/vector/stores/InMemoryIndexStore';
import { makeChunk } from '../helpers/documents';
import { ScriptedCompletion, corruptImageBase64, createTestPipeline } from '../helpers/fakes';

const DOCKER_URL = 'https://tds.s-anand.net/#/docker';
const dockerPage = {
  sourceUrl: DOCKER_URL,
  rawText: 'Docker vs Podman: use Podman for better security',
  corpus: 'course'
};

const servers: Server[] = [];

async function serve(orchestrator: PipelineOrchestrator): Promise<string> {
  const server = createApp(orchestrator).listen(0);
  servers.push(server);
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(server => new Promise<void>(resolve => server.close(() => resolve())))
  );
});

describe('HTTP API', () => {
  it('ingests documents and answers in the public response shape', async () => {
    const baseUrl = await serve(await createTestPipeline());

    const ingest = await post(`${baseUrl}/api/ingest`, { documents: [dockerPage] });
    expect(ingest.status).toBe(201);
    expect(await ingest.json()).toEqual({
      documentsIndexed: 1,
      chunksIndexed: 1,
      documentsSkipped: 0,
      documentsUnchanged: 0,
      generation: 1
    });

    const answer = await post(`${baseUrl}/api/`, { question: 'Should I use Docker or Podman?' });
    expect(answer.status).toBe(200);
    expect(await answer.json()).toEqual({
      answer: 'Docker vs Podman: use Podman for better security [1]',
      links: [{ url: DOCKER_URL, text: 'Docker vs Podman: use Podman for better security' }]
    });
  });

  it('accepts a base64 image and reports attachments it could not read', async () => {
    const orchestrator = await createTestPipeline();
    await orchestrator.ingest([dockerPage]);
    const baseUrl = await serve(orchestrator);

    const response = await post(`${baseUrl}/api/answer`, {
      question: 'Should I use Docker or Podman?',
      image: corruptImageBase64()
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      links: [{ url: DOCKER_URL }],
      warnings: ['Attachment 1 could not be processed: unrecognized or corrupt image data']
    });
  });

  it('rejects requests without a question or image', async () => {
    const baseUrl = await serve(await createTestPipeline());

    const empty = await post(`${baseUrl}/api/answer`, {});
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({
      error: 'ValidationError',
      message: 'Either question or image must be provided.'
    });

    const wrongType = await post(`${baseUrl}/api/answer`, { question: 42 });
    expect(wrongType.status).toBe(400);

    const badIngest = await post(`${baseUrl}/api/ingest`, { documents: 'all of them' });
    expect(badIngest.status).toBe(400);
  });

  it('answers a malformed JSON body with a JSON error', async () => {
    const baseUrl = await serve(await createTestPipeline());

    const response = await fetch(`${baseUrl}/api/answer`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"question": "Docker?"'
    });

    expect(response.status).toBe(400);
    expect(response.headers.get('content-type')).toMatch(/^application\/json/);
    expect(await response.json()).toEqual({
      error: 'ValidationError',
      message: 'Request body is not valid JSON'
    });
  });

  it('maps a failing model to a bad gateway', async () => {
    const orchestrator = await createTestPipeline({ completion: new ScriptedCompletion() });
    await orchestrator.ingest([dockerPage]);
    const baseUrl = await serve(orchestrator);

    const response = await post(`${baseUrl}/api/answer`, { question: 'Should I use Docker or Podman?' });

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({
      error: 'CompletionCapabilityError',
      message: 'Answer completion failed: no scripted completion left'
    });
  });

  it('reports index state on the stats and health endpoints', async () => {
    const orchestrator = await createTestPipeline();
    await orchestrator.ingest([dockerPage]);
    const baseUrl = await serve(orchestrator);

    const stats = await fetch(`${baseUrl}/api/index/stats`);
    expect(await stats.json()).toEqual({
      status: 'ready',
      store: 'in-memory',
      generation: 1,
      dimension: 64,
      documents: 1,
      chunks: 1,
      byCorpus: { course: { documents: 1, chunks: 1 }, forum: { documents: 0, chunks: 0 } }
    });

    const health = await fetch(`${baseUrl}/api/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'ok', index: { status: 'ready' } });
  });

  it('answers 503 while the index is corrupt', async () => {
    const indexStore = new InMemoryIndexStore({
      generation: 1,
      dimension: 2,
      documents: [],
      entries: [{ chunk: makeChunk('ghost', 0, 'orphan'), vector: [1, 0] }]
    });
    const baseUrl = await serve(await createTestPipeline({ indexStore }));

    const answer = await post(`${baseUrl}/api/answer`, { question: 'Anything?' });
    expect(answer.status).toBe(503);

    const health = await fetch(`${baseUrl}/api/health`);
    expect(health.status).toBe(503);
    expect(await health.json()).toMatchObject({ status: 'degraded', index: { status: 'corrupt' } });
  });
});
