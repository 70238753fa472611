import { describe, expect, it } from 'vitest';
import { MongoConnection } from '../../src/config/database';
import { ConfigurationError } from '../../src/errors/PipelineErrors';

describe('MongoConnection', () => {
  it('refuses to connect without a URI', async () => {
    await expect(new MongoConnection(undefined).connect()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('reports a connection that was never opened as disconnected', async () => {
    expect(await new MongoConnection('mongodb://127.0.0.1:1/course-qa-test').healthCheck()).toEqual({
      status: 'disconnected',
      readyState: 0
    });
  });

  it('treats disconnecting an unopened connection as done', async () => {
    await expect(new MongoConnection(undefined).disconnect()).resolves.toBeUndefined();
  });
});
