import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { EmbeddingConfig } from '../config';
import type { HttpClient } from '../http-client';
import { OpenAIEmbedder } from './openai-embedder';
import { MAX_EMBED_CHARS } from './prepare-text';

const config: EmbeddingConfig = {
  provider: 'openai',
  apiUrl: 'https://api.example.com/v1/',
  apiKey: 'test-secret',
  model: 'text-embedding-3-small',
  dimensions: 3,
  timeoutMs: 1000,
};

describe('OpenAIEmbedder', () => {
  const http = { get: vi.fn(), post: vi.fn() } satisfies HttpClient;

  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('posts the model and input and returns the first embedding', async () => {
    http.post.mockResolvedValueOnce({
      data: { data: [{ embedding: [0.1, 0.2, 0.3] }], usage: { total_tokens: 4 } },
    });
    const embedder = new OpenAIEmbedder(config, http);

    await expect(embedder.embed('chocolate cake')).resolves.toEqual({ embedding: [0.1, 0.2, 0.3], tokenCount: 4 });
    expect(http.post).toHaveBeenCalledWith(
      '/embeddings',
      { model: 'text-embedding-3-small', input: 'chocolate cake' },
      { signal: undefined }
    );
  });

  it('lets the caller override the model', async () => {
    http.post.mockResolvedValueOnce({ data: { data: [{ embedding: [1, 0, 0] }] } });
    const embedder = new OpenAIEmbedder(config, http);

    await embedder.embed('chocolate cake', { model: 'text-embedding-3-large' });

    expect(http.post).toHaveBeenCalledWith(
      '/embeddings',
      { model: 'text-embedding-3-large', input: 'chocolate cake' },
      { signal: undefined }
    );
  });

  it('truncates long input', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    http.post.mockResolvedValueOnce({ data: { data: [{ embedding: [1, 0, 0] }] } });
    const embedder = new OpenAIEmbedder(config, http);

    await embedder.embed('x'.repeat(MAX_EMBED_CHARS + 10));

    expect(http.post.mock.calls[0][1]).toEqual({ model: 'text-embedding-3-small', input: 'x'.repeat(MAX_EMBED_CHARS) });
  });

  it('treats an unexpected body as a permanent failure', async () => {
    http.post.mockResolvedValueOnce({ data: { data: [] } });
    const embedder = new OpenAIEmbedder(config, http);

    await expect(embedder.embed('chocolate cake')).rejects.toMatchObject({
      kind: 'permanent',
      message: 'OpenAIEmbedder(text-embedding-3-small): Invalid embedding response format',
    });
  });

  it('marks rate limiting as transient', async () => {
    const requestConfig = { headers: new AxiosHeaders() };
    http.post.mockRejectedValueOnce(
      new AxiosError('Request failed', 'ERR_BAD_REQUEST', requestConfig, {}, {
        status: 429,
        statusText: 'Too Many Requests',
        data: {},
        headers: {},
        config: requestConfig,
      })
    );
    const embedder = new OpenAIEmbedder(config, http);

    await expect(embedder.embed('chocolate cake')).rejects.toMatchObject({ kind: 'transient', status: 429 });
  });

  it('reports the configured dimensions', () => {
    expect(new OpenAIEmbedder(config, http).getDimensions()).toBe(3);
  });
});
