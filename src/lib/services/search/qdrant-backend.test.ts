import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { CollectionHandle, SearchQuery } from '@/lib/core/types';
import { ConfigurationError, ExternalServiceError } from '@/lib/utils/errors';
import type { HttpClient } from '../http-client';
import { QdrantBackend } from './qdrant-backend';

const handle: CollectionHandle = {
  connection: { kind: 'local', host: 'localhost', port: 6333, https: false },
  collectionName: 'recipes',
  expectedVectorSize: 4,
  distanceMetric: 'cosine',
  vectorName: null,
  sparseVectorName: 'sparse',
  documentIdField: 'doc_id',
};

function dense(vector: number[]): SearchQuery {
  return { mode: 'dense', dense: vector, text: 'brownies' };
}

const sparse = { indices: [17, 4021], values: [0.31, 0.12] };

function httpError(status: number, statusText: string): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', config, {}, {
    status,
    statusText,
    data: {},
    headers: {},
    config,
  });
}

describe('QdrantBackend', () => {
  const http = { get: vi.fn(), post: vi.fn() } satisfies HttpClient;

  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('queries points and keeps backend order as ranks', async () => {
    http.post.mockResolvedValueOnce({
      data: {
        result: {
          points: [
            { id: 11, score: 0.91, payload: { doc_id: 'doc-7', title: 'Brownies' } },
            { id: 12, score: 0.62, payload: { id: 'doc-42' } },
            { id: 'c0ffee', score: 0.4, payload: null },
          ],
        },
      },
    });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    const candidates = await backend.search(dense([0.1, 0.2, 0.3, 0.4]), 10);

    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      { query: [0.1, 0.2, 0.3, 0.4], limit: 10, with_payload: true },
      { signal: undefined }
    );
    expect(candidates.map(({ documentId, score, rank }) => ({ documentId, score, rank }))).toEqual([
      { documentId: 'doc-7', score: 0.91, rank: 1 },
      { documentId: 'doc-42', score: 0.62, rank: 2 },
      { documentId: 'c0ffee', score: 0.4, rank: 3 },
    ]);
  });

  it('queries the configured named vector', async () => {
    http.post.mockResolvedValueOnce({ data: { result: { points: [] } } });
    const backend = new QdrantBackend({ ...handle, vectorName: 'dense' }, { timeoutMs: 1000, http });

    await backend.search(dense([1, 0, 0, 0]), 5);

    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      { query: [1, 0, 0, 0], limit: 5, with_payload: true, using: 'dense' },
      { signal: undefined }
    );
  });

  it('treats a malformed response as a permanent error', async () => {
    http.post.mockResolvedValueOnce({ data: { status: 'ok' } });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.search(dense([1, 0, 0, 0]), 5)).rejects.toMatchObject({
      kind: 'permanent',
      message: 'Qdrant: Invalid query response format',
    });
  });

  it('classifies HTTP failures', async () => {
    http.post.mockRejectedValueOnce(httpError(401, 'Unauthorized'));
    http.post.mockRejectedValueOnce(httpError(503, 'Service Unavailable'));
    http.post.mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED 127.0.0.1:6333', 'ECONNREFUSED'));
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.search(dense([1, 0, 0, 0]), 5)).rejects.toMatchObject({ kind: 'auth', status: 401 });
    await expect(backend.search(dense([1, 0, 0, 0]), 5)).rejects.toMatchObject({ kind: 'transient', status: 503 });
    await expect(backend.search(dense([1, 0, 0, 0]), 5)).rejects.toMatchObject({ kind: 'connection' });
  });

  it('reads a collection with one unnamed vector', async () => {
    http.get.mockResolvedValueOnce({
      data: { result: { points_count: 42, config: { params: { vectors: { size: 4, distance: 'Cosine' } } } } },
    });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.getCollectionInfo()).resolves.toEqual({
      vectorSize: 4,
      distanceMetric: 'cosine',
      pointCount: 42,
      vectorName: null,
      sparseVectorNames: [],
    });
    expect(http.get).toHaveBeenCalledWith('/collections/recipes', { signal: undefined });
  });

  it('resolves a single named vector and searches it afterwards', async () => {
    http.get.mockResolvedValueOnce({
      data: { result: { points_count: 7, config: { params: { vectors: { dense: { size: 1024, distance: 'Dot' } } } } } },
    });
    http.post.mockResolvedValueOnce({ data: { result: { points: [] } } });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.getCollectionInfo()).resolves.toEqual({
      vectorSize: 1024,
      distanceMetric: 'dot',
      pointCount: 7,
      vectorName: 'dense',
      sparseVectorNames: [],
    });

    await backend.search(dense([1]), 3);
    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      { query: [1], limit: 3, with_payload: true, using: 'dense' },
      { signal: undefined }
    );
  });

  it('sends a sparse query to the sparse vector', async () => {
    http.post.mockResolvedValueOnce({ data: { result: { points: [] } } });
    const backend = new QdrantBackend({ ...handle, vectorName: 'dense' }, { timeoutMs: 1000, http });

    await backend.search({ mode: 'sparse', dense: [1, 0, 0, 0], sparse, text: 'brownies' }, 5);

    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      { query: { indices: [17, 4021], values: [0.31, 0.12] }, using: 'sparse', limit: 5, with_payload: true },
      { signal: undefined }
    );
  });

  it('fuses dense and sparse prefetches with RRF for hybrid queries', async () => {
    http.post.mockResolvedValueOnce({
      data: { result: { points: [{ id: 3, score: 0.5, payload: { doc_id: 'doc-3' } }] } },
    });
    const backend = new QdrantBackend({ ...handle, vectorName: 'dense' }, { timeoutMs: 1000, http });

    const candidates = await backend.search({ mode: 'hybrid', dense: [1, 0, 0, 0], sparse, text: 'brownies' }, 4);

    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      {
        prefetch: [
          { query: [1, 0, 0, 0], using: 'dense', limit: 12 },
          { query: { indices: [17, 4021], values: [0.31, 0.12] }, using: 'sparse', limit: 12 },
        ],
        query: { fusion: 'rrf' },
        limit: 4,
        with_payload: true,
      },
      { signal: undefined }
    );
    expect(candidates.map((c) => [c.documentId, c.rank])).toEqual([['doc-3', 1]]);
  });

  it('queries the dense vector when a hybrid query has no sparse part', async () => {
    http.post.mockResolvedValueOnce({ data: { result: { points: [] } } });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await backend.search({ mode: 'hybrid', dense: [1, 0, 0, 0], text: 'brownies' }, 5);

    expect(http.post).toHaveBeenCalledWith(
      '/collections/recipes/points/query',
      { query: [1, 0, 0, 0], limit: 5, with_payload: true },
      { signal: undefined }
    );
  });

  it('searches the collection a case names', async () => {
    http.post.mockResolvedValueOnce({ data: { result: { points: [] } } });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await backend.search(dense([1, 0, 0, 0]), 5, { collectionName: 'desserts v2' });

    expect(http.post).toHaveBeenCalledWith(
      '/collections/desserts%20v2/points/query',
      { query: [1, 0, 0, 0], limit: 5, with_payload: true },
      { signal: undefined }
    );
  });

  it('lists the sparse vectors a collection declares', async () => {
    http.get.mockResolvedValueOnce({
      data: {
        result: {
          points_count: 3,
          config: {
            params: {
              vectors: { dense: { size: 4, distance: 'Cosine' } },
              sparse_vectors: { sparse: { modifier: 'idf' } },
            },
          },
        },
      },
    });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.getCollectionInfo()).resolves.toMatchObject({
      vectorName: 'dense',
      sparseVectorNames: ['sparse'],
    });
  });

  it('asks for VECTOR_NAME when several named vectors exist', async () => {
    http.get.mockResolvedValueOnce({
      data: {
        result: {
          config: {
            params: {
              vectors: { dense: { size: 1024, distance: 'Cosine' }, title: { size: 384, distance: 'Cosine' } },
            },
          },
        },
      },
    });
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.getCollectionInfo()).rejects.toThrow(
      'Collection recipes has named vectors (dense, title); set VECTOR_NAME to one of them'
    );
  });

  it('reports a missing collection as a configuration problem', async () => {
    http.get.mockRejectedValueOnce(httpError(404, 'Not Found'));
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    const error = await backend.getCollectionInfo().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).not.toBeInstanceOf(ExternalServiceError);
  });

  it('reports health from /healthz', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    http.get.mockResolvedValueOnce({ data: 'healthz check passed' });
    http.get.mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'));
    const backend = new QdrantBackend(handle, { timeoutMs: 1000, http });

    await expect(backend.healthCheck()).resolves.toBe(true);
    await expect(backend.healthCheck()).resolves.toBe(false);
    expect(http.get).toHaveBeenCalledWith('/healthz', { signal: undefined });
  });

  it('builds client options for remote and local instances', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(
      QdrantBackend.clientOptions(
        { ...handle, connection: { kind: 'remote', url: 'https://cluster.example.com/', apiKey: 'test-secret' } },
        5000
      )
    ).toEqual({ baseURL: 'https://cluster.example.com', timeoutMs: 5000, headers: { 'api-key': 'test-secret' } });

    expect(QdrantBackend.clientOptions(handle, 5000)).toEqual({ baseURL: 'http://localhost:6333', timeoutMs: 5000 });
  });
});
