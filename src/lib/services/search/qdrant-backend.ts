import { z } from 'zod';
import type { SearchBackend } from '@/lib/core/interfaces';
import type {
  CollectionHandle,
  CollectionInfo,
  DistanceMetric,
  SearchCandidate,
  SearchOptions,
  SearchQuery,
} from '@/lib/core/types';
import { ConfigurationError, ExternalServiceError } from '@/lib/utils/errors';
import { toServiceError } from '@/lib/utils/http-errors';
import { debug } from '@/lib/utils/debug';
import { createHttpClient, type HttpClient, type HttpClientOptions } from '../http-client';

const SERVICE = 'Qdrant';

const pointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  score: z.number(),
  payload: z.record(z.unknown()).nullish(),
});

const queryResponseSchema = z.object({
  result: z.object({ points: z.array(pointSchema) }),
});

const vectorParamsSchema = z.object({
  size: z.number().int().positive(),
  distance: z.string(),
});

const collectionResponseSchema = z.object({
  result: z.object({
    points_count: z.number().nullish(),
    config: z.object({
      params: z.object({
        // Either one unnamed vector or a map of named vectors
        vectors: z.union([vectorParamsSchema, z.record(vectorParamsSchema)]),
        sparse_vectors: z.record(z.unknown()).nullish(),
      }),
    }),
  }),
});

/** Each prefetch branch of a hybrid query over-fetches before fusion */
export const HYBRID_PREFETCH_FACTOR = 3;

const DISTANCES: Record<string, DistanceMetric> = {
  Cosine: 'cosine',
  Dot: 'dot',
  Euclid: 'euclid',
  Manhattan: 'manhattan',
};

export interface QdrantBackendOptions {
  timeoutMs: number;
  http?: HttpClient;
}

/**
 * Qdrant REST API backend.
 * Local mode uses host/port; remote mode uses URL + `api-key` header.
 */
export class QdrantBackend implements SearchBackend {
  private http: HttpClient;
  private vectorName: string | null;

  constructor(private handle: CollectionHandle, options: QdrantBackendOptions) {
    this.vectorName = handle.vectorName;
    this.http = options.http ?? createHttpClient(QdrantBackend.clientOptions(handle, options.timeoutMs));
  }

  static clientOptions(handle: CollectionHandle, timeoutMs: number): HttpClientOptions {
    const { connection } = handle;

    if (connection.kind === 'remote') {
      console.log(`[Qdrant] ☁️  Remote: ${connection.url}`);
      return {
        baseURL: connection.url.replace(/\/+$/, ''),
        timeoutMs,
        headers: connection.apiKey ? { 'api-key': connection.apiKey } : undefined,
      };
    }

    const scheme = connection.https ? 'https' : 'http';
    console.log(`[Qdrant] 🏠 Local: ${scheme}://${connection.host}:${connection.port}`);
    return { baseURL: `${scheme}://${connection.host}:${connection.port}`, timeoutMs };
  }

  async search(query: SearchQuery, topK: number, options?: SearchOptions): Promise<SearchCandidate[]> {
    const body = { ...this.queryBody(query, topK), limit: topK, with_payload: true };
    const path = this.collectionPath('/points/query', options?.collectionName);

    let data: unknown;
    try {
      const response = await this.http.post(path, body, { signal: options?.signal });
      data = response.data;
    } catch (error) {
      throw toServiceError(SERVICE, error, options?.signal);
    }

    const parsed = queryResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, 'Invalid query response format', { kind: 'permanent' });
    }

    debug.search.log(`${query.mode} query limit=${topK} → ${parsed.data.result.points.length} points`);

    return parsed.data.result.points.map((point, index) => {
      const payload = point.payload ?? {};
      return {
        documentId: this.documentIdOf(payload, point.id),
        score: point.score,
        rank: index + 1,
        payload,
      };
    });
  }

  async getCollectionInfo(options?: SearchOptions): Promise<CollectionInfo> {
    let data: unknown;
    try {
      const response = await this.http.get(this.collectionPath(''), { signal: options?.signal });
      data = response.data;
    } catch (error) {
      const serviceError = toServiceError(SERVICE, error, options?.signal);
      if (serviceError instanceof ExternalServiceError && serviceError.status === 404) {
        throw new ConfigurationError(`Collection not found: ${this.handle.collectionName}`);
      }
      throw serviceError;
    }

    const parsed = collectionResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, 'Invalid collection info format', { kind: 'permanent' });
    }

    const { vectors, sparse_vectors } = parsed.data.result.config.params;
    const pointCount = parsed.data.result.points_count ?? 0;
    const sparseVectorNames = Object.keys(sparse_vectors ?? {});

    const single = vectorParamsSchema.safeParse(vectors);
    if (single.success) {
      if (this.handle.vectorName) {
        throw new ConfigurationError(
          `Collection ${this.handle.collectionName} has one unnamed vector; unset VECTOR_NAME (${this.handle.vectorName})`
        );
      }
      return {
        vectorSize: single.data.size,
        distanceMetric: DISTANCES[single.data.distance] ?? null,
        pointCount,
        vectorName: null,
        sparseVectorNames,
      };
    }

    const named = z.record(vectorParamsSchema).parse(vectors);
    const names = Object.keys(named);
    const vectorName = this.handle.vectorName ?? (names.length === 1 ? names[0] : null);

    if (!vectorName || !named[vectorName]) {
      throw new ConfigurationError(
        `Collection ${this.handle.collectionName} has named vectors (${names.join(', ')}); set VECTOR_NAME to one of them`
      );
    }

    // Later searches query the resolved vector
    this.vectorName = vectorName;

    return {
      vectorSize: named[vectorName].size,
      distanceMetric: DISTANCES[named[vectorName].distance] ?? null,
      pointCount,
      vectorName,
      sparseVectorNames,
    };
  }

  async healthCheck(options?: SearchOptions): Promise<boolean> {
    try {
      await this.http.get('/healthz', { signal: options?.signal });
      return true;
    } catch (error) {
      console.error(`[Qdrant] ❌ Health check failed:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  getName(): string {
    return `QdrantBackend(${this.handle.collectionName})`;
  }

  /**
   * Query part of a `points/query` body. Hybrid fuses a dense and a sparse
   * prefetch with reciprocal rank fusion; without a sparse vector every
   * mode queries the dense one.
   */
  private queryBody(query: SearchQuery, topK: number): Record<string, unknown> {
    const dense = { query: query.dense, ...(this.vectorName ? { using: this.vectorName } : {}) };
    if (query.mode === 'dense' || !query.sparse) return dense;

    const sparse = {
      query: { indices: query.sparse.indices, values: query.sparse.values },
      using: this.handle.sparseVectorName,
    };
    if (query.mode === 'sparse') return sparse;

    const prefetchLimit = topK * HYBRID_PREFETCH_FACTOR;
    return {
      prefetch: [
        { ...dense, limit: prefetchLimit },
        { ...sparse, limit: prefetchLimit },
      ],
      query: { fusion: 'rrf' },
    };
  }

  private collectionPath(suffix: string, collectionName: string = this.handle.collectionName): string {
    return `/collections/${encodeURIComponent(collectionName)}${suffix}`;
  }

  private documentIdOf(payload: Record<string, unknown>, pointId: string | number): string {
    const fromField = payload[this.handle.documentIdField] ?? payload.id;
    return fromField !== undefined && fromField !== null ? String(fromField) : String(pointId);
  }
}
