import weaviate, { type WeaviateClient } from 'weaviate-ts-client';
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
import { kindForStatus } from '@/lib/utils/http-errors';
import { abortReason, raceWithSignal } from '@/lib/utils/deadline';
import { debug } from '@/lib/utils/debug';

const SERVICE = 'Weaviate';

const additionalSchema = z.object({
  id: z.string(),
  distance: z.number().nullish(),
  // BM25 and hybrid scores arrive as strings
  score: z.union([z.number(), z.string()]).nullish(),
});

const getResponseSchema = z.object({
  data: z.object({ Get: z.record(z.array(z.record(z.unknown())).nullable()) }),
});

const aggregateResponseSchema = z.object({
  data: z.object({
    Aggregate: z.record(z.array(z.object({ meta: z.object({ count: z.number() }) }))),
  }),
});

const classSchema = z.object({
  vectorIndexConfig: z.object({ distance: z.string().optional() }).passthrough().optional(),
});

const objectsSchema = z.object({
  objects: z.array(z.object({ vector: z.array(z.number()).optional() })).optional(),
});

const DISTANCES: Record<string, DistanceMetric> = {
  cosine: 'cosine',
  dot: 'dot',
  'l2-squared': 'euclid',
  manhattan: 'manhattan',
  hamming: 'hamming',
};

export type WeaviateOperator =
  | { kind: 'nearVector'; vector: number[] }
  | { kind: 'bm25'; query: string }
  | { kind: 'hybrid'; query: string; vector: number[] };

export interface WeaviateGetRequest {
  className: string;
  fields: string;
  limit: number;
  operator: WeaviateOperator;
}

/**
 * The slice of weaviate-ts-client the backend calls. Responses are parsed
 * by the backend, so they stay `unknown` here.
 */
export interface WeaviateApi {
  get(request: WeaviateGetRequest): Promise<unknown>;
  classSchema(className: string): Promise<unknown>;
  countObjects(className: string): Promise<unknown>;
  /** One stored object with its vector */
  sampleObject(className: string): Promise<unknown>;
  ready(): Promise<boolean>;
}

export function weaviateApi(client: WeaviateClient): WeaviateApi {
  return {
    get: ({ className, fields, limit, operator }) => {
      const builder = client.graphql.get().withClassName(className).withFields(fields).withLimit(limit);
      switch (operator.kind) {
        case 'nearVector':
          return builder.withNearVector({ vector: operator.vector }).do();
        case 'bm25':
          return builder.withBm25({ query: operator.query }).do();
        case 'hybrid':
          return builder.withHybrid({ query: operator.query, vector: operator.vector }).do();
      }
    },
    classSchema: (className) => client.schema.classGetter().withClassName(className).do(),
    countObjects: (className) =>
      client.graphql.aggregate().withClassName(className).withFields('meta { count }').do(),
    sampleObject: (className) => client.data.getter().withClassName(className).withVector().withLimit(1).do(),
    ready: () => client.misc.readyChecker().do(),
  };
}

/**
 * Create a Weaviate client for local (Docker) or remote (cloud) mode.
 */
export function createWeaviateClient(handle: CollectionHandle): WeaviateClient {
  const { connection } = handle;

  if (connection.kind === 'remote') {
    const url = new URL(connection.url);
    console.log(`[Weaviate] ☁️  Connecting to Cloud: ${url.host}`);

    return weaviate.client({
      scheme: url.protocol.replace(':', ''),
      host: url.host,
      headers: connection.apiKey ? { Authorization: `Bearer ${connection.apiKey}` } : {},
    });
  }

  const scheme = connection.https ? 'https' : 'http';
  const hostUrl = `${connection.host}:${connection.port}`;
  console.log(`[Weaviate] 🏠 Connecting to Local: ${scheme}://${hostUrl}`);

  return weaviate.client({ scheme, host: hostUrl });
}

/**
 * Weaviate GraphQL backend.
 *
 * Dense queries use `nearVector` and score `1 - distance`, clamped at 0.
 * Sparse queries use BM25 on the query text; hybrid combines BM25 with the
 * dense vector. Both report Weaviate's own score.
 * Documents are identified by a property, or by the object UUID when the
 * property is absent.
 */
export class WeaviateBackend implements SearchBackend {
  private api: WeaviateApi;

  constructor(private handle: CollectionHandle, api?: WeaviateApi) {
    this.api = api ?? weaviateApi(createWeaviateClient(handle));
  }

  async search(query: SearchQuery, topK: number, options?: SearchOptions): Promise<SearchCandidate[]> {
    const className = options?.collectionName ?? this.handle.collectionName;
    const idField = this.idProperty();
    const operator = toOperator(query);
    const additional = operator.kind === 'nearVector' ? '_additional { id distance }' : '_additional { id score }';
    const fields = idField ? `${idField} ${additional}` : additional;

    const result = await this.call(
      () => this.api.get({ className, fields, limit: topK, operator }),
      options?.signal
    );

    const parsed = getResponseSchema.safeParse(result);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, 'Invalid search response format', { kind: 'permanent' });
    }

    const objects = parsed.data.data.Get[className] ?? [];
    debug.search.log(`${operator.kind} limit=${topK} → ${objects.length} objects`);

    return objects.map((obj, index) => {
      const additional = additionalSchema.safeParse(obj._additional);
      if (!additional.success) {
        throw new ExternalServiceError(SERVICE, 'Search result without _additional.id', { kind: 'permanent' });
      }

      const { _additional, ...properties } = obj;
      const fromProperty = idField ? properties[idField] : undefined;

      return {
        documentId: fromProperty !== undefined && fromProperty !== null ? String(fromProperty) : additional.data.id,
        score: operator.kind === 'nearVector' ? distanceScore(additional.data.distance) : Number(additional.data.score ?? 0),
        rank: index + 1,
        payload: properties,
      };
    });
  }

  async getCollectionInfo(options?: SearchOptions): Promise<CollectionInfo> {
    const className = this.handle.collectionName;

    const schema = await this.call(() => this.api.classSchema(className), options?.signal);
    const parsedClass = classSchema.safeParse(schema);
    if (!parsedClass.success) {
      throw new ExternalServiceError(SERVICE, 'Invalid class schema format', { kind: 'permanent' });
    }

    const aggregate = await this.call(() => this.api.countObjects(className), options?.signal);
    const parsedAggregate = aggregateResponseSchema.safeParse(aggregate);
    const pointCount = parsedAggregate.success ? parsedAggregate.data.data.Aggregate[className]?.[0]?.meta.count ?? 0 : 0;

    // Weaviate classes do not declare a vector size; read it off one stored object
    const sample = await this.call(() => this.api.sampleObject(className), options?.signal);
    const parsedSample = objectsSchema.safeParse(sample);
    const sampleVector = parsedSample.success ? parsedSample.data.objects?.[0]?.vector : undefined;

    const distance = parsedClass.data.vectorIndexConfig?.distance ?? 'cosine';

    return {
      vectorSize: sampleVector && sampleVector.length > 0 ? sampleVector.length : null,
      distanceMetric: DISTANCES[distance] ?? null,
      pointCount,
      vectorName: null,
      sparseVectorNames: null,
    };
  }

  async healthCheck(options?: SearchOptions): Promise<boolean> {
    try {
      const ready = await raceWithSignal(this.api.ready(), options?.signal);
      return ready === true;
    } catch (error) {
      console.error(`[Weaviate] ❌ Connection Failed:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  getName(): string {
    return `WeaviateBackend(${this.handle.collectionName})`;
  }

  // "id" is reserved in Weaviate; the object UUID stands in for it
  private idProperty(): string | null {
    return this.handle.documentIdField === 'id' ? null : this.handle.documentIdField;
  }

  private async call<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await raceWithSignal(fn(), signal);
    } catch (error) {
      throw toWeaviateError(error, signal);
    }
  }
}

function toOperator(query: SearchQuery): WeaviateOperator {
  switch (query.mode) {
    case 'dense':
      return { kind: 'nearVector', vector: query.dense };
    case 'sparse':
      return { kind: 'bm25', query: query.text };
    case 'hybrid':
      return { kind: 'hybrid', query: query.text, vector: query.dense };
  }
}

// Distance 0 = score 1; a missing distance scores 0
function distanceScore(distance: number | null | undefined): number {
  return Math.max(0, 1 - (distance ?? 1));
}

/**
 * weaviate-ts-client reports HTTP failures as messages like
 * "usage error (401): ..." and network failures as fetch errors.
 */
export function toWeaviateError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted) return abortReason(signal);
  if (error instanceof ExternalServiceError || error instanceof ConfigurationError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const statusMatch = message.match(/\((\d{3})\)/);

  if (statusMatch) {
    const status = parseInt(statusMatch[1], 10);
    if (status === 404) {
      return new ConfigurationError(`Weaviate class not found: ${message}`);
    }
    return new ExternalServiceError(SERVICE, message, { kind: kindForStatus(status), status, cause: error });
  }

  const connectionFailure = /ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ECONNRESET|fetch failed|socket hang up/i.test(message);
  return new ExternalServiceError(SERVICE, message, {
    kind: connectionFailure ? 'connection' : 'permanent',
    cause: error,
  });
}
