import type { Embedder } from '@/lib/core/interfaces';
import type { EmbeddingResult, EmbeddingOptions, SparseVector } from '@/lib/core/types';
import { ExternalServiceError } from '@/lib/utils/errors';
import { toServiceError } from '@/lib/utils/http-errors';
import { debug } from '@/lib/utils/debug';
import type { EmbeddingConfig } from '../config';
import { createHttpClient, type HttpClient } from '../http-client';
import { prepareText } from './prepare-text';

interface RequestShape {
  name: string;
  build: (text: string) => Record<string, unknown>;
}

// Self-hosted servers disagree on the request body; tried in this order
const REQUEST_SHAPES: RequestShape[] = [
  { name: 'inputs', build: (text) => ({ inputs: [text] }) },
  { name: 'texts', build: (text) => ({ texts: [text] }) },
  { name: 'input', build: (text) => ({ input: text }) },
];

const RESPONSE_KEYS = ['embeddings', 'data', 'vectors', 'embedding'];

const SPARSE_KEYS = ['sparse', 'sparse_vecs', 'sparse_embeddings', 'lexical_weights'];

/**
 * Self-hosted embedding server (e.g. a bge-m3 deployment).
 * Remembers the first request shape the server accepts.
 */
export class HttpEmbedder implements Embedder {
  private http: HttpClient;
  private preferredShape: number | null = null;

  constructor(private config: EmbeddingConfig, http?: HttpClient) {
    const headers: Record<string, string> = config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {};
    this.http = http ?? createHttpClient({ timeoutMs: config.timeoutMs, headers });
  }

  async embed(text: string, options?: EmbeddingOptions): Promise<EmbeddingResult> {
    const input = prepareText(this.getName(), text);
    const signal = options?.signal;
    let lastError: Error | null = null;

    for (const index of this.shapeOrder()) {
      const shape = REQUEST_SHAPES[index];

      try {
        debug.embed.log(`POST ${this.config.apiUrl} shape=${shape.name}`);
        const response = await this.http.post(this.config.apiUrl, shape.build(input), { signal });
        const embedding = extractEmbedding(response.data);

        if (embedding) {
          this.preferredShape = index;
          const sparse = extractSparse(response.data);
          return sparse ? { embedding, sparse } : { embedding };
        }

        lastError = new ExternalServiceError(this.getName(), `Unrecognised response to "${shape.name}" request`, {
          kind: 'permanent',
        });
      } catch (error) {
        const serviceError = toServiceError(this.getName(), error, signal);
        if (!(serviceError instanceof ExternalServiceError) || !canTryNextShape(serviceError)) {
          throw serviceError;
        }
        lastError = serviceError;
      }
    }

    throw lastError ?? new ExternalServiceError(this.getName(), 'No request shape succeeded', { kind: 'permanent' });
  }

  private shapeOrder(): number[] {
    const all = REQUEST_SHAPES.map((_, i) => i);
    if (this.preferredShape === null) return all;
    return [this.preferredShape, ...all.filter((i) => i !== this.preferredShape)];
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  getName(): string {
    return `HttpEmbedder(${this.config.model})`;
  }
}

function canTryNextShape(error: ExternalServiceError): boolean {
  // Only a rejected body (4xx) says the server wants another shape
  return error.kind === 'permanent';
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === 'number');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromList(value: unknown): number[] | null {
  if (isVector(value)) return value;
  if (!Array.isArray(value) || value.length === 0) return null;

  const first: unknown = value[0];
  if (isVector(first)) return first;
  if (isRecord(first) && isVector(first.embedding)) return first.embedding;
  return null;
}

/**
 * Pull the first vector out of the response shapes seen in the wild:
 * a bare vector, a list of vectors, an object keyed by a known name,
 * OpenAI-style `data[].embedding`, or the first list-valued field.
 */
export function extractEmbedding(data: unknown): number[] | null {
  const direct = fromList(data);
  if (direct) return direct;
  if (!isRecord(data)) return null;

  for (const key of RESPONSE_KEYS) {
    const found = fromList(data[key]);
    if (found) return found;
  }

  for (const value of Object.values(data)) {
    const found = fromList(value);
    if (found) return found;
  }

  return null;
}

function toSparse(value: unknown): SparseVector | null {
  if (!isRecord(value)) return null;

  const { indices, values } = value;
  if (Array.isArray(indices) && Array.isArray(values)) {
    const valid =
      indices.length > 0 &&
      indices.length === values.length &&
      indices.every((i) => Number.isInteger(i)) &&
      values.every((v) => typeof v === 'number');
    return valid ? { indices, values } : null;
  }

  // Token id → weight, as BGE-M3 returns its lexical weights
  const entries = Object.entries(value);
  if (entries.length === 0) return null;

  const sparse: SparseVector = { indices: [], values: [] };
  for (const [token, weight] of entries) {
    const id = Number(token);
    if (!Number.isInteger(id) || typeof weight !== 'number') return null;
    sparse.indices.push(id);
    sparse.values.push(weight);
  }
  return sparse;
}

/**
 * Lexical weights for the first input, when the server returns any:
 * `{ indices, values }` or a token-id → weight map, alone or in a list.
 */
export function extractSparse(data: unknown): SparseVector | null {
  if (!isRecord(data)) return null;

  for (const key of SPARSE_KEYS) {
    const value = data[key];
    const sparse = toSparse(Array.isArray(value) ? value[0] : value);
    if (sparse) return sparse;
  }
  return null;
}
