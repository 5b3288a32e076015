import { z } from 'zod';
import type { Embedder } from '@/lib/core/interfaces';
import type { EmbeddingResult, EmbeddingOptions } from '@/lib/core/types';
import { ExternalServiceError } from '@/lib/utils/errors';
import { toServiceError } from '@/lib/utils/http-errors';
import { debug } from '@/lib/utils/debug';
import type { EmbeddingConfig } from '../config';
import { createHttpClient, type HttpClient } from '../http-client';
import { prepareText } from './prepare-text';

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

/**
 * OpenAI-compatible embeddings API (`POST {baseUrl}/embeddings`).
 */
export class OpenAIEmbedder implements Embedder {
  private http: HttpClient;

  constructor(private config: EmbeddingConfig, http?: HttpClient) {
    const baseURL = config.apiUrl.endsWith('/') ? config.apiUrl.slice(0, -1) : config.apiUrl;
    this.http =
      http ??
      createHttpClient({
        baseURL,
        timeoutMs: config.timeoutMs,
        headers: { Authorization: `Bearer ${config.apiKey}` },
      });
  }

  async embed(text: string, options?: EmbeddingOptions): Promise<EmbeddingResult> {
    const input = prepareText(this.getName(), text);
    const model = options?.model || this.config.model;

    try {
      debug.embed.log(`POST /embeddings model=${model} chars=${input.length}`);
      const response = await this.http.post('/embeddings', { model, input }, { signal: options?.signal });

      const parsed = embeddingResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new ExternalServiceError(this.getName(), 'Invalid embedding response format', { kind: 'permanent' });
      }

      return {
        embedding: parsed.data.data[0].embedding,
        tokenCount: parsed.data.usage?.total_tokens,
      };
    } catch (error) {
      throw toServiceError(this.getName(), error, options?.signal);
    }
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  getName(): string {
    return `OpenAIEmbedder(${this.config.model})`;
  }
}
