/**
 * Centralized embedding model configuration
 * Single source of truth for model names and vector sizes
 */

import type { EmbeddingProvider } from '@/lib/core/types';

export interface EmbeddingModelConfig {
  id: string;
  provider: EmbeddingProvider;
  dimensions: number;
}

export const EMBEDDING_MODELS: EmbeddingModelConfig[] = [
  { id: "text-embedding-3-small", provider: "openai", dimensions: 1536 },
  { id: "text-embedding-3-large", provider: "openai", dimensions: 3072 },
  { id: "text-embedding-ada-002", provider: "openai", dimensions: 1536 },
  { id: "bge-m3", provider: "bge-m3", dimensions: 1024 },
];

// Defaults per provider when EMBEDDING_MODEL / EMBEDDING_API_URL are not set
export const PROVIDER_DEFAULTS: Record<EmbeddingProvider, { model: string; apiUrl: string; dimensions: number }> = {
  openai: {
    model: "text-embedding-3-small",
    apiUrl: "https://api.openai.com/v1",
    dimensions: 1536,
  },
  "bge-m3": {
    model: "bge-m3",
    apiUrl: "http://localhost:8000/embed",
    dimensions: 1024,
  },
};

/**
 * Vector size for a model: explicit override, then the known model table,
 * then the provider default.
 */
export function resolveDimensions(provider: EmbeddingProvider, model: string, override?: number): number {
  if (override !== undefined) return override;
  const known = EMBEDDING_MODELS.find((m) => m.id === model);
  return known?.dimensions ?? PROVIDER_DEFAULTS[provider].dimensions;
}
