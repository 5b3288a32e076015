import type { EmbeddingResult, EmbeddingOptions } from '../types/embedding.types';

export interface Embedder {
  /**
   * Generate embedding for a single non-empty text
   */
  embed(text: string, options?: EmbeddingOptions): Promise<EmbeddingResult>;

  /**
   * Get embedding dimensions
   */
  getDimensions(): number;

  /**
   * Embedder name
   */
  getName(): string;
}
