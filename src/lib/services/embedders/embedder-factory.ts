import type { Embedder } from '@/lib/core/interfaces';
import type { EmbeddingProvider } from '@/lib/core/types';
import { ConfigurationError } from '@/lib/utils/errors';
import type { EmbeddingConfig } from '../config';
import { OpenAIEmbedder } from './openai-embedder';
import { HttpEmbedder } from './http-embedder';

export type EmbedderCreator = (config: EmbeddingConfig) => Embedder;

/**
 * Factory for embedders.
 * Selects the implementation registered for the configured model identifier.
 */
class EmbedderFactory {
  private creators: Map<string, EmbedderCreator> = new Map();

  constructor() {
    this.register('openai', (config) => new OpenAIEmbedder(config));
    this.register('bge-m3', (config) => new HttpEmbedder(config));
  }

  /**
   * Register (or replace) the creator for a provider name.
   */
  register(provider: EmbeddingProvider | string, creator: EmbedderCreator): void {
    this.creators.set(provider, creator);
  }

  /**
   * Create the embedder for a configuration.
   * @throws ConfigurationError if the provider is not registered.
   */
  create(config: EmbeddingConfig): Embedder {
    const creator = this.creators.get(config.provider);
    if (!creator) {
      throw new ConfigurationError(
        `Embedding provider not found: ${config.provider}. Available: ${this.getAvailableProviders().join(', ')}`
      );
    }
    return creator(config);
  }

  getAvailableProviders(): string[] {
    return Array.from(this.creators.keys());
  }
}

// Singleton instance
export const embedderFactory = new EmbedderFactory();

// Also export the class for testing
export { EmbedderFactory };
