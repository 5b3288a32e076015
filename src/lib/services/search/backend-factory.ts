import type { SearchBackend } from '@/lib/core/interfaces';
import type { SearchBackendProvider } from '@/lib/core/types';
import { ConfigurationError } from '@/lib/utils/errors';
import type { BackendConfig } from '../config';
import { QdrantBackend } from './qdrant-backend';
import { WeaviateBackend } from './weaviate-backend';

export interface BackendCreateOptions {
  /** Transport timeout for a single request */
  timeoutMs: number;
}

export type BackendCreator = (config: BackendConfig, options: BackendCreateOptions) => SearchBackend;

/**
 * Factory for search backends, keyed by VECTOR_DB_PROVIDER.
 */
class BackendFactory {
  private creators: Map<string, BackendCreator> = new Map();

  constructor() {
    this.register('qdrant', (config, options) => new QdrantBackend(config.handle, { timeoutMs: options.timeoutMs }));
    this.register('weaviate', (config) => new WeaviateBackend(config.handle));
  }

  register(provider: SearchBackendProvider | string, creator: BackendCreator): void {
    this.creators.set(provider, creator);
  }

  /**
   * @throws ConfigurationError if the provider is not registered.
   */
  create(config: BackendConfig, options: BackendCreateOptions): SearchBackend {
    const creator = this.creators.get(config.provider);
    if (!creator) {
      throw new ConfigurationError(
        `Search backend not found: ${config.provider}. Available: ${this.getAvailableProviders().join(', ')}`
      );
    }
    return creator(config, options);
  }

  getAvailableProviders(): string[] {
    return Array.from(this.creators.keys());
  }
}

export const backendFactory = new BackendFactory();

export { BackendFactory };
