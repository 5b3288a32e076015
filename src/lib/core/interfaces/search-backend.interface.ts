import type { CollectionInfo, SearchCandidate, SearchOptions, SearchQuery } from '../types/search.types';

/**
 * Read-only view of a nearest-neighbour index.
 * Implementations never write to the backend.
 */
export interface SearchBackend {
  /**
   * Run a dense, sparse or hybrid query. Candidates come back best match
   * first, in backend order, with ranks 1..n.
   */
  search(query: SearchQuery, topK: number, options?: SearchOptions): Promise<SearchCandidate[]>;

  /**
   * Vector size, distance metric and point count of the configured collection
   */
  getCollectionInfo(options?: SearchOptions): Promise<CollectionInfo>;

  /**
   * True when the backend answers its readiness check
   */
  healthCheck(options?: SearchOptions): Promise<boolean>;

  /**
   * Backend name
   */
  getName(): string;
}
