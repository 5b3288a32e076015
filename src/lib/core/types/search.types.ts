// SEARCH TYPES
//
// 1. SearchCandidate - one ranked hit returned by the backend
// 2. CollectionInfo  - metadata used by the pre-flight check
// 3. CollectionHandle - connection identity owned by a backend for one run
// 4. SearchQuery      - what a case asks the backend for

import type { SparseVector } from './embedding.types';

export type DistanceMetric = 'cosine' | 'dot' | 'euclid' | 'manhattan' | 'hamming';

export type SearchBackendProvider = 'qdrant' | 'weaviate';

export const SEARCH_MODES = ['dense', 'sparse', 'hybrid'] as const;

/** dense: vector similarity; sparse: lexical; hybrid: both fused with RRF */
export type SearchMode = (typeof SEARCH_MODES)[number];

export interface SearchCandidate {
  readonly documentId: string;
  readonly score: number;
  /** 1-based position in backend order */
  readonly rank: number;
  readonly payload?: Readonly<Record<string, unknown>>;
}

export interface CollectionInfo {
  /** Null when the backend cannot report it (e.g. an empty schemaless class) */
  vectorSize: number | null;
  distanceMetric: DistanceMetric | null;
  pointCount: number;
  vectorName: string | null;
  /** Sparse vectors the collection declares; null when the backend has no such notion */
  sparseVectorNames: readonly string[] | null;
}

export type BackendConnection =
  | { kind: 'local'; host: string; port: number; https: boolean }
  | { kind: 'remote'; url: string; apiKey?: string };

export interface CollectionHandle {
  readonly connection: BackendConnection;
  readonly collectionName: string;
  readonly expectedVectorSize: number;
  readonly distanceMetric: DistanceMetric;
  /** Named vector to query; null uses the collection's only vector */
  readonly vectorName: string | null;
  /** Sparse vector queried by sparse and hybrid searches (Qdrant) */
  readonly sparseVectorName: string;
  /** Payload field (Qdrant) or property (Weaviate) holding the document id */
  readonly documentIdField: string;
}

export interface SearchQuery {
  mode: SearchMode;
  dense: number[];
  /** Required by Qdrant for sparse and hybrid modes */
  sparse?: SparseVector;
  /** Query text, for backends that score lexical matches themselves (Weaviate BM25) */
  text: string;
}

export interface SearchOptions {
  signal?: AbortSignal;
  /** Collection to query instead of the configured one */
  collectionName?: string;
}
