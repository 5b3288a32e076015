/** Learned lexical weights (e.g. BGE-M3), keyed by token id */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface EmbeddingResult {
  embedding: number[];
  /** Only from providers that return lexical weights */
  sparse?: SparseVector;
  tokenCount?: number;
}

export interface EmbeddingOptions {
  model?: string;
  /** Cancels the underlying request when the case or run deadline fires */
  signal?: AbortSignal;
}

/** Model identifiers with a registered embedder implementation */
export type EmbeddingProvider = 'openai' | 'bge-m3';
