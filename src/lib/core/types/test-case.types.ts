import type { SearchMode } from './search.types';

/**
 * A query paired with its known-correct expected result.
 * Loaded once by the registry and frozen; never mutated during a run.
 */
export interface TestCase {
  readonly id: string;
  readonly queryText: string;
  readonly expectedDocumentId: string;
  /** Other document ids accepted as the expected result */
  readonly alternativeDocumentIds?: readonly string[];
  readonly category?: string;
  /** Falls back to the run default when absent */
  readonly maxAllowedRank?: number;
  /** Falls back to the run default when absent */
  readonly minScoreThreshold?: number;
  /** Falls back to the run default when absent */
  readonly searchMode?: SearchMode;
  /** Collection to query instead of the configured one */
  readonly collection?: string;
  readonly name?: string;
  readonly description?: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
}

/** Tolerances actually applied to a case after defaults are resolved */
export interface ResolvedTolerances {
  maxAllowedRank: number;
  minScoreThreshold: number;
  topK: number;
}

export interface TestCaseSelection {
  ids?: string[];
  categories?: string[];
}

/** On-disk layout of the test case file */
export interface TestCaseFile {
  version: string;
  updatedAt?: string;
  tests: TestCase[];
}
