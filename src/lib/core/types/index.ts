export type { EmbeddingResult, EmbeddingOptions, EmbeddingProvider, SparseVector } from './embedding.types';
export type {
  TestCase,
  ResolvedTolerances,
  TestCaseSelection,
  TestCaseFile,
} from './test-case.types';
export type {
  DistanceMetric,
  SearchBackendProvider,
  SearchCandidate,
  CollectionInfo,
  BackendConnection,
  CollectionHandle,
  SearchOptions,
  SearchMode,
  SearchQuery,
} from './search.types';
export { SEARCH_MODES } from './search.types';
export type {
  CaseOutcome,
  FailureOutcome,
  ErrorKind,
  CaseResult,
  CategoryStats,
  RunStatus,
  RunSummary,
  ReportFormat,
  WrittenReport,
} from './result.types';
export { FAILURE_OUTCOMES } from './result.types';
