export type { Embedder } from './embedder.interface';
export type { SearchBackend } from './search-backend.interface';
