/**
 * Dense retrieval module exports
 */

export { OllamaEmbeddingService } from './embedding-service';
export type { FetchLike } from './embedding-service';
export { RequestQueue } from './request-queue';
export { CollaboratorDenseRetriever } from './dense-retriever';
export { EmbeddingVectorSearch, buildEmbeddingText } from './embedding-vector-search';
export { InMemoryVectorStore, cosineSimilarity } from './in-memory-vector-store';
export type {
  DenseRetriever,
  EmbedAndSearch,
  EmbeddingProvider,
  EmbeddingTaskType,
  VectorQueryHit,
  VectorStore,
} from './types';
