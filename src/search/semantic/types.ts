/**
 * Types for dense retrieval using embedding vectors
 */

import type { DenseMatch } from '../interfaces';

/** Prefixes the text so the embedding model knows which side it encodes */
export type EmbeddingTaskType = 'search_query' | 'search_document';

export interface EmbeddingProvider {
  embed(text: string, taskType: EmbeddingTaskType, signal?: AbortSignal): Promise<Float32Array>;
}

export interface VectorQueryHit {
  id: string;
  /** Cosine distance, 0 = identical direction */
  distance: number;
}

export interface VectorStore {
  query(vector: Float32Array, topN: number): Promise<VectorQueryHit[]>;
}

/**
 * Embedding + vector-store collaborator. Implementations embed the query
 * text and return matches whose similarity is at least minSimilarity.
 */
export interface EmbedAndSearch {
  embedAndSearch(
    queryText: string,
    topN: number,
    minSimilarity: number,
    signal?: AbortSignal
  ): Promise<DenseMatch[]>;
}

export interface DenseRetriever {
  /**
   * At most topN matches ordered by similarity descending with ranks 1..n.
   * Rejects with RetrievalError on any collaborator failure.
   */
  search(query: string, topN: number, minSimilarity: number, signal?: AbortSignal): Promise<DenseMatch[]>;
}
