/**
 * Embeds recipes and queries and searches them in a vector store
 */

import type { DenseMatch, RecipeDocument, RecipeMetadata } from '../interfaces';
import { logger } from '../../utils/logger';
import { InMemoryVectorStore } from './in-memory-vector-store';
import type { EmbedAndSearch, EmbeddingProvider } from './types';

/**
 * Text a recipe is embedded from. One labelled line per field so the
 * embedding reflects the whole recipe rather than the title alone.
 */
export function buildEmbeddingText(metadata: RecipeMetadata): string {
  return [
    `Recipe: ${metadata.title}`,
    `Difficulty: ${metadata.difficulty}`,
    `Cooking time: ${metadata.prepTimeMinutes} minutes prep, ${metadata.cookTimeMinutes} minutes cook`,
    `Serves ${metadata.servings} people`,
    `Ingredients: ${metadata.ingredients.join(' | ')}`,
    `Instructions: ${metadata.instructions.join(' ')}`,
  ].join('\n');
}

export class EmbeddingVectorSearch implements EmbedAndSearch {
  private provider: EmbeddingProvider;
  private store: InMemoryVectorStore;
  private metadata: Map<string, RecipeMetadata> = new Map();

  constructor(provider: EmbeddingProvider, store: InMemoryVectorStore = new InMemoryVectorStore()) {
    this.provider = provider;
    this.store = store;
  }

  /**
   * Embed and store each document. Requests are issued together and
   * the provider's own queue bounds concurrency.
   */
  async indexDocuments(documents: readonly RecipeDocument[]): Promise<number> {
    const startTime = Date.now();
    const vectors = await Promise.all(
      documents.map(document => this.provider.embed(buildEmbeddingText(document.metadata), 'search_document'))
    );

    documents.forEach((document, i) => {
      const vector = vectors[i];
      if (vector) {
        this.store.upsert(document.id, vector);
        this.metadata.set(document.id, document.metadata);
      }
    });

    logger.info(`EmbeddingVectorSearch: Embedded ${documents.length} documents in ${Date.now() - startTime}ms`);
    return documents.length;
  }

  removeDocument(id: string): void {
    this.store.remove(id);
    this.metadata.delete(id);
  }

  async embedAndSearch(
    queryText: string,
    topN: number,
    minSimilarity: number,
    signal?: AbortSignal
  ): Promise<DenseMatch[]> {
    const vector = await this.provider.embed(queryText, 'search_query', signal);
    const hits = await this.store.query(vector, topN);

    const matches: DenseMatch[] = [];
    for (const hit of hits) {
      const similarity = Math.min(1, Math.max(0, 1 - hit.distance));
      if (similarity < minSimilarity) {
        continue;
      }
      matches.push({
        kind: 'dense',
        id: hit.id,
        similarity,
        rank: matches.length + 1,
        metadata: this.metadata.get(hit.id),
      });
    }

    return matches;
  }
}
