import type { DenseMatch } from '../interfaces';
import { describeError, RetrievalError } from '../errors';
import { logger } from '../../utils/logger';
import type { DenseRetriever, EmbedAndSearch } from './types';

/**
 * Dense retrieval over an embedding + vector-store collaborator.
 *
 * The collaborator's output is re-checked rather than trusted: matches below
 * the threshold are dropped, order is re-established and ranks reassigned.
 */
export class CollaboratorDenseRetriever implements DenseRetriever {
  private collaborator: EmbedAndSearch;

  constructor(collaborator: EmbedAndSearch) {
    this.collaborator = collaborator;
  }

  async search(query: string, topN: number, minSimilarity: number, signal?: AbortSignal): Promise<DenseMatch[]> {
    if (topN <= 0) {
      return [];
    }

    let raw: DenseMatch[];
    try {
      raw = await this.collaborator.embedAndSearch(query, topN, minSimilarity, signal);
    } catch (error) {
      logger.warn('DenseRetriever: Collaborator failed', describeError(error));
      throw new RetrievalError('dense', describeError(error), { cause: error });
    }

    const ordered = raw
      .map((match, position) => ({ match, position }))
      .filter(({ match }) => Number.isFinite(match.similarity) && match.similarity >= minSimilarity)
      .sort((a, b) => (b.match.similarity - a.match.similarity) || (a.position - b.position));

    return ordered.slice(0, topN).map(({ match }, index): DenseMatch => ({
      kind: 'dense',
      id: match.id,
      similarity: match.similarity,
      rank: index + 1,
      metadata: match.metadata,
    }));
  }
}
