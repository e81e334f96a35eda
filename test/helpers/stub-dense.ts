import type { DenseMatch } from '../../src/search/interfaces';
import type { EmbedAndSearch } from '../../src/search/semantic/types';

interface StubBehaviour {
    failWith?: Error;
    /** Resolve only after this many ms, or reject early when aborted */
    delayMs?: number;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener('abort', () => {
            clearTimeout(timer);
            reject(new Error('aborted'));
        }, { once: true });
    });
}

/**
 * In-process stand-in for the embedding + vector store collaborator.
 * Returns fixed similarities regardless of the query text.
 */
export class StubEmbedAndSearch implements EmbedAndSearch {
    readonly calls: string[] = [];

    private similarities: Record<string, number>;

    private behaviour: StubBehaviour;

    constructor(similarities: Record<string, number>, behaviour: StubBehaviour = {}) {
        this.similarities = similarities;
        this.behaviour = behaviour;
    }

    async embedAndSearch(
        queryText: string,
        topN: number,
        minSimilarity: number,
        signal?: AbortSignal,
    ): Promise<DenseMatch[]> {
        this.calls.push(queryText);
        if (this.behaviour.delayMs !== undefined) {
            await delay(this.behaviour.delayMs, signal);
        }
        if (this.behaviour.failWith) {
            throw this.behaviour.failWith;
        }

        return Object.entries(this.similarities)
            .filter(([, similarity]) => similarity >= minSimilarity)
            .sort((a, b) => b[1] - a[1])
            .slice(0, topN)
            .map(([id, similarity], index): DenseMatch => ({
                kind: 'dense',
                id,
                similarity,
                rank: index + 1,
            }));
    }
}
