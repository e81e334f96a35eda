import { describe, expect, it, vi } from 'vitest';
import { createRecipeSearch } from '../../src/create-recipe-search';
import { SparseIndexBuildError } from '../../src/search/errors';
import { InMemoryDocumentStore } from '../../src/search/in-memory-document-store';
import { OllamaEmbeddingService } from '../../src/search/semantic/embedding-service';
import type { FetchLike } from '../../src/search/semantic/embedding-service';
import { EmbeddingVectorSearch } from '../../src/search/semantic/embedding-vector-search';
import { LogLevel } from '../../src/utils/logger';
import { CURRY_CORPUS, CURRY_SIMILARITIES } from '../helpers/recipes';
import { StubEmbedAndSearch } from '../helpers/stub-dense';

const settings = { logLevel: LogLevel.ERROR };

/** Embedding server stand-in: picks a vector from the prompt text */
function vectorFor(prompt: string): number[] {
    if (prompt.startsWith('search_query:')) {
        return [1, 0];
    }
    if (prompt.includes('Recipe: Chicken Fried Rice')) {
        return [1, 0];
    }
    if (prompt.includes('Recipe: Vegetable Curry')) {
        return [0, 1];
    }
    return [0.6, 0.8];
}

const embeddingServer: FetchLike = async (_input, init) => {
    const body: unknown = JSON.parse(String(init?.body));
    const prompt = typeof body === 'object' && body !== null && 'prompt' in body ? String(body.prompt) : '';
    return new Response(JSON.stringify({ embedding: vectorFor(prompt) }), { status: 200 });
};

describe('createRecipeSearch', () => {
    it('builds the sparse index from the store and wires the dense path', async () => {
        const service = await createRecipeSearch({
            documentStore: new InMemoryDocumentStore(CURRY_CORPUS),
            embedAndSearch: new StubEmbedAndSearch(CURRY_SIMILARITIES),
            settings,
        });

        expect(service.hasDenseSearch()).toBe(true);
        expect(service.getStats().index.documentCount).toBe(3);

        const results = await service.hybridSearch('chicken curry', { nResults: 2 });
        expect(results.map((r) => r.id)).toEqual(['C', 'A']);
    });

    it('runs sparse-only without an embedding collaborator', async () => {
        const service = await createRecipeSearch({
            documentStore: new InMemoryDocumentStore(CURRY_CORPUS),
            settings,
        });

        expect(service.hasDenseSearch()).toBe(false);
        const results = await service.hybridSearch('thigh');
        expect(results.map((r) => [r.id, r.source])).toEqual([['C', 'sparse']]);
    });

    it('applies setting overrides', async () => {
        const service = await createRecipeSearch({
            documentStore: new InMemoryDocumentStore(CURRY_CORPUS),
            settings: { ...settings, defaultResultCount: 1 },
        });

        await expect(service.hybridSearch('chicken curry')).resolves.toHaveLength(1);
    });

    it('fails when the store cannot be read', async () => {
        const documentStore = new InMemoryDocumentStore();
        vi.spyOn(documentStore, 'getAllDocuments').mockRejectedValue(new Error('store offline'));

        await expect(createRecipeSearch({ documentStore, settings })).rejects.toBeInstanceOf(SparseIndexBuildError);
    });

    it('searches end to end through the embedding service', async () => {
        const embeddings = new OllamaEmbeddingService({ retryBaseDelayMs: 0 }, embeddingServer);
        const vectorSearch = new EmbeddingVectorSearch(embeddings);
        await vectorSearch.indexDocuments(CURRY_CORPUS);

        const service = await createRecipeSearch({
            documentStore: new InMemoryDocumentStore(CURRY_CORPUS),
            embedAndSearch: vectorSearch,
            settings,
        });

        const results = await service.hybridSearch('fried rice');

        expect(results.map((r) => [r.id, r.source])).toEqual([['A', 'both'], ['C', 'dense']]);
        expect(results[0]?.combinedScore).toBeCloseTo(1 / 61, 12);
        expect(results[1]?.combinedScore).toBeCloseTo(0.5 / 62, 12);
    });
});
