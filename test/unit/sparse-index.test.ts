import { afterEach, describe, expect, it } from 'vitest';
import { IndexUnavailableError, SparseIndexBuildError } from '../../src/search/errors';
import { InMemoryDocumentStore } from '../../src/search/in-memory-document-store';
import type { DocumentStore } from '../../src/search/interfaces';
import { SparseIndex } from '../../src/search/sparse-index';
import { LogLevel, logger } from '../../src/utils/logger';
import { CURRY_CORPUS, recipe } from '../helpers/recipes';

const settings = { logLevel: LogLevel.ERROR };

function builtIndex(): SparseIndex {
    const index = new SparseIndex(settings);
    index.build(CURRY_CORPUS);
    return index;
}

describe('SparseIndex', () => {
    it('ranks documents by term overlap', () => {
        const results = builtIndex().search(['chicken', 'curry'], 10);

        expect(results.map((r) => r.id)).toEqual(['C', 'A', 'B']);
        expect(results.map((r) => r.rank)).toEqual([1, 2, 3]);
        expect(results.every((r) => r.kind === 'sparse' && r.score > 0)).toBe(true);
        expect(results[0]?.score).toBeGreaterThan(results[1]?.score ?? Infinity);
    });

    it('carries metadata from the indexed document', () => {
        const [first] = builtIndex().search(['thigh'], 1);
        expect(first?.metadata).toEqual(CURRY_CORPUS[2]?.metadata);
    });

    it('truncates to topN', () => {
        expect(builtIndex().search(['chicken', 'curry'], 2).map((r) => r.id)).toEqual(['C', 'A']);
    });

    it('breaks score ties by insertion order', () => {
        const twinA = recipe('first', { title: 'Lentil Stew' });
        const twinB = recipe('second', { title: 'Lentil Stew' });

        const index = new SparseIndex(settings);
        index.build([twinA, twinB]);
        expect(index.search(['lentil'], 10).map((r) => r.id)).toEqual(['first', 'second']);

        index.build([twinB, twinA]);
        expect(index.search(['lentil'], 10).map((r) => r.id)).toEqual(['second', 'first']);
    });

    it('returns nothing for empty queries, non-positive topN and unknown terms', () => {
        const index = builtIndex();
        expect(index.search([], 10)).toEqual([]);
        expect(index.search(['chicken'], 0)).toEqual([]);
        expect(index.search(['zebra'], 10)).toEqual([]);
    });

    it('returns nothing for an empty corpus', () => {
        const index = new SparseIndex(settings);
        index.build([]);
        expect(index.isAvailable()).toBe(true);
        expect(index.search(['chicken'], 10)).toEqual([]);
    });

    it('treats a never-built index as empty but reports it through searchOrThrow', () => {
        const index = new SparseIndex(settings);
        expect(index.isAvailable()).toBe(false);
        expect(index.search(['chicken'], 10)).toEqual([]);
        expect(() => index.searchOrThrow(['chicken'], 10)).toThrow(IndexUnavailableError);
    });

    it('keeps the previous index when a build fails', () => {
        const index = builtIndex();

        expect(() => index.build([recipe('', { title: 'Broken' })])).toThrow(SparseIndexBuildError);
        expect(index.search(['thigh'], 10).map((r) => r.id)).toEqual(['C']);
        expect(index.getStats().buildCount).toBe(1);
    });

    it('keeps the previous index when the store cannot be read', async () => {
        const index = builtIndex();
        const failingStore: DocumentStore = {
            getAllDocuments: () => Promise.reject(new Error('store offline')),
            getDocumentMetadata: () => Promise.resolve(undefined),
        };

        await expect(index.rebuild(failingStore)).rejects.toBeInstanceOf(SparseIndexBuildError);
        expect(index.getStats().documentCount).toBe(3);
    });

    it('rebuilds from a document store', async () => {
        const store = new InMemoryDocumentStore(CURRY_CORPUS);
        const index = new SparseIndex(settings);
        await index.rebuild(store);

        store.upsert(recipe('D', { title: 'Mushroom Risotto' }));
        expect(index.search(['mushroom'], 10)).toEqual([]);

        await index.rebuild(store);
        expect(index.search(['mushroom'], 10).map((r) => r.id)).toEqual(['D']);
        expect(index.getStats()).toMatchObject({ documentCount: 4, buildCount: 2, isAvailable: true });
    });

    it('lets a later duplicate replace the earlier record in place', () => {
        const index = new SparseIndex(settings);
        index.build([
            recipe('x', { title: 'Apple Pie' }),
            recipe('y', { title: 'Banana Bread' }),
            recipe('x', { title: 'Banana Pancakes' }),
        ]);

        expect(index.search(['apple'], 10)).toEqual([]);
        expect(index.search(['banana'], 10).map((r) => r.id)).toEqual(['x', 'y']);
        expect(index.getStats().documentCount).toBe(2);
        expect(index.getMetadata('x')?.title).toBe('Banana Pancakes');
    });
    it('measures document length in tokens, repeats included', () => {
        // Both hold "chicken" twice; the rice recipe is longer only through repeats
        const riceHeavy = recipe('X', { title: 'Chicken', ingredients: Array<string>(7).fill('rice') });
        const soup = recipe('Y', { title: 'Chicken Soup', ingredients: ['stew'] });
        const index = new SparseIndex(settings);
        index.build([riceHeavy, soup]);

        const results = index.search(['chicken'], 10);

        // avgdl = (9 + 5) / 2, idf = ln(1 + 0.5 / 2.5)
        const idf = Math.log(1.2);
        expect(results.map((r) => r.id)).toEqual(['Y', 'X']);
        expect(results[0]?.score).toBeCloseTo(idf * (5 / (2 + 1.5 * (0.25 + 0.75 * (5 / 7)))), 10);
        expect(results[1]?.score).toBeCloseTo(idf * (5 / (2 + 1.5 * (0.25 + 0.75 * (9 / 7)))), 10);
    });

    describe('log level', () => {
        afterEach(() => {
            logger.setLogLevel(LogLevel.ERROR);
        });

        it('applies an explicit logLevel on construction', () => {
            logger.setLogLevel(LogLevel.DEBUG);

            new SparseIndex({ logLevel: LogLevel.WARN });

            expect(logger.getLogLevel()).toBe(LogLevel.WARN);
        });

        it('leaves the process-wide level alone without an override', () => {
            logger.setLogLevel(LogLevel.INFO);

            new SparseIndex({ bm25K1: 1.2 });

            expect(logger.getLogLevel()).toBe(LogLevel.INFO);
        });
    });
});
