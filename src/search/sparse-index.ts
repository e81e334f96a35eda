import MiniSearch from 'minisearch';
import { applyLogLevel, resolveSettings } from '../settings';
import type { RecipeSearchSettings, RecipeSearchSettingsOverrides } from '../settings';
import { logger } from '../utils/logger';
import { describeError, IndexUnavailableError, SparseIndexBuildError } from './errors';
import type { DocumentStore, RecipeDocument, RecipeMetadata, SparseMatch } from './interfaces';
import { createTokenizer } from './tokenizer';
import type { RecipeTokenizer } from './tokenizer';

interface SparseIndexEntry {
    id: string;
    /** Pre-tokenized keywords joined by single spaces */
    keywords: string;
}

/**
 * One fully built index. Never mutated after construction; a rebuild
 * publishes a new snapshot by swapping the reference.
 */
interface SparseIndexSnapshot {
    /** Candidate retrieval only; scores are recomputed from the token statistics below */
    readonly index: MiniSearch<SparseIndexEntry>;
    /** Document id -> insertion position, used to break score ties */
    readonly ordinals: ReadonlyMap<string, number>;
    readonly metadata: ReadonlyMap<string, RecipeMetadata>;
    /** Document id -> term -> occurrences */
    readonly termFrequencies: ReadonlyMap<string, ReadonlyMap<string, number>>;
    /** Document id -> token count, duplicates included */
    readonly lengths: ReadonlyMap<string, number>;
    /** Term -> number of documents containing it */
    readonly documentFrequencies: ReadonlyMap<string, number>;
    readonly averageLength: number;
    readonly builtAt: number;
}

export interface SparseIndexStats {
    documentCount: number;
    buildCount: number;
    lastBuiltAt: number | null;
    isAvailable: boolean;
}

const splitKeywords = (text: string): string[] => text.split(' ').filter((term) => term.length > 0);

/**
 * In-memory BM25 index over recipe keywords. MiniSearch finds the
 * candidate documents; scoring uses the snapshot's own token statistics.
 * Readers capture the current snapshot once per query, so a concurrent
 * rebuild is never observed half-done.
 */
export class SparseIndex {
    private snapshot: SparseIndexSnapshot | null = null;

    private buildCount = 0;

    private readonly settings: RecipeSearchSettings;

    private readonly tokenizer: RecipeTokenizer;

    constructor(settings?: RecipeSearchSettingsOverrides, tokenizer?: RecipeTokenizer) {
        this.settings = resolveSettings(settings);
        applyLogLevel(settings);
        this.tokenizer = tokenizer ?? createTokenizer(this.settings);
    }

    getTokenizer(): RecipeTokenizer {
        return this.tokenizer;
    }

    /**
     * Build a fresh index from the full document set and publish it.
     * On failure the previously published index stays in place.
     */
    build(documents: readonly RecipeDocument[]): void {
        const startTime = Date.now();
        logger.debug(`SparseIndex: Building index from ${documents.length} documents`);

        let next: SparseIndexSnapshot;
        try {
            next = this.createSnapshot(documents);
        } catch (error) {
            logger.error('SparseIndex: Build failed, keeping previous index', error);
            throw new SparseIndexBuildError(`Failed to build sparse index: ${describeError(error)}`, { cause: error });
        }

        this.snapshot = next;
        this.buildCount++;
        logger.info(`SparseIndex: Indexed ${next.ordinals.size} documents in ${Date.now() - startTime}ms`);
    }

    /**
     * Rebuild from the document store
     */
    async rebuild(store: DocumentStore): Promise<void> {
        let documents: RecipeDocument[];
        try {
            documents = await store.getAllDocuments();
        } catch (error) {
            logger.error('SparseIndex: Could not load documents for rebuild', error);
            throw new SparseIndexBuildError(`Failed to load documents: ${describeError(error)}`, { cause: error });
        }
        this.build(documents);
    }

    isAvailable(): boolean {
        return this.snapshot !== null;
    }

    /**
     * Rank documents against query tokens. A never-built index yields no
     * results; use searchOrThrow to tell that case apart.
     */
    search(queryTokens: readonly string[], topN: number): SparseMatch[] {
        const snapshot = this.snapshot;
        if (!snapshot) {
            logger.debug('SparseIndex: Queried before first build, returning no results');
            return [];
        }
        return this.searchSnapshot(snapshot, queryTokens, topN);
    }

    searchOrThrow(queryTokens: readonly string[], topN: number): SparseMatch[] {
        const snapshot = this.snapshot;
        if (!snapshot) {
            throw new IndexUnavailableError();
        }
        return this.searchSnapshot(snapshot, queryTokens, topN);
    }

    getMetadata(id: string): RecipeMetadata | undefined {
        return this.snapshot?.metadata.get(id);
    }

    getStats(): SparseIndexStats {
        return {
            documentCount: this.snapshot?.ordinals.size ?? 0,
            buildCount: this.buildCount,
            lastBuiltAt: this.snapshot?.builtAt ?? null,
            isAvailable: this.snapshot !== null,
        };
    }

    private createSnapshot(documents: readonly RecipeDocument[]): SparseIndexSnapshot {
        // Later records replace earlier ones with the same id but keep their position
        const latest = new Map<string, RecipeDocument>();
        for (const document of documents) {
            if (typeof document.id !== 'string' || document.id.length === 0) {
                throw new Error('Document id must be a non-empty string');
            }
            latest.set(document.id, document);
        }

        const ordinals = new Map<string, number>();
        const metadata = new Map<string, RecipeMetadata>();
        const termFrequencies = new Map<string, Map<string, number>>();
        const lengths = new Map<string, number>();
        const documentFrequencies = new Map<string, number>();
        const entries: SparseIndexEntry[] = [];
        let totalLength = 0;

        const corpus = this.tokenizer.buildCorpus([...latest.values()]);
        for (const { id, tokens } of corpus) {
            const document = latest.get(id);
            if (!document) {
                continue;
            }
            ordinals.set(id, ordinals.size);
            metadata.set(id, document.metadata);

            const frequencies = new Map<string, number>();
            for (const token of tokens) {
                frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
            }
            for (const term of frequencies.keys()) {
                documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1);
            }
            termFrequencies.set(id, frequencies);
            lengths.set(id, tokens.length);
            totalLength += tokens.length;

            entries.push({ id, keywords: tokens.join(' ') });
        }

        const index = new MiniSearch<SparseIndexEntry>({
            fields: ['keywords'],
            storeFields: [],
            tokenize: splitKeywords,
            // Terms are already normalized by the tokenizer
            processTerm: (term: string) => term,
            searchOptions: {
                combineWith: 'OR',
                prefix: false,
                fuzzy: false,
            },
        });
        index.addAll(entries);

        return {
            index,
            ordinals,
            metadata,
            termFrequencies,
            lengths,
            documentFrequencies,
            averageLength: corpus.length > 0 ? totalLength / corpus.length : 0,
            builtAt: Date.now(),
        };
    }

    private searchSnapshot(
        snapshot: SparseIndexSnapshot,
        queryTokens: readonly string[],
        topN: number,
    ): SparseMatch[] {
        const terms = queryTokens.filter((token) => token.length > 0);
        if (terms.length === 0 || topN <= 0 || snapshot.ordinals.size === 0) {
            return [];
        }

        const candidates = snapshot.index.search(terms.join(' '));

        const scored = candidates.map((candidate) => {
            const id = String(candidate.id);
            return {
                id,
                score: this.scoreDocument(snapshot, id, terms),
                ordinal: snapshot.ordinals.get(id) ?? Number.MAX_SAFE_INTEGER,
            };
        });

        scored.sort((a, b) => (b.score - a.score) || (a.ordinal - b.ordinal));

        return scored.slice(0, topN).map((entry, index): SparseMatch => ({
            kind: 'sparse',
            id: entry.id,
            score: entry.score,
            rank: index + 1,
            metadata: snapshot.metadata.get(entry.id),
        }));
    }

    /**
     * Okapi BM25 (BM25+ when delta > 0) over the full token sequence.
     * Document length counts every token, repeats included.
     */
    private scoreDocument(snapshot: SparseIndexSnapshot, id: string, queryTerms: readonly string[]): number {
        const frequencies = snapshot.termFrequencies.get(id);
        const length = snapshot.lengths.get(id) ?? 0;
        if (!frequencies || snapshot.averageLength === 0) {
            return 0;
        }

        const { bm25K1: k1, bm25B: b, bm25Delta: delta } = this.settings;
        const documentCount = snapshot.ordinals.size;
        const lengthNorm = k1 * (1 - b + b * (length / snapshot.averageLength));

        let score = 0;
        for (const term of queryTerms) {
            const tf = frequencies.get(term) ?? 0;
            if (tf === 0) {
                continue;
            }
            const df = snapshot.documentFrequencies.get(term) ?? 0;
            const idf = Math.log(1 + (documentCount - df + 0.5) / (df + 0.5));
            score += idf * (delta + (tf * (k1 + 1)) / (tf + lengthNorm));
        }
        return score;
    }
}
