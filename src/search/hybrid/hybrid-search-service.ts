/**
 * Hybrid Search Service
 *
 * Orchestrates sparse (BM25) and dense (embedding) retrieval, fuses the two
 * ranked lists using RRF, then filters the fused list on recipe metadata.
 *
 * Either path may fail on its own; the search then continues with the other
 * one. Only when every attempted path fails is the failure surfaced.
 */

import { applyLogLevel, resolveSettings } from '../../settings';
import type { RecipeSearchSettings, RecipeSearchSettingsOverrides } from '../../settings';
import { logger } from '../../utils/logger';
import { withTimeout } from '../../utils/timeout';
import {
    describeError,
    IndexUnavailableError,
    RetrievalError,
    SparseIndexBuildError,
    TotalRetrievalFailure,
    ValidationError,
} from '../errors';
import type { CandidateMetadata, DenseMatch, DocumentStore, SparseMatch } from '../interfaces';
import { SearchPerformanceMonitor } from '../performance-monitor';
import type { PerformanceReport } from '../performance-monitor';
import type { SparseIndex, SparseIndexStats } from '../sparse-index';
import type { DenseRetriever } from '../semantic/types';
import { fuseResults, validateFusionSettings } from './fusion';
import { passes } from './metadata-filter';
import { parseQueryFilters } from './query-filter-parser';
import { RecipeFilter } from './recipe-filter';
import type { FilterBounds } from './recipe-filter';
import type { FusedResult, FusionSettings, HybridSearchOptions, PathOutcome } from './types';

export interface HybridSearchStats {
    index: SparseIndexStats;
    performance: PerformanceReport;
    denseEnabled: boolean;
    settings: RecipeSearchSettings;
}

function toRetrievalError(path: 'sparse' | 'dense', error: unknown): RetrievalError {
    if (error instanceof RetrievalError) {
        return error;
    }
    return new RetrievalError(path, describeError(error), { cause: error });
}

/**
 * Main hybrid search service that combines sparse and dense search
 */
export class HybridSearchService {
    private sparseIndex: SparseIndex;

    private denseRetriever: DenseRetriever | null;

    private documentStore: DocumentStore | null;

    private settings: RecipeSearchSettings;

    private monitor: SearchPerformanceMonitor;

    private operationCounter = 0;

    constructor(
        sparseIndex: SparseIndex,
        denseRetriever: DenseRetriever | null,
        documentStore: DocumentStore | null,
        settings?: RecipeSearchSettingsOverrides,
        monitor: SearchPerformanceMonitor = new SearchPerformanceMonitor(),
    ) {
        this.sparseIndex = sparseIndex;
        this.denseRetriever = denseRetriever;
        this.documentStore = documentStore;
        this.settings = resolveSettings(settings);
        this.monitor = monitor;

        applyLogLevel(settings);

        logger.debug(`HybridSearchService: Initialized (dense path ${denseRetriever ? 'enabled' : 'disabled'})`);
    }

    /**
     * Check if dense search is available
     */
    hasDenseSearch(): boolean {
        return this.denseRetriever !== null;
    }

    getFilterBounds(): FilterBounds {
        const { maxTimeMinutes, minServings, maxServings } = this.settings;
        return { maxTimeMinutes, minServings, maxServings };
    }

    /**
     * Perform hybrid search: retrieve from both paths, fuse, filter, truncate
     */
    async hybridSearch(query: string, options: HybridSearchOptions = {}): Promise<FusedResult[]> {
        const nResults = this.resolveResultCount(options.nResults);
        const fusionSettings: FusionSettings = {
            rrfK: this.settings.rrfK,
            sparseWeight: options.sparseWeight ?? this.settings.sparseWeight,
            denseWeight: options.denseWeight ?? this.settings.denseWeight,
        };
        validateFusionSettings(fusionSettings);

        const trimmedQuery = query.trim();
        if (!trimmedQuery) {
            logger.debug('HybridSearchService: Empty query');
            return [];
        }

        // Check for cancellation
        const { signal } = options;
        if (signal?.aborted) {
            return [];
        }

        const operationId = this.nextOperationId('hybrid');
        this.monitor.startTiming(operationId);

        const poolSize = nResults * this.settings.oversampleFactor;
        logger.debug(`HybridSearchService: Searching for "${trimmedQuery}" (nResults: ${nResults}, pool: ${poolSize})`);

        // Each path resolves to an outcome and never rejects. Dense is started
        // first so its request is in flight while sparse scoring runs.
        const densePending = this.runDense(trimmedQuery, poolSize, signal);
        const [sparseOutcome, denseOutcome] = await Promise.all([
            this.runSparse(trimmedQuery, poolSize),
            densePending,
        ]);

        // Check for cancellation after searches
        if (signal?.aborted) {
            this.monitor.endTiming(operationId);
            return [];
        }

        if (sparseOutcome.status === 'failed') {
            this.recordFailure('sparse', sparseOutcome.error);
        }
        if (denseOutcome.status === 'failed') {
            this.recordFailure('dense', denseOutcome.error);
        }

        if (sparseOutcome.status === 'failed' && denseOutcome.status !== 'ok') {
            this.monitor.recordTotalFailure();
            this.monitor.endTiming(operationId);
            const denseError = denseOutcome.status === 'failed' ? toRetrievalError('dense', denseOutcome.error) : null;
            const failure = new TotalRetrievalFailure(toRetrievalError('sparse', sparseOutcome.error), denseError);
            logger.error('HybridSearchService: All retrieval paths failed', {
                sparse: failure.sparseError.message,
                dense: failure.denseError?.message ?? 'disabled',
            });
            throw failure;
        }

        const sparseDegraded = sparseOutcome.status === 'ok' && sparseOutcome.indexUnavailable === true;
        if (sparseOutcome.status === 'failed' || denseOutcome.status === 'failed' || sparseDegraded) {
            this.monitor.recordDegradedSearch();
        }

        const sparseMatches = sparseOutcome.status === 'ok' ? sparseOutcome.matches : [];
        const denseMatches = denseOutcome.status === 'ok' ? denseOutcome.matches : [];
        logger.debug(`HybridSearchService: Got ${sparseMatches.length} sparse and ${denseMatches.length} dense results`);

        // Fuse first, filter after, so RRF ranks come from the unfiltered lists
        const fusedResults = fuseResults(sparseMatches, denseMatches, fusionSettings);
        const finalResults = await this.filterCandidates(fusedResults, options.filters, nResults);

        const elapsed = this.monitor.endTiming(operationId);
        logger.debug(`HybridSearchService: Search completed in ${elapsed.toFixed(1)}ms, returning ${finalResults.length} results`);

        return finalResults;
    }

    /**
     * Sparse path only. An index that has never been built yields no results.
     */
    async sparseSearch(
        query: string,
        nResults?: number,
        filters?: RecipeFilter | null,
    ): Promise<SparseMatch[]> {
        const limit = this.resolveResultCount(nResults);
        const trimmedQuery = query.trim();
        if (!trimmedQuery) {
            return [];
        }

        if (!this.sparseIndex.isAvailable()) {
            logger.warn('HybridSearchService: Sparse index not built yet, returning no results');
            return [];
        }

        const outcome = await this.runSparse(trimmedQuery, limit * this.settings.oversampleFactor);
        if (outcome.status !== 'ok') {
            throw outcome.status === 'failed'
                ? toRetrievalError('sparse', outcome.error)
                : new RetrievalError('sparse', 'sparse path disabled');
        }

        return this.filterCandidates(outcome.matches, filters, limit);
    }

    /**
     * Dense path only. Failures propagate as RetrievalError.
     */
    async denseSearch(
        query: string,
        nResults?: number,
        filters?: RecipeFilter | null,
        signal?: AbortSignal,
    ): Promise<DenseMatch[]> {
        const limit = this.resolveResultCount(nResults);
        const trimmedQuery = query.trim();
        if (!trimmedQuery) {
            return [];
        }

        const outcome = await this.runDense(trimmedQuery, limit * this.settings.oversampleFactor, signal);
        switch (outcome.status) {
            case 'disabled':
                throw new RetrievalError('dense', 'no dense retriever configured');
            case 'failed':
                this.recordFailure('dense', outcome.error);
                throw toRetrievalError('dense', outcome.error);
            case 'ok':
                return this.filterCandidates(outcome.matches, filters, limit);
        }
    }

    /**
     * Hybrid search over a raw query that may contain filter expressions
     * such as `prep:<=20` or `diet:vegan`. Fields set on options.filters
     * take precedence over the ones parsed from the text.
     */
    async search(rawQuery: string, options: HybridSearchOptions = {}): Promise<FusedResult[]> {
        const bounds = this.getFilterBounds();
        const parsed = parseQueryFilters(rawQuery, bounds);
        if (!parsed.filter.ok) {
            throw parsed.filter.error;
        }

        const merged = RecipeFilter.merge(parsed.filter.value, options.filters, bounds);
        if (!merged.ok) {
            throw merged.error;
        }

        return this.hybridSearch(parsed.textQuery, { ...options, filters: merged.value });
    }

    /**
     * Rebuild the sparse index from the document store
     */
    async rebuildIndex(): Promise<void> {
        if (!this.documentStore) {
            throw new SparseIndexBuildError('No document store configured');
        }

        const operationId = this.nextOperationId('rebuild');
        this.monitor.startTiming(operationId);
        try {
            await this.sparseIndex.rebuild(this.documentStore);
        } finally {
            this.monitor.endTiming(operationId, 'indexing');
        }
    }

    getStats(): HybridSearchStats {
        return {
            index: this.sparseIndex.getStats(),
            performance: this.monitor.getPerformanceReport(),
            denseEnabled: this.denseRetriever !== null,
            settings: this.settings,
        };
    }

    private resolveResultCount(nResults: number | undefined): number {
        const value = nResults ?? this.settings.defaultResultCount;
        if (!Number.isInteger(value) || value <= 0) {
            throw new ValidationError([`nResults: must be a positive integer, got ${value}`]);
        }
        return value;
    }

    private nextOperationId(prefix: string): string {
        this.operationCounter++;
        return `${prefix}-${this.operationCounter}`;
    }

    private async runSparse(query: string, topN: number): Promise<PathOutcome<SparseMatch>> {
        try {
            const tokens = this.sparseIndex.getTokenizer().extractQueryKeywords(query);
            return { status: 'ok', matches: this.sparseIndex.searchOrThrow(tokens, topN) };
        } catch (error) {
            if (error instanceof IndexUnavailableError) {
                // A never-built index is empty, not broken
                logger.warn('HybridSearchService: Sparse index not built yet, continuing with no sparse results');
                this.monitor.recordIndexUnavailable();
                return { status: 'ok', matches: [], indexUnavailable: true };
            }
            return { status: 'failed', error: toRetrievalError('sparse', error) };
        }
    }

    private async runDense(query: string, topN: number, signal?: AbortSignal): Promise<PathOutcome<DenseMatch>> {
        const retriever = this.denseRetriever;
        if (!retriever) {
            return { status: 'disabled' };
        }

        try {
            const matches = await withTimeout(
                (timeoutSignal) => retriever.search(query, topN, this.settings.minSimilarity, timeoutSignal),
                this.settings.denseTimeoutMs,
                signal,
            );
            return { status: 'ok', matches };
        } catch (error) {
            return { status: 'failed', error: toRetrievalError('dense', error) };
        }
    }

    private recordFailure(path: 'sparse' | 'dense', error: Error): void {
        logger.warn(`HybridSearchService: ${path} path failed, continuing without it`, error.message);
        this.monitor.recordPathFailure(path, error.message);
    }

    /**
     * Walk candidates in rank order and keep the first `limit` that pass the
     * filter. Metadata is looked up only for candidates that reach the filter.
     */
    private async filterCandidates<T extends { id: string; metadata?: CandidateMetadata }>(
        candidates: readonly T[],
        filters: RecipeFilter | null | undefined,
        limit: number,
    ): Promise<T[]> {
        const activeFilter = filters && filters.hasFilters() ? filters : null;
        const survivors: T[] = [];

        for (const candidate of candidates) {
            if (survivors.length >= limit) {
                break;
            }

            if (!activeFilter) {
                survivors.push(candidate.metadata
                    ? candidate
                    : { ...candidate, metadata: this.sparseIndex.getMetadata(candidate.id) });
                continue;
            }

            const metadata = candidate.metadata ?? await this.lookupMetadata(candidate.id);
            if (passes(metadata, activeFilter)) {
                survivors.push({ ...candidate, metadata });
            } else {
                logger.debug(`HybridSearchService: Filtered out ${candidate.id}`);
            }
        }

        return survivors;
    }

    private async lookupMetadata(id: string): Promise<CandidateMetadata | undefined> {
        const local = this.sparseIndex.getMetadata(id);
        if (local) {
            return local;
        }
        if (!this.documentStore) {
            return undefined;
        }

        try {
            return await this.documentStore.getDocumentMetadata(id);
        } catch (error) {
            // Unresolvable metadata fails the filter
            logger.warn(`HybridSearchService: Metadata lookup failed for ${id}`, describeError(error));
            return undefined;
        }
    }
}
