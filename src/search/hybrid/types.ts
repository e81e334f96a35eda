/**
 * Types for hybrid search functionality
 * Combines sparse (BM25) and dense (embedding) search results
 */

import type { CandidateMetadata } from '../interfaces';
import type { RecipeFilter } from './recipe-filter';

/**
 * Source of a search result in hybrid search
 */
export type HybridResultSource = 'sparse' | 'dense' | 'both';

/**
 * Result of fusing the sparse and dense ranked lists
 */
export interface FusedResult {
    kind: 'fused';
    id: string;

    // Raw scores, informational only once fusion has run
    /** BM25 score, 0 if absent from the sparse list */
    sparseScore: number;
    /** Similarity, 0 if absent from the dense list */
    denseScore: number;

    /** sparseWeight / (k + sparseRank), or 0 */
    rrfSparse: number;
    /** denseWeight / (k + denseRank), or 0 */
    rrfDense: number;
    /** rrfSparse + rrfDense; the only ranking key */
    combinedScore: number;

    // Source tracking
    /** Rank in sparse results (undefined if not in sparse results) */
    sparseRank?: number;
    /** Rank in dense results (undefined if not in dense results) */
    denseRank?: number;
    /** Which retrieval path(s) returned this result */
    source: HybridResultSource;

    metadata?: CandidateMetadata;
}

export interface FusionSettings {
    /** RRF k parameter - higher values give more weight to lower-ranked items (default: 60) */
    rrfK: number;
    /** Weight for sparse results in fusion (default: 0.5) */
    sparseWeight: number;
    /** Weight for dense results in fusion (default: 0.5) */
    denseWeight: number;
}

export interface HybridSearchOptions {
    /** Defaults to the configured defaultResultCount */
    nResults?: number;
    filters?: RecipeFilter | null;
    sparseWeight?: number;
    denseWeight?: number;
    /** Aborting stops waiting on the dense path */
    signal?: AbortSignal;
}

/**
 * Per-request outcome of one retrieval path
 */
export type PathOutcome<T> =
    | { status: 'ok'; matches: T[]; indexUnavailable?: boolean }
    | { status: 'failed'; error: Error }
    | { status: 'disabled' };
