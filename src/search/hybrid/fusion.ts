/**
 * Reciprocal Rank Fusion (RRF) algorithm for merging sparse and dense search results
 *
 * RRF combines ranked lists by rank position rather than raw score, so BM25
 * scores and cosine similarities never have to share a scale.
 * For each item, it computes: score = Σ weight_i / (k + rank_i)
 * where k is a constant (typically 60) and rank_i is the rank in list i.
 */

import type { DenseMatch, SparseMatch } from '../interfaces';
import { ValidationError } from '../errors';
import type { FusedResult, FusionSettings, HybridResultSource } from './types';
import { logger } from '../../utils/logger';

export const DEFAULT_FUSION_SETTINGS: FusionSettings = {
    rrfK: 60,
    sparseWeight: 0.5,
    denseWeight: 0.5,
};

/**
 * Computes RRF score for a single item
 * score = weight * (1 / (k + rank))
 */
export function computeRRFScore(rank: number, k: number, weight: number): number {
    return weight * (1 / (k + rank));
}

/**
 * Weights and k must be finite and non-negative
 */
export function validateFusionSettings(settings: FusionSettings): void {
    const issues: string[] = [];
    const check = (name: string, value: number): void => {
        if (!Number.isFinite(value) || value < 0) {
            issues.push(`${name}: must be a finite number >= 0, got ${value}`);
        }
    };

    check('rrfK', settings.rrfK);
    check('sparseWeight', settings.sparseWeight);
    check('denseWeight', settings.denseWeight);

    if (issues.length > 0) {
        throw new ValidationError(issues);
    }
}

interface Contribution<T> {
    match: T;
    /** 1-based position in its own list */
    rank: number;
}

/** First occurrence of each id wins, so a duplicate keeps its best rank */
function indexByFirstRank<T extends { id: string }>(results: readonly T[]): Map<string, Contribution<T>> {
    const byId = new Map<string, Contribution<T>>();
    results.forEach((match, index) => {
        if (!byId.has(match.id)) {
            byId.set(match.id, { match, rank: index + 1 });
        }
    });
    return byId;
}

/**
 * Fuses sparse and dense results using weighted Reciprocal Rank Fusion.
 * Ties on the combined score keep first-appearance order: sparse list
 * order first, then dense-only ids in dense order.
 */
export function fuseResults(
    sparseResults: readonly SparseMatch[],
    denseResults: readonly DenseMatch[],
    settings: FusionSettings = DEFAULT_FUSION_SETTINGS,
    nResults?: number,
): FusedResult[] {
    validateFusionSettings(settings);
    const { rrfK, sparseWeight, denseWeight } = settings;

    logger.debug(`Hybrid fusion: Merging ${sparseResults.length} sparse and ${denseResults.length} dense results`);

    const sparseMap = indexByFirstRank(sparseResults);
    const denseMap = indexByFirstRank(denseResults);

    // Map keys iterate in insertion order, which is the tie-break order
    const allIds = new Set<string>([...sparseMap.keys(), ...denseMap.keys()]);

    const fusedResults: Array<FusedResult & { order: number }> = [];
    let order = 0;

    allIds.forEach((id) => {
        const sparse = sparseMap.get(id);
        const dense = denseMap.get(id);

        const rrfSparse = sparse ? computeRRFScore(sparse.rank, rrfK, sparseWeight) : 0;
        const rrfDense = dense ? computeRRFScore(dense.rank, rrfK, denseWeight) : 0;

        let source: HybridResultSource;
        if (sparse && dense) {
            source = 'both';
        } else if (sparse) {
            source = 'sparse';
        } else {
            source = 'dense';
        }

        fusedResults.push({
            kind: 'fused',
            id,
            sparseScore: sparse?.match.score ?? 0,
            denseScore: dense?.match.similarity ?? 0,
            rrfSparse,
            rrfDense,
            combinedScore: rrfSparse + rrfDense,
            sparseRank: sparse?.rank,
            denseRank: dense?.rank,
            source,
            // Prefer sparse metadata as it comes from the local index snapshot
            metadata: sparse?.match.metadata ?? dense?.match.metadata,
            order: order++,
        });
    });

    fusedResults.sort((a, b) => (b.combinedScore - a.combinedScore) || (a.order - b.order));

    // Log top results for debugging
    if (fusedResults.length > 0) {
        logger.debug('Hybrid fusion: Top 5 fused results:');
        fusedResults.slice(0, 5).forEach((r, i) => {
            logger.debug(`  ${i + 1}. ${r.id} (score: ${r.combinedScore.toFixed(4)}, source: ${r.source})`);
        });
    }

    const limited = nResults === undefined ? fusedResults : fusedResults.slice(0, Math.max(0, nResults));
    return limited.map(({ order: _order, ...result }) => result);
}
