/**
 * Performance monitoring for the recipe search system
 * Tracks search latency, per-path failures and degraded searches
 */

import { performance } from 'node:perf_hooks';
import type { RetrievalPath } from './errors';
import { logger } from '../utils/logger';

export interface LatencyStats {
    averageLatency: number;
    medianLatency: number;
    p95Latency: number;
    maxLatency: number;
    sampleCount: number;
}

export interface DegradationStats {
    /** Searches that completed with one path failed */
    degradedSearches: number;
    /** Searches where every attempted path failed */
    totalFailures: number;
    sparseFailures: number;
    denseFailures: number;
    /** Searches that ran before the sparse index was first built */
    sparseUnavailable: number;
    /** Most recent failure reason per path */
    lastFailure: Partial<Record<RetrievalPath, string>>;
}

export interface PerformanceReport {
    search: LatencyStats;
    indexing: LatencyStats;
    degradation: DegradationStats;
    healthScore: number;
}

function summarize(samples: readonly number[]): LatencyStats {
    if (samples.length === 0) {
        return {
            averageLatency: 0,
            medianLatency: 0,
            p95Latency: 0,
            maxLatency: 0,
            sampleCount: 0,
        };
    }

    const sorted = [...samples].sort((a, b) => a - b);
    const sum = sorted.reduce((acc, val) => acc + val, 0);
    const at = (fraction: number): number => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))] ?? 0;

    return {
        averageLatency: sum / sorted.length,
        medianLatency: at(0.5),
        p95Latency: at(0.95),
        maxLatency: sorted[sorted.length - 1] ?? 0,
        sampleCount: sorted.length,
    };
}

export class SearchPerformanceMonitor {
    private searchLatencies: number[] = [];
    private indexingLatencies: number[] = [];
    private maxSamples: number;
    private performanceMarks = new Map<string, number>();

    private degradedSearches = 0;
    private totalFailures = 0;
    private pathFailures: Record<RetrievalPath, number> = { sparse: 0, dense: 0 };
    private sparseUnavailable = 0;
    private lastFailure: Partial<Record<RetrievalPath, string>> = {};

    constructor(maxSamples = 100) {
        this.maxSamples = maxSamples;
    }

    /**
     * Start timing an operation
     */
    startTiming(operationId: string): void {
        this.performanceMarks.set(operationId, performance.now());
    }

    /**
     * End timing an operation and record the duration
     */
    endTiming(operationId: string, operationType: 'search' | 'indexing' = 'search'): number {
        const startTime = this.performanceMarks.get(operationId);
        if (startTime === undefined) {
            logger.warn(`PerformanceMonitor: No start time found for operation: ${operationId}`);
            return 0;
        }

        const duration = performance.now() - startTime;
        this.performanceMarks.delete(operationId);

        if (operationType === 'search') {
            this.recordSearchLatency(duration);
        } else {
            this.recordIndexingLatency(duration);
        }

        return duration;
    }

    recordSearchLatency(latency: number): void {
        this.push(this.searchLatencies, latency);
    }

    recordIndexingLatency(latency: number): void {
        this.push(this.indexingLatencies, latency);
    }

    /**
     * Record that one retrieval path failed or timed out during a search
     */
    recordPathFailure(path: RetrievalPath, reason: string): void {
        this.pathFailures[path]++;
        this.lastFailure[path] = reason;
    }

    /**
     * Record a search that returned results from a single path after the other failed
     */
    recordDegradedSearch(): void {
        this.degradedSearches++;
    }

    recordIndexUnavailable(): void {
        this.sparseUnavailable++;
    }

    recordTotalFailure(): void {
        this.totalFailures++;
    }

    getSearchStats(): LatencyStats {
        return summarize(this.searchLatencies);
    }

    getIndexingStats(): LatencyStats {
        return summarize(this.indexingLatencies);
    }

    getDegradationStats(): DegradationStats {
        return {
            degradedSearches: this.degradedSearches,
            totalFailures: this.totalFailures,
            sparseFailures: this.pathFailures.sparse,
            denseFailures: this.pathFailures.dense,
            sparseUnavailable: this.sparseUnavailable,
            lastFailure: { ...this.lastFailure },
        };
    }

    /**
     * Get comprehensive performance report
     */
    getPerformanceReport(): PerformanceReport {
        const searchStats = this.getSearchStats();
        const indexingStats = this.getIndexingStats();
        const degradation = this.getDegradationStats();

        // Calculate health score (0-100)
        let healthScore = 100;

        // Penalize slow search performance (target: < 100ms)
        if (searchStats.averageLatency > 100) {
            healthScore -= Math.min(50, (searchStats.averageLatency - 100) / 10);
        }

        // Penalize slow index builds (target: < 1000ms)
        if (indexingStats.averageLatency > 1000) {
            healthScore -= Math.min(20, (indexingStats.averageLatency - 1000) / 100);
        }

        // Penalize degraded searches relative to the searches recorded
        if (searchStats.sampleCount > 0) {
            const degradedShare = (degradation.degradedSearches + degradation.totalFailures) / searchStats.sampleCount;
            healthScore -= Math.min(30, degradedShare * 30);
        }

        return {
            search: searchStats,
            indexing: indexingStats,
            degradation,
            healthScore: Math.max(0, Math.round(healthScore)),
        };
    }

    /**
     * Clear all performance data
     */
    reset(): void {
        this.searchLatencies = [];
        this.indexingLatencies = [];
        this.performanceMarks.clear();
        this.degradedSearches = 0;
        this.totalFailures = 0;
        this.pathFailures = { sparse: 0, dense: 0 };
        this.sparseUnavailable = 0;
        this.lastFailure = {};
    }

    private push(samples: number[], value: number): void {
        samples.push(value);
        if (samples.length > this.maxSamples) {
            samples.shift();
        }
    }
}
