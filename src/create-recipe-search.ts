import { resolveSettings } from './settings';
import type { RecipeSearchSettingsOverrides } from './settings';
import { logger } from './utils/logger';
import { HybridSearchService } from './search/hybrid/hybrid-search-service';
import type { DocumentStore } from './search/interfaces';
import { SearchPerformanceMonitor } from './search/performance-monitor';
import { CollaboratorDenseRetriever } from './search/semantic/dense-retriever';
import type { EmbedAndSearch } from './search/semantic/types';
import { SparseIndex } from './search/sparse-index';

export interface RecipeSearchOptions {
    documentStore: DocumentStore;
    /** Omit to run sparse-only */
    embedAndSearch?: EmbedAndSearch | null;
    settings?: RecipeSearchSettingsOverrides;
    monitor?: SearchPerformanceMonitor;
}

/**
 * Wire the sparse index, dense retriever and orchestrator from one settings
 * object, then build the sparse index from the document store.
 */
export async function createRecipeSearch(options: RecipeSearchOptions): Promise<HybridSearchService> {
    const settings = resolveSettings(options.settings);

    const sparseIndex = new SparseIndex(settings);
    const denseRetriever = options.embedAndSearch
        ? new CollaboratorDenseRetriever(options.embedAndSearch)
        : null;

    const service = new HybridSearchService(
        sparseIndex,
        denseRetriever,
        options.documentStore,
        options.settings,
        options.monitor ?? new SearchPerformanceMonitor(),
    );

    await service.rebuildIndex();
    logger.info(`RecipeSearch: Ready with ${sparseIndex.getStats().documentCount} documents`);

    return service;
}
