export { createRecipeSearch } from './create-recipe-search';
export type { RecipeSearchOptions } from './create-recipe-search';
export {
    DEFAULT_EMBEDDING_SETTINGS,
    DEFAULT_RECIPE_SEARCH_SETTINGS,
    loadSettingsFromEnv,
    resolveSettings,
} from './settings';
export type {
    EmbeddingServiceSettings,
    RecipeSearchSettings,
    RecipeSearchSettingsOverrides,
} from './settings';
export { logger, LogLevel, parseLogLevel } from './utils/logger';
export { AbortedError, TimeoutError, withTimeout } from './utils/timeout';

export {
    EmbeddingError,
    err,
    IndexUnavailableError,
    ok,
    RecipeSearchError,
    RetrievalError,
    SparseIndexBuildError,
    TotalRetrievalFailure,
    ValidationError,
} from './search/errors';
export type { RecipeSearchErrorKind, Result, RetrievalPath } from './search/errors';
export { getSearchableText, RECIPE_DIFFICULTIES } from './search/interfaces';
export type {
    CandidateMetadata,
    DenseMatch,
    DocumentStore,
    RecipeDifficulty,
    RecipeDocument,
    RecipeMetadata,
    SparseMatch,
    TokenizedDocument,
} from './search/interfaces';
export { COOKING_STOPWORDS, createTokenizer, filterKeywords, tokenize } from './search/tokenizer';
export type { RecipeTokenizer } from './search/tokenizer';
export { SparseIndex } from './search/sparse-index';
export type { SparseIndexStats } from './search/sparse-index';
export { InMemoryDocumentStore } from './search/in-memory-document-store';
export { SearchPerformanceMonitor } from './search/performance-monitor';
export type { DegradationStats, LatencyStats, PerformanceReport } from './search/performance-monitor';
export * from './search/hybrid';
export * from './search/semantic';
