/**
 * Hybrid Search Module
 *
 * Exports all hybrid search functionality for use by other modules.
 */

export { HybridSearchService } from './hybrid-search-service';
export type { HybridSearchStats } from './hybrid-search-service';
export {
    computeRRFScore,
    DEFAULT_FUSION_SETTINGS,
    fuseResults,
    validateFusionSettings,
} from './fusion';
export type {
    FusedResult,
    FusionSettings,
    HybridResultSource,
    HybridSearchOptions,
    PathOutcome,
} from './types';
export {
    createRecipeFilter,
    DEFAULT_FILTER_BOUNDS,
    RecipeFilter,
    SUPPORTED_DIETARY_RESTRICTIONS,
} from './recipe-filter';
export type {
    DietaryRestriction,
    FilterBounds,
    RecipeFilterInput,
} from './recipe-filter';
export {
    applyMetadataFilters,
    matchesDietaryRestriction,
    passes,
    toNumber,
} from './metadata-filter';
export { parseQueryFilters } from './query-filter-parser';
export type {
    FilterField,
    FilterOperator,
    ParsedQuery,
    QueryFilterExpression,
} from './query-filter-parser';
