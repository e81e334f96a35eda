/**
 * Core interfaces for the recipe search system
 *
 * These interfaces define the documents being ranked, the per-path match
 * records, and the contract of the document-store collaborator.
 */

export const RECIPE_DIFFICULTIES = ['Beginner', 'Intermediate', 'Advanced'] as const;

export type RecipeDifficulty = typeof RECIPE_DIFFICULTIES[number];

export interface RecipeMetadata {
    title: string;
    difficulty: RecipeDifficulty;
    prepTimeMinutes: number;
    cookTimeMinutes: number;
    /** 1..50 */
    servings: number;
    ingredients: string[];
    instructions: string[];
}

/**
 * A recipe as owned by the storage subsystem. Immutable once indexed; an
 * update replaces the whole record under the same id.
 */
export interface RecipeDocument {
    id: string;
    metadata: RecipeMetadata;
}

/**
 * Metadata as seen by the filter engine. Records coming back from external
 * stores are not trusted, so every field may be missing or mistyped.
 */
export interface CandidateMetadata {
    title?: unknown;
    difficulty?: unknown;
    prepTimeMinutes?: unknown;
    cookTimeMinutes?: unknown;
    servings?: unknown;
    ingredients?: unknown;
    instructions?: unknown;
}

export interface TokenizedDocument {
    id: string;
    /** Duplicates retained: term frequency matters for BM25 */
    tokens: string[];
}

export interface SparseMatch {
    kind: 'sparse';
    id: string;
    /** BM25 relevance, >= 0 */
    score: number;
    /** 1-based position in the sparse ranking */
    rank: number;
    metadata?: CandidateMetadata;
}

export interface DenseMatch {
    kind: 'dense';
    id: string;
    /** 1 - cosine distance, in [0, 1] */
    similarity: number;
    /** 1-based position in the dense ranking */
    rank: number;
    metadata?: CandidateMetadata;
}

/**
 * Document-store collaborator. Owns the document set; the sparse index is a
 * derived cache of it.
 */
export interface DocumentStore {
    getAllDocuments(): Promise<RecipeDocument[]>;
    getDocumentMetadata(id: string): Promise<CandidateMetadata | undefined>;
}

/**
 * Searchable text of a recipe: title, ingredients, then instructions
 */
export function getSearchableText(metadata: RecipeMetadata): string {
    return [metadata.title, ...metadata.ingredients, ...metadata.instructions].join(' ');
}
