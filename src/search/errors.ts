/**
 * Error taxonomy for the recipe search core.
 *
 * Every error carries a `kind` discriminant so callers at an API boundary can
 * map it to a response without `instanceof` chains.
 */

import type { ZodError } from 'zod';

export type RecipeSearchErrorKind =
    | 'validation'
    | 'retrieval'
    | 'total-retrieval-failure'
    | 'index-unavailable'
    | 'index-build'
    | 'embedding';

/** Which retrieval path produced a candidate or a failure */
export type RetrievalPath = 'sparse' | 'dense';

export type Result<T, E> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

export abstract class RecipeSearchError extends Error {
    abstract readonly kind: RecipeSearchErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed filter or request parameter. Never retried.
 */
export class ValidationError extends RecipeSearchError {
    readonly kind = 'validation';

    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(issues.length > 0 ? issues.join('; ') : 'Invalid search request');
        this.issues = issues;
    }
}

/**
 * A single retrieval path failed or timed out.
 */
export class RetrievalError extends RecipeSearchError {
    readonly kind = 'retrieval';

    readonly path: RetrievalPath;

    constructor(path: RetrievalPath, message: string, options?: { cause?: unknown }) {
        super(`${path} retrieval failed: ${message}`, options);
        this.path = path;
    }
}

/**
 * Every retrieval path that was attempted failed. Distinguishes "the search
 * subsystem is down" from "nothing matched".
 */
export class TotalRetrievalFailure extends RecipeSearchError {
    readonly kind = 'total-retrieval-failure';

    readonly sparseError: RetrievalError;

    /** Null when no dense retriever is configured */
    readonly denseError: RetrievalError | null;

    constructor(sparseError: RetrievalError, denseError: RetrievalError | null) {
        super('All retrieval paths failed', { cause: denseError ?? sparseError });
        this.sparseError = sparseError;
        this.denseError = denseError;
    }
}

/**
 * The sparse index was queried before any successful build.
 */
export class IndexUnavailableError extends RecipeSearchError {
    readonly kind = 'index-unavailable';

    constructor() {
        super('Sparse index has not been built');
    }
}

export class SparseIndexBuildError extends RecipeSearchError {
    readonly kind = 'index-build';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class EmbeddingError extends RecipeSearchError {
    readonly kind = 'embedding';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatZodIssues(error: ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
