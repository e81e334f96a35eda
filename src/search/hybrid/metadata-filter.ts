/**
 * Metadata filter evaluation
 *
 * Evaluation does not depend on which retrieval path produced a candidate.
 * Range checks fail closed: a missing or non-numeric field never satisfies
 * an active constraint on that field.
 */

import type { CandidateMetadata } from '../interfaces';
import dietaryKeywords from './dietary-keywords.json';
import type { DietaryRestriction, RecipeFilter } from './recipe-filter';

type KeywordGroup = keyof typeof dietaryKeywords;

/**
 * Heuristic rules: the restriction holds when none of the listed keyword
 * groups appears in the recipe text. Tags without a rule match verbatim only.
 */
const DIETARY_HEURISTICS: Partial<Record<DietaryRestriction, readonly KeywordGroup[]>> = {
    'vegetarian': ['meat'],
    'vegan': ['meat', 'dairy', 'egg'],
    'dairy-free': ['dairy'],
    'gluten-free': ['gluten'],
};

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * Numbers and numeric strings ("15") are numeric; anything else is not
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && NUMERIC_STRING.test(value)) {
        return Number(value);
    }
    return null;
}

function inRange(value: unknown, min: number | undefined, max: number | undefined): boolean {
    if (min === undefined && max === undefined) {
        return true;
    }
    const num = toNumber(value);
    if (num === null) {
        return false;
    }
    return (min === undefined || num >= min) && (max === undefined || num <= max);
}

/**
 * Lower-cased title + ingredients, or null when neither is present
 */
function getDietaryText(metadata: CandidateMetadata): string | null {
    const parts: string[] = [];
    if (typeof metadata.title === 'string') {
        parts.push(metadata.title);
    }
    if (Array.isArray(metadata.ingredients)) {
        for (const ingredient of metadata.ingredients) {
            if (typeof ingredient === 'string') {
                parts.push(ingredient);
            }
        }
    }
    return parts.length > 0 ? parts.join(' ').toLowerCase() : null;
}

export function matchesDietaryRestriction(text: string, restriction: DietaryRestriction): boolean {
    if (text.includes(restriction)) {
        return true;
    }
    const groups = DIETARY_HEURISTICS[restriction];
    if (!groups) {
        return false;
    }
    return groups.every((group) => dietaryKeywords[group].every((keyword) => !text.includes(keyword)));
}

/**
 * Decide whether a candidate's metadata satisfies every active constraint.
 * Dietary restrictions are OR-ed: any one of them is enough.
 */
export function passes(
    metadata: CandidateMetadata | null | undefined,
    filter: RecipeFilter | null | undefined,
): boolean {
    if (!filter || !filter.hasFilters()) {
        return true;
    }
    if (!metadata) {
        return false;
    }

    if (filter.difficulty !== undefined && metadata.difficulty !== filter.difficulty) {
        return false;
    }

    if (!inRange(metadata.prepTimeMinutes, filter.prepTimeMin, filter.prepTimeMax)) {
        return false;
    }
    if (!inRange(metadata.cookTimeMinutes, filter.cookTimeMin, filter.cookTimeMax)) {
        return false;
    }
    if (!inRange(metadata.servings, filter.servingsMin, filter.servingsMax)) {
        return false;
    }

    if (filter.maxTotalTime !== undefined) {
        const prep = toNumber(metadata.prepTimeMinutes);
        const cook = toNumber(metadata.cookTimeMinutes);
        if (prep === null || cook === null || prep + cook > filter.maxTotalTime) {
            return false;
        }
    }

    if (filter.dietaryRestrictions.length > 0) {
        const text = getDietaryText(metadata);
        if (text === null) {
            return false;
        }
        if (!filter.dietaryRestrictions.some((restriction) => matchesDietaryRestriction(text, restriction))) {
            return false;
        }
    }

    return true;
}

/**
 * Keep results whose metadata passes, preserving order
 */
export function applyMetadataFilters<T extends { metadata?: CandidateMetadata }>(
    results: readonly T[],
    filter: RecipeFilter | null | undefined,
): T[] {
    if (!filter || !filter.hasFilters()) {
        return [...results];
    }
    return results.filter((result) => passes(result.metadata, filter));
}
