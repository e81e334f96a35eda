/**
 * Recipe filter value object
 *
 * A RecipeFilter can only be obtained through RecipeFilter.create, which
 * validates every bound up front. Instances are frozen.
 */

import { z } from 'zod';
import type { RecipeSearchSettings } from '../../settings';
import { err, formatZodIssues, ok, ValidationError } from '../errors';
import type { Result } from '../errors';
import { RECIPE_DIFFICULTIES } from '../interfaces';
import type { RecipeDifficulty } from '../interfaces';

export const SUPPORTED_DIETARY_RESTRICTIONS = [
    'vegetarian',
    'vegan',
    'gluten-free',
    'dairy-free',
    'low-carb',
    'keto',
    'paleo',
    'diabetic',
    'low-sodium',
    'low-fat',
    'high-protein',
    'nut-free',
    'pescatarian',
] as const;

export type DietaryRestriction = typeof SUPPORTED_DIETARY_RESTRICTIONS[number];

export type FilterBounds = Pick<RecipeSearchSettings, 'maxTimeMinutes' | 'minServings' | 'maxServings'>;

export const DEFAULT_FILTER_BOUNDS: FilterBounds = {
    maxTimeMinutes: 1440,
    minServings: 1,
    maxServings: 50,
};

/**
 * Loose input accepted from callers. Null and undefined both mean "no
 * constraint"; an empty dietary list is treated the same way.
 */
export interface RecipeFilterInput {
    difficulty?: string | null;
    prepTimeMin?: number | null;
    prepTimeMax?: number | null;
    cookTimeMin?: number | null;
    cookTimeMax?: number | null;
    servingsMin?: number | null;
    servingsMax?: number | null;
    maxTotalTime?: number | null;
    dietaryRestrictions?: readonly string[] | null;
}

interface RecipeFilterValues {
    difficulty?: RecipeDifficulty;
    prepTimeMin?: number;
    prepTimeMax?: number;
    cookTimeMin?: number;
    cookTimeMax?: number;
    servingsMin?: number;
    servingsMax?: number;
    maxTotalTime?: number;
    dietaryRestrictions: readonly DietaryRestriction[];
}

const RANGE_PAIRS = [
    ['prepTimeMin', 'prepTimeMax'],
    ['cookTimeMin', 'cookTimeMax'],
    ['servingsMin', 'servingsMax'],
] as const;

function findDifficulty(value: string): RecipeDifficulty | undefined {
    const normalized = value.trim().toLowerCase();
    return RECIPE_DIFFICULTIES.find((level) => level.toLowerCase() === normalized);
}

function findDietaryRestriction(value: string): DietaryRestriction | undefined {
    const normalized = value.trim().toLowerCase();
    return SUPPORTED_DIETARY_RESTRICTIONS.find((restriction) => restriction === normalized);
}

function createFilterSchema(bounds: FilterBounds) {
    const bounded = (min: number, max: number) =>
        z.number().int().min(min).max(max).nullish().transform((value) => value ?? undefined);

    const time = bounded(0, bounds.maxTimeMinutes);
    const servings = bounded(bounds.minServings, bounds.maxServings);

    return z.object({
        difficulty: z.string().nullish().transform((value, ctx) => {
            if (value === null || value === undefined) {
                return undefined;
            }
            const difficulty = findDifficulty(value);
            if (!difficulty) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `must be one of ${RECIPE_DIFFICULTIES.join(', ')}, got '${value}'`,
                });
                return z.NEVER;
            }
            return difficulty;
        }),
        prepTimeMin: time,
        prepTimeMax: time,
        cookTimeMin: time,
        cookTimeMax: time,
        servingsMin: servings,
        servingsMax: servings,
        maxTotalTime: bounded(0, bounds.maxTimeMinutes * 2),
        dietaryRestrictions: z.array(z.string()).nullish().transform((values, ctx) => {
            const restrictions: DietaryRestriction[] = [];
            for (const value of values ?? []) {
                const restriction = findDietaryRestriction(value);
                if (!restriction) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `unsupported dietary restriction '${value}'`,
                    });
                    continue;
                }
                if (!restrictions.includes(restriction)) {
                    restrictions.push(restriction);
                }
            }
            return restrictions;
        }),
    }).strict().superRefine((filter, ctx) => {
        for (const [minKey, maxKey] of RANGE_PAIRS) {
            const min = filter[minKey];
            const max = filter[maxKey];
            if (min !== undefined && max !== undefined && min > max) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [minKey],
                    message: `must not exceed ${maxKey} (${min} > ${max})`,
                });
            }
        }
    });
}

export class RecipeFilter {
    readonly difficulty?: RecipeDifficulty;
    readonly prepTimeMin?: number;
    readonly prepTimeMax?: number;
    readonly cookTimeMin?: number;
    readonly cookTimeMax?: number;
    readonly servingsMin?: number;
    readonly servingsMax?: number;
    readonly maxTotalTime?: number;
    /** Lower-cased, de-duplicated; empty when no dietary constraint */
    readonly dietaryRestrictions: readonly DietaryRestriction[];

    private constructor(values: RecipeFilterValues) {
        this.difficulty = values.difficulty;
        this.prepTimeMin = values.prepTimeMin;
        this.prepTimeMax = values.prepTimeMax;
        this.cookTimeMin = values.cookTimeMin;
        this.cookTimeMax = values.cookTimeMax;
        this.servingsMin = values.servingsMin;
        this.servingsMax = values.servingsMax;
        this.maxTotalTime = values.maxTotalTime;
        this.dietaryRestrictions = Object.freeze([...values.dietaryRestrictions]);
        Object.freeze(this);
    }

    /**
     * Validate input and build a filter. Bounds are never swapped or clamped.
     */
    static create(
        input: RecipeFilterInput = {},
        bounds: FilterBounds = DEFAULT_FILTER_BOUNDS,
    ): Result<RecipeFilter, ValidationError> {
        const parsed = createFilterSchema(bounds).safeParse(input);
        if (!parsed.success) {
            return err(new ValidationError(formatZodIssues(parsed.error)));
        }
        return ok(new RecipeFilter(parsed.data));
    }

    static empty(): RecipeFilter {
        return new RecipeFilter({ dietaryRestrictions: [] });
    }

    /**
     * Combine a filter parsed from query text with an explicit one.
     * Fields set on the explicit filter win.
     */
    static merge(
        parsed: RecipeFilter,
        explicit: RecipeFilter | null | undefined,
        bounds: FilterBounds = DEFAULT_FILTER_BOUNDS,
    ): Result<RecipeFilter, ValidationError> {
        if (!explicit) {
            return ok(parsed);
        }
        return RecipeFilter.create({ ...parsed.toInput(), ...explicit.toInput() }, bounds);
    }

    hasFilters(): boolean {
        return this.difficulty !== undefined
            || this.prepTimeMin !== undefined
            || this.prepTimeMax !== undefined
            || this.cookTimeMin !== undefined
            || this.cookTimeMax !== undefined
            || this.servingsMin !== undefined
            || this.servingsMax !== undefined
            || this.maxTotalTime !== undefined
            || this.dietaryRestrictions.length > 0;
    }

    /**
     * Only the constraints that are set
     */
    toInput(): RecipeFilterInput {
        const input: RecipeFilterInput = {};
        if (this.difficulty !== undefined) input.difficulty = this.difficulty;
        if (this.prepTimeMin !== undefined) input.prepTimeMin = this.prepTimeMin;
        if (this.prepTimeMax !== undefined) input.prepTimeMax = this.prepTimeMax;
        if (this.cookTimeMin !== undefined) input.cookTimeMin = this.cookTimeMin;
        if (this.cookTimeMax !== undefined) input.cookTimeMax = this.cookTimeMax;
        if (this.servingsMin !== undefined) input.servingsMin = this.servingsMin;
        if (this.servingsMax !== undefined) input.servingsMax = this.servingsMax;
        if (this.maxTotalTime !== undefined) input.maxTotalTime = this.maxTotalTime;
        if (this.dietaryRestrictions.length > 0) input.dietaryRestrictions = [...this.dietaryRestrictions];
        return input;
    }
}

export function createRecipeFilter(
    input: RecipeFilterInput = {},
    bounds: FilterBounds = DEFAULT_FILTER_BOUNDS,
): Result<RecipeFilter, ValidationError> {
    return RecipeFilter.create(input, bounds);
}
