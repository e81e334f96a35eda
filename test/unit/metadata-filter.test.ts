import { describe, expect, it } from 'vitest';
import { applyMetadataFilters, passes, toNumber } from '../../src/search/hybrid/metadata-filter';
import { createRecipeFilter } from '../../src/search/hybrid/recipe-filter';
import type { RecipeFilter, RecipeFilterInput } from '../../src/search/hybrid/recipe-filter';
import type { CandidateMetadata } from '../../src/search/interfaces';
import { CHICKEN_CURRY, CHICKEN_FRIED_RICE, VEGETABLE_CURRY } from '../helpers/recipes';

function filterOf(input: RecipeFilterInput): RecipeFilter {
    const result = createRecipeFilter(input);
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}

describe('toNumber', () => {
    it('accepts finite numbers and numeric strings only', () => {
        expect(toNumber(15)).toBe(15);
        expect(toNumber(' 15 ')).toBe(15);
        expect(toNumber('2.5')).toBe(2.5);
        expect(toNumber('15 minutes')).toBeNull();
        expect(toNumber(Number.NaN)).toBeNull();
        expect(toNumber(true)).toBeNull();
        expect(toNumber(undefined)).toBeNull();
    });
});

describe('passes', () => {
    it('lets everything through without constraints, even missing metadata', () => {
        expect(passes(undefined, null)).toBe(true);
        expect(passes(undefined, filterOf({}))).toBe(true);
    });

    it('rejects missing metadata once a constraint is active', () => {
        expect(passes(undefined, filterOf({ difficulty: 'Beginner' }))).toBe(false);
    });

    it('matches difficulty exactly', () => {
        const beginner = filterOf({ difficulty: 'Beginner' });
        expect(passes(CHICKEN_FRIED_RICE.metadata, beginner)).toBe(true);
        expect(passes(CHICKEN_CURRY.metadata, beginner)).toBe(false);
        expect(passes({ difficulty: 'beginner' }, beginner)).toBe(false);
    });

    it('checks ranges inclusively', () => {
        expect(passes({ prepTimeMinutes: 30 }, filterOf({ prepTimeMax: 30 }))).toBe(true);
        expect(passes({ prepTimeMinutes: 31 }, filterOf({ prepTimeMax: 30 }))).toBe(false);
        expect(passes({ servings: 4 }, filterOf({ servingsMin: 4, servingsMax: 6 }))).toBe(true);
        expect(passes({ servings: 3 }, filterOf({ servingsMin: 4, servingsMax: 6 }))).toBe(false);
        expect(passes({ cookTimeMinutes: 40 }, filterOf({ cookTimeMin: 30 }))).toBe(true);
    });

    it('fails closed on missing or non-numeric fields', () => {
        const quickPrep = filterOf({ prepTimeMax: 20 });
        expect(passes({ title: 'Mystery Stew' }, quickPrep)).toBe(false);
        expect(passes({ prepTimeMinutes: 'quick' }, quickPrep)).toBe(false);
        expect(passes({ prepTimeMinutes: null }, quickPrep)).toBe(false);
        expect(passes({ prepTimeMinutes: '15' }, quickPrep)).toBe(true);
    });

    it('bounds total time by prep plus cook', () => {
        const metadata: CandidateMetadata = { prepTimeMinutes: 10, cookTimeMinutes: 20 };
        expect(passes(metadata, filterOf({ maxTotalTime: 30 }))).toBe(true);
        expect(passes(metadata, filterOf({ maxTotalTime: 29 }))).toBe(false);
        expect(passes({ prepTimeMinutes: 10 }, filterOf({ maxTotalTime: 60 }))).toBe(false);
    });

    it('applies the vegetarian heuristic to title and ingredients', () => {
        const vegetarian = filterOf({ dietaryRestrictions: ['vegetarian'] });
        expect(passes(VEGETABLE_CURRY.metadata, vegetarian)).toBe(true);
        expect(passes(CHICKEN_CURRY.metadata, vegetarian)).toBe(false);
        expect(passes({ title: 'Beef Stew', ingredients: ['carrot'] }, vegetarian)).toBe(false);
    });

    it('only looks at meat keywords for vegetarian', () => {
        const vegetarian = filterOf({ dietaryRestrictions: ['vegetarian'] });
        expect(passes({ title: 'Pork Ribs', ingredients: ['pork'] }, vegetarian)).toBe(true);
    });

    it('applies the vegan, dairy-free and gluten-free heuristics', () => {
        const buttered = { title: 'Buttered Potatoes', ingredients: ['potato', 'butter'] };
        expect(passes(buttered, filterOf({ dietaryRestrictions: ['vegan'] }))).toBe(false);
        expect(passes(buttered, filterOf({ dietaryRestrictions: ['dairy-free'] }))).toBe(false);
        expect(passes(buttered, filterOf({ dietaryRestrictions: ['gluten-free'] }))).toBe(true);
        expect(passes(VEGETABLE_CURRY.metadata, filterOf({ dietaryRestrictions: ['vegan'] }))).toBe(true);
    });

    it('requires any one of several restrictions', () => {
        const buttered = { title: 'Buttered Potatoes', ingredients: ['potato', 'butter'] };
        expect(passes(buttered, filterOf({ dietaryRestrictions: ['vegan', 'gluten-free'] }))).toBe(true);
        expect(passes(buttered, filterOf({ dietaryRestrictions: ['vegan', 'dairy-free'] }))).toBe(false);
    });

    it('matches other restrictions only when named in the text', () => {
        const keto = filterOf({ dietaryRestrictions: ['keto'] });
        expect(passes({ title: 'Keto Chicken Bowl', ingredients: ['chicken'] }, keto)).toBe(true);
        expect(passes(CHICKEN_CURRY.metadata, keto)).toBe(false);
    });

    it('fails dietary checks when there is no text to inspect', () => {
        expect(passes({ servings: 2 }, filterOf({ dietaryRestrictions: ['vegetarian'] }))).toBe(false);
    });

    it('requires every dimension to hold', () => {
        const filter = filterOf({ difficulty: 'Intermediate', dietaryRestrictions: ['vegetarian'], maxTotalTime: 45 });
        expect(passes(VEGETABLE_CURRY.metadata, filter)).toBe(false);
        expect(passes({ ...VEGETABLE_CURRY.metadata, cookTimeMinutes: 25 }, filter)).toBe(true);
    });
});

describe('applyMetadataFilters', () => {
    it('keeps survivors in their original order', () => {
        const results = [
            { id: 'C', metadata: CHICKEN_CURRY.metadata },
            { id: 'B', metadata: VEGETABLE_CURRY.metadata },
            { id: 'A', metadata: CHICKEN_FRIED_RICE.metadata },
            { id: 'X' },
        ];
        const filtered = applyMetadataFilters(results, filterOf({ servingsMax: 4 }));
        expect(filtered.map((r) => r.id)).toEqual(['C', 'B', 'A']);
    });

    it('returns a copy of everything without a filter', () => {
        const results: Array<{ id: string; metadata?: CandidateMetadata }> = [{ id: 'X' }];
        const filtered = applyMetadataFilters(results, null);
        expect(filtered).toEqual(results);
        expect(filtered).not.toBe(results);
    });
});
