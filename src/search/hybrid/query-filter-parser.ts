/**
 * Query Filter Parser for Hybrid Search
 *
 * Parses recipe filter expressions from search queries.
 * Supports expressions like `prep:<=20`, `servings:>=4`, `diet:vegan`,
 * `difficulty:beginner` and `total:<45`.
 */

import { err, ValidationError } from '../errors';
import type { Result } from '../errors';
import { logger } from '../../utils/logger';
import { DEFAULT_FILTER_BOUNDS, RecipeFilter } from './recipe-filter';
import type { FilterBounds, RecipeFilterInput } from './recipe-filter';

/**
 * Filter operators supported in queries
 */
export type FilterOperator =
    | 'eq'   // Exact match (field:value)
    | 'gt'   // Greater than (field:>value)
    | 'lt'   // Less than (field:<value)
    | 'gte'  // Greater than or equal (field:>=value)
    | 'lte'; // Less than or equal (field:<=value)

export type FilterField = 'difficulty' | 'prep' | 'cook' | 'servings' | 'total' | 'diet';

/**
 * A filter expression recognised in the query
 */
export interface QueryFilterExpression {
    field: FilterField;
    operator: FilterOperator;
    value: string | number;
    /** The original matched string for removal from query */
    rawMatch: string;
}

export interface ParsedQuery {
    /** The query text with recognised filter expressions removed */
    textQuery: string;
    filter: Result<RecipeFilter, ValidationError>;
    expressions: QueryFilterExpression[];
}

/**
 * Regex pattern for matching filter expressions
 * ORDER MATTERS: Check >= and <= before > and <
 */
const FILTER_REGEX = /(\w+):(>=|<=|>|<)?("[^"]+"|'[^']+'|[^\s]+)/g;

const FIELD_ALIASES = new Map<string, FilterField>([
    ['difficulty', 'difficulty'],
    ['level', 'difficulty'],
    ['prep', 'prep'],
    ['cook', 'cook'],
    ['servings', 'servings'],
    ['serves', 'servings'],
    ['total', 'total'],
    ['time', 'total'],
    ['diet', 'diet'],
]);

type RangeKeys = readonly ['prepTimeMin' | 'cookTimeMin' | 'servingsMin', 'prepTimeMax' | 'cookTimeMax' | 'servingsMax'];

const RANGE_FIELDS: Partial<Record<FilterField, RangeKeys>> = {
    prep: ['prepTimeMin', 'prepTimeMax'],
    cook: ['cookTimeMin', 'cookTimeMax'],
    servings: ['servingsMin', 'servingsMax'],
};

/**
 * Map operator symbols to FilterOperator type
 */
function parseOperator(symbol: string | undefined): FilterOperator {
    switch (symbol) {
        case '>=': return 'gte';
        case '<=': return 'lte';
        case '>': return 'gt';
        case '<': return 'lt';
        default: return 'eq';
    }
}

/**
 * Parse the value, handling quoted strings and numbers
 */
function parseValue(rawValue: string): string | number {
    // Remove quotes if present
    let value = rawValue;
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
    }

    const numValue = Number(value);
    if (value.trim() !== '' && Number.isFinite(numValue)) {
        return numValue;
    }

    return value;
}

/**
 * Fold one expression into the filter input, or describe why it cannot be
 */
function applyExpression(input: RecipeFilterInput, expression: QueryFilterExpression): string | null {
    const { field, operator, value } = expression;

    const rangeKeys = RANGE_FIELDS[field];
    if (rangeKeys) {
        if (typeof value !== 'number') {
            return `${field}: expected a number, got '${value}'`;
        }
        const [minKey, maxKey] = rangeKeys;
        switch (operator) {
            case 'gte': input[minKey] = value; break;
            case 'gt': input[minKey] = value + 1; break;
            case 'lte': input[maxKey] = value; break;
            case 'lt': input[maxKey] = value - 1; break;
            case 'eq':
                input[minKey] = value;
                input[maxKey] = value;
                break;
        }
        return null;
    }

    switch (field) {
        case 'total':
            if (typeof value !== 'number') {
                return `total: expected a number, got '${value}'`;
            }
            if (operator === 'lte' || operator === 'eq') {
                input.maxTotalTime = value;
            } else if (operator === 'lt') {
                input.maxTotalTime = value - 1;
            } else {
                return 'total: only an upper bound (<= or <) is supported';
            }
            return null;
        case 'difficulty':
            if (operator !== 'eq') {
                return 'difficulty: comparison operators are not supported';
            }
            input.difficulty = String(value);
            return null;
        case 'diet':
            if (operator !== 'eq') {
                return 'diet: comparison operators are not supported';
            }
            input.dietaryRestrictions = [...(input.dietaryRestrictions ?? []), String(value)];
            return null;
        default:
            return null;
    }
}

/**
 * Parse a search query to extract recipe filters
 *
 * @example
 * parseQueryFilters("prep:<=20 diet:vegan curry")
 * // textQuery: "curry", filter: { prepTimeMax: 20, dietaryRestrictions: ['vegan'] }
 */
export function parseQueryFilters(query: string, bounds: FilterBounds = DEFAULT_FILTER_BOUNDS): ParsedQuery {
    const expressions: QueryFilterExpression[] = [];
    const spans: Array<{ start: number; end: number }> = [];

    for (const match of query.matchAll(FILTER_REGEX)) {
        const [rawMatch, rawField = '', operatorSymbol, rawValue = ''] = match;
        const field = FIELD_ALIASES.get(rawField.toLowerCase());
        if (!field || match.index === undefined) {
            // Not a recipe field; leave it in the text query
            continue;
        }
        spans.push({ start: match.index, end: match.index + rawMatch.length });

        const expression: QueryFilterExpression = {
            field,
            operator: parseOperator(operatorSymbol),
            value: parseValue(rawValue),
            rawMatch,
        };
        expressions.push(expression);
        logger.debug('Query filter parsed:', expression);
    }

    // Cut recognised expressions out by their match positions
    let textQuery = '';
    let cursor = 0;
    for (const { start, end } of spans) {
        textQuery += `${query.slice(cursor, start)} `;
        cursor = end;
    }
    textQuery += query.slice(cursor);

    // Clean up extra whitespace
    textQuery = textQuery.replace(/\s+/g, ' ').trim();

    const input: RecipeFilterInput = {};
    const issues: string[] = [];
    for (const expression of expressions) {
        const issue = applyExpression(input, expression);
        if (issue) {
            issues.push(issue);
        }
    }

    const filter = issues.length > 0
        ? err(new ValidationError(issues))
        : RecipeFilter.create(input, bounds);

    if (expressions.length > 0) {
        logger.debug(`Parsed ${expressions.length} filters from query. Remaining text query: "${textQuery}"`);
    }

    return { textQuery, filter, expressions };
}
