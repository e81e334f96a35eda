/**
 * Keyword extraction shared by sparse indexing and query encoding.
 *
 * The same pipeline runs on both sides so a query term can only match a
 * document term that went through identical normalization.
 */

import type { RecipeSearchSettings } from '../settings';
import type { RecipeDocument, TokenizedDocument } from './interfaces';

/** Articles, prepositions, conjunctions and recipe-instruction filler */
export const COOKING_STOPWORDS: ReadonlySet<string> = new Set([
    'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'he',
    'in', 'is', 'it', 'its', 'of', 'on', 'that', 'the', 'to', 'was', 'will', 'with',
    'add', 'then', 'into', 'over', 'until', 'about', 'all', 'also', 'can', 'or',
]);

export const DEFAULT_MIN_KEYWORD_LENGTH = 2;

const NO_STOPWORDS: ReadonlySet<string> = new Set();

/**
 * Lower-case, turn every non-ASCII-alphanumeric character into whitespace,
 * split, and drop empty tokens.
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9]/g, ' ')
        .split(/\s+/)
        .filter((token) => token.length > 0);
}

export function filterKeywords(
    tokens: readonly string[],
    minLength: number = DEFAULT_MIN_KEYWORD_LENGTH,
    stopwords: ReadonlySet<string> = COOKING_STOPWORDS,
): string[] {
    return tokens.filter((token) => token.length >= minLength && !stopwords.has(token));
}

export interface RecipeTokenizer {
    /** tokenize + filterKeywords with the configured rules */
    extractKeywords(text: string): string[];
    extractQueryKeywords(query: string): string[];
    /** Title tokens appear twice to up-weight title matches */
    extractDocumentKeywords(document: RecipeDocument): string[];
    buildCorpus(documents: readonly RecipeDocument[]): TokenizedDocument[];
}

export function createTokenizer(
    settings: Pick<RecipeSearchSettings, 'minKeywordLength' | 'stopwordsEnabled'>,
): RecipeTokenizer {
    const stopwords = settings.stopwordsEnabled ? COOKING_STOPWORDS : NO_STOPWORDS;
    const extractKeywords = (text: string): string[] =>
        filterKeywords(tokenize(text), settings.minKeywordLength, stopwords);

    const extractDocumentKeywords = (document: RecipeDocument): string[] => {
        const { title, ingredients, instructions } = document.metadata;
        return extractKeywords([title, title, ...ingredients, ...instructions].join(' '));
    };

    return {
        extractKeywords,
        extractQueryKeywords: extractKeywords,
        extractDocumentKeywords,
        buildCorpus(documents: readonly RecipeDocument[]): TokenizedDocument[] {
            return documents.map((document) => ({
                id: document.id,
                tokens: extractDocumentKeywords(document),
            }));
        },
    };
}
