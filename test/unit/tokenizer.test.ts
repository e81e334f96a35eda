import { describe, expect, it } from 'vitest';
import { COOKING_STOPWORDS, createTokenizer, filterKeywords, tokenize } from '../../src/search/tokenizer';
import { recipe } from '../helpers/recipes';

describe('tokenize', () => {
    it('lower-cases and splits on anything that is not a letter or digit', () => {
        expect(tokenize('Chicken-Fried RICE! 2x')).toEqual(['chicken', 'fried', 'rice', '2x']);
    });

    it('treats non-ASCII letters as separators', () => {
        expect(tokenize('Crème brûlée')).toEqual(['cr', 'me', 'br', 'l', 'e']);
    });

    it('returns no tokens for blank or punctuation-only text', () => {
        expect(tokenize('')).toEqual([]);
        expect(tokenize('  --- !!! ')).toEqual([]);
    });
});

describe('filterKeywords', () => {
    it('drops stopwords and short tokens', () => {
        expect(filterKeywords(['add', 'the', 'salt', 'a', 'to', 'pepper', 'x'])).toEqual(['salt', 'pepper']);
    });

    it('honours a custom minimum length', () => {
        expect(filterKeywords(['egg', 'salt', 'flour'], 4)).toEqual(['salt', 'flour']);
    });

    it('keeps the instruction filler words in the stopword set', () => {
        for (const word of ['add', 'then', 'into', 'until']) {
            expect(COOKING_STOPWORDS.has(word)).toBe(true);
        }
    });
});

describe('createTokenizer', () => {
    it('can keep stopwords', () => {
        const tokenizer = createTokenizer({ minKeywordLength: 2, stopwordsEnabled: false });
        expect(tokenizer.extractKeywords('add the salt')).toEqual(['add', 'the', 'salt']);
    });

    it('repeats title tokens in document keywords', () => {
        const tokenizer = createTokenizer({ minKeywordLength: 2, stopwordsEnabled: true });
        const document = recipe('soup', {
            title: 'Tomato Soup',
            ingredients: ['tomato'],
            instructions: ['Blend until smooth.'],
        });

        expect(tokenizer.extractDocumentKeywords(document)).toEqual([
            'tomato', 'soup', 'tomato', 'soup', 'tomato', 'blend', 'smooth',
        ]);
    });

    it('is deterministic', () => {
        const tokenizer = createTokenizer({ minKeywordLength: 2, stopwordsEnabled: true });
        const query = 'Quick chicken curry with rice';
        expect(tokenizer.extractQueryKeywords(query)).toEqual(tokenizer.extractQueryKeywords(query));
        expect(tokenizer.extractQueryKeywords(query)).toEqual(['quick', 'chicken', 'curry', 'rice']);
    });

    it('builds a corpus with one entry per document', () => {
        const tokenizer = createTokenizer({ minKeywordLength: 2, stopwordsEnabled: true });
        const corpus = tokenizer.buildCorpus([recipe('a', { title: 'Rice' }), recipe('b', { title: 'Beans' })]);
        expect(corpus).toEqual([
            { id: 'a', tokens: ['rice', 'rice'] },
            { id: 'b', tokens: ['beans', 'beans'] },
        ]);
    });
});
