import { z } from 'zod';
import { formatZodIssues, ValidationError } from './search/errors';
import { logger, LogLevel, parseLogLevel } from './utils/logger';

export interface EmbeddingServiceSettings {
    /** Base URL of the Ollama-compatible embedding endpoint */
    baseUrl: string;
    model: string;
    maxConcurrentRequests: number;
    /** Per-request timeout for a single embedding call */
    requestTimeoutMs: number;
    maxRetries: number;
    /** First backoff delay; doubles on every retry */
    retryBaseDelayMs: number;
}

export interface RecipeSearchSettings {
    // Tokenizer
    /** Tokens shorter than this are dropped (default: 2) */
    minKeywordLength: number;
    stopwordsEnabled: boolean;

    // BM25
    bm25K1: number;
    bm25B: number;
    /** BM25+ lower bound; 0 gives classic BM25 */
    bm25Delta: number;

    // Fusion
    /** RRF k parameter - higher values flatten the rank curve (default: 60) */
    rrfK: number;
    sparseWeight: number;
    denseWeight: number;

    // Retrieval
    /** Dense matches below this similarity are dropped (default: 0.3) */
    minSimilarity: number;
    /** Candidates requested per path = nResults * oversampleFactor */
    oversampleFactor: number;
    denseTimeoutMs: number;
    defaultResultCount: number;

    // Filter bounds
    maxTimeMinutes: number;
    minServings: number;
    maxServings: number;

    embedding: EmbeddingServiceSettings;

    logLevel: LogLevel;
}

export type RecipeSearchSettingsOverrides =
    Partial<Omit<RecipeSearchSettings, 'embedding'>> & {
        embedding?: Partial<EmbeddingServiceSettings>;
    };

export const DEFAULT_EMBEDDING_SETTINGS: EmbeddingServiceSettings = {
    baseUrl: 'http://localhost:11434',
    model: 'nomic-embed-text',
    maxConcurrentRequests: 3,
    requestTimeoutMs: 30000,
    maxRetries: 3,
    retryBaseDelayMs: 1000,
};

export const DEFAULT_RECIPE_SEARCH_SETTINGS: RecipeSearchSettings = {
    minKeywordLength: 2,
    stopwordsEnabled: true,
    bm25K1: 1.5,
    bm25B: 0.75,
    bm25Delta: 0,
    rrfK: 60,
    sparseWeight: 0.5,
    denseWeight: 0.5,
    minSimilarity: 0.3,
    oversampleFactor: 3,
    denseTimeoutMs: 5000,
    defaultResultCount: 10,
    maxTimeMinutes: 1440,
    minServings: 1,
    maxServings: 50,
    embedding: DEFAULT_EMBEDDING_SETTINGS,
    logLevel: LogLevel.INFO,
};

const nonNegative = z.number().finite().nonnegative();

const embeddingSettingsSchema = z.object({
    baseUrl: z.string().url(),
    model: z.string().min(1),
    maxConcurrentRequests: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
});

const settingsSchema = z.object({
    minKeywordLength: z.number().int().positive(),
    stopwordsEnabled: z.boolean(),
    bm25K1: nonNegative,
    bm25B: z.number().min(0).max(1),
    bm25Delta: nonNegative,
    rrfK: nonNegative,
    sparseWeight: nonNegative,
    denseWeight: nonNegative,
    minSimilarity: z.number().min(0).max(1),
    oversampleFactor: z.number().int().min(1),
    denseTimeoutMs: z.number().int().positive(),
    defaultResultCount: z.number().int().positive(),
    maxTimeMinutes: z.number().int().positive(),
    minServings: z.number().int().positive(),
    maxServings: z.number().int().positive(),
    embedding: embeddingSettingsSchema,
    logLevel: z.nativeEnum(LogLevel),
}).refine((s) => s.minServings <= s.maxServings, {
    message: 'minServings cannot be greater than maxServings',
    path: ['minServings'],
});

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ValidationError when any value is out of range.
 */
export function resolveSettings(overrides: RecipeSearchSettingsOverrides = {}): RecipeSearchSettings {
    const settings: RecipeSearchSettings = {
        ...DEFAULT_RECIPE_SEARCH_SETTINGS,
        ...overrides,
        embedding: { ...DEFAULT_EMBEDDING_SETTINGS, ...overrides.embedding },
    };

    const parsed = settingsSchema.safeParse(settings);
    if (!parsed.success) {
        throw new ValidationError(formatZodIssues(parsed.error));
    }

    return settings;
}

/**
 * Apply an explicit logLevel override. The logger is process-wide, so the
 * last component constructed with a logLevel sets it for every component.
 */
export function applyLogLevel(overrides?: RecipeSearchSettingsOverrides): void {
    if (overrides?.logLevel !== undefined) {
        logger.setLogLevel(overrides.logLevel);
    }
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    // NaN is left for the schema to reject with the variable's field name
    return Number(raw);
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
    const raw = env[key]?.trim().toLowerCase();
    if (raw === undefined || raw === '') {
        return undefined;
    }
    return raw === 'true' || raw === '1' || raw === 'yes';
}

type NumericSettingKey = Exclude<{
    [K in keyof RecipeSearchSettings]: RecipeSearchSettings[K] extends number ? K : never;
}[keyof RecipeSearchSettings], 'logLevel'>;

type NumericEmbeddingKey = {
    [K in keyof EmbeddingServiceSettings]: EmbeddingServiceSettings[K] extends number ? K : never;
}[keyof EmbeddingServiceSettings];

const NUMERIC_ENV_KEYS: ReadonlyArray<[string, NumericSettingKey]> = [
    ['RECIPE_SEARCH_MIN_KEYWORD_LENGTH', 'minKeywordLength'],
    ['RECIPE_SEARCH_BM25_K1', 'bm25K1'],
    ['RECIPE_SEARCH_BM25_B', 'bm25B'],
    ['RECIPE_SEARCH_BM25_DELTA', 'bm25Delta'],
    ['RECIPE_SEARCH_RRF_K', 'rrfK'],
    ['RECIPE_SEARCH_SPARSE_WEIGHT', 'sparseWeight'],
    ['RECIPE_SEARCH_DENSE_WEIGHT', 'denseWeight'],
    ['RECIPE_SEARCH_MIN_SIMILARITY', 'minSimilarity'],
    ['RECIPE_SEARCH_OVERSAMPLE_FACTOR', 'oversampleFactor'],
    ['RECIPE_SEARCH_DENSE_TIMEOUT_MS', 'denseTimeoutMs'],
    ['RECIPE_SEARCH_DEFAULT_RESULTS', 'defaultResultCount'],
];

const NUMERIC_EMBEDDING_ENV_KEYS: ReadonlyArray<[string, NumericEmbeddingKey]> = [
    ['RECIPE_SEARCH_EMBEDDING_CONCURRENCY', 'maxConcurrentRequests'],
    ['RECIPE_SEARCH_EMBEDDING_TIMEOUT_MS', 'requestTimeoutMs'],
    ['RECIPE_SEARCH_EMBEDDING_RETRIES', 'maxRetries'],
];

/**
 * Build settings from RECIPE_SEARCH_* environment variables
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): RecipeSearchSettings {
    const overrides: RecipeSearchSettingsOverrides = {};
    const embedding: Partial<EmbeddingServiceSettings> = {};

    for (const [envKey, settingKey] of NUMERIC_ENV_KEYS) {
        const value = readNumber(env, envKey);
        if (value !== undefined) {
            overrides[settingKey] = value;
        }
    }

    for (const [envKey, settingKey] of NUMERIC_EMBEDDING_ENV_KEYS) {
        const value = readNumber(env, envKey);
        if (value !== undefined) {
            embedding[settingKey] = value;
        }
    }

    const stopwordsEnabled = readBoolean(env, 'RECIPE_SEARCH_STOPWORDS_ENABLED');
    if (stopwordsEnabled !== undefined) {
        overrides.stopwordsEnabled = stopwordsEnabled;
    }

    const logLevelName = env.RECIPE_SEARCH_LOG_LEVEL;
    if (logLevelName) {
        const logLevel = parseLogLevel(logLevelName);
        if (logLevel === null) {
            throw new ValidationError([`logLevel: unknown log level '${logLevelName}'`]);
        }
        overrides.logLevel = logLevel;
    }

    if (env.RECIPE_SEARCH_EMBEDDING_URL) {
        embedding.baseUrl = env.RECIPE_SEARCH_EMBEDDING_URL;
    }
    if (env.RECIPE_SEARCH_EMBEDDING_MODEL) {
        embedding.model = env.RECIPE_SEARCH_EMBEDDING_MODEL;
    }
    overrides.embedding = embedding;

    return resolveSettings(overrides);
}
