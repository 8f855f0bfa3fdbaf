import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type HistographConfig } from '../types/index.js';
import { getLogger, isLogLevel } from './logger.js';

/**
 * Partial configuration: scalar fields replace, nested sections merge field by field.
 * `source` is replaced as a whole.
 */
export type ConfigOverrides = {
    [K in keyof HistographConfig]?: HistographConfig[K] extends object
        ? Partial<HistographConfig[K]>
        : HistographConfig[K];
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Shape of histograph.config.json. Unknown keys are ignored.
 */
const fileConfigSchema = z.object({
    dbPath: z.string().min(1).optional(),
    lexiconPath: z.string().min(1).optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
    jsonLogs: z.boolean().optional(),
    source: z
        .object({
            title: z.string().min(1),
            author: z.string().optional(),
            year: z.number().int().optional(),
            perspective: z.string().optional(),
            language: z.string().default('English'),
            description: z.string().optional(),
        })
        .optional(),
    chunking: z
        .object({ targetWords: positiveInt, minDocumentChars: nonNegativeInt })
        .partial()
        .optional(),
    extraction: z
        .object({
            mode: z.enum(['historical', 'narrative']),
            maxPromptChars: positiveInt,
            relationshipPromptChars: positiveInt,
            maxEntitiesPerCategory: positiveInt,
            maxRelationships: positiveInt,
            entityMaxTokens: positiveInt,
            relationshipMaxTokens: positiveInt,
            temperature: z.number().min(0).max(2),
            jsonMode: z.boolean(),
        })
        .partial()
        .optional(),
    ingestion: z
        .object({ chunkDelayMs: nonNegativeInt, filePattern: z.string().min(1) })
        .partial()
        .optional(),
    retrieval: z
        .object({
            maxBlocks: positiveInt,
            profilesPerTerm: positiveInt,
            maxRelationshipsPerProfile: nonNegativeInt,
            roleGroupLimit: nonNegativeInt,
            maxContentTerms: nonNegativeInt,
            episodesPerTerm: nonNegativeInt,
            excerptChars: positiveInt,
            maxEventTerms: nonNegativeInt,
            eventsPerTerm: nonNegativeInt,
        })
        .partial()
        .optional(),
    compression: z
        .object({
            thresholdChars: positiveInt,
            batchSize: positiveInt,
            fallbackChars: positiveInt,
            maxTokens: positiveInt,
        })
        .partial()
        .optional(),
    synthesis: z
        .object({
            maxTokens: positiveInt,
            temperature: z.number().min(0).max(2),
            appendSources: z.boolean(),
            maxSourceLabels: nonNegativeInt,
        })
        .partial()
        .optional(),
    llm: z
        .object({
            provider: z.enum(['ollama', 'openai']),
            model: z.string().min(1),
            baseUrl: z.string().url(),
            timeoutMs: positiveInt,
            maxRetries: nonNegativeInt,
        })
        .partial()
        .optional(),
});

/**
 * Load configuration from histograph.config.json using cosmiconfig.
 * Returns null when no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('histograph', {
        searchPlaces: ['histograph.config.json'],
    });

    let loaded: unknown = null;
    try {
        const result = await explorer.search(searchFrom);
        if (!result || result.isEmpty) return null;
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        loaded = result.config;
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
        return null;
    }

    const parsed = fileConfigSchema.safeParse(loaded);
    if (!parsed.success) {
        getLogger().warn({ issues: parsed.error.issues }, 'Invalid config file, using defaults');
        return null;
    }
    return parsed.data;
}

/**
 * Read relevant environment variables.
 * API keys are read where needed (see `getApiKey`), never stored in config.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};
    const llm: Partial<HistographConfig['llm']> = {};

    const dbPath = process.env['HISTOGRAPH_DB'];
    if (dbPath) env.dbPath = dbPath;

    const logLevel = process.env['HISTOGRAPH_LOG_LEVEL'];
    if (isLogLevel(logLevel)) env.logLevel = logLevel;

    const provider = process.env['HISTOGRAPH_LLM_PROVIDER'];
    if (provider === 'ollama' || provider === 'openai') {
        llm.provider = provider;
    } else if (provider) {
        getLogger().warn({ provider }, 'Ignoring unknown HISTOGRAPH_LLM_PROVIDER');
    }

    const model = process.env['HISTOGRAPH_MODEL'];
    if (model) llm.model = model;

    if (Object.keys(llm).length > 0) env.llm = llm;
    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<HistographConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    const merged: HistographConfig = {
        dbPath: cliFlags.dbPath ?? envConfig.dbPath ?? fileConfig?.dbPath ?? DEFAULT_CONFIG.dbPath,
        lexiconPath: cliFlags.lexiconPath ?? fileConfig?.lexiconPath,
        logLevel: cliFlags.logLevel ?? envConfig.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
        source: cliFlags.source ?? fileConfig?.source,
        // Deep merge nested objects
        chunking: {
            ...DEFAULT_CONFIG.chunking,
            ...fileConfig?.chunking,
            ...cliFlags.chunking,
        },
        extraction: {
            ...DEFAULT_CONFIG.extraction,
            ...fileConfig?.extraction,
            ...cliFlags.extraction,
        },
        ingestion: {
            ...DEFAULT_CONFIG.ingestion,
            ...fileConfig?.ingestion,
            ...cliFlags.ingestion,
        },
        retrieval: {
            ...DEFAULT_CONFIG.retrieval,
            ...fileConfig?.retrieval,
            ...cliFlags.retrieval,
        },
        compression: {
            ...DEFAULT_CONFIG.compression,
            ...fileConfig?.compression,
            ...cliFlags.compression,
        },
        synthesis: {
            ...DEFAULT_CONFIG.synthesis,
            ...fileConfig?.synthesis,
            ...cliFlags.synthesis,
        },
        llm: {
            ...DEFAULT_CONFIG.llm,
            ...fileConfig?.llm,
            ...envConfig.llm,
            ...cliFlags.llm,
        },
    };

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
