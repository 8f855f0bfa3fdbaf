/**
 * Log level options. `silent` disables output entirely (used by the test runner).
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Which extraction schema the model is asked to fill.
 *
 * - `historical`: people, places, events, organizations and dates
 * - `narrative`: characters, locations and events
 */
export type ExtractionMode = 'historical' | 'narrative';

/**
 * Bibliographic description of the book being ingested.
 */
export interface SourceConfig {
    title: string;
    author?: string;
    year?: number;
    perspective?: string;
    language: string;
    description?: string;
}

export interface ChunkingConfig {
    /** Paragraphs are accumulated until the next one would push the chunk past this many words */
    targetWords: number;
    /** Documents shorter than this (trimmed, in characters) are skipped */
    minDocumentChars: number;
}

export interface ExtractionConfig {
    mode: ExtractionMode;
    /** Chunk text is cut to this many characters in the entity prompt */
    maxPromptChars: number;
    /** Chunk text is cut to this many characters in the relationship prompt */
    relationshipPromptChars: number;
    /** Upper bound of records kept per category */
    maxEntitiesPerCategory: number;
    /** Upper bound of relationships accepted per call */
    maxRelationships: number;
    entityMaxTokens: number;
    relationshipMaxTokens: number;
    temperature: number;
    /** Ask the provider for a JSON response format where it supports one */
    jsonMode: boolean;
}

export interface IngestionConfig {
    /** Pause between chunks, to stay under the model service's rate limit */
    chunkDelayMs: number;
    /** Only files whose name matches this pattern are ingested */
    filePattern: string;
}

export interface RetrievalConfig {
    maxBlocks: number;
    profilesPerTerm: number;
    maxRelationshipsPerProfile: number;
    roleGroupLimit: number;
    maxContentTerms: number;
    episodesPerTerm: number;
    excerptChars: number;
    maxEventTerms: number;
    eventsPerTerm: number;
}

export interface CompressionConfig {
    /** Contexts strictly longer than this are compressed */
    thresholdChars: number;
    /** Excerpts per batched compression call */
    batchSize: number;
    /** Raw context is cut to this many characters when compression fails */
    fallbackChars: number;
    maxTokens: number;
}

export interface SynthesisConfig {
    maxTokens: number;
    temperature: number;
    /** Append the distinct source labels that fed the answer */
    appendSources: boolean;
    maxSourceLabels: number;
}

/**
 * LLM provider configuration.
 */
export interface LlmConfig {
    provider: 'ollama' | 'openai';
    model: string;
    baseUrl?: string;
    timeoutMs: number;
    /** Transport-level retries on 429/5xx. Extraction itself never retries. */
    maxRetries: number;
}

/**
 * Full Histograph configuration merged from CLI flags, env vars, and config file.
 */
export interface HistographConfig {
    dbPath: string;
    /** Path to a lexicon JSON file; the bundled one is used when unset */
    lexiconPath?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    source?: SourceConfig;
    chunking: ChunkingConfig;
    extraction: ExtractionConfig;
    ingestion: IngestionConfig;
    retrieval: RetrievalConfig;
    compression: CompressionConfig;
    synthesis: SynthesisConfig;
    llm: LlmConfig;
}

export const HISTOGRAPH_VERSION = '0.1.0';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: HistographConfig = {
    dbPath: './histograph.db',
    logLevel: 'info',
    jsonLogs: false,
    chunking: {
        targetWords: 1500,
        minDocumentChars: 100,
    },
    extraction: {
        mode: 'historical',
        maxPromptChars: 1500,
        relationshipPromptChars: 1800,
        maxEntitiesPerCategory: 5,
        maxRelationships: 12,
        entityMaxTokens: 1500,
        relationshipMaxTokens: 1000,
        temperature: 0.1,
        jsonMode: false,
    },
    ingestion: {
        chunkDelayMs: 1000,
        filePattern: '\\.txt$',
    },
    retrieval: {
        maxBlocks: 15,
        profilesPerTerm: 1,
        maxRelationshipsPerProfile: 5,
        roleGroupLimit: 5,
        maxContentTerms: 4,
        episodesPerTerm: 4,
        excerptChars: 1500,
        maxEventTerms: 2,
        eventsPerTerm: 2,
    },
    compression: {
        thresholdChars: 8000,
        batchSize: 4,
        fallbackChars: 8000,
        maxTokens: 1500,
    },
    synthesis: {
        maxTokens: 1200,
        temperature: 0.6,
        appendSources: true,
        maxSourceLabels: 5,
    },
    llm: {
        provider: 'ollama',
        model: 'mistral-small3.1:latest',
        timeoutMs: 120000,
        maxRetries: 0,
    },
};

/**
 * Ingestion run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at?: string;
    histograph_version: string;
    config_json: string;
    source_id: string;
    stats_json: string;
}
