#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { HistographDatabase } from '../storage/database.js';
import { createLlmProvider } from '../llm/index.js';
import { DEFAULT_LEXICON_PATH, loadLexicon, type Lexicon } from '../nlp/lexicon.js';
import { StructuredExtractor } from '../extraction/structured-extractor.js';
import { IngestionPipeline } from '../ingest/pipeline.js';
import { GraphRetriever } from '../retrieval/retriever.js';
import { LlmContextCompressor } from '../retrieval/compressor.js';
import { Synthesizer } from '../synthesis/synthesizer.js';
import { QueryService, isAnalysisMode } from '../query/service.js';
import {
    HISTOGRAPH_VERSION,
    type HistographConfig,
    type IngestionConfig,
    type LlmConfig,
    type SourceConfig,
} from '../types/index.js';

interface CommonOptions {
    db?: string;
    config?: string;
    lexicon?: string;
    provider?: string;
    model?: string;
    baseUrl?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface IngestOptions extends CommonOptions {
    dir: string;
    title?: string;
    author?: string;
    year?: number;
    perspective?: string;
    language?: string;
    pattern?: string;
    targetWords?: number;
    delay?: number;
    mode?: string;
}

interface AskOptions extends CommonOptions {
    mode?: string;
    json?: boolean;
}

interface CompareOptions extends CommonOptions {
    perSource: number;
}

interface CanonicalizeOptions extends CommonOptions {
    name?: string;
    type: string;
    alias?: string[];
}

function parseInteger(value: string): number {
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .option('--config <dir>', 'Directory to search for histograph.config.json')
        .option('--lexicon <path>', 'Lexicon JSON file')
        .option('--provider <name>', 'LLM provider: ollama | openai')
        .option('--model <name>', 'Model name')
        .option('--base-url <url>', 'LLM service base URL')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs');
}

/**
 * CLI flags as config overrides. Only flags actually given are set,
 * so lower-precedence sources still apply.
 */
function toOverrides(opts: CommonOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (opts.db) overrides.dbPath = opts.db;
    if (opts.lexicon) overrides.lexiconPath = opts.lexicon;
    if (isLogLevel(opts.logLevel)) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;

    const llm: Partial<LlmConfig> = {};
    if (opts.provider === 'ollama' || opts.provider === 'openai') llm.provider = opts.provider;
    if (opts.model) llm.model = opts.model;
    if (opts.baseUrl) llm.baseUrl = opts.baseUrl;
    if (Object.keys(llm).length > 0) overrides.llm = llm;

    return overrides;
}

async function setup(opts: CommonOptions, extra: ConfigOverrides = {}): Promise<HistographConfig> {
    if (opts.provider && opts.provider !== 'ollama' && opts.provider !== 'openai') {
        throw new InvalidArgumentError(`Unknown provider: ${opts.provider}. Valid: ollama, openai`);
    }
    const overrides = toOverrides(opts);
    const config = await resolveConfig(
        {
            ...overrides,
            ...extra,
            llm: { ...overrides.llm, ...extra.llm },
        },
        { searchFrom: opts.config }
    );
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function openLexicon(config: HistographConfig): Lexicon {
    return loadLexicon(config.lexiconPath ?? DEFAULT_LEXICON_PATH);
}

function createQueryService(config: HistographConfig, db: HistographDatabase): QueryService {
    const llm = createLlmProvider(config.llm);
    const lexicon = openLexicon(config);
    return new QueryService({
        retriever: new GraphRetriever(db, lexicon, config.retrieval),
        compressor: new LlmContextCompressor(llm, config.compression),
        synthesizer: new Synthesizer(llm, config.synthesis),
        llm,
        inventory: db,
        lexicon,
    });
}

function fail(message: string, error: unknown): never {
    getLogger().error({ error }, message);
    process.exit(1);
}

const program = new Command();

program
    .name('histograph')
    .description('Build a knowledge graph from historical books and ask questions over it.')
    .version(HISTOGRAPH_VERSION);

// ─── INGEST command ───────────────────────────────────────

withCommonOptions(
    program
        .command('ingest')
        .description('Ingest a directory of chapter text files as one source')
        .requiredOption('-d, --dir <directory>', 'Directory of chapter .txt files')
        .option('-t, --title <title>', 'Source title (or source.title in the config file)')
        .option('--author <author>', 'Source author')
        .option('--year <year>', 'Publication year', parseInteger)
        .option('--perspective <text>', 'Whose point of view the source takes')
        .option('--language <language>', 'Source language')
        .option('--pattern <regex>', 'File name pattern')
        .option('--target-words <n>', 'Words per chunk', parseInteger)
        .option('--delay <ms>', 'Pause between chunks', parseInteger)
        .option('--mode <mode>', 'Extraction schema: historical | narrative')
).action(async (opts: IngestOptions) => {
    try {
        const extra: ConfigOverrides = {};
        if (opts.targetWords !== undefined) extra.chunking = { targetWords: opts.targetWords };
        const ingestion: Partial<IngestionConfig> = {};
        if (opts.pattern) ingestion.filePattern = opts.pattern;
        if (opts.delay !== undefined) ingestion.chunkDelayMs = opts.delay;
        if (Object.keys(ingestion).length > 0) extra.ingestion = ingestion;
        if (opts.mode === 'historical' || opts.mode === 'narrative') {
            extra.extraction = { mode: opts.mode };
        } else if (opts.mode) {
            throw new InvalidArgumentError(`Unknown extraction mode: ${opts.mode}. Valid: historical, narrative`);
        }

        const config = await setup(opts, extra);
        const title = opts.title ?? config.source?.title;
        if (!title) {
            throw new InvalidArgumentError('A source title is required (--title or source.title in histograph.config.json)');
        }
        const source: SourceConfig = {
            ...config.source,
            title,
            language: opts.language ?? config.source?.language ?? 'English',
        };
        if (opts.author) source.author = opts.author;
        if (opts.year !== undefined) source.year = opts.year;
        if (opts.perspective) source.perspective = opts.perspective;

        const db = new HistographDatabase(config.dbPath);
        try {
            const llm = createLlmProvider(config.llm);
            const pipeline = new IngestionPipeline({
                store: db,
                extractor: new StructuredExtractor(llm, openLexicon(config), config.extraction),
                source,
                chunking: config.chunking,
                ingestion: config.ingestion,
                runLog: db,
            });
            const stats = await pipeline.ingestDirectory(opts.dir);
            console.log(JSON.stringify({ source: pipeline.sourceId, ...stats }, null, 2));
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Ingestion failed', error);
    }
});

// ─── ASK command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('ask')
        .description('Ask a question over the ingested sources')
        .argument('<question>', 'Question to answer')
        .option('-m, --mode <mode>', 'Analysis mode: comprehensive | character | relationships | timeline | themes')
        .option('--json', 'Print the full response as JSON')
).action(async (question: string, opts: AskOptions) => {
    try {
        if (opts.mode !== undefined && !isAnalysisMode(opts.mode)) {
            throw new InvalidArgumentError(`Unknown analysis mode: ${opts.mode}`);
        }
        const config = await setup(opts);
        const db = new HistographDatabase(config.dbPath);
        try {
            const response = await createQueryService(config, db).ask({ question, analysis_mode: opts.mode });
            if (opts.json) {
                console.log(JSON.stringify(response, null, 2));
            } else {
                console.log(`\n${response.answer}\n`);
                console.log(
                    `(${response.detected_query_type}, ${response.entities_found} entities, ${response.processing_time_seconds}s)`
                );
            }
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Question failed', error);
    }
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect').description('Show database statistics')).action(
    async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const db = new HistographDatabase(config.dbPath);
            const stats = db.getStats();
            db.close();

            console.log('\n📚 Histograph Database Statistics\n');
            console.log(`  Sources:       ${stats.sources}`);
            console.log(`  Chapters:      ${stats.chapters}`);
            console.log(`  Episodes:      ${stats.episodes}`);
            console.log(`  Entities:      ${stats.entities}`);
            console.log(`  Mentions:      ${stats.mentions}`);
            console.log(`  Relationships: ${stats.relationships}`);
            console.log(`  Canonical:     ${stats.canonicalEntities}`);
            console.log(`  Runs:          ${stats.runs}`);

            if (Object.keys(stats.entitiesByCategory).length > 0) {
                console.log('\n  Entity Categories:');
                for (const [category, count] of Object.entries(stats.entitiesByCategory)) {
                    console.log(`    ${category}: ${count}`);
                }
            }

            if (Object.keys(stats.relationshipsByType).length > 0) {
                console.log('\n  Relationship Types:');
                for (const [type, count] of Object.entries(stats.relationshipsByType)) {
                    console.log(`    ${type}: ${count}`);
                }
            }

            console.log('');
        } catch (error) {
            fail('Inspect failed', error);
        }
    }
);

// ─── SOURCES command ──────────────────────────────────────

withCommonOptions(program.command('sources').description('List ingested sources')).action(
    async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const db = new HistographDatabase(config.dbPath);
            const sources = db.listSources();
            db.close();

            if (sources.length === 0) {
                console.log('No sources ingested yet.');
                return;
            }
            for (const source of sources) {
                const byline = [source.author, source.year].filter((v) => v !== null).join(', ');
                console.log(`${source.source_id}  ${source.title}${byline ? ` (${byline})` : ''}`);
                console.log(`    ${source.chapters} chapters, ${source.episodes} episodes`);
                if (source.perspective) console.log(`    Perspective: ${source.perspective}`);
            }
        } catch (error) {
            fail('Listing sources failed', error);
        }
    }
);

// ─── COMPARE command ──────────────────────────────────────

withCommonOptions(
    program
        .command('compare')
        .description('Show how each source covers an entity')
        .argument('<entity>', 'Entity name or part of one')
        .option('--per-source <n>', 'Excerpts per source', parseInteger, 2)
).action(async (entity: string, opts: CompareOptions) => {
    try {
        const config = await setup(opts);
        const db = new HistographDatabase(config.dbPath);
        const accounts = db.compareEntityAcrossSources(entity, opts.perSource);
        db.close();

        if (accounts.length === 0) {
            console.log(`No source mentions "${entity}".`);
            return;
        }
        for (const account of accounts) {
            console.log(`\n== ${account.source_title} (as ${account.entity_names.join(', ')})`);
            for (const excerpt of account.excerpts) {
                console.log(`\n  [chapter ${excerpt.chapter_number}: ${excerpt.chapter_title}]`);
                console.log(`  ${excerpt.content.slice(0, 400).replace(/\s+/g, ' ')}…`);
            }
        }
        console.log('');
    } catch (error) {
        fail('Compare failed', error);
    }
});

// ─── CANONICALIZE command ─────────────────────────────────

withCommonOptions(
    program
        .command('canonicalize')
        .description('Link alias spellings to canonical entities (all lexicon people when no name is given)')
        .option('-n, --name <name>', 'Canonical name')
        .option('--type <category>', 'Entity category of the canonical entity', 'person')
        .option('-a, --alias <aliases...>', 'Alternative spellings')
).action(async (opts: CanonicalizeOptions) => {
    try {
        const config = await setup(opts);
        if (opts.type !== 'person' && opts.type !== 'place' && opts.type !== 'organization' && opts.type !== 'event') {
            throw new InvalidArgumentError(`Unsupported category: ${opts.type}`);
        }
        const entityType = opts.type;
        const entries = opts.name
            ? [{ name: opts.name, aliases: opts.alias ?? [] }]
            : openLexicon(config).people;

        const db = new HistographDatabase(config.dbPath);
        try {
            for (const entry of entries) {
                const canonicalId = db.upsertCanonicalEntity(entry.name, entityType, entry.aliases);
                const linked = db.linkCanonicalAliases(canonicalId);
                console.log(`${entry.name}: ${linked} entities linked`);
            }
        } finally {
            db.close();
        }
    } catch (error) {
        fail('Canonicalize failed', error);
    }
});

// ─── CAPABILITIES command ─────────────────────────────────

withCommonOptions(program.command('capabilities').description('List analysis modes and known entities')).action(
    async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const db = new HistographDatabase(config.dbPath);
            const capabilities = createQueryService(config, db).capabilities();
            db.close();
            console.log(JSON.stringify(capabilities, null, 2));
        } catch (error) {
            fail('Capabilities failed', error);
        }
    }
);

// ─── HEALTH command ───────────────────────────────────────

withCommonOptions(program.command('health').description('Check the store and the model service')).action(
    async (opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const db = new HistographDatabase(config.dbPath);
            try {
                const health = await createQueryService(config, db).health();
                console.log(JSON.stringify(health, null, 2));
                if (health.status !== 'ok') process.exitCode = 1;
            } finally {
                db.close();
            }
        } catch (error) {
            fail('Health check failed', error);
        }
    }
);

program.parseAsync().catch((error: unknown) => fail('Command failed', error));
