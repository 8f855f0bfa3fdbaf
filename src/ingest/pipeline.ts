import fs from 'node:fs';
import path from 'node:path';
import {
    DEFAULT_CONFIG,
    HISTOGRAPH_VERSION,
    type ChunkingConfig,
    type EntityAttributes,
    type EntityCategory,
    type EntityExtractor,
    type ExtractedEntity,
    type ExtractionContext,
    type GraphStore,
    type IngestionConfig,
    type RunRecord,
    type SourceConfig,
} from '../types/index.js';
import { extractChapterMetadata } from '../nlp/chapter.js';
import { chunkDocument, isIngestible } from '../nlp/chunker.js';
import { escapeRegExp } from '../nlp/lexicon.js';
import { countWords, normalizeTerm } from '../nlp/tokenizer.js';
import { sleep } from '../utils/http-client.js';
import { getModuleLogger } from '../utils/logger.js';
import { slugify } from '../utils/slug.js';

/**
 * Where ingestion runs are recorded. Optional: stores without a run log still ingest.
 */
export interface RunLog {
    recordRun(run: Omit<RunRecord, 'run_id' | 'created_at'>): number;
}

export interface PipelineDependencies {
    store: GraphStore;
    extractor: EntityExtractor;
    source: SourceConfig;
    chunking?: Partial<ChunkingConfig>;
    ingestion?: Partial<IngestionConfig>;
    runLog?: RunLog;
    /** Injected so tests do not wait between chunks */
    sleep?: (ms: number) => Promise<void>;
}

export interface IngestionStats {
    documents: number;
    skippedDocuments: number;
    episodes: number;
    entities: number;
    mentions: number;
    relationships: number;
    /** Chunks whose entities came from the pattern fallback */
    patternFallbacks: number;
    /** Chunks for which extraction returned nothing */
    emptyChunks: number;
    /** Failed write groups (entities or relationships of one chunk) */
    writeErrors: number;
}

function emptyStats(): IngestionStats {
    return {
        documents: 0,
        skippedDocuments: 0,
        episodes: 0,
        entities: 0,
        mentions: 0,
        relationships: 0,
        patternFallbacks: 0,
        emptyChunks: 0,
        writeErrors: 0,
    };
}

const STAT_KEYS: ReadonlyArray<keyof IngestionStats> = [
    'documents',
    'skippedDocuments',
    'episodes',
    'entities',
    'mentions',
    'relationships',
    'patternFallbacks',
    'emptyChunks',
    'writeErrors',
];

function addStats(total: IngestionStats, part: IngestionStats): void {
    for (const key of STAT_KEYS) {
        total[key] += part[key];
    }
}

/**
 * Drop absent values so the store's merge keeps what it already has.
 */
function compact(values: Record<string, string | string[] | undefined>): Record<string, string | string[]> {
    const result: Record<string, string | string[]> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value === undefined) continue;
        if (Array.isArray(value) && value.length === 0) continue;
        result[key] = value;
    }
    return result;
}

/**
 * Graph attributes of an extracted record.
 */
export function toEntityAttributes(entity: ExtractedEntity): EntityAttributes {
    switch (entity.kind) {
        case 'person':
            return { role: entity.role, nationality: entity.nationality, significance: entity.significance };
        case 'place':
            return { significance: entity.significance, extra: compact({ placeType: entity.placeType }) };
        case 'event':
            return {
                significance: entity.significance,
                extra: compact({
                    eventType: entity.eventType,
                    date: entity.date,
                    narrativeFunction: entity.narrativeFunction,
                    participants: entity.participants,
                    consequences: entity.consequences,
                }),
            };
        case 'organization':
            return { role: entity.orgType, significance: entity.significance, extra: compact({ orgType: entity.orgType }) };
        case 'date':
            return { significance: entity.significance, extra: compact({ date: entity.date }) };
    }
}

/**
 * Sentence-sized window of the chunk around the first mention of a name.
 * Case and accents are ignored; combining marks may follow any letter.
 */
export function mentionWindow(text: string, name: string, radius = 120): string | undefined {
    const folded = normalizeTerm(name);
    if (!folded) return undefined;

    const pattern = new RegExp([...folded].map((ch) => `${escapeRegExp(ch)}\\p{M}*`).join(''), 'iu');
    const decomposed = text.normalize('NFD');
    const match = pattern.exec(decomposed);
    if (!match) return undefined;

    const start = Math.max(0, match.index - radius);
    const end = Math.min(decomposed.length, match.index + match[0].length + radius);
    return decomposed.slice(start, end).normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * Ingestion pipeline: Chunker → Extractor → Graph Store.
 *
 * Chunks are processed strictly in order with a pause between them.
 * A failed extraction yields nothing for that chunk; a failed write is
 * logged and the next chunk proceeds. Nothing is rolled back.
 */
export class IngestionPipeline {
    private readonly store: GraphStore;
    private readonly extractor: EntityExtractor;
    private readonly source: SourceConfig;
    private readonly chunking: ChunkingConfig;
    private readonly ingestion: IngestionConfig;
    private readonly runLog?: RunLog;
    private readonly pause: (ms: number) => Promise<void>;
    readonly sourceId: string;

    constructor(deps: PipelineDependencies) {
        this.store = deps.store;
        this.extractor = deps.extractor;
        this.source = deps.source;
        this.chunking = { ...DEFAULT_CONFIG.chunking, ...deps.chunking };
        this.ingestion = { ...DEFAULT_CONFIG.ingestion, ...deps.ingestion };
        this.runLog = deps.runLog;
        this.pause = deps.sleep ?? sleep;
        this.sourceId = slugify(deps.source.title);
    }

    /**
     * Ingest every matching file of a directory, in filename order.
     */
    async ingestDirectory(directory: string): Promise<IngestionStats> {
        const logger = getModuleLogger('ingest');
        const pattern = new RegExp(this.ingestion.filePattern, 'i');
        const files = fs
            .readdirSync(directory)
            .filter((name) => pattern.test(name))
            .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

        logger.info({ directory, files: files.length, source: this.sourceId }, 'Starting ingestion');
        const startTime = Date.now();

        this.registerSource();
        const total = emptyStats();

        for (const [index, file] of files.entries()) {
            const content = fs.readFileSync(path.join(directory, file), 'utf-8');
            addStats(total, await this.ingestDocument(file, content, index + 1));
        }

        this.recordRun(total);

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.info({ ...total, elapsed: `${elapsed}s` }, 'Ingestion complete');
        return total;
    }

    /**
     * Ingest one chapter document. `sequence` orders chapters within the source.
     */
    async ingestDocument(filename: string, content: string, sequence: number): Promise<IngestionStats> {
        const logger = getModuleLogger('ingest');
        const stats = emptyStats();

        if (!isIngestible(content, this.chunking.minDocumentChars)) {
            logger.warn(
                { filename, chars: content.trim().length, minChars: this.chunking.minDocumentChars },
                'Document too short, skipped'
            );
            stats.skippedDocuments = 1;
            return stats;
        }

        this.registerSource();
        const chapter = extractChapterMetadata(filename, content, sequence);
        const chapterId = this.store.upsertChapter({
            source_id: this.sourceId,
            number: chapter.number,
            title: chapter.title,
            filename,
            word_count: countWords(content),
            sequence,
        });

        const context: ExtractionContext = {
            sourceId: this.sourceId,
            sourceTitle: this.source.title,
            chapterNumber: chapter.number,
            chapterTitle: chapter.title,
            dates: chapter.dates,
        };

        const chunks = chunkDocument(content, this.chunking.targetWords);
        logger.info({ filename, chapter: chapter.number, title: chapter.title, chunks: chunks.length }, 'Chapter chunked');

        for (const [index, chunk] of chunks.entries()) {
            const episodeId = this.store.insertEpisode({
                chapter_id: chapterId,
                source_id: this.sourceId,
                name: `${chapter.title} (Part ${index + 1})`,
                content: chunk,
                word_count: countWords(chunk),
                position: index,
            });
            stats.episodes++;

            await this.processChunk(chunk, episodeId, context, stats);

            if (index < chunks.length - 1 && this.ingestion.chunkDelayMs > 0) {
                await this.pause(this.ingestion.chunkDelayMs);
            }
        }

        stats.documents = 1;
        return stats;
    }

    private async processChunk(
        chunk: string,
        episodeId: number,
        context: ExtractionContext,
        stats: IngestionStats
    ): Promise<void> {
        const logger = getModuleLogger('ingest');
        const provenance = { sourceId: context.sourceId, chapter: context.chapterNumber };

        const extracted = await this.extractor.extractEntities(chunk, context);
        if (extracted.method === 'pattern') stats.patternFallbacks++;
        if (extracted.entities.length === 0) {
            stats.emptyChunks++;
            logger.warn({ chapter: context.chapterNumber, episodeId }, 'No entities extracted from chunk');
            return;
        }

        // Entities first: relationship endpoints must exist before the edge
        try {
            for (const entity of extracted.entities) {
                const entityId = this.store.upsertEntity(entity.name, entity.kind, toEntityAttributes(entity), provenance);
                stats.entities++;
                this.store.linkMention(episodeId, entityId, {
                    sourceId: context.sourceId,
                    chapter: context.chapterNumber,
                    context: mentionWindow(chunk, entity.name),
                });
                stats.mentions++;
            }
        } catch (error) {
            stats.writeErrors++;
            logger.error({ error, chapter: context.chapterNumber, episodeId }, 'Failed to write entities');
            return;
        }

        const { relationships } = await this.extractor.extractRelationships(chunk, context, extracted.entities);
        if (relationships.length === 0) return;

        const categories = new Map<string, EntityCategory>();
        for (const entity of extracted.entities) {
            const key = normalizeTerm(entity.name);
            if (!categories.has(key)) categories.set(key, entity.kind);
        }

        try {
            for (const relationship of relationships) {
                this.store.upsertRelationship(
                    { name: relationship.from, category: categories.get(normalizeTerm(relationship.from)) },
                    { name: relationship.to, category: categories.get(normalizeTerm(relationship.to)) },
                    relationship.type,
                    { context: relationship.context, evidence: relationship.evidence, provenance }
                );
                stats.relationships++;
            }
        } catch (error) {
            stats.writeErrors++;
            logger.error({ error, chapter: context.chapterNumber, episodeId }, 'Failed to write relationships');
        }
    }

    private registerSource(): void {
        this.store.upsertSource({
            source_id: this.sourceId,
            title: this.source.title,
            author: this.source.author ?? null,
            year: this.source.year ?? null,
            perspective: this.source.perspective ?? null,
            language: this.source.language,
            description: this.source.description ?? null,
        });
    }

    private recordRun(stats: IngestionStats): void {
        if (!this.runLog) return;
        this.runLog.recordRun({
            histograph_version: HISTOGRAPH_VERSION,
            config_json: JSON.stringify({ source: this.source, chunking: this.chunking, ingestion: this.ingestion }),
            source_id: this.sourceId,
            stats_json: JSON.stringify(stats),
        });
    }
}
