import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import type { EntityExtractor, ExtractedEntity } from '../types/index.js';
import { IngestionPipeline, mentionWindow, toEntityAttributes } from '../ingest/pipeline.js';
import { ENTITY_SYSTEM_PROMPT } from '../extraction/prompts.js';
import { StructuredExtractor } from '../extraction/structured-extractor.js';
import type { HistographDatabase } from '../storage/database.js';
import { ScriptedLlm } from './helpers/fake-llm.js';
import { createTempDatabase, testLexicon } from './helpers/fixtures.js';

const ENTITY_REPLY = JSON.stringify({
    people: [{ name: 'Asa Jennings', role: 'YMCA secretary', nationality: 'American' }],
    places: [{ name: 'Smyrna', type: 'city' }],
});

const RELATIONSHIP_REPLY = JSON.stringify({
    relationships: [{ from: 'Asa Jennings', to: 'Smyrna', type: 'evacuated from', context: 'He chartered the ships.' }],
});

const CHAPTER_ONE = `CHAPTER 1
The Quay

Asa Jennings, a YMCA secretary, reached Smyrna on 9 September 1922. Refugees crowded the quay for miles.`;

const CHAPTER_TWO = `CHAPTER 2
The Ships

Asa Jennings chartered Greek ships and evacuated the refugees from Smyrna to Mytilene.`;

function replyByStage(): ScriptedLlm {
    return new ScriptedLlm([], (_prompt, params) =>
        params?.systemPrompt === ENTITY_SYSTEM_PROMPT ? ENTITY_REPLY : RELATIONSHIP_REPLY
    );
}

describe('IngestionPipeline', () => {
    let db: HistographDatabase;
    let dir: string;
    let cleanup: () => void;
    let bookDir: string;

    beforeEach(() => {
        ({ db, dir, cleanup } = createTempDatabase());
        bookDir = path.join(dir, 'book');
        fs.mkdirSync(bookDir);
        fs.writeFileSync(path.join(bookDir, 'chapter_02.txt'), CHAPTER_TWO);
        fs.writeFileSync(path.join(bookDir, 'chapter_01.txt'), CHAPTER_ONE);
        fs.writeFileSync(path.join(bookDir, 'short.txt'), 'Too short.');
        fs.writeFileSync(path.join(bookDir, 'notes.md'), 'Not a chapter.');
    });

    afterEach(() => {
        cleanup();
    });

    function createPipeline(extractor: EntityExtractor, sleep = vi.fn(async () => undefined)) {
        return new IngestionPipeline({
            store: db,
            extractor,
            source: { title: 'Smyrna 1922', author: 'A. Historian', language: 'English' },
            runLog: db,
            sleep,
        });
    }

    it('should ingest a directory into a merged graph', async () => {
        const pipeline = createPipeline(new StructuredExtractor(replyByStage(), testLexicon()));

        const stats = await pipeline.ingestDirectory(bookDir);

        expect(stats).toEqual({
            documents: 2,
            skippedDocuments: 1,
            episodes: 2,
            entities: 4,
            mentions: 4,
            relationships: 2,
            patternFallbacks: 0,
            emptyChunks: 0,
            writeErrors: 0,
        });

        const graph = db.getStats();
        expect(graph).toMatchObject({
            sources: 1,
            chapters: 2,
            episodes: 2,
            entities: 2,
            relationships: 1,
            mentions: 4,
            runs: 1,
        });

        const jennings = db.getEntity('Asa Jennings', 'person');
        expect(jennings?.role).toBe('YMCA secretary');
        expect(JSON.parse(jennings?.sources_json ?? '')).toEqual([
            { sourceId: 'smyrna-1922', chapter: 1 },
            { sourceId: 'smyrna-1922', chapter: 2 },
        ]);
        expect(JSON.parse(db.getEntity('Smyrna', 'place')?.attributes_json ?? '')).toEqual({ placeType: 'city' });
    });

    it('should name episodes after their chapter and record the source', async () => {
        const pipeline = createPipeline(new StructuredExtractor(replyByStage(), testLexicon()));
        await pipeline.ingestDirectory(bookDir);

        expect(db.findEpisodesContaining('smyrna', 5).map((e) => [e.name, e.chapter_number])).toEqual([
            ['The Quay (Part 1)', 1],
            ['The Ships (Part 1)', 2],
        ]);
        expect(db.getSource('smyrna-1922')).toMatchObject({ title: 'Smyrna 1922', author: 'A. Historian' });
    });

    it('should not duplicate entities or relationships when run twice', async () => {
        const pipeline = createPipeline(new StructuredExtractor(replyByStage(), testLexicon()));

        await pipeline.ingestDirectory(bookDir);
        await pipeline.ingestDirectory(bookDir);

        expect(db.getStats()).toMatchObject({ entities: 2, relationships: 1, episodes: 4, runs: 2 });
    });

    it('should pause between chunks but not after the last', async () => {
        const sleep = vi.fn(async () => undefined);
        const pipeline = new IngestionPipeline({
            store: db,
            extractor: new StructuredExtractor(replyByStage(), testLexicon()),
            source: { title: 'Smyrna 1922', language: 'English' },
            chunking: { targetWords: 5, minDocumentChars: 10 },
            ingestion: { chunkDelayMs: 250 },
            sleep,
        });

        const stats = await pipeline.ingestDocument('chapter_01.txt', CHAPTER_ONE, 1);

        expect(stats.episodes).toBe(2);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(250);
    });

    it('should keep the episode when extraction fails', async () => {
        const llm = new ScriptedLlm([new Error('connection refused')]);
        const pipeline = createPipeline(new StructuredExtractor(llm, testLexicon()));

        const stats = await pipeline.ingestDocument('chapter_01.txt', CHAPTER_ONE, 1);

        expect(stats).toMatchObject({ documents: 1, episodes: 1, entities: 0, emptyChunks: 1 });
        expect(db.getStats()).toMatchObject({ episodes: 1, entities: 0 });
    });

    it('should count pattern fallbacks', async () => {
        const llm = new ScriptedLlm(['not json at all'], 'still not json');
        const pipeline = createPipeline(new StructuredExtractor(llm, testLexicon()));

        const stats = await pipeline.ingestDocument('chapter_02.txt', CHAPTER_TWO, 2);

        expect(stats.patternFallbacks).toBe(1);
        expect(db.getEntity('Asa Jennings', 'person')).toBeDefined();
        expect(db.getEntity('Smyrna', 'place')).toBeDefined();
    });

    it('should log a failed write and move on to the next chunk', async () => {
        const entities: ExtractedEntity[][] = [[{ kind: 'person', name: '   ' }], [{ kind: 'place', name: 'Smyrna' }]];
        const extractor: EntityExtractor = {
            extractEntities: async () => ({ entities: entities.shift() ?? [], method: 'model', repaired: false, dropped: 0 }),
            extractRelationships: async () => ({ relationships: [], method: 'none', coerced: 0, dropped: 0 }),
        };
        const pipeline = new IngestionPipeline({
            store: db,
            extractor,
            source: { title: 'Smyrna 1922', language: 'English' },
            chunking: { targetWords: 10 },
            sleep: async () => undefined,
        });

        const stats = await pipeline.ingestDocument(
            'chapter_01.txt',
            'First paragraph with enough words to fill a chunk on its own.\n\nSecond paragraph, also long enough to stand alone as a chunk.',
            1
        );

        expect(stats).toMatchObject({ episodes: 2, writeErrors: 1, entities: 1 });
        expect(db.getEntity('Smyrna', 'place')).toBeDefined();
    });
});

describe('toEntityAttributes', () => {
    it('should move category fields into extras', () => {
        expect(
            toEntityAttributes({
                kind: 'event',
                name: 'Great Fire',
                eventType: 'disaster',
                participants: [],
                significance: 'destroyed the city',
            })
        ).toEqual({ significance: 'destroyed the city', extra: { eventType: 'disaster' } });
    });

    it('should store an organization type as its role', () => {
        expect(toEntityAttributes({ kind: 'organization', name: 'Near East Relief', orgType: 'relief' })).toEqual({
            role: 'relief',
            significance: undefined,
            extra: { orgType: 'relief' },
        });
    });
});

describe('mentionWindow', () => {
    it('should return the text around a mention', () => {
        expect(mentionWindow('Asa Jennings reached Smyrna.', 'Smyrna', 5)).toBe('ched Smyrna.');
    });

    it('should match ignoring accents', () => {
        expect(mentionWindow('Atatürk arrived', 'Ataturk', 3)).toBe('Atatürk ar');
    });

    it('should keep the window on the mention in decomposed text', () => {
        expect(mentionWindow('Crowds cheered Atatu\u0308rk at the quay.', 'Atatürk', 3)).toBe('ed Atatürk at');
    });

    it('should match ignoring case', () => {
        expect(mentionWindow('ADMIRAL BRISTOL SAILED', 'Bristol', 2)).toBe('L BRISTOL S');
    });

    it('should return undefined when the name is absent', () => {
        expect(mentionWindow('Nothing here', 'Jennings')).toBeUndefined();
    });
});
