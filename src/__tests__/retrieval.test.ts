import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NO_INFORMATION_FOUND, RelationshipType, type ContextBlock, type FoundRetrieval } from '../types/index.js';
import { GraphRetriever } from '../retrieval/retriever.js';
import { COMPRESSION_SYSTEM_PROMPT, LlmContextCompressor } from '../retrieval/compressor.js';
import type { HistographDatabase } from '../storage/database.js';
import { ScriptedLlm } from './helpers/fake-llm.js';
import { createTempDatabase, testLexicon } from './helpers/fixtures.js';

const JENNINGS_PROFILE = `AUTHORITATIVE PROFILE: Asa Jennings
Category: person
Role: YMCA secretary
Nationality: American
Significance: Organized the evacuation
Sources: Smyrna 1922, chapter 1
KEY RELATIONSHIPS:
  → EVACUATES_FROM Smyrna (place): Chartered Greek ships`;

const QUAY_EXCERPT = `FROM The Quay (Part 1) (Smyrna 1922, chapter 1):
Asa Jennings organized the evacuation of refugees from the quay.`;

describe('GraphRetriever', () => {
    let db: HistographDatabase;
    let cleanup: () => void;

    beforeEach(() => {
        ({ db, cleanup } = createTempDatabase());

        db.upsertSource({
            source_id: 'smyrna-1922',
            title: 'Smyrna 1922',
            author: null,
            year: null,
            perspective: null,
            language: 'English',
            description: null,
        });
        const chapterId = db.upsertChapter({
            source_id: 'smyrna-1922',
            number: 1,
            title: 'The Quay',
            filename: 'chapter_01.txt',
            word_count: 10,
            sequence: 1,
        });
        const episodeId = db.insertEpisode({
            chapter_id: chapterId,
            source_id: 'smyrna-1922',
            name: 'The Quay (Part 1)',
            content: 'Asa Jennings organized the evacuation of refugees from the quay.',
            word_count: 10,
            position: 0,
        });

        const provenance = { sourceId: 'smyrna-1922', chapter: 1 };
        const jennings = db.upsertEntity(
            'Asa Jennings',
            'person',
            { role: 'YMCA secretary', nationality: 'American', significance: 'Organized the evacuation' },
            provenance
        );
        db.linkMention(episodeId, jennings, { sourceId: 'smyrna-1922', chapter: 1 });
        db.upsertRelationship(
            { name: 'Asa Jennings', category: 'person' },
            { name: 'Smyrna', category: 'place' },
            RelationshipType.EVACUATES_FROM,
            { context: 'Chartered Greek ships', provenance }
        );
        db.upsertEntity('Mark Bristol', 'person', { role: 'Admiral, US High Commissioner', nationality: 'American' });
    });

    afterEach(() => {
        cleanup();
    });

    it('should derive terms from names, expansions and content words', () => {
        const retriever = new GraphRetriever(db, testLexicon());

        expect(retriever.deriveTerms('Who led the humanitarian work?')).toEqual({
            entityTerms: ['relief', 'jennings'],
            words: ['humanitarian', 'work'],
            all: ['relief', 'jennings', 'humanitarian', 'work'],
        });
    });

    it('should put the profile before the excerpts', () => {
        const retriever = new GraphRetriever(db, testLexicon());

        expect(retriever.retrieve('What did Jennings do?')).toEqual({
            found: true,
            terms: ['jennings'],
            blocks: [
                { kind: 'profile', text: JENNINGS_PROFILE },
                { kind: 'excerpt', label: 'Smyrna 1922, chapter 1', text: QUAY_EXCERPT },
            ],
            context: `${JENNINGS_PROFILE}\n\n${QUAY_EXCERPT}`,
            entitiesFound: 1,
            sourceLabels: ['Smyrna 1922, chapter 1'],
        });
    });

    it('should cap the number of blocks', () => {
        const retriever = new GraphRetriever(db, testLexicon(), { maxBlocks: 1 });

        const result = retriever.retrieve('What did Jennings do?');

        expect(result.found && result.blocks.map((b) => b.kind)).toEqual(['profile']);
        expect(result.found && result.sourceLabels).toEqual([]);
    });

    it('should cut excerpts', () => {
        const retriever = new GraphRetriever(db, testLexicon(), { excerptChars: 12 });

        const result = retriever.retrieve('What did Jennings do?');

        expect(result.found && result.blocks[1]?.text).toBe('FROM The Quay (Part 1) (Smyrna 1922, chapter 1):\nAsa Jennings');
    });

    it('should list role holders when the question names a group', () => {
        const retriever = new GraphRetriever(db, testLexicon());

        const result = retriever.retrieve('Which American officials were involved?');

        expect(result.found && result.blocks).toEqual([
            {
                kind: 'role-profile',
                text: 'PROFILE: Mark Bristol\nRole: Admiral, US High Commissioner\nNationality: American',
            },
        ]);
        expect(result.entitiesFound).toBe(1);
    });

    it('should describe matching events', () => {
        db.upsertEntity('Great Fire', 'event', {
            significance: 'Destroyed the Armenian quarter',
            extra: {
                eventType: 'disaster',
                date: '13 September 1922',
                narrativeFunction: 'climax',
                participants: ['Asa Jennings'],
            },
        });
        const retriever = new GraphRetriever(db, testLexicon());

        const result = retriever.retrieve('When was the great fire?');

        expect(result.found && result.blocks.map((b) => b.kind)).toEqual(['profile', 'event']);
        expect(result.found && result.blocks[1]?.text).toBe(
            [
                'EVENT: Great Fire',
                'Type: disaster',
                'Date: 13 September 1922',
                'Function: climax',
                'Participants: Asa Jennings',
                'Significance: Destroyed the Armenian quarter',
            ].join('\n')
        );
        expect(result.entitiesFound).toBe(1);
    });

    it('should report when nothing matches', () => {
        const retriever = new GraphRetriever(db, testLexicon());

        expect(retriever.retrieve('Tell me about Napoleon')).toEqual({
            found: false,
            terms: ['napoleon'],
            context: NO_INFORMATION_FOUND,
            entitiesFound: 0,
        });
    });
});

function retrieval(blocks: ContextBlock[]): FoundRetrieval {
    return {
        found: true,
        terms: [],
        blocks,
        context: blocks.map((b) => b.text).join('\n\n'),
        entitiesFound: 0,
        sourceLabels: [],
    };
}

function excerpt(n: number): ContextBlock {
    return { kind: 'excerpt', label: `Book, chapter ${n}`, text: `${n}`.repeat(20) };
}

describe('LlmContextCompressor', () => {
    it('should return a short context unchanged without a call', async () => {
        const llm = new ScriptedLlm();
        const compressor = new LlmContextCompressor(llm, { thresholdChars: 100 });
        const input = retrieval([{ kind: 'profile', text: 'Short profile.' }]);

        expect(await compressor.compress('Who?', input)).toEqual({
            context: 'Short profile.',
            strategy: 'none',
            modelCalls: 0,
        });
        expect(llm.calls).toHaveLength(0);
    });

    it('should compress only past the threshold', async () => {
        const llm = new ScriptedLlm(['Condensed.']);
        const compressor = new LlmContextCompressor(llm, { thresholdChars: 10 });

        const atThreshold = await compressor.compress('Who?', retrieval([{ kind: 'profile', text: '0123456789' }]));
        expect(atThreshold).toEqual({ context: '0123456789', strategy: 'none', modelCalls: 0 });
        expect(llm.calls).toHaveLength(0);

        const overThreshold = await compressor.compress('Who?', retrieval([{ kind: 'profile', text: '0123456789A' }]));
        expect(overThreshold).toEqual({ context: 'Condensed.', strategy: 'whole', modelCalls: 1 });
        expect(llm.calls).toHaveLength(1);
    });

    it('should compress the whole context in one call', async () => {
        const llm = new ScriptedLlm(['  Condensed.  ']);
        const compressor = new LlmContextCompressor(llm, { thresholdChars: 10 });

        const result = await compressor.compress('Who?', retrieval([{ kind: 'profile', text: 'P'.repeat(50) }]));

        expect(result).toEqual({ context: 'Condensed.', strategy: 'whole', modelCalls: 1 });
        expect(llm.calls[0]?.params).toEqual({
            systemPrompt: COMPRESSION_SYSTEM_PROMPT,
            maxTokens: 1500,
            temperature: 0.2,
        });
        expect(llm.calls[0]?.prompt).toContain('P'.repeat(50));
    });

    it('should condense excerpts in batches and keep other blocks', async () => {
        const llm = new ScriptedLlm(['c1', 'c2', 'c3']);
        const compressor = new LlmContextCompressor(llm, { thresholdChars: 10, batchSize: 2 });
        const blocks = [{ kind: 'profile' as const, text: 'PROFILE' }, ...[1, 2, 3, 4, 5].map(excerpt)];

        const result = await compressor.compress('Who?', retrieval(blocks));

        expect(result).toEqual({ context: 'PROFILE\n\nc1\n\nc2\n\nc3', strategy: 'batched', modelCalls: 3 });
        expect(llm.calls[1]?.prompt).toContain(`[EXCERPT 3: Book, chapter 3]\n${'3'.repeat(20)}`);
        expect(llm.calls[1]?.prompt).toContain('[EXCERPT 4: Book, chapter 4]');
        expect(llm.calls[1]?.prompt).not.toContain('[EXCERPT 5');
    });

    it('should truncate the raw context when a call fails', async () => {
        const llm = new ScriptedLlm(['c1', new Error('timeout')]);
        const compressor = new LlmContextCompressor(llm, { thresholdChars: 10, batchSize: 2, fallbackChars: 30 });
        const input = retrieval([1, 2, 3].map(excerpt));

        expect(await compressor.compress('Who?', input)).toEqual({
            context: input.context.slice(0, 30),
            strategy: 'truncated',
            modelCalls: 2,
        });
    });

    it('should treat an empty reply as a failure', async () => {
        const compressor = new LlmContextCompressor(new ScriptedLlm(['   ']), { thresholdChars: 10, fallbackChars: 5 });

        const result = await compressor.compress('Who?', retrieval([{ kind: 'profile', text: 'ABCDEFGHIJKLMNOP' }]));

        expect(result).toEqual({ context: 'ABCDE', strategy: 'truncated', modelCalls: 1 });
    });
});
