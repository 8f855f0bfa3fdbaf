import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import { HistographDatabase } from '../storage/database.js';
import { RelationshipType, type NewSource } from '../types/index.js';
import { createTempDatabase } from './helpers/fixtures.js';

function source(sourceId: string, title: string): NewSource {
    return {
        source_id: sourceId,
        title,
        author: null,
        year: null,
        perspective: null,
        language: 'English',
        description: null,
    };
}

/**
 * Source with one chapter; returns a function adding episodes to it.
 */
function seedChapter(db: HistographDatabase, sourceId: string, title: string, chapter = 1) {
    db.upsertSource(source(sourceId, title));
    const chapterId = db.upsertChapter({
        source_id: sourceId,
        number: chapter,
        title: `Chapter ${chapter}`,
        filename: null,
        word_count: 0,
        sequence: chapter,
    });
    let position = 0;
    return (content: string) =>
        db.insertEpisode({
            chapter_id: chapterId,
            source_id: sourceId,
            name: `${title} (Part ${position + 1})`,
            content,
            word_count: content.split(/\s+/).length,
            position: position++,
        });
}

describe('HistographDatabase', () => {
    let db: HistographDatabase;
    let dir: string;
    let cleanup: () => void;

    beforeEach(() => {
        ({ db, dir, cleanup } = createTempDatabase());
    });

    afterEach(() => {
        cleanup();
    });

    describe('initialization', () => {
        it('should create all tables', () => {
            const tables = db
                .getRawDb()
                .prepare<[], { name: string }>(
                    "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
                )
                .all()
                .map((t) => t.name);

            expect(tables).toEqual([
                'canonical_entities',
                'chapters',
                'entities',
                'entity_interpretations',
                'episodes',
                'mentions',
                'relationships',
                'runs',
                'sources',
            ]);
        });

        it('should set PRAGMA user_version = 1', () => {
            expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
        });

        it('should reopen an existing database without losing data', () => {
            db.upsertEntity('Jennings', 'person', {});

            const reopened = new HistographDatabase(path.join(dir, 'test.db'));
            expect(reopened.getEntity('Jennings', 'person')?.name).toBe('Jennings');
            expect(reopened.getRawDb().pragma('user_version', { simple: true })).toBe(1);
            reopened.close();
        });
    });

    describe('sources and chapters', () => {
        it('should keep the first version of a source', () => {
            expect(db.upsertSource(source('smyrna-1922', 'Smyrna 1922'))).toBe('smyrna-1922');
            db.upsertSource(source('smyrna-1922', 'Another Title'));

            expect(db.getSourceTitle('smyrna-1922')).toBe('Smyrna 1922');
            expect(db.getSourceTitle('missing')).toBeUndefined();
        });

        it('should derive chapter ids and count chapters and episodes', () => {
            const addEpisode = seedChapter(db, 'smyrna-1922', 'Smyrna 1922', 3);
            addEpisode('First part.');
            addEpisode('Second part.');

            expect(db.getRawDb().prepare<[], { chapter_id: string }>('SELECT chapter_id FROM chapters').all()).toEqual([
                { chapter_id: 'smyrna-1922-ch3' },
            ]);
            expect(db.listSources().map(({ source_id, chapters, episodes }) => ({ source_id, chapters, episodes }))).toEqual([
                { source_id: 'smyrna-1922', chapters: 1, episodes: 2 },
            ]);
        });
    });

    describe('episodes', () => {
        it('should find episodes ignoring case and accents', () => {
            const addEpisode = seedChapter(db, 'smyrna-1922', 'Smyrna 1922');
            addEpisode('Atatürk entered Smyrna.');
            addEpisode('The quay was crowded.');

            const found = db.findEpisodesContaining('ATATURK', 5);

            expect(found).toHaveLength(1);
            expect(found[0]).toMatchObject({
                name: 'Smyrna 1922 (Part 1)',
                source_title: 'Smyrna 1922',
                chapter_number: 1,
                chapter_title: 'Chapter 1',
            });
        });

        it('should order episodes by chapter and position', () => {
            const addFirst = seedChapter(db, 'smyrna-1922', 'Smyrna 1922', 2);
            addFirst('Fire at the quay.');
            const addSecond = seedChapter(db, 'smyrna-1922', 'Smyrna 1922', 1);
            addSecond('Fire in the Armenian quarter.');
            addSecond('Fire near the consulate.');

            expect(db.findEpisodesContaining('fire', 2).map((e) => e.content)).toEqual([
                'Fire in the Armenian quarter.',
                'Fire near the consulate.',
            ]);
        });
    });

    describe('entities', () => {
        it('should merge on name and category', () => {
            const first = db.upsertEntity('Asa Jennings', 'person', { role: 'YMCA secretary' }, { sourceId: 's', chapter: 1 });
            const second = db.upsertEntity(
                'Asa Jennings',
                'person',
                { nationality: 'American', extra: { nickname: 'Little Jennings' } },
                { sourceId: 's', chapter: 2 }
            );
            db.upsertEntity('Asa Jennings', 'person', {}, { sourceId: 's', chapter: 1 });

            const row = db.getEntity('Asa Jennings', 'person');
            expect(second).toBe(first);
            expect(row?.role).toBe('YMCA secretary');
            expect(row?.nationality).toBe('American');
            expect(JSON.parse(row?.attributes_json ?? '')).toEqual({ nickname: 'Little Jennings' });
            expect(JSON.parse(row?.sources_json ?? '')).toEqual([
                { sourceId: 's', chapter: 1 },
                { sourceId: 's', chapter: 2 },
            ]);
            expect(db.getStats().entities).toBe(1);
        });

        it('should keep names in different categories apart', () => {
            const asPlace = db.upsertEntity('Smyrna', 'place', {});
            const asEvent = db.upsertEntity('Smyrna', 'event', {});
            expect(asPlace).not.toBe(asEvent);
        });

        it('should reject an empty name', () => {
            expect(() => db.upsertEntity('   ', 'person', {})).toThrow('Entity name must not be empty');
        });

        it('should rank an exact match first', () => {
            db.upsertEntity('Asa Jennings', 'person', {});
            db.upsertEntity('Jennings', 'person', {});
            db.upsertEntity('Jennings Hall', 'place', {});

            expect(db.findEntitiesMatching('jennings', 5).map((e) => e.name)).toEqual([
                'Jennings',
                'Asa Jennings',
                'Jennings Hall',
            ]);
            expect(db.findEntitiesMatching('jennings', 5, ['place']).map((e) => e.name)).toEqual(['Jennings Hall']);
        });

        it('should match ignoring accents', () => {
            db.upsertEntity('Mustafa Kemal Atatürk', 'person', {});
            expect(db.findEntitiesMatching('ataturk', 5).map((e) => e.name)).toEqual(['Mustafa Kemal Atatürk']);
        });

        it('should treat LIKE wildcards in a term literally', () => {
            db.upsertEntity('Smyrna', 'place', {});
            db.upsertEntity('100% Relief', 'organization', {});
            expect(db.findEntitiesMatching('%', 5).map((e) => e.name)).toEqual(['100% Relief']);
        });

        it('should find people by role and nationality', () => {
            db.upsertEntity('Mark Bristol', 'person', { role: 'Admiral, US High Commissioner', nationality: 'American' });
            db.upsertEntity('George Horton', 'person', { role: 'American consul general' });
            db.upsertEntity('Stergiadis', 'person', { role: 'Greek high commissioner' });
            db.upsertEntity('Admiral Hotel', 'place', { role: 'admiral' });

            expect(db.findEntitiesByRole(['admiral', 'consul'], ['american'], 5).map((e) => e.name)).toEqual([
                'Mark Bristol',
                'George Horton',
            ]);
            expect(db.findEntitiesByRole(['commissioner'], [], 5).map((e) => e.name)).toEqual([
                'Mark Bristol',
                'Stergiadis',
            ]);
            expect(db.findEntitiesByRole(['commissioner'], ['greek'], 5).map((e) => e.name)).toEqual(['Stergiadis']);
            expect(db.findEntitiesByRole([], ['american'], 5)).toEqual([]);
        });

        it('should find events by name, type or narrative function', () => {
            db.upsertEntity('Great Fire', 'event', { extra: { eventType: 'disaster', narrativeFunction: 'climax' } });
            db.upsertEntity('Landing at Smyrna', 'event', { extra: { eventType: 'military landing' } });
            db.upsertEntity('Fire Brigade', 'organization', {});

            expect(db.findEvents('climax', 5).map((e) => e.name)).toEqual(['Great Fire']);
            expect(db.findEvents('military', 5).map((e) => e.name)).toEqual(['Landing at Smyrna']);
            expect(db.findEvents('fire', 5).map((e) => e.name)).toEqual(['Great Fire']);
        });

        it('should list the most mentioned names first', () => {
            const addEpisode = seedChapter(db, 's', 'Source');
            const episode = addEpisode('Jennings and Bristol.');
            db.upsertEntity('Bristol', 'person', {});
            const jennings = db.upsertEntity('Jennings', 'person', {});
            db.upsertEntity('Smyrna', 'place', {});
            db.linkMention(episode, jennings, { sourceId: 's', chapter: 1 });

            expect(db.listEntityNames(10)).toEqual(['Jennings', 'Bristol', 'Smyrna']);
            expect(db.listEntityNames(10, 'place')).toEqual(['Smyrna']);
        });
    });

    describe('mentions', () => {
        it('should link an episode to an entity once', () => {
            const addEpisode = seedChapter(db, 's', 'Source');
            const episode = addEpisode('Jennings was on the quay.');
            const entity = db.upsertEntity('Jennings', 'person', {});

            db.linkMention(episode, entity, { sourceId: 's', chapter: 1, context: 'on the quay' });
            db.linkMention(episode, entity, { sourceId: 's', chapter: 1 });

            const rows = db
                .getRawDb()
                .prepare<[], { context: string | null }>('SELECT context FROM mentions')
                .all();
            expect(rows).toEqual([{ context: 'on the quay' }]);
        });
    });

    describe('relationships', () => {
        it('should merge on endpoints and type', () => {
            const from = { name: 'Jennings', category: 'person' as const };
            const to = { name: 'Smyrna', category: 'place' as const };

            const first = db.upsertRelationship(from, to, RelationshipType.EVACUATES_FROM, {
                context: 'Led the evacuation.',
                provenance: { sourceId: 's', chapter: 1 },
            });
            const second = db.upsertRelationship(from, to, RelationshipType.EVACUATES_FROM, {
                evidence: 'ships left the quay',
                provenance: { sourceId: 's', chapter: 2 },
            });

            expect(second).toBe(first);
            const row = db
                .getRawDb()
                .prepare<[], { category: string; context: string; evidence: string; provenance_json: string }>(
                    'SELECT category, context, evidence, provenance_json FROM relationships'
                )
                .get();
            expect(row?.category).toBe('spatial');
            expect(row?.context).toBe('Led the evacuation.');
            expect(row?.evidence).toBe('ships left the quay');
            expect(JSON.parse(row?.provenance_json ?? '')).toEqual([
                { sourceId: 's', chapter: 1 },
                { sourceId: 's', chapter: 2 },
            ]);
        });

        it('should create missing endpoints and reuse existing ones by folded name', () => {
            const ataturk = db.upsertEntity('Atatürk', 'person', {});

            db.upsertRelationship({ name: 'ATATURK' }, { name: 'USS Litchfield' }, RelationshipType.TRAVELS_TO, {
                provenance: { sourceId: 's' },
            });

            expect(db.getStats().entities).toBe(2);
            expect(db.getEntity('USS Litchfield', 'other')).toBeDefined();
            expect(db.getRelationshipsFor(ataturk, 5)).toEqual([
                expect.objectContaining({
                    type: 'TRAVELS_TO',
                    direction: 'outgoing',
                    other_name: 'USS Litchfield',
                    other_category: 'other',
                }),
            ]);
        });

        it('should report relationships in both directions', () => {
            const jennings = db.upsertEntity('Jennings', 'person', {});
            db.upsertRelationship(
                { name: 'Jennings', category: 'person' },
                { name: 'Smyrna', category: 'place' },
                RelationshipType.EVACUATES_FROM,
                { provenance: { sourceId: 's' } }
            );
            db.upsertRelationship(
                { name: 'Bristol', category: 'person' },
                { name: 'Jennings', category: 'person' },
                RelationshipType.INFLUENCES,
                { context: 'Approved the ships.', provenance: { sourceId: 's' } }
            );

            expect(
                db.getRelationshipsFor(jennings, 5).map(({ type, direction, other_name, context }) => ({
                    type,
                    direction,
                    other_name,
                    context,
                }))
            ).toEqual([
                { type: 'EVACUATES_FROM', direction: 'outgoing', other_name: 'Smyrna', context: null },
                { type: 'INFLUENCES', direction: 'incoming', other_name: 'Bristol', context: 'Approved the ships.' },
            ]);
        });
    });

    describe('canonical entities', () => {
        it('should link aliases of the same type', () => {
            db.upsertEntity('Atatürk', 'person', {});
            db.upsertEntity('Mustafa Kemal', 'person', {});
            db.upsertEntity('kemal', 'other', {});
            db.upsertEntity('Kemal', 'place', {});

            const id = db.upsertCanonicalEntity('Mustafa Kemal Atatürk', 'person', ['Ataturk', 'Mustafa Kemal', 'Kemal']);

            expect(db.linkCanonicalAliases(id)).toBe(3);
            expect(db.getEntity('Kemal', 'place')?.canonical_name).toBeNull();
            expect(
                db
                    .findEntitiesMatching('Mustafa Kemal Atatürk', 10)
                    .map((e) => e.name)
                    .sort()
            ).toEqual(['Atatürk', 'Mustafa Kemal', 'kemal']);
        });

        it('should update aliases in place', () => {
            const first = db.upsertCanonicalEntity('Asa Kent Jennings', 'person', ['Jennings']);
            const second = db.upsertCanonicalEntity('Asa Kent Jennings', 'person', ['Jennings', 'Asa Jennings']);
            expect(second).toBe(first);
            expect(db.getStats().canonicalEntities).toBe(1);
        });

        it('should link nothing for an unknown id', () => {
            expect(db.linkCanonicalAliases(99)).toBe(0);
        });
    });

    describe('cross-source comparison', () => {
        it('should group mentioning episodes by source', () => {
            const addA = seedChapter(db, 'a-source', 'Source A');
            const addB = seedChapter(db, 'b-source', 'Source B');
            const jennings = db.upsertEntity('Jennings', 'person', {});
            const asa = db.upsertEntity('Asa Jennings', 'person', {});

            const a1 = addA('Jennings on the quay.');
            const a2 = addA('Jennings on the ship.');
            const b1 = addB('Asa Jennings in Mytilene.');
            db.linkMention(a1, jennings, { sourceId: 'a-source', chapter: 1 });
            db.linkMention(a2, jennings, { sourceId: 'a-source', chapter: 1 });
            db.linkMention(b1, asa, { sourceId: 'b-source', chapter: 1 });

            const accounts = db.compareEntityAcrossSources('jennings', 1);

            expect(accounts.map((a) => [a.source_title, a.entity_names, a.excerpts.map((e) => e.content)])).toEqual([
                ['Source A', ['Jennings'], ['Jennings on the quay.']],
                ['Source B', ['Asa Jennings'], ['Asa Jennings in Mytilene.']],
            ]);
        });

        it('should return nothing for an unknown entity', () => {
            expect(db.compareEntityAcrossSources('nobody', 2)).toEqual([]);
        });
    });

    describe('runs and stats', () => {
        it('should record runs and count rows', () => {
            db.recordRun({ histograph_version: '0.1.0', config_json: '{}', source_id: 's', stats_json: '{}' });
            db.upsertEntity('Jennings', 'person', {});
            db.upsertEntity('Smyrna', 'place', {});
            db.upsertRelationship(
                { name: 'Jennings', category: 'person' },
                { name: 'Smyrna', category: 'place' },
                RelationshipType.LOCATED_IN,
                { provenance: { sourceId: 's' } }
            );

            const stats = db.getStats();
            expect(stats.runs).toBe(1);
            expect(stats.entitiesByCategory).toEqual({ person: 1, place: 1 });
            expect(stats.relationshipsByType).toEqual({ LOCATED_IN: 1 });
        });
    });
});
