import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    RELATIONSHIP_CATEGORIES,
    type CanonicalEntityRow,
    type EntityAttributes,
    type EntityCategory,
    type EntityRef,
    type EntityRow,
    type EpisodeExcerpt,
    type GraphStore,
    type MentionContext,
    type NewChapter,
    type NewEpisode,
    type NewSource,
    type Provenance,
    type RelationshipAttributes,
    type RelationshipType,
    type RelationshipView,
    type RunRecord,
    type SourceRow,
} from '../types/index.js';
import { normalizeTerm } from '../nlp/tokenizer.js';
import { getModuleLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: ingestion session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  histograph_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  source_id TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Sources: one row per book, never mutated
CREATE TABLE IF NOT EXISTS sources (
  source_id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  author TEXT,
  year INTEGER,
  perspective TEXT,
  language TEXT NOT NULL DEFAULT 'English',
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Chapters: owned by a source
CREATE TABLE IF NOT EXISTS chapters (
  chapter_id TEXT PRIMARY KEY,
  source_id TEXT NOT NULL REFERENCES sources(source_id),
  number INTEGER NOT NULL,
  title TEXT NOT NULL,
  filename TEXT,
  word_count INTEGER NOT NULL DEFAULT 0,
  sequence INTEGER NOT NULL
);

-- Episodes: chunks of chapter text, always inserted
CREATE TABLE IF NOT EXISTS episodes (
  episode_id INTEGER PRIMARY KEY,
  chapter_id TEXT NOT NULL REFERENCES chapters(chapter_id),
  source_id TEXT NOT NULL REFERENCES sources(source_id),
  name TEXT NOT NULL,
  content TEXT NOT NULL,
  word_count INTEGER NOT NULL,
  position INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Entities: merged on (name, category)
CREATE TABLE IF NOT EXISTS entities (
  entity_id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  category TEXT NOT NULL,
  role TEXT,
  nationality TEXT,
  significance TEXT,
  attributes_json TEXT NOT NULL DEFAULT '{}',
  sources_json TEXT NOT NULL DEFAULT '[]',
  canonical_name TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  UNIQUE (name, category)
);

-- Episode → entity mentions
CREATE TABLE IF NOT EXISTS mentions (
  episode_id INTEGER NOT NULL REFERENCES episodes(episode_id),
  entity_id INTEGER NOT NULL REFERENCES entities(entity_id),
  source_id TEXT NOT NULL,
  chapter INTEGER NOT NULL,
  context TEXT,
  PRIMARY KEY (episode_id, entity_id)
);

-- Relationships: merged on (from, to, type)
CREATE TABLE IF NOT EXISTS relationships (
  relationship_id INTEGER PRIMARY KEY,
  from_entity_id INTEGER NOT NULL REFERENCES entities(entity_id),
  to_entity_id INTEGER NOT NULL REFERENCES entities(entity_id),
  type TEXT NOT NULL,
  category TEXT NOT NULL,
  context TEXT,
  evidence TEXT,
  provenance_json TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  UNIQUE (from_entity_id, to_entity_id, type)
);

-- Canonical alias anchors
CREATE TABLE IF NOT EXISTS canonical_entities (
  canonical_id INTEGER PRIMARY KEY,
  canonical_name TEXT NOT NULL UNIQUE,
  entity_type TEXT NOT NULL,
  aliases_json TEXT NOT NULL DEFAULT '[]'
);

-- Entity "interprets-as" canonical entity
CREATE TABLE IF NOT EXISTS entity_interpretations (
  entity_id INTEGER NOT NULL REFERENCES entities(entity_id),
  canonical_id INTEGER NOT NULL REFERENCES canonical_entities(canonical_id),
  PRIMARY KEY (entity_id, canonical_id)
);

CREATE INDEX IF NOT EXISTS idx_relationships_from ON relationships(from_entity_id);
CREATE INDEX IF NOT EXISTS idx_relationships_to ON relationships(to_entity_id);
CREATE INDEX IF NOT EXISTS idx_mentions_entity ON mentions(entity_id);
CREATE INDEX IF NOT EXISTS idx_entities_category ON entities(category);
CREATE INDEX IF NOT EXISTS idx_episodes_chapter ON episodes(chapter_id);
`;

const provenanceListSchema = z
    .array(z.object({ sourceId: z.string(), chapter: z.number().optional() }))
    .catch([]);

const attributesSchema = z.record(z.union([z.string(), z.array(z.string())])).catch({});

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

function unionProvenance(existing: Provenance[], added: Provenance | undefined): Provenance[] {
    if (!added) return existing;
    const key = (p: Provenance) => `${p.sourceId}:${p.chapter ?? ''}`;
    if (existing.some((p) => key(p) === key(added))) return existing;
    return [...existing, added];
}

/** `%term%` LIKE pattern over folded text, with LIKE wildcards escaped */
function likePattern(term: string): string {
    return `%${normalizeTerm(term).replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * A source with its size.
 */
export interface SourceSummary extends SourceRow {
    chapters: number;
    episodes: number;
}

/**
 * How one source speaks about an entity.
 */
export interface SourceAccount {
    source_id: string;
    source_title: string;
    entity_names: string[];
    excerpts: EpisodeExcerpt[];
}

export interface GraphStats {
    sources: number;
    chapters: number;
    episodes: number;
    entities: number;
    relationships: number;
    mentions: number;
    canonicalEntities: number;
    runs: number;
    entitiesByCategory: Record<string, number>;
    relationshipsByType: Record<string, number>;
}

type CountRow = { count: number };

/**
 * Histograph database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and merge-based writes.
 */
export class HistographDatabase implements GraphStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Accent- and case-insensitive comparison key
        this.db.function('fold', { deterministic: true }, (value: unknown) =>
            typeof value === 'string' ? normalizeTerm(value) : null
        );

        this.migrate();

        getModuleLogger('storage').debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getModuleLogger('storage').info('Database migrated to v1');
        }
    }

    // ─── Sources & chapters ───────────────────────────────────

    upsertSource(source: NewSource): string {
        this.db
            .prepare<NewSource>(`
      INSERT OR IGNORE INTO sources (source_id, title, author, year, perspective, language, description)
      VALUES (@source_id, @title, @author, @year, @perspective, @language, @description)
    `)
            .run(source);
        return source.source_id;
    }

    getSource(sourceId: string): SourceRow | undefined {
        return this.db.prepare<[string], SourceRow>('SELECT * FROM sources WHERE source_id = ?').get(sourceId);
    }

    getSourceTitle(sourceId: string): string | undefined {
        return this.getSource(sourceId)?.title;
    }

    listSources(): SourceSummary[] {
        return this.db
            .prepare<[], SourceSummary>(`
      SELECT s.*,
        (SELECT COUNT(*) FROM chapters c WHERE c.source_id = s.source_id) AS chapters,
        (SELECT COUNT(*) FROM episodes e WHERE e.source_id = s.source_id) AS episodes
      FROM sources s
      ORDER BY s.created_at, s.source_id
    `)
            .all();
    }

    /**
     * Chapters are immutable: a chapter id seen before keeps its first row.
     */
    upsertChapter(chapter: NewChapter): string {
        const chapterId = `${chapter.source_id}-ch${chapter.number}`;
        this.db
            .prepare<NewChapter & { chapter_id: string }>(`
      INSERT OR IGNORE INTO chapters (chapter_id, source_id, number, title, filename, word_count, sequence)
      VALUES (@chapter_id, @source_id, @number, @title, @filename, @word_count, @sequence)
    `)
            .run({ ...chapter, chapter_id: chapterId });
        return chapterId;
    }

    // ─── Episodes ─────────────────────────────────────────────

    insertEpisode(episode: NewEpisode): number {
        const result = this.db
            .prepare<NewEpisode>(`
      INSERT INTO episodes (chapter_id, source_id, name, content, word_count, position)
      VALUES (@chapter_id, @source_id, @name, @content, @word_count, @position)
    `)
            .run(episode);
        return Number(result.lastInsertRowid);
    }

    findEpisodesContaining(term: string, limit: number): EpisodeExcerpt[] {
        return this.db
            .prepare<{ pattern: string; limit: number }, EpisodeExcerpt>(`
      SELECT ep.episode_id, ep.name, ep.content,
        s.title AS source_title, c.number AS chapter_number, c.title AS chapter_title
      FROM episodes ep
      JOIN chapters c ON c.chapter_id = ep.chapter_id
      JOIN sources s ON s.source_id = ep.source_id
      WHERE fold(ep.content) LIKE @pattern ESCAPE '\\'
      ORDER BY s.created_at, s.source_id, c.sequence, ep.position
      LIMIT @limit
    `)
            .all({ pattern: likePattern(term), limit });
    }

    // ─── Entities ─────────────────────────────────────────────

    /**
     * Merge an entity on (name, category).
     * Present attributes overwrite stored ones; absent ones keep the stored value.
     * Provenance is unioned.
     */
    upsertEntity(
        name: string,
        category: EntityCategory,
        attributes: EntityAttributes,
        provenance?: Provenance
    ): number {
        const trimmed = name.trim();
        if (!trimmed) {
            throw new Error('Entity name must not be empty');
        }

        const upsert = this.db.transaction((): number => {
            const existing = this.getEntity(trimmed, category);
            const storedAttributes = existing ? attributesSchema.parse(parseJson(existing.attributes_json)) : {};
            const storedSources = existing ? provenanceListSchema.parse(parseJson(existing.sources_json)) : [];

            const row = this.db
                .prepare<
                    {
                        name: string;
                        category: string;
                        role: string | null;
                        nationality: string | null;
                        significance: string | null;
                        attributes_json: string;
                        sources_json: string;
                    },
                    { entity_id: number }
                >(`
        INSERT INTO entities (name, category, role, nationality, significance, attributes_json, sources_json)
        VALUES (@name, @category, @role, @nationality, @significance, @attributes_json, @sources_json)
        ON CONFLICT(name, category) DO UPDATE SET
          role = COALESCE(excluded.role, role),
          nationality = COALESCE(excluded.nationality, nationality),
          significance = COALESCE(excluded.significance, significance),
          attributes_json = excluded.attributes_json,
          sources_json = excluded.sources_json,
          updated_at = datetime('now')
        RETURNING entity_id
      `)
                .get({
                    name: trimmed,
                    category,
                    role: attributes.role ?? null,
                    nationality: attributes.nationality ?? null,
                    significance: attributes.significance ?? null,
                    attributes_json: JSON.stringify({ ...storedAttributes, ...attributes.extra }),
                    sources_json: JSON.stringify(unionProvenance(storedSources, provenance)),
                });

            if (!row) {
                throw new Error(`Upsert of entity "${trimmed}" returned no row`);
            }
            return row.entity_id;
        });

        return upsert();
    }

    getEntity(name: string, category: EntityCategory): EntityRow | undefined {
        return this.db
            .prepare<[string, string], EntityRow>('SELECT * FROM entities WHERE name = ? AND category = ?')
            .get(name, category);
    }

    /**
     * Entities whose name (or canonical name) contains the term.
     * An exact name match ranks first, then the most mentioned.
     */
    findEntitiesMatching(term: string, limit: number, categories?: EntityCategory[]): EntityRow[] {
        return this.db
            .prepare<{ pattern: string; term: string; categories: string | null; limit: number }, EntityRow>(`
      SELECT e.* FROM entities e
      WHERE (fold(e.name) LIKE @pattern ESCAPE '\\' OR fold(COALESCE(e.canonical_name, '')) LIKE @pattern ESCAPE '\\')
        AND (@categories IS NULL OR e.category IN (SELECT value FROM json_each(@categories)))
      ORDER BY
        fold(e.name) = @term DESC,
        (SELECT COUNT(*) FROM mentions m WHERE m.entity_id = e.entity_id) DESC,
        e.entity_id
      LIMIT @limit
    `)
            .all({
                pattern: likePattern(term),
                term: normalizeTerm(term),
                categories: categories && categories.length > 0 ? JSON.stringify(categories) : null,
                limit,
            });
    }

    /**
     * People and organizations whose role contains any of `roles`; when
     * `nationalities` is non-empty, the nationality (or role) must contain one of them too.
     */
    findEntitiesByRole(roles: string[], nationalities: string[], limit: number): EntityRow[] {
        if (roles.length === 0) return [];

        return this.db
            .prepare<{ roles: string; nationalities: string; limit: number }, EntityRow>(`
      SELECT e.* FROM entities e
      WHERE e.category IN ('person', 'organization')
        AND EXISTS (
          SELECT 1 FROM json_each(@roles) r
          WHERE fold(COALESCE(e.role, '')) LIKE '%' || r.value || '%'
        )
        AND (
          json_array_length(@nationalities) = 0
          OR EXISTS (
            SELECT 1 FROM json_each(@nationalities) n
            WHERE fold(COALESCE(e.nationality, '')) LIKE '%' || n.value || '%'
               OR fold(COALESCE(e.role, '')) LIKE '%' || n.value || '%'
          )
        )
      ORDER BY (SELECT COUNT(*) FROM mentions m WHERE m.entity_id = e.entity_id) DESC, e.entity_id
      LIMIT @limit
    `)
            .all({
                roles: JSON.stringify(roles.map(normalizeTerm)),
                nationalities: JSON.stringify(nationalities.map(normalizeTerm)),
                limit,
            });
    }

    /**
     * Events whose name, type or narrative function contains the term.
     */
    findEvents(term: string, limit: number): EntityRow[] {
        return this.db
            .prepare<{ pattern: string; limit: number }, EntityRow>(`
      SELECT e.* FROM entities e
      WHERE e.category = 'event'
        AND (
          fold(e.name) LIKE @pattern ESCAPE '\\'
          OR fold(COALESCE(json_extract(e.attributes_json, '$.narrativeFunction'), '')) LIKE @pattern ESCAPE '\\'
          OR fold(COALESCE(json_extract(e.attributes_json, '$.eventType'), '')) LIKE @pattern ESCAPE '\\'
        )
      ORDER BY e.entity_id
      LIMIT @limit
    `)
            .all({ pattern: likePattern(term), limit });
    }

    /**
     * Most-mentioned entity names, optionally within one category.
     */
    listEntityNames(limit: number, category?: EntityCategory): string[] {
        return this.db
            .prepare<{ category: string | null; limit: number }, { name: string }>(`
      SELECT e.name FROM entities e
      WHERE @category IS NULL OR e.category = @category
      ORDER BY (SELECT COUNT(*) FROM mentions m WHERE m.entity_id = e.entity_id) DESC, e.name
      LIMIT @limit
    `)
            .all({ category: category ?? null, limit })
            .map((row) => row.name);
    }

    // ─── Mentions ─────────────────────────────────────────────

    linkMention(episodeId: number, entityId: number, mention: MentionContext): void {
        this.db
            .prepare<{ episode_id: number; entity_id: number; source_id: string; chapter: number; context: string | null }>(`
      INSERT INTO mentions (episode_id, entity_id, source_id, chapter, context)
      VALUES (@episode_id, @entity_id, @source_id, @chapter, @context)
      ON CONFLICT(episode_id, entity_id) DO UPDATE SET
        context = COALESCE(excluded.context, context)
    `)
            .run({
                episode_id: episodeId,
                entity_id: entityId,
                source_id: mention.sourceId,
                chapter: mention.chapter,
                context: mention.context ?? null,
            });
    }

    // ─── Relationships ────────────────────────────────────────

    /**
     * Resolve an endpoint, creating it when absent.
     * Without a category: exact name first, then the folded name; a new node gets category `other`.
     */
    private resolveEndpoint(ref: EntityRef, provenance: Provenance): number {
        if (ref.category) {
            const existing = this.getEntity(ref.name.trim(), ref.category);
            return existing ? existing.entity_id : this.upsertEntity(ref.name, ref.category, {}, provenance);
        }

        const found = this.db
            .prepare<[string, string], { entity_id: number }>(`
      SELECT entity_id FROM entities
      WHERE name = ? OR fold(name) = ?
      ORDER BY category = 'other', entity_id
      LIMIT 1
    `)
            .get(ref.name.trim(), normalizeTerm(ref.name));

        return found ? found.entity_id : this.upsertEntity(ref.name, 'other', {}, provenance);
    }

    /**
     * Merge a relationship on (from, to, type). Missing endpoints are created first.
     */
    upsertRelationship(
        from: EntityRef,
        to: EntityRef,
        type: RelationshipType,
        attributes: RelationshipAttributes
    ): number {
        const upsert = this.db.transaction((): number => {
            const fromId = this.resolveEndpoint(from, attributes.provenance);
            const toId = this.resolveEndpoint(to, attributes.provenance);

            const existing = this.db
                .prepare<[number, number, string], { provenance_json: string }>(
                    'SELECT provenance_json FROM relationships WHERE from_entity_id = ? AND to_entity_id = ? AND type = ?'
                )
                .get(fromId, toId, type);
            const storedProvenance = existing ? provenanceListSchema.parse(parseJson(existing.provenance_json)) : [];

            const row = this.db
                .prepare<
                    {
                        from_entity_id: number;
                        to_entity_id: number;
                        type: string;
                        category: string;
                        context: string | null;
                        evidence: string | null;
                        provenance_json: string;
                    },
                    { relationship_id: number }
                >(`
        INSERT INTO relationships (from_entity_id, to_entity_id, type, category, context, evidence, provenance_json)
        VALUES (@from_entity_id, @to_entity_id, @type, @category, @context, @evidence, @provenance_json)
        ON CONFLICT(from_entity_id, to_entity_id, type) DO UPDATE SET
          context = COALESCE(excluded.context, context),
          evidence = COALESCE(excluded.evidence, evidence),
          provenance_json = excluded.provenance_json,
          updated_at = datetime('now')
        RETURNING relationship_id
      `)
                .get({
                    from_entity_id: fromId,
                    to_entity_id: toId,
                    type,
                    category: RELATIONSHIP_CATEGORIES[type],
                    context: attributes.context ?? null,
                    evidence: attributes.evidence ?? null,
                    provenance_json: JSON.stringify(unionProvenance(storedProvenance, attributes.provenance)),
                });

            if (!row) {
                throw new Error(`Upsert of relationship ${from.name} -[${type}]-> ${to.name} returned no row`);
            }
            return row.relationship_id;
        });

        return upsert();
    }

    /**
     * Relationships touching an entity, in both directions.
     */
    getRelationshipsFor(entityId: number, limit: number): RelationshipView[] {
        return this.db
            .prepare<{ id: number; limit: number }, RelationshipView>(`
      SELECT r.relationship_id, r.type, r.category, r.context,
        'outgoing' AS direction, o.name AS other_name, o.category AS other_category
      FROM relationships r JOIN entities o ON o.entity_id = r.to_entity_id
      WHERE r.from_entity_id = @id
      UNION ALL
      SELECT r.relationship_id, r.type, r.category, r.context,
        'incoming' AS direction, o.name AS other_name, o.category AS other_category
      FROM relationships r JOIN entities o ON o.entity_id = r.from_entity_id
      WHERE r.to_entity_id = @id
      ORDER BY relationship_id
      LIMIT @limit
    `)
            .all({ id: entityId, limit });
    }

    // ─── Canonical entities ───────────────────────────────────

    upsertCanonicalEntity(canonicalName: string, entityType: EntityCategory, aliases: string[]): number {
        const row = this.db
            .prepare<{ canonical_name: string; entity_type: string; aliases_json: string }, { canonical_id: number }>(`
      INSERT INTO canonical_entities (canonical_name, entity_type, aliases_json)
      VALUES (@canonical_name, @entity_type, @aliases_json)
      ON CONFLICT(canonical_name) DO UPDATE SET aliases_json = excluded.aliases_json
      RETURNING canonical_id
    `)
            .get({ canonical_name: canonicalName, entity_type: entityType, aliases_json: JSON.stringify(aliases) });

        if (!row) {
            throw new Error(`Upsert of canonical entity "${canonicalName}" returned no row`);
        }
        return row.canonical_id;
    }

    /**
     * Point every entity named like the canonical name or one of its aliases
     * (accent- and case-insensitive, exact) at the canonical entity.
     * Returns the number of entities linked.
     */
    linkCanonicalAliases(canonicalId: number): number {
        const canonical = this.db
            .prepare<[number], CanonicalEntityRow>('SELECT * FROM canonical_entities WHERE canonical_id = ?')
            .get(canonicalId);
        if (!canonical) return 0;

        const aliases = z.array(z.string()).catch([]).parse(parseJson(canonical.aliases_json));
        const names = JSON.stringify([canonical.canonical_name, ...aliases].map(normalizeTerm));

        const link = this.db.transaction((): number => {
            const matches = this.db
                .prepare<{ names: string; entity_type: string }, { entity_id: number }>(`
        SELECT entity_id FROM entities
        WHERE fold(name) IN (SELECT value FROM json_each(@names))
          AND category IN (@entity_type, 'other')
      `)
                .all({ names, entity_type: canonical.entity_type });

            const insert = this.db.prepare<[number, number]>(
                'INSERT OR IGNORE INTO entity_interpretations (entity_id, canonical_id) VALUES (?, ?)'
            );
            const update = this.db.prepare<[string, number]>('UPDATE entities SET canonical_name = ? WHERE entity_id = ?');

            for (const { entity_id } of matches) {
                insert.run(entity_id, canonicalId);
                update.run(canonical.canonical_name, entity_id);
            }
            return matches.length;
        });

        return link();
    }

    // ─── Cross-source comparison ──────────────────────────────

    /**
     * Group the episodes mentioning entities that match `term` by source.
     */
    compareEntityAcrossSources(term: string, excerptsPerSource: number): SourceAccount[] {
        const entities = this.findEntitiesMatching(term, 10);
        if (entities.length === 0) return [];

        const rows = this.db
            .prepare<
                { ids: string },
                EpisodeExcerpt & { source_id: string; entity_name: string }
            >(`
      SELECT DISTINCT ep.episode_id, ep.name, ep.content, ep.source_id,
        s.title AS source_title, c.number AS chapter_number, c.title AS chapter_title,
        e.name AS entity_name
      FROM mentions m
      JOIN episodes ep ON ep.episode_id = m.episode_id
      JOIN chapters c ON c.chapter_id = ep.chapter_id
      JOIN sources s ON s.source_id = ep.source_id
      JOIN entities e ON e.entity_id = m.entity_id
      WHERE m.entity_id IN (SELECT value FROM json_each(@ids))
      ORDER BY s.created_at, s.source_id, c.sequence, ep.position
    `)
            .all({ ids: JSON.stringify(entities.map((e) => e.entity_id)) });

        const accounts = new Map<string, SourceAccount>();
        for (const row of rows) {
            let account = accounts.get(row.source_id);
            if (!account) {
                account = { source_id: row.source_id, source_title: row.source_title, entity_names: [], excerpts: [] };
                accounts.set(row.source_id, account);
            }
            if (!account.entity_names.includes(row.entity_name)) {
                account.entity_names.push(row.entity_name);
            }
            if (
                account.excerpts.length < excerptsPerSource &&
                !account.excerpts.some((e) => e.episode_id === row.episode_id)
            ) {
                account.excerpts.push({
                    episode_id: row.episode_id,
                    name: row.name,
                    content: row.content,
                    source_title: row.source_title,
                    chapter_number: row.chapter_number,
                    chapter_title: row.chapter_title,
                });
            }
        }

        return [...accounts.values()];
    }

    // ─── Runs ─────────────────────────────────────────────────

    recordRun(run: Omit<RunRecord, 'run_id' | 'created_at'>): number {
        const result = this.db
            .prepare<Omit<RunRecord, 'run_id' | 'created_at'>>(`
      INSERT INTO runs (histograph_version, config_json, source_id, stats_json)
      VALUES (@histograph_version, @config_json, @source_id, @stats_json)
    `)
            .run(run);
        return Number(result.lastInsertRowid);
    }

    // ─── Stats ────────────────────────────────────────────────

    private count(table: string): number {
        return this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;
    }

    getStats(): GraphStats {
        const byCategory = this.db
            .prepare<[], { category: string; count: number }>('SELECT category, COUNT(*) AS count FROM entities GROUP BY category')
            .all();
        const byType = this.db
            .prepare<[], { type: string; count: number }>('SELECT type, COUNT(*) AS count FROM relationships GROUP BY type')
            .all();

        return {
            sources: this.count('sources'),
            chapters: this.count('chapters'),
            episodes: this.count('episodes'),
            entities: this.count('entities'),
            relationships: this.count('relationships'),
            mentions: this.count('mentions'),
            canonicalEntities: this.count('canonical_entities'),
            runs: this.count('runs'),
            entitiesByCategory: Object.fromEntries(byCategory.map((r) => [r.category, r.count])),
            relationshipsByType: Object.fromEntries(byType.map((r) => [r.type, r.count])),
        };
    }

    // ─── Utilities ────────────────────────────────────────────

    close(): void {
        this.db.close();
        getModuleLogger('storage').debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 database (for advanced queries and tests).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
