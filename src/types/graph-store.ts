import type { EntityAttributes, EntityCategory, EntityRow, Provenance } from './entity.js';
import type { RelationshipType, RelationshipView } from './relationship.js';
import type { EpisodeExcerpt, NewChapter, NewEpisode, NewSource } from './source.js';

/**
 * Reference to a relationship endpoint. Without a category, any entity
 * with that exact name is accepted.
 */
export interface EntityRef {
    name: string;
    category?: EntityCategory;
}

export interface MentionContext {
    sourceId: string;
    chapter: number;
    /** Short text around the mention, if known */
    context?: string;
}

export interface RelationshipAttributes {
    context?: string;
    evidence?: string;
    provenance: Provenance;
}

/**
 * Write side of the graph. Every write is a merge, so repeating an
 * ingestion never duplicates nodes or edges.
 */
export interface GraphWriter {
    /** Create the source if absent; returns its id */
    upsertSource(source: NewSource): string;
    /** Create or refresh a chapter; returns its id */
    upsertChapter(chapter: NewChapter): string;
    /** Always creates a new episode */
    insertEpisode(episode: NewEpisode): number;
    /** Merge on (name, category); returns the entity id */
    upsertEntity(
        name: string,
        category: EntityCategory,
        attributes: EntityAttributes,
        provenance?: Provenance
    ): number;
    /** Idempotent episode → entity edge */
    linkMention(episodeId: number, entityId: number, mention: MentionContext): void;
    /** Creates missing endpoints, then merges on (from, to, type); returns the relationship id */
    upsertRelationship(
        from: EntityRef,
        to: EntityRef,
        type: RelationshipType,
        attributes: RelationshipAttributes
    ): number;
}

/**
 * Read side used at question time. Term matching is case-insensitive,
 * accent-insensitive substring matching.
 */
export interface GraphReader {
    findEntitiesMatching(term: string, limit: number, categories?: EntityCategory[]): EntityRow[];
    getRelationshipsFor(entityId: number, limit: number): RelationshipView[];
    findEntitiesByRole(roles: string[], nationalities: string[], limit: number): EntityRow[];
    findEpisodesContaining(term: string, limit: number): EpisodeExcerpt[];
    findEvents(term: string, limit: number): EntityRow[];
    /** Display title of a source, by id */
    getSourceTitle(sourceId: string): string | undefined;
}

export type GraphStore = GraphWriter & GraphReader;
