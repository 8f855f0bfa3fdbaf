/**
 * Node categories in the graph. `other` is only ever assigned to endpoints
 * created on demand by a relationship whose entity was never extracted.
 */
export type EntityCategory = 'person' | 'place' | 'event' | 'organization' | 'date' | 'other';

// ─── Extracted records (validated model output) ──────────

export interface PersonRecord {
    kind: 'person';
    name: string;
    role?: string;
    nationality?: string;
    significance?: string;
}

export interface PlaceRecord {
    kind: 'place';
    name: string;
    /** city / country / building / ship ... */
    placeType?: string;
    significance?: string;
}

export interface EventRecord {
    kind: 'event';
    name: string;
    eventType?: string;
    date?: string;
    /** What the event does for the story (turning point, climax ...) */
    narrativeFunction?: string;
    participants: string[];
    consequences?: string;
    significance?: string;
}

export interface OrganizationRecord {
    kind: 'organization';
    name: string;
    orgType?: string;
    significance?: string;
}

export interface DateRecord {
    kind: 'date';
    /** The event the date marks, or the date itself when no event was given */
    name: string;
    date: string;
    significance?: string;
}

/**
 * One entity as produced by the extractor. Tagged on `kind`,
 * which doubles as the entity's graph category.
 */
export type ExtractedEntity = PersonRecord | PlaceRecord | EventRecord | OrganizationRecord | DateRecord;

// ─── Stored rows ─────────────────────────────────────────

/**
 * Where a fact was derived from. Unioned, never overwritten.
 */
export interface Provenance {
    sourceId: string;
    chapter?: number;
}

/**
 * Attributes written by `upsertEntity`. Absent fields keep the stored value.
 */
export interface EntityAttributes {
    role?: string;
    nationality?: string;
    significance?: string;
    /** Category-specific extras (placeType, date, participants ...) */
    extra?: Record<string, string | string[]>;
}

/**
 * Entity row as stored in the `entities` table.
 */
export interface EntityRow {
    entity_id: number;
    name: string;
    category: string;
    role: string | null;
    nationality: string | null;
    significance: string | null;
    attributes_json: string;
    sources_json: string;
    canonical_name: string | null;
    created_at: string;
    updated_at: string;
}

/**
 * Canonical alias anchor. Entities point at it, it never owns them.
 */
export interface CanonicalEntityRow {
    canonical_id: number;
    canonical_name: string;
    entity_type: string;
    aliases_json: string;
}
