import type { ExtractedEntity } from './entity.js';
import type { ExtractedRelationship } from './relationship.js';

/**
 * What the extractor is told about the chunk it is reading.
 */
export interface ExtractionContext {
    sourceId: string;
    sourceTitle: string;
    chapterNumber: number;
    chapterTitle: string;
    /** Dates found in the chapter, as written */
    dates: string[];
}

/** How a result was obtained */
export type ExtractionMethod = 'model' | 'pattern' | 'none';

export interface EntityExtractionResult {
    entities: ExtractedEntity[];
    method: ExtractionMethod;
    /** The payload was truncated and had to be closed off */
    repaired: boolean;
    /** Records rejected by validation */
    dropped: number;
}

export interface RelationshipExtractionResult {
    relationships: ExtractedRelationship[];
    method: ExtractionMethod;
    /** Types outside the vocabulary, stored as RELATED_TO */
    coerced: number;
    dropped: number;
}

/**
 * Turns chunk text into typed records. Implementations never throw:
 * a failed call yields an empty result.
 */
export interface EntityExtractor {
    extractEntities(text: string, context: ExtractionContext): Promise<EntityExtractionResult>;
    extractRelationships(
        text: string,
        context: ExtractionContext,
        entities: ExtractedEntity[]
    ): Promise<RelationshipExtractionResult>;
}
