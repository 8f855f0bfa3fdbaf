import { RELATIONSHIP_TYPES, RelationshipType } from '../types/index.js';

/**
 * Spellings models commonly produce for vocabulary members.
 */
const TYPE_ALIASES: Readonly<Record<string, RelationshipType>> = {
    COMMANDED: RelationshipType.COMMANDS,
    COMMAND: RelationshipType.COMMANDS,
    LED: RelationshipType.COMMANDS,
    LEADS: RelationshipType.COMMANDS,
    RESCUED: RelationshipType.RESCUES,
    RESCUE: RelationshipType.RESCUES,
    SAVED: RelationshipType.RESCUES,
    SAVES: RelationshipType.RESCUES,
    EVACUATED: RelationshipType.EVACUATES_FROM,
    EVACUATES: RelationshipType.EVACUATES_FROM,
    EVACUATED_FROM: RelationshipType.EVACUATES_FROM,
    LOCATED_AT: RelationshipType.LOCATED_IN,
    LOCATED: RelationshipType.LOCATED_IN,
    LIVED_IN: RelationshipType.LIVES_IN,
    TRAVELED_TO: RelationshipType.TRAVELS_TO,
    TRAVELLED_TO: RelationshipType.TRAVELS_TO,
    ARRIVED_IN: RelationshipType.TRAVELS_TO,
    ESCAPED_FROM: RelationshipType.ESCAPES_FROM,
    FLED_FROM: RelationshipType.ESCAPES_FROM,
    DEFENDED: RelationshipType.DEFENDS,
    ATTACKED: RelationshipType.ATTACKS,
    OCCUPIED: RelationshipType.OCCUPIES,
    CAUSED: RelationshipType.CAUSES,
    PREVENTED: RelationshipType.PREVENTS,
    ENABLED: RelationshipType.ENABLES,
    MOTIVATED: RelationshipType.MOTIVATES,
    INSPIRED: RelationshipType.INSPIRES,
    DESTROYED: RelationshipType.DESTROYS,
    BURNED: RelationshipType.DESTROYS,
    INFLUENCED: RelationshipType.INFLUENCES,
    CONTROLLED: RelationshipType.CONTROLS,
    SERVED: RelationshipType.SERVES,
    REPRESENTED: RelationshipType.REPRESENTS,
    REPORTED_TO: RelationshipType.REPORTS_TO,
    TRUSTED: RelationshipType.TRUSTS,
    BETRAYED: RelationshipType.BETRAYS,
    LOVED: RelationshipType.LOVES,
    MENTORED: RelationshipType.MENTORS,
    PRECEDED: RelationshipType.PRECEDES,
    FOLLOWED: RelationshipType.FOLLOWS,
    TRIGGERED: RelationshipType.TRIGGERS,
    RELATES_TO: RelationshipType.RELATED_TO,
    RELATED: RelationshipType.RELATED_TO,
    ASSOCIATED_WITH: RelationshipType.RELATED_TO,
};

export interface NormalizedType {
    type: RelationshipType;
    /** False when the input was outside the vocabulary and coerced to RELATED_TO */
    known: boolean;
}

/**
 * Map a free-form type string onto the closed vocabulary.
 * "evacuated from" → EVACUATES_FROM, "Commands" → COMMANDS, "HATES" → RELATED_TO (unknown).
 */
export function normalizeRelationshipType(raw: string): NormalizedType {
    const key = raw
        .trim()
        .toUpperCase()
        .replace(/[\s\-/]+/g, '_')
        .replace(/[^A-Z_]/g, '')
        .replace(/^_+|_+$/g, '');

    const member = RELATIONSHIP_TYPES.find((t) => t === key);
    if (member) return { type: member, known: true };

    const alias = TYPE_ALIASES[key];
    if (alias) return { type: alias, known: true };

    return { type: RelationshipType.RELATED_TO, known: false };
}
