/**
 * Closed relationship vocabulary.
 *
 * Personal:  LOVES, TRUSTS, BETRAYS, MENTORS, FAMILY_OF, FRIENDS_WITH, RIVALS_WITH, DEPENDS_ON
 * Power:     COMMANDS, REPORTS_TO, INFLUENCES, CONTROLS, SERVES, REPRESENTS
 * Spatial:   LOCATED_IN, LIVES_IN, TRAVELS_TO, ESCAPES_FROM, EVACUATES_FROM, DEFENDS, ATTACKS, OCCUPIES
 * Temporal:  PRECEDES, FOLLOWS, COINCIDES_WITH, TRIGGERS, RESULTS_FROM, INTERRUPTS
 * Narrative: SYMBOLIZES, FORESHADOWS, PARALLELS, CONTRASTS_WITH, EXEMPLIFIES
 * Causal:    CAUSES, PREVENTS, ENABLES, MOTIVATES, INSPIRES, DESTROYS, RESCUES
 *
 * Anything the model produces outside this list is stored as RELATED_TO.
 */
export enum RelationshipType {
    // Personal
    LOVES = 'LOVES',
    TRUSTS = 'TRUSTS',
    BETRAYS = 'BETRAYS',
    MENTORS = 'MENTORS',
    FAMILY_OF = 'FAMILY_OF',
    FRIENDS_WITH = 'FRIENDS_WITH',
    RIVALS_WITH = 'RIVALS_WITH',
    DEPENDS_ON = 'DEPENDS_ON',

    // Power
    COMMANDS = 'COMMANDS',
    REPORTS_TO = 'REPORTS_TO',
    INFLUENCES = 'INFLUENCES',
    CONTROLS = 'CONTROLS',
    SERVES = 'SERVES',
    REPRESENTS = 'REPRESENTS',

    // Spatial
    LOCATED_IN = 'LOCATED_IN',
    LIVES_IN = 'LIVES_IN',
    TRAVELS_TO = 'TRAVELS_TO',
    ESCAPES_FROM = 'ESCAPES_FROM',
    EVACUATES_FROM = 'EVACUATES_FROM',
    DEFENDS = 'DEFENDS',
    ATTACKS = 'ATTACKS',
    OCCUPIES = 'OCCUPIES',

    // Temporal
    PRECEDES = 'PRECEDES',
    FOLLOWS = 'FOLLOWS',
    COINCIDES_WITH = 'COINCIDES_WITH',
    TRIGGERS = 'TRIGGERS',
    RESULTS_FROM = 'RESULTS_FROM',
    INTERRUPTS = 'INTERRUPTS',

    // Narrative
    SYMBOLIZES = 'SYMBOLIZES',
    FORESHADOWS = 'FORESHADOWS',
    PARALLELS = 'PARALLELS',
    CONTRASTS_WITH = 'CONTRASTS_WITH',
    EXEMPLIFIES = 'EXEMPLIFIES',

    // Causal
    CAUSES = 'CAUSES',
    PREVENTS = 'PREVENTS',
    ENABLES = 'ENABLES',
    MOTIVATES = 'MOTIVATES',
    INSPIRES = 'INSPIRES',
    DESTROYS = 'DESTROYS',
    RESCUES = 'RESCUES',

    // Fallback
    RELATED_TO = 'RELATED_TO',
}

export type RelationshipCategory =
    | 'personal'
    | 'power'
    | 'spatial'
    | 'temporal'
    | 'narrative'
    | 'causal'
    | 'generic';

export const RELATIONSHIP_CATEGORIES: Readonly<Record<RelationshipType, RelationshipCategory>> = {
    [RelationshipType.LOVES]: 'personal',
    [RelationshipType.TRUSTS]: 'personal',
    [RelationshipType.BETRAYS]: 'personal',
    [RelationshipType.MENTORS]: 'personal',
    [RelationshipType.FAMILY_OF]: 'personal',
    [RelationshipType.FRIENDS_WITH]: 'personal',
    [RelationshipType.RIVALS_WITH]: 'personal',
    [RelationshipType.DEPENDS_ON]: 'personal',
    [RelationshipType.COMMANDS]: 'power',
    [RelationshipType.REPORTS_TO]: 'power',
    [RelationshipType.INFLUENCES]: 'power',
    [RelationshipType.CONTROLS]: 'power',
    [RelationshipType.SERVES]: 'power',
    [RelationshipType.REPRESENTS]: 'power',
    [RelationshipType.LOCATED_IN]: 'spatial',
    [RelationshipType.LIVES_IN]: 'spatial',
    [RelationshipType.TRAVELS_TO]: 'spatial',
    [RelationshipType.ESCAPES_FROM]: 'spatial',
    [RelationshipType.EVACUATES_FROM]: 'spatial',
    [RelationshipType.DEFENDS]: 'spatial',
    [RelationshipType.ATTACKS]: 'spatial',
    [RelationshipType.OCCUPIES]: 'spatial',
    [RelationshipType.PRECEDES]: 'temporal',
    [RelationshipType.FOLLOWS]: 'temporal',
    [RelationshipType.COINCIDES_WITH]: 'temporal',
    [RelationshipType.TRIGGERS]: 'temporal',
    [RelationshipType.RESULTS_FROM]: 'temporal',
    [RelationshipType.INTERRUPTS]: 'temporal',
    [RelationshipType.SYMBOLIZES]: 'narrative',
    [RelationshipType.FORESHADOWS]: 'narrative',
    [RelationshipType.PARALLELS]: 'narrative',
    [RelationshipType.CONTRASTS_WITH]: 'narrative',
    [RelationshipType.EXEMPLIFIES]: 'narrative',
    [RelationshipType.CAUSES]: 'causal',
    [RelationshipType.PREVENTS]: 'causal',
    [RelationshipType.ENABLES]: 'causal',
    [RelationshipType.MOTIVATES]: 'causal',
    [RelationshipType.INSPIRES]: 'causal',
    [RelationshipType.DESTROYS]: 'causal',
    [RelationshipType.RESCUES]: 'causal',
    [RelationshipType.RELATED_TO]: 'generic',
};

/** Every member of the vocabulary, in declaration order */
export const RELATIONSHIP_TYPES: readonly RelationshipType[] = Object.values(RelationshipType);

/**
 * A relationship as produced by the extractor, endpoints still by name.
 */
export interface ExtractedRelationship {
    from: string;
    to: string;
    type: RelationshipType;
    context?: string;
    evidence?: string;
}

/**
 * A relationship seen from one of its endpoints, with the other side's name resolved.
 */
export interface RelationshipView {
    relationship_id: number;
    type: string;
    category: string;
    direction: 'outgoing' | 'incoming';
    other_name: string;
    other_category: string;
    context: string | null;
}
