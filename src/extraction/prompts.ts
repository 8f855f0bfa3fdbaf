import {
    RELATIONSHIP_CATEGORIES,
    RELATIONSHIP_TYPES,
    type ExtractedEntity,
    type ExtractionContext,
    type ExtractionMode,
    type RelationshipCategory,
} from '../types/index.js';

export const ENTITY_SYSTEM_PROMPT =
    'You are an expert entity extractor for historical texts. Extract key entities from the text. Return only valid JSON.';

export const RELATIONSHIP_SYSTEM_PROMPT =
    'You are an expert in historical analysis. Identify relationships between the given entities. Return only valid JSON.';

/** Entities listed in a relationship prompt */
const MAX_PROMPT_ENTITIES = 20;

const HISTORICAL_SCHEMA = `{
  "people": [{"name": "Full Name", "role": "their role", "nationality": "nationality", "significance": "why important"}],
  "places": [{"name": "Place Name", "type": "city/country/building/ship", "significance": "relevance"}],
  "events": [{"name": "Event Name", "type": "battle/meeting/evacuation/crisis", "date": "when", "participants": ["Name"], "consequences": "outcome"}],
  "organizations": [{"name": "Organization Name", "type": "military/government/relief/religious"}],
  "dates": [{"date": "9 September 1922", "event": "what happened"}]
}`;

const NARRATIVE_SCHEMA = `{
  "characters": [{"name": "Full Name", "role": "protagonist/antagonist/supporting", "nationality": "nationality", "significance": "their part in the story"}],
  "locations": [{"name": "Place Name", "type": "city/building/ship", "significance": "what happens there"}],
  "events": [{"name": "Event Name", "type": "battle/meeting/crisis", "narrative_function": "inciting incident/turning point/climax/resolution", "participants": ["Name"], "consequences": "outcome"}]
}`;

/**
 * One-paragraph description of where a chunk comes from.
 */
export function describeContext(context: ExtractionContext): string {
    const lines = [`Source: ${context.sourceTitle}`, `Chapter ${context.chapterNumber}: ${context.chapterTitle}`];
    if (context.dates.length > 0) {
        lines.push(`Dates mentioned: ${context.dates.join(', ')}`);
    }
    return lines.join('\n');
}

export function buildEntityPrompt(
    text: string,
    context: ExtractionContext,
    mode: ExtractionMode,
    options: { maxChars: number; maxPerCategory: number }
): string {
    const schema = mode === 'narrative' ? NARRATIVE_SCHEMA : HISTORICAL_SCHEMA;

    return `Extract key entities from this historical text:

${text.slice(0, options.maxChars)}

${describeContext(context)}

Return JSON in exactly this format, with at most ${options.maxPerCategory} entries per list:
${schema}

Use full names where the text gives them. Omit fields you do not know.
Return ONLY the JSON.`;
}

function vocabularyByCategory(): string {
    const groups = new Map<RelationshipCategory, string[]>();
    for (const type of RELATIONSHIP_TYPES) {
        const category = RELATIONSHIP_CATEGORIES[type];
        if (category === 'generic') continue;
        const members = groups.get(category) ?? [];
        members.push(type);
        groups.set(category, members);
    }
    return [...groups.entries()].map(([category, types]) => `- ${category}: ${types.join(', ')}`).join('\n');
}

export function buildRelationshipPrompt(
    text: string,
    context: ExtractionContext,
    entities: ExtractedEntity[],
    options: { maxChars: number; maxRelationships: number }
): string {
    const listed = entities
        .slice(0, MAX_PROMPT_ENTITIES)
        .map((e) => `- ${e.name} (${e.kind})`)
        .join('\n');

    return `Identify relationships between these entities in the text below.

Entities:
${listed}

Text:
${text.slice(0, options.maxChars)}

${describeContext(context)}

Use only these relationship types:
${vocabularyByCategory()}

Return at most ${options.maxRelationships} relationships as JSON:
{
  "relationships": [
    {"from": "Entity Name", "to": "Entity Name", "type": "COMMANDS", "context": "one sentence from or about the text", "evidence": "short quote"}
  ]
}

Return ONLY the JSON.`;
}
