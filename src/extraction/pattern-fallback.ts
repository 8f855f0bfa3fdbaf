import {
    RelationshipType,
    type DateRecord,
    type ExtractedEntity,
    type ExtractedRelationship,
    type PersonRecord,
    type PlaceRecord,
} from '../types/index.js';
import { findDates } from '../nlp/chapter.js';
import { containsPhrase, knownPersonNames, type Lexicon } from '../nlp/lexicon.js';
import { normalizeTerm } from '../nlp/tokenizer.js';

/** One to three capitalized words: "Jennings", "Admiral Mark Bristol", "A.K. Jennings" */
const NAME = String.raw`\p{Lu}[\p{L}'’.-]*(?:[ \t]+\p{Lu}[\p{L}'’.-]*){0,2}`;

/** Relationships the fallback reports per call */
const MAX_PATTERN_RELATIONSHIPS = 5;

const VERB_PATTERNS: ReadonlyArray<readonly [string, RelationshipType]> = [
    [String.raw`(?:commanded|commands|led)\s+(?:the\s+)?`, RelationshipType.COMMANDS],
    [String.raw`(?:evacuated|evacuates)\b[^.]*?\bfrom\s+(?:the\s+)?`, RelationshipType.EVACUATES_FROM],
    [String.raw`(?:rescued|rescues|saved)\s+(?:the\s+)?`, RelationshipType.RESCUES],
    [String.raw`(?:arrived|landed)\s+(?:in|at)\s+(?:the\s+)?`, RelationshipType.TRAVELS_TO],
    [String.raw`(?:travelled|traveled|sailed|returned)\s+to\s+(?:the\s+)?`, RelationshipType.TRAVELS_TO],
    [String.raw`(?:fled|escaped)\s+(?:from\s+)?(?:the\s+)?`, RelationshipType.ESCAPES_FROM],
    [String.raw`(?:lived|lives|resided)\s+in\s+`, RelationshipType.LIVES_IN],
    [String.raw`(?:attacked|attacks)\s+(?:the\s+)?`, RelationshipType.ATTACKS],
    [String.raw`(?:occupied|occupies|entered)\s+(?:the\s+)?`, RelationshipType.OCCUPIES],
    [String.raw`(?:destroyed|burned)\s+(?:the\s+)?`, RelationshipType.DESTROYS],
    [String.raw`(?:represented|represents)\s+(?:the\s+)?`, RelationshipType.REPRESENTS],
    [String.raw`reported\s+to\s+`, RelationshipType.REPORTS_TO],
];

const RELATION_PATTERNS: ReadonlyArray<{ pattern: RegExp; type: RelationshipType }> = VERB_PATTERNS.map(
    ([verb, type]) => ({ pattern: new RegExp(`(${NAME})\\s+${verb}(${NAME})`, 'gu'), type })
);

/**
 * Drop leading sentence words ("When Jennings" → "Jennings") and
 * trailing punctuation, keeping initials such as "A.K.".
 */
function trimName(raw: string, stopwords: ReadonlySet<string>): string {
    const words = raw.split(/\s+/);
    while (words.length > 0 && stopwords.has((words[0] ?? '').toLowerCase())) {
        words.shift();
    }
    const last = words.pop();
    if (last !== undefined) {
        words.push(/^(?:\p{Lu}\.)+$/u.test(last) ? last : last.replace(/[.'’-]+$/, ''));
    }
    return words.join(' ').trim();
}

function personTokens(lexicon: Lexicon): Set<string> {
    const honorifics = new Set(lexicon.honorifics.map(normalizeTerm));
    const tokens = new Set<string>();
    for (const name of knownPersonNames(lexicon)) {
        for (const word of name.split(/\s+/)) {
            const token = normalizeTerm(word.replace(/\.$/, ''));
            if (token.length > 3 && !honorifics.has(token)) tokens.add(token);
        }
    }
    return tokens;
}

/**
 * Degraded extraction used when the model reply cannot be parsed:
 * capitalized names carrying a known surname or an honorific, lexicon
 * places, and explicit dates.
 */
export function extractEntitiesByPattern(text: string, lexicon: Lexicon, maxPerCategory: number): ExtractedEntity[] {
    const stopwords = new Set(lexicon.stopwords);
    const honorifics = new Set(lexicon.honorifics.map(normalizeTerm));
    const markers = personTokens(lexicon);
    const placeNames = new Set(lexicon.places.map(normalizeTerm));

    const people: PersonRecord[] = [];
    const seen = new Set<string>();
    for (const match of text.matchAll(new RegExp(NAME, 'gu'))) {
        if (people.length >= maxPerCategory) break;

        const name = trimName(match[0], stopwords);
        const key = normalizeTerm(name);
        if (name.length <= 3 || seen.has(key) || placeNames.has(key)) continue;

        const words = key.split(/\s+/);
        const first = (words[0] ?? '').replace(/\.$/, '');
        const hasHonorific = words.length >= 2 && honorifics.has(first);
        const hasMarker = words.some((w) => markers.has(w));
        if (!hasHonorific && !hasMarker) continue;

        seen.add(key);
        people.push({ kind: 'person', name });
    }

    const places: PlaceRecord[] = lexicon.places
        .filter((place) => containsPhrase(text, place))
        .slice(0, maxPerCategory)
        .map((name) => ({ kind: 'place', name }));

    const dates: DateRecord[] = findDates(text, maxPerCategory).map((date) => ({ kind: 'date', name: date, date }));

    return [...people, ...places, ...dates];
}

/**
 * Entity name a captured phrase refers to: exact match first, then an
 * entity named inside the phrase, then an entity whose name contains it.
 */
function resolveEndpoint(phrase: string, entities: readonly ExtractedEntity[]): string | undefined {
    const normalized = normalizeTerm(phrase);
    const exact = entities.find((e) => normalizeTerm(e.name) === normalized);
    if (exact) return exact.name;

    const named = entities.find((e) => containsPhrase(phrase, e.name));
    if (named) return named.name;

    return entities.find((e) => containsPhrase(e.name, phrase))?.name;
}

/**
 * Verb-pattern relationships ("X evacuated refugees from Y") between known entities.
 * Texts are searched in order; at most five relationships are returned.
 */
export function extractRelationshipsByPattern(
    texts: readonly string[],
    entities: readonly ExtractedEntity[]
): ExtractedRelationship[] {
    const found: ExtractedRelationship[] = [];
    const seen = new Set<string>();

    for (const text of texts) {
        for (const { pattern, type } of RELATION_PATTERNS) {
            for (const match of text.matchAll(pattern)) {
                if (found.length >= MAX_PATTERN_RELATIONSHIPS) return found;

                const from = resolveEndpoint(match[1] ?? '', entities);
                const to = resolveEndpoint(match[2] ?? '', entities);
                if (!from || !to || from === to) continue;

                const key = `${from}|${to}|${type}`;
                if (seen.has(key)) continue;
                seen.add(key);

                found.push({ from, to, type, evidence: match[0].trim() });
            }
        }
    }

    return found;
}
