import { z } from 'zod';
import type {
    DateRecord,
    EventRecord,
    ExtractedEntity,
    ExtractedRelationship,
    OrganizationRecord,
    PersonRecord,
    PlaceRecord,
} from '../types/index.js';
import { normalizeTerm } from '../nlp/tokenizer.js';
import { normalizeRelationshipType } from './relationship-types.js';

// ─── Field helpers ───────────────────────────────────────

const requiredText = z.string().trim().min(1);

/** Present and non-blank, or dropped. Never coerced from other types. */
const optionalText = z.string().trim().min(1).optional().catch(undefined);

const textList = z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
        items.filter((item): item is string => typeof item === 'string').map((s) => s.trim()).filter(Boolean)
    );

// ─── Entity records ──────────────────────────────────────

const personSchema = z
    .object({
        name: requiredText,
        role: optionalText,
        nationality: optionalText,
        significance: optionalText,
        description: optionalText,
    })
    .transform(
        (r): PersonRecord => ({
            kind: 'person',
            name: r.name,
            role: r.role,
            nationality: r.nationality,
            significance: r.significance ?? r.description,
        })
    );

const placeSchema = z
    .object({
        name: requiredText,
        type: optionalText,
        significance: optionalText,
        context: optionalText,
    })
    .transform(
        (r): PlaceRecord => ({
            kind: 'place',
            name: r.name,
            placeType: r.type,
            significance: r.significance ?? r.context,
        })
    );

const eventSchema = z
    .object({
        name: requiredText,
        type: optionalText,
        date: optionalText,
        function: optionalText,
        narrative_function: optionalText,
        participants: textList.optional(),
        consequences: optionalText,
        significance: optionalText,
        importance: optionalText,
    })
    .transform(
        (r): EventRecord => ({
            kind: 'event',
            name: r.name,
            eventType: r.type,
            date: r.date,
            narrativeFunction: r.narrative_function ?? r.function,
            participants: r.participants ?? [],
            consequences: r.consequences,
            significance: r.significance ?? r.importance,
        })
    );

const organizationSchema = z
    .object({
        name: requiredText,
        type: optionalText,
        significance: optionalText,
    })
    .transform(
        (r): OrganizationRecord => ({
            kind: 'organization',
            name: r.name,
            orgType: r.type,
            significance: r.significance,
        })
    );

const dateSchema = z
    .object({
        date: requiredText,
        event: optionalText,
        name: optionalText,
        significance: optionalText,
    })
    .transform(
        (r): DateRecord => ({
            kind: 'date',
            name: r.event ?? r.name ?? r.date,
            date: r.date,
            significance: r.significance,
        })
    );

/**
 * Payload keys understood in either extraction mode, and the schema for their items.
 */
const CATEGORY_SCHEMAS: ReadonlyArray<readonly [string, z.ZodType<ExtractedEntity, z.ZodTypeDef, unknown>]> = [
    ['people', personSchema],
    ['characters', personSchema],
    ['places', placeSchema],
    ['locations', placeSchema],
    ['events', eventSchema],
    ['organizations', organizationSchema],
    ['dates', dateSchema],
];

export interface RejectedRecord {
    category: string;
    record: unknown;
    issue: string;
}

export interface EntityPayload {
    /** At least one known category key was present */
    recognized: boolean;
    entities: ExtractedEntity[];
    rejected: RejectedRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    return issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record';
}

/**
 * Validate an entity payload. Invalid records are rejected one by one;
 * their siblings are kept. At most `maxPerCategory` records per key,
 * and one record per (kind, name).
 */
export function parseEntityPayload(value: unknown, maxPerCategory: number): EntityPayload {
    if (!isRecord(value)) {
        return { recognized: false, entities: [], rejected: [] };
    }

    let recognized = false;
    const entities: ExtractedEntity[] = [];
    const rejected: RejectedRecord[] = [];
    const seen = new Set<string>();

    for (const [category, schema] of CATEGORY_SCHEMAS) {
        const items = value[category];
        if (items === undefined) continue;
        recognized = true;
        if (!Array.isArray(items)) {
            rejected.push({ category, record: items, issue: 'expected a list' });
            continue;
        }

        let accepted = 0;
        for (const item of items) {
            if (accepted >= maxPerCategory) break;

            const parsed = schema.safeParse(item);
            if (!parsed.success) {
                rejected.push({ category, record: item, issue: firstIssue(parsed.error) });
                continue;
            }

            const key = `${parsed.data.kind}:${normalizeTerm(parsed.data.name)}`;
            if (seen.has(key)) continue;
            seen.add(key);
            entities.push(parsed.data);
            accepted++;
        }
    }

    return { recognized, entities, rejected };
}

// ─── Relationships ───────────────────────────────────────

const relationshipSchema = z
    .object({
        from: optionalText,
        source: optionalText,
        to: optionalText,
        target: optionalText,
        type: requiredText,
        context: optionalText,
        description: optionalText,
        evidence: optionalText,
    })
    .superRefine((r, ctx) => {
        if (!(r.from ?? r.source)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing from', path: ['from'] });
        if (!(r.to ?? r.target)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing to', path: ['to'] });
    });

export interface RelationshipPayload {
    recognized: boolean;
    relationships: ExtractedRelationship[];
    rejected: RejectedRecord[];
    /** Types outside the vocabulary, stored as RELATED_TO */
    coerced: string[];
}

/**
 * Validate a relationship payload: `{ "relationships": [...] }` or a bare list.
 * Self-loops and repeated (from, to, type) triples are skipped.
 */
export function parseRelationshipPayload(value: unknown, maxRelationships: number): RelationshipPayload {
    const items = Array.isArray(value) ? value : isRecord(value) ? value['relationships'] : undefined;
    if (!Array.isArray(items)) {
        return { recognized: false, relationships: [], rejected: [], coerced: [] };
    }

    const relationships: ExtractedRelationship[] = [];
    const rejected: RejectedRecord[] = [];
    const coerced: string[] = [];
    const seen = new Set<string>();

    for (const item of items) {
        if (relationships.length >= maxRelationships) break;

        const parsed = relationshipSchema.safeParse(item);
        if (!parsed.success) {
            rejected.push({ category: 'relationships', record: item, issue: firstIssue(parsed.error) });
            continue;
        }

        const from = parsed.data.from ?? parsed.data.source;
        const to = parsed.data.to ?? parsed.data.target;
        if (!from || !to) continue;
        if (normalizeTerm(from) === normalizeTerm(to)) {
            rejected.push({ category: 'relationships', record: item, issue: 'self-referencing relationship' });
            continue;
        }

        const normalized = normalizeRelationshipType(parsed.data.type);
        if (!normalized.known) coerced.push(parsed.data.type);

        const key = `${normalizeTerm(from)}|${normalizeTerm(to)}|${normalized.type}`;
        if (seen.has(key)) continue;
        seen.add(key);

        relationships.push({
            from,
            to,
            type: normalized.type,
            context: parsed.data.context ?? parsed.data.description,
            evidence: parsed.data.evidence,
        });
    }

    return { recognized: true, relationships, rejected, coerced };
}
