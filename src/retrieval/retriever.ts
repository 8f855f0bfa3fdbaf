import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    NO_INFORMATION_FOUND,
    type ContextBlock,
    type EntityRow,
    type GraphReader,
    type RetrievalConfig,
    type RetrievalResult,
} from '../types/index.js';
import { containsPhrase, expandTerms, matchLexiconTerms, type Lexicon } from '../nlp/lexicon.js';
import { normalizeTerm, tokenize } from '../nlp/tokenizer.js';
import { getModuleLogger } from '../utils/logger.js';

const attributesSchema = z.record(z.union([z.string(), z.array(z.string())])).catch({});
const sourcesSchema = z.array(z.object({ sourceId: z.string(), chapter: z.number().optional() })).catch([]);

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return null;
    }
}

function attributeText(value: string | string[] | undefined): string | undefined {
    if (value === undefined) return undefined;
    const text = Array.isArray(value) ? value.join(', ') : value;
    return text.trim() || undefined;
}

/**
 * Search terms of a question.
 */
export interface QuestionTerms {
    /** Lexicon names and places, then their expansions */
    entityTerms: string[];
    /** Content words, in order of appearance */
    words: string[];
    /** Both lists, deduplicated, entity terms first */
    all: string[];
}

/**
 * Assembles a bounded context for a question from the graph.
 *
 * Strategies run in priority order and their blocks keep that order:
 * A. entity profiles (with relationships)
 * B. role-group profiles, when the question names a group ("officials", "military")
 * C. episode excerpts containing the content words, in chapter order
 * D. events whose name or function matches
 */
export class GraphRetriever {
    private readonly options: RetrievalConfig;
    private readonly stopwords: ReadonlySet<string>;

    constructor(
        private readonly store: GraphReader,
        private readonly lexicon: Lexicon,
        options: Partial<RetrievalConfig> = {}
    ) {
        this.options = { ...DEFAULT_CONFIG.retrieval, ...options };
        this.stopwords = new Set(lexicon.stopwords.map(normalizeTerm));
    }

    deriveTerms(question: string): QuestionTerms {
        const words = tokenize(question, this.stopwords);
        const lexiconTerms = matchLexiconTerms(question, this.lexicon);
        const entityTerms = [...new Set([...lexiconTerms, ...expandTerms(words, this.lexicon)])];
        const all = [...new Set([...entityTerms, ...words])];
        return { entityTerms, words, all };
    }

    retrieve(question: string): RetrievalResult {
        const logger = getModuleLogger('retriever');
        const terms = this.deriveTerms(question);
        const entityIds = new Set<number>();

        const profiles = this.profileBlocks(terms.all, entityIds);
        const roleProfiles = this.roleBlocks(question, entityIds);
        const contentTerms = terms.words.length > 0 ? terms.words : terms.entityTerms;
        const excerpts = this.excerptBlocks(contentTerms);
        const events = this.eventBlocks(contentTerms, entityIds);

        const seen = new Set<string>();
        const blocks: ContextBlock[] = [];
        for (const block of [...profiles, ...roleProfiles, ...excerpts, ...events]) {
            if (seen.has(block.text)) continue;
            seen.add(block.text);
            blocks.push(block);
        }
        const kept = blocks.slice(0, this.options.maxBlocks);

        logger.debug(
            {
                terms: terms.all,
                profiles: profiles.length,
                roleProfiles: roleProfiles.length,
                excerpts: excerpts.length,
                events: events.length,
                kept: kept.length,
            },
            'Context assembled'
        );

        if (kept.length === 0) {
            return { found: false, terms: terms.all, context: NO_INFORMATION_FOUND, entitiesFound: 0 };
        }

        const sourceLabels: string[] = [];
        for (const block of kept) {
            if (block.label && !sourceLabels.includes(block.label)) sourceLabels.push(block.label);
        }

        return {
            found: true,
            terms: terms.all,
            blocks: kept,
            context: kept.map((b) => b.text).join('\n\n'),
            entitiesFound: entityIds.size,
            sourceLabels,
        };
    }

    // ─── Strategy A: entity profiles ──────────────────────

    private profileBlocks(terms: string[], entityIds: Set<number>): ContextBlock[] {
        const blocks: ContextBlock[] = [];
        for (const term of terms) {
            for (const entity of this.store.findEntitiesMatching(term, this.options.profilesPerTerm)) {
                entityIds.add(entity.entity_id);
                blocks.push({ kind: 'profile', text: this.formatProfile(entity) });
            }
        }
        return blocks;
    }

    private formatProfile(entity: EntityRow): string {
        const lines = [`AUTHORITATIVE PROFILE: ${entity.name}`, `Category: ${entity.category}`];
        if (entity.role) lines.push(`Role: ${entity.role}`);
        if (entity.nationality) lines.push(`Nationality: ${entity.nationality}`);
        if (entity.significance) lines.push(`Significance: ${entity.significance}`);
        if (entity.canonical_name && entity.canonical_name !== entity.name) {
            lines.push(`Also known as: ${entity.canonical_name}`);
        }

        const attributes = attributesSchema.parse(parseJson(entity.attributes_json));
        for (const [key, value] of Object.entries(attributes)) {
            const text = attributeText(value);
            if (text) lines.push(`${key}: ${text}`);
        }

        const sources = this.sourceLabels(entity.sources_json);
        if (sources.length > 0) lines.push(`Sources: ${sources.join('; ')}`);

        const relationships = this.store.getRelationshipsFor(entity.entity_id, this.options.maxRelationshipsPerProfile);
        if (relationships.length > 0) {
            lines.push('KEY RELATIONSHIPS:');
            for (const rel of relationships) {
                const arrow = rel.direction === 'outgoing' ? '→' : '←';
                const context = rel.context ? `: ${rel.context}` : '';
                lines.push(`  ${arrow} ${rel.type} ${rel.other_name} (${rel.other_category})${context}`);
            }
        }

        return lines.join('\n');
    }

    private sourceLabels(sourcesJson: string): string[] {
        const labels: string[] = [];
        for (const { sourceId, chapter } of sourcesSchema.parse(parseJson(sourcesJson))) {
            const title = this.store.getSourceTitle(sourceId) ?? sourceId;
            const label = chapter === undefined ? title : `${title}, chapter ${chapter}`;
            if (!labels.includes(label)) labels.push(label);
        }
        return labels;
    }

    // ─── Strategy B: role groups ──────────────────────────

    private roleBlocks(question: string, entityIds: Set<number>): ContextBlock[] {
        const groups = this.lexicon.roleGroups.filter((group) =>
            group.keywords.some((keyword) => containsPhrase(question, keyword))
        );
        if (groups.length === 0) return [];

        const nationalities = this.lexicon.nationalities.filter((n) => containsPhrase(question, n));
        const blocks: ContextBlock[] = [];

        for (const group of groups) {
            for (const entity of this.store.findEntitiesByRole(group.roles, nationalities, this.options.roleGroupLimit)) {
                entityIds.add(entity.entity_id);
                const lines = [`PROFILE: ${entity.name}`];
                if (entity.role) lines.push(`Role: ${entity.role}`);
                if (entity.nationality) lines.push(`Nationality: ${entity.nationality}`);
                if (entity.significance) lines.push(`Significance: ${entity.significance}`);
                blocks.push({ kind: 'role-profile', text: lines.join('\n') });
            }
        }
        return blocks;
    }

    // ─── Strategy C: excerpts ─────────────────────────────

    private excerptBlocks(terms: string[]): ContextBlock[] {
        const blocks: ContextBlock[] = [];
        for (const term of terms.slice(0, this.options.maxContentTerms)) {
            for (const episode of this.store.findEpisodesContaining(term, this.options.episodesPerTerm)) {
                const label = `${episode.source_title}, chapter ${episode.chapter_number}`;
                blocks.push({
                    kind: 'excerpt',
                    label,
                    text: `FROM ${episode.name} (${label}):\n${episode.content.slice(0, this.options.excerptChars)}`,
                });
            }
        }
        return blocks;
    }

    // ─── Strategy D: events ───────────────────────────────

    private eventBlocks(terms: string[], entityIds: Set<number>): ContextBlock[] {
        const blocks: ContextBlock[] = [];
        for (const term of terms.slice(0, this.options.maxEventTerms)) {
            for (const event of this.store.findEvents(term, this.options.eventsPerTerm)) {
                entityIds.add(event.entity_id);
                const attributes = attributesSchema.parse(parseJson(event.attributes_json));
                const lines = [`EVENT: ${event.name}`];
                const fields: Array<[string, string | string[] | undefined]> = [
                    ['Type', attributes['eventType']],
                    ['Date', attributes['date']],
                    ['Function', attributes['narrativeFunction']],
                    ['Participants', attributes['participants']],
                    ['Consequences', attributes['consequences']],
                ];
                for (const [label, value] of fields) {
                    const text = attributeText(value);
                    if (text) lines.push(`${label}: ${text}`);
                }
                if (event.significance) lines.push(`Significance: ${event.significance}`);
                blocks.push({ kind: 'event', text: lines.join('\n') });
            }
        }
        return blocks;
    }
}
