import {
    DEFAULT_CONFIG,
    type EntityExtractionResult,
    type EntityExtractor,
    type ExtractedEntity,
    type ExtractionConfig,
    type ExtractionContext,
    type LlmProvider,
    type RelationshipExtractionResult,
} from '../types/index.js';
import type { Lexicon } from '../nlp/lexicon.js';
import { getModuleLogger } from '../utils/logger.js';
import { looksTruncated, parseStructuredPayload } from './json-scanner.js';
import { extractEntitiesByPattern, extractRelationshipsByPattern } from './pattern-fallback.js';
import {
    ENTITY_SYSTEM_PROMPT,
    RELATIONSHIP_SYSTEM_PROMPT,
    buildEntityPrompt,
    buildRelationshipPrompt,
} from './prompts.js';
import { parseEntityPayload, parseRelationshipPayload } from './schemas.js';

/**
 * Model-backed extractor with a validating parse step.
 *
 * Each call is independent. A failed model call yields an empty result;
 * an unparseable reply falls back to pattern matching over the text.
 */
export class StructuredExtractor implements EntityExtractor {
    private readonly options: ExtractionConfig;

    constructor(
        private readonly llm: LlmProvider,
        private readonly lexicon: Lexicon,
        options: Partial<ExtractionConfig> = {}
    ) {
        this.options = { ...DEFAULT_CONFIG.extraction, ...options };
    }

    async extractEntities(text: string, context: ExtractionContext): Promise<EntityExtractionResult> {
        const logger = getModuleLogger('extractor');
        const prompt = buildEntityPrompt(text, context, this.options.mode, {
            maxChars: this.options.maxPromptChars,
            maxPerCategory: this.options.maxEntitiesPerCategory,
        });

        const reply = await this.ask(prompt, ENTITY_SYSTEM_PROMPT, this.options.entityMaxTokens, context, 'entities');
        if (reply === null) {
            return { entities: [], method: 'none', repaired: false, dropped: 0 };
        }

        const payload = parseStructuredPayload(reply);
        if (payload) {
            const parsed = parseEntityPayload(payload.value, this.options.maxEntitiesPerCategory);
            if (parsed.recognized) {
                for (const rejected of parsed.rejected) {
                    logger.warn(
                        { chapter: context.chapterNumber, category: rejected.category, record: rejected.record, issue: rejected.issue },
                        'Dropped invalid entity record'
                    );
                }
                if (payload.repaired) {
                    logger.warn({ chapter: context.chapterNumber }, 'Entity reply was truncated; kept the complete records');
                }
                return {
                    entities: parsed.entities,
                    method: 'model',
                    repaired: payload.repaired,
                    dropped: parsed.rejected.length,
                };
            }
        }

        logger.warn(
            { chapter: context.chapterNumber, truncated: looksTruncated(reply), preview: reply.slice(0, 200) },
            'Unparseable entity reply, falling back to pattern extraction'
        );
        const entities = extractEntitiesByPattern(text, this.lexicon, this.options.maxEntitiesPerCategory);
        return {
            entities,
            method: entities.length > 0 ? 'pattern' : 'none',
            repaired: false,
            dropped: 0,
        };
    }

    async extractRelationships(
        text: string,
        context: ExtractionContext,
        entities: ExtractedEntity[]
    ): Promise<RelationshipExtractionResult> {
        const logger = getModuleLogger('extractor');
        const empty: RelationshipExtractionResult = { relationships: [], method: 'none', coerced: 0, dropped: 0 };

        if (entities.length < 2) return empty;

        const prompt = buildRelationshipPrompt(text, context, entities, {
            maxChars: this.options.relationshipPromptChars,
            maxRelationships: this.options.maxRelationships,
        });

        const reply = await this.ask(
            prompt,
            RELATIONSHIP_SYSTEM_PROMPT,
            this.options.relationshipMaxTokens,
            context,
            'relationships'
        );
        if (reply === null) return empty;

        const payload = parseStructuredPayload(reply);
        if (payload) {
            const parsed = parseRelationshipPayload(payload.value, this.options.maxRelationships);
            if (parsed.recognized) {
                for (const rejected of parsed.rejected) {
                    logger.warn(
                        { chapter: context.chapterNumber, record: rejected.record, issue: rejected.issue },
                        'Dropped invalid relationship record'
                    );
                }
                if (parsed.coerced.length > 0) {
                    logger.info({ chapter: context.chapterNumber, types: parsed.coerced }, 'Unknown relationship types stored as RELATED_TO');
                }
                return {
                    relationships: parsed.relationships,
                    method: 'model',
                    coerced: parsed.coerced.length,
                    dropped: parsed.rejected.length,
                };
            }
        }

        logger.warn(
            { chapter: context.chapterNumber, truncated: looksTruncated(reply) },
            'Unparseable relationship reply, falling back to pattern extraction'
        );
        const relationships = extractRelationshipsByPattern([reply, text], entities);
        return {
            relationships,
            method: relationships.length > 0 ? 'pattern' : 'none',
            coerced: 0,
            dropped: 0,
        };
    }

    /**
     * One model call. Transport and response errors are logged and turned into null.
     */
    private async ask(
        prompt: string,
        systemPrompt: string,
        maxTokens: number,
        context: ExtractionContext,
        stage: 'entities' | 'relationships'
    ): Promise<string | null> {
        try {
            const result = await this.llm.complete(prompt, {
                systemPrompt,
                maxTokens,
                temperature: this.options.temperature,
                jsonMode: this.options.jsonMode,
            });
            return result.text;
        } catch (error) {
            getModuleLogger('extractor').error(
                { error, stage, source: context.sourceId, chapter: context.chapterNumber },
                'Extraction call failed'
            );
            return null;
        }
    }
}
